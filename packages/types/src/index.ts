export * from './auth.schema.js';
export * from './session.schema.js';
export * from './user.schema.js';
