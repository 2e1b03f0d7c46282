export { initializeAuditLogging } from './audit-logger.js';
