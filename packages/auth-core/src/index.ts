export * from './types.js';
export * from './errors.js';
export { extractBearerToken } from './bearer.js';
export {
  loadAuthCoreConfig,
  DEFAULT_JWT_ISSUER,
  DEFAULT_CACHE_TIMEOUT_MS,
  MIN_JWT_SECRET_LENGTH,
  type AuthCoreConfig,
  type RevocationFailurePolicy,
} from './config.js';
export {
  InfrastructureGuard,
  OperationTimeoutError,
  withTimeout,
  type InfrastructureGuardOptions,
} from './infrastructure.js';
export {
  RedisRevocationStore,
  createUpstashRevocationStore,
  tokenBlacklistKey,
  userBlacklistKey,
  type RevocationCacheClient,
  type RevocationStore,
} from './revocation-store.js';
export { TokenIssuer, type TokenIssuerOptions } from './token-issuer.js';
