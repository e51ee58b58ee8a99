// ============================================================================
// SIGNING CORE
// ============================================================================

export * from './hmac';

// ============================================================================
// CONFIGURATION
// ============================================================================

export { loadHmacConfig, loadVerifierOptions, parseMethodList } from './config';

// ============================================================================
// ADAPTERS
// ============================================================================

// Express (inbound verification)
export {
  HmacAuthenticatedRequest,
  HmacAuthHandlers,
  HmacAuthConfig,
  createHmacAuthMiddleware,
  requestDetailsFromExpress,
} from './middleware/hmac-auth.middleware';

// axios (outbound signing)
export {
  SigningInterceptorOptions,
  RequestInterceptor,
  createSigningInterceptor,
  attachHmacSigning,
  requestDetailsFromAxios,
  requestPath,
} from './http-client/signing-interceptor';

// ============================================================================
// LOGGING
// ============================================================================

export { logger, createChildLogger } from './utils/logger';
