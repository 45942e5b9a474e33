/**
 * @llamahost/auth - Bearer key authentication for llamahost services
 *
 * This package provides:
 * - A credential store holding standard and admin key sets
 * - Express middleware that enforces a static route-tier table
 * - Key helpers (fingerprints, generation, parsing)
 *
 * @example
 * ```typescript
 * import { createAuthMiddleware, createCredentialStore } from '@llamahost/auth';
 *
 * const store = createCredentialStore({ standardKeys: ['sk-one'], adminKeys: ['sk-admin'] });
 * const auth = createAuthMiddleware(store, {
 *   routes: [
 *     { method: 'GET', path: '/v1/models', tier: 'standard' },
 *     { method: 'POST', path: '/admin/reload', tier: 'admin' },
 *   ],
 * });
 *
 * app.use(auth.authenticate);
 * app.post('/admin/reload', auth.requireTier('admin'), reloadHandler);
 * ```
 */

export type {
  AccessTier,
  CredentialTier,
  CredentialSet,
  RouteAccessRule,
  RequestAuth,
  AuthMiddlewareOptions,
} from "./types.js";

export { createCredentialStore, type CredentialStore } from "./credentials.js";

export {
  createAuthMiddleware,
  compileRoutePath,
  UnauthorizedError,
  ForbiddenError,
  type AuthMiddleware,
} from "./middleware.js";

export {
  keyFingerprint,
  generateApiKey,
  parseKeyList,
  parseBearerToken,
} from "./utils.js";
