/**
 * @llamahost/auth - Type definitions
 */

/**
 * Privilege level a credential grants. Admin satisfies standard.
 */
export type CredentialTier = "standard" | "admin";

/**
 * Privilege level a route requires
 */
export type AccessTier = "public" | CredentialTier;

/**
 * Configured key sets, loaded once at startup
 */
export interface CredentialSet {
  standardKeys: readonly string[];
  adminKeys: readonly string[];
}

/**
 * Static classification of one route
 */
export interface RouteAccessRule {
  method: string;
  /** Express-style path, `:param` segments match any single segment */
  path: string;
  tier: AccessTier;
}

/**
 * Identity attached to an authenticated request
 */
export interface RequestAuth {
  tier: CredentialTier;
  /** First 8 hex chars of the key's SHA-256, safe to log */
  keyId: string;
}

/**
 * Options for auth middleware creation
 */
export interface AuthMiddlewareOptions {
  /** Route classification table */
  routes: readonly RouteAccessRule[];
  /** Tier required for requests matching no rule */
  defaultTier?: AccessTier;
  /** Custom logger function */
  logger?: (level: "info" | "warn" | "error", message: string) => void;
}
