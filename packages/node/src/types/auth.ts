/**
 * Authentication types.
 *
 * The transport only establishes who the caller is. What they may do
 * in a vault is decided by the vault's membership in the engine.
 */

/**
 * Resolved caller, set by the auth middleware.
 *
 * - `api-key`: X-Api-Key matched a configured key
 * - `header`: unsecured mode, X-User named the caller
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly username: string;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly username: string;
}
