/**
 * Cache Models
 *
 * Type definitions for the on-disk response cache.
 */

/**
 * Persisted cache record
 */
export interface CacheEntry {
  key: string;
  expires_at: number;                // Unix seconds
  body: unknown;                     // Parsed JSON response body
}

/**
 * Internal lookup outcome. `unavailable` means storage failed and is
 * reported to callers as a miss.
 */
export type CacheLookup =
  | { status: 'hit'; body: unknown }
  | { status: 'miss' }
  | { status: 'unavailable'; error: Error };

/**
 * Cache statistics
 */
export interface CacheStats {
  total: number;
  active: number;
  expired: number;
  sizeBytes: number;
}
