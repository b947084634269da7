import type { RateLimitEntry } from "./repository-types.js";

export interface IRateLimitRepository {
  /**
   * Count one request for key + scope and return the updated entry.
   * If the current window has expired (now - windowStart >= windowMs), the
   * counter restarts at 1 in a new window opening at `now`.
   * Atomic: concurrent increments never lose a count.
   */
  increment(key: string, scope: string, windowMs: number, now?: number): Promise<RateLimitEntry>;

  /** Delete entries whose window started more than windowMs ago. */
  purgeStale(windowMs: number, now?: number): Promise<number>;
}
