/**
 * Abstraction for wall-clock time.
 * Transfer rates and start timestamps read from it.
 */
export interface Clock {
  /** Current timestamp in milliseconds */
  now(): number;
}
