/**
 * Per-call options for bus operations
 */
export interface CallOptions {
  // Aborting cancels the underlying call
  signal?: AbortSignal;
}
