import { OperationCancelledError } from './errors.js';

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(
      'Operation was cancelled',
      signal.reason instanceof Error ? signal.reason : undefined,
    );
  }
}

/** Combines an optional caller signal with a per-call timeout. */
export function withTimeout(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
