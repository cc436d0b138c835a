// ═══════════════════════════════════════════════════════════════
// Warden :: Deadlines
// ═══════════════════════════════════════════════════════════════

import { TimeoutError } from './errors.js';

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with TimeoutError at the deadline even if `fn` ignores the signal.
 */
export async function runWithTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(operation, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
