import type { CallOptions, StoragePort } from '../../interfaces/storage';
import { TimeoutError } from '../../utils/errors';

/**
 * Settles with `call`, or rejects with TimeoutError once `timeoutMs` has
 * passed. The signal handed to `call` is aborted at that point, and also
 * when `parent` aborts.
 */
export async function withTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    forwardAbort();
  } else {
    parent?.addEventListener('abort', forwardAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });
  try {
    return await Promise.race([call(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}

async function settleWithin<T, E>(
  call: (
    signal: AbortSignal,
  ) => Promise<{ success: true; value: T } | { success: false; error: E }>,
  timeoutMs: number,
  operation: string,
  parent?: AbortSignal,
): Promise<
  { success: true; value: T } | { success: false; error: E | TimeoutError }
> {
  try {
    return await withTimeout(call, timeoutMs, operation, parent);
  } catch (error) {
    if (error instanceof TimeoutError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Wraps every call of `port` in a timeout. Result-returning calls report a
 * timeout as a failed result; `list` rejects with it. A timed-out call is
 * aborted, which kills the provider's child process.
 */
export function withCallTimeouts(
  port: StoragePort,
  timeoutMs: number,
): StoragePort {
  return {
    provider: port.provider,
    isAuthenticated: () => port.isAuthenticated(),
    authenticate: (options: CallOptions = {}) =>
      settleWithin(
        (signal) => port.authenticate({ signal }),
        timeoutMs,
        `${port.provider} authenticate`,
        options.signal,
      ),
    put: (item, options: CallOptions = {}) =>
      settleWithin(
        (signal) => port.put(item, { signal }),
        timeoutMs,
        `upload of ${item.remoteKey}`,
        options.signal,
      ),
    list: (options: CallOptions = {}) =>
      withTimeout(
        (signal) => port.list({ signal }),
        timeoutMs,
        `${port.provider} list`,
        options.signal,
      ),
    delete: (ref, options: CallOptions = {}) =>
      settleWithin(
        (signal) => port.delete(ref, { signal }),
        timeoutMs,
        `delete of ${ref.key}`,
        options.signal,
      ),
  };
}
