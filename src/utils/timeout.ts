import { OperationTimeoutError, type TimedOperation } from "../errors.js";

/**
 * Runs `fn` with a signal that aborts when `timeoutMs` elapses or `parent`
 * aborts, whichever comes first. A timeout rejects with OperationTimeoutError;
 * a parent abort rejects with the parent's reason.
 */
export async function withTimeout<T>(
  operation: TimedOperation,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new OperationTimeoutError(operation, timeoutMs)),
    timeoutMs,
  );

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
      once: true,
    });
  });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
