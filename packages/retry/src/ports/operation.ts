/** Synchronous operation; a thrown value is the failure. */
export type BlockingOperation<T> = () => T

/**
 * Asynchronous operation: an already-started promise, or a factory that is
 * only called once the attempt is due. The factory receives a signal that
 * aborts when the attempt is abandoned.
 */
export type AsyncOperation<T> =
  | PromiseLike<T>
  | ((signal: AbortSignal) => PromiseLike<T>)

export type TryAsyncOptions = {
  /** Aborting releases a pending wait or attempt and rejects with the signal's reason */
  signal?: AbortSignal
}
