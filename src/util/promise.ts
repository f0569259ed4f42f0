import { TimedoutJobException } from '../exceptions/timedout.job.exception.js';
import { PromiseOrDirect } from './util.types.js';

export interface TimeoutPromise<T> {
  controller: AbortController;
  promise: Promise<T>;
}

/**
 * Runs `work` with a hard deadline. When the deadline passes the returned
 * promise rejects with `TimedoutJobException` and the signal handed to `work`
 * is aborted, so the work can tear down whatever it started.
 */
export const createTimeoutPromise = <T>(
  work: (signal: AbortSignal) => PromiseOrDirect<T>,
  timeout: number,
): TimeoutPromise<T> => {
  const controller = new AbortController();

  const timeoutId = setTimeout(
    () => controller.abort(new TimedoutJobException(timeout)),
    timeout,
  );

  const returnPromise = new Promise<T>((resolve, reject) => {
    const abortHandler = () => {
      clearTimeout(timeoutId);
      reject(controller.signal.reason);
    };
    controller.signal.addEventListener('abort', abortHandler);
    const promise = (async () => await work(controller.signal))();
    promise
      .then((result) => {
        resolve(result);
      })
      .catch((error: unknown) => {
        reject(error);
      })
      .finally(() => {
        clearTimeout(timeoutId);
        controller.signal.removeEventListener('abort', abortHandler);
      });
  });

  return { promise: returnPromise, controller };
};

/**
 * Runs the function `fn`
 * and retries automatically if it fails.
 *
 * Tries max `1 + retries` times
 * with `retryIntervalMs` milliseconds between retries.
 */
export const retry = async <T>(
  fn: () => Promise<T> | T,
  { retries, retryIntervalMs }: { retries: number; retryIntervalMs: number },
): Promise<T> => {
  try {
    return await fn();
  } catch (error) {
    if (retries <= 0) {
      throw error;
    }
    await sleep(retryIntervalMs);
    return retry(fn, { retries: retries - 1, retryIntervalMs });
  }
};

export const sleep = (waitTimeInMs = 0) =>
  new Promise<void>((resolve) => setTimeout(resolve, waitTimeInMs));

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
