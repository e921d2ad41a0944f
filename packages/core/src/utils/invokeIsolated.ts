export const isPromiseLike = (value: unknown): value is PromiseLike<unknown> =>
  typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";

/**
 * Runs `fn` and hands its failure to `onError`, whether it throws or returns a promise that rejects.
 */
export const invokeIsolated = (fn: () => unknown, onError: (error: unknown) => void): void => {
  let result: unknown;
  try {
    result = fn();
  } catch (error) {
    onError(error);
    return;
  }

  if (isPromiseLike(result)) void Promise.resolve(result).catch(onError);
};
