export type Closable = { close(): void };

/**
 * Runs `body` with `resource` and closes it afterwards, whether `body` returns, throws,
 * or returns a promise that later settles. `body`'s result is passed through.
 */
export function scoped<H extends Closable, R>(resource: H, body: (resource: H) => R): R;
export function scoped<H extends Closable>(resource: H, body: (resource: H) => unknown): unknown {
  let result: unknown;
  try {
    result = body(resource);
  } catch (error) {
    resource.close();
    throw error;
  }

  if (result instanceof Promise) {
    return result.finally(() => resource.close());
  }

  resource.close();
  return result;
}
