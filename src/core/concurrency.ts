import os from "node:os";

/** 0, negative or missing means one slot per available CPU. */
export function resolveConcurrency(requested?: number): number {
  if (requested !== undefined && Number.isInteger(requested) && requested > 0) {
    return requested;
  }
  return Math.max(1, os.availableParallelism());
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. After the first
 * failure no new item is started; the first error is rethrown once every running call has
 * settled.
 */
export async function processWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  let index = 0;
  let failure: { error: unknown } | undefined;

  const slots = new Array(Math.max(1, Math.min(concurrency, items.length))).fill(null).map(async () => {
    while (!failure) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      try {
        await worker(items[current], current);
      } catch (error) {
        failure ??= { error };
      }
    }
  });
  await Promise.all(slots);

  if (failure) {
    throw failure.error;
  }
}
