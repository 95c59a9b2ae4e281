/**
 * Bounded read-ahead: keeps up to `depth` loads in flight while the consumer
 * works on the current item. Results come back in input order, and a failed
 * load is delivered as a value rather than thrown.
 */

export type Settled<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown };

async function* iterate<T>(items: AsyncIterable<T> | Iterable<T>): AsyncGenerator<T, void, undefined> {
  for await (const item of items) {
    yield item;
  }
}

export async function* readAhead<T, R>(
  items: AsyncIterable<T> | Iterable<T>,
  load: (item: T) => Promise<R>,
  depth: number
): AsyncGenerator<Settled<T, R>, void, undefined> {
  const source = iterate(items);
  const limit = Math.max(1, depth);
  const queue: Promise<Settled<T, R>>[] = [];
  let exhausted = false;

  const fill = async () => {
    while (!exhausted && queue.length < limit) {
      const next = await source.next();
      if (next.done) {
        exhausted = true;
        return;
      }
      const item = next.value;
      queue.push(
        load(item).then(
          (value): Settled<T, R> => ({ item, ok: true, value }),
          (error: unknown): Settled<T, R> => ({ item, ok: false, error })
        )
      );
    }
  };

  try {
    await fill();
    for (let head = queue.shift(); head; head = queue.shift()) {
      const settled = await head;
      await fill();
      yield settled;
    }
  } finally {
    await source.return();
  }
}
