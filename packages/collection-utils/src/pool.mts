import { debuglog } from "util";

const debug = debuglog("coatcheck:collection-utils");

export interface PoolRunTasksOptions<TYield> {
  maxPoolSize: number;
  /**
   * Each generator this function creates serves as a 'worker' that pulls
   * tasks from a shared source (an array cursor, a queue, ...). It's up to
   * the caller to make sure every worker takes unique tasks.
   *
   * The pool keeps calling next() on each worker until it returns. Values
   * are yielded in completion order, not in task order.
   *
   * Example:
   * ```ts
   * let next = 0;
   * const createGenerator = async function* () {
   *   while (next < tasks.length) {
   *     const task = tasks[next++];
   *     yield await process(task);
   *   }
   * };
   * ```
   */
  createGenerator: (workerId: number) => AsyncGenerator<TYield, void, undefined>;
}

type RaceOutcome<TYield> =
  | { index: number; result: IteratorResult<TYield, void> }
  | { index: number; error: unknown };

/**
 * Runs tasks in a pool where, as one task finishes, the same worker picks
 * up the next one so that `maxPoolSize` stays filled.
 *
 * The first worker error ends the pool and is rethrown to the consumer.
 * Workers still in flight at that point are abandoned; their outcomes are
 * discarded.
 */
export async function* poolRunTasks<TYield>({
  maxPoolSize,
  createGenerator,
}: PoolRunTasksOptions<TYield>): AsyncGenerator<TYield, void, undefined> {
  const asyncIterators: AsyncGenerator<TYield, void, undefined>[] = [];
  for (let i = 0; i < maxPoolSize; i++) {
    asyncIterators.push(createGenerator(i));
  }
  yield* raceAsyncIterators(asyncIterators);
}

/**
 * Races multiple async iterators, yielding values from whichever iterator
 * resolves first until all of them are exhausted.
 */
async function* raceAsyncIterators<TYield>(
  asyncIterators: AsyncGenerator<TYield, void, undefined>[],
): AsyncGenerator<TYield, void, undefined> {
  const promises = new Map<number, Promise<RaceOutcome<TYield>>>();

  // rejections become values so that abandoned iterators never surface
  // as unhandled rejections once the race is over
  const nextResultOfIterator = (
    index: number,
    iterator: AsyncGenerator<TYield, void, undefined>,
  ): Promise<RaceOutcome<TYield>> =>
    iterator.next().then(
      (result) => ({ index, result }),
      (error: unknown) => ({ index, error }),
    );

  debug("Starting %d iterators", asyncIterators.length);
  asyncIterators.forEach((iterator, index) => {
    promises.set(index, nextResultOfIterator(index, iterator));
  });

  while (promises.size) {
    const outcome = await Promise.race(promises.values());
    const { index } = outcome;

    if ("error" in outcome) {
      debug("Iterator at index %d failed, stopping the pool", index);
      promises.clear();
      throw outcome.error;
    }

    if (outcome.result.done) {
      debug("Finished iterator at index %d", index);
      promises.delete(index);
      continue;
    }

    const iterator = asyncIterators[index];
    if (iterator) {
      promises.set(index, nextResultOfIterator(index, iterator));
    }
    yield outcome.result.value;
  }
}
