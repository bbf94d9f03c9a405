/**
 * Order-preserving map over worker threads
 *
 * The input is cut into blocks of `blockSize` elements. A pool of
 * `parallelism` worker threads takes blocks from a shared cursor; every
 * result is written back at its input position, so the output always
 * matches `items.map(transform)` in order and length.
 *
 * The transform is shipped to the workers as source text and rebuilt there.
 * It therefore has to be self-contained: an arrow function or function
 * expression that uses nothing from its enclosing scope. Elements and results
 * cross thread boundaries by structured clone.
 */

import { InvalidCapacityError, ParallelMapError, precondition } from "@coatcheck/errors";
import { availableParallelism } from "os";
import { debuglog } from "util";
import { Worker } from "worker_threads";

import { poolRunTasks } from "./pool.mjs";

const debug = debuglog("coatcheck:collection-utils");

export interface ParallelMapOptions {
  /** Number of worker threads (default: `os.availableParallelism()`, capped by the block count) */
  parallelism?: number;
  /** Number of elements per block (default: enough for about four blocks per worker) */
  blockSize?: number;
}

interface BlockRequest {
  blockIndex: number;
  items: unknown[];
}

type WorkerReply<U> =
  | { type: "result"; blockIndex: number; results: U[] }
  | { type: "error"; blockIndex: number; reason: string };

type BlockOutcome<U> =
  | { ok: true; results: U[] }
  | { ok: false; error: ParallelMapError };

// runs as a CommonJS script inside each worker
const WORKER_SOURCE = `
const { parentPort, workerData } = require("node:worker_threads");
const transform = (0, eval)("(" + workerData.source + ")");
parentPort.on("message", ({ blockIndex, items }) => {
  try {
    parentPort.postMessage({ type: "result", blockIndex, results: items.map((item) => transform(item)) });
  } catch (error) {
    parentPort.postMessage({ type: "error", blockIndex, reason: error instanceof Error ? error.message : String(error) });
  }
});
`;

const assertPositiveInteger = (value: number, option: string): void => {
  precondition(
    Number.isInteger(value) && value > 0,
    () => new InvalidCapacityError(`${option} must be a positive integer, got ${value}`, option, value),
  );
};

const spawnWorker = (source: string, workerId: number): Worker => {
  const worker = new Worker(WORKER_SOURCE, { eval: true, workerData: { source } });
  // failures while a block is pending are reported by runBlock
  worker.on("error", (error) => {
    debug("Worker %d raised %s", workerId, error.message);
  });
  debug("Started worker %d", workerId);
  return worker;
};

const runBlock = <T, U>(
  worker: Worker,
  blockIndex: number,
  items: T[],
): Promise<BlockOutcome<U>> =>
  new Promise((resolve) => {
    const settle = (outcome: BlockOutcome<U>) => {
      worker.off("message", onMessage);
      worker.off("error", onError);
      worker.off("exit", onExit);
      resolve(outcome);
    };
    const onMessage = (reply: WorkerReply<U>) => {
      settle(
        reply.type === "result"
          ? { ok: true, results: reply.results }
          : { ok: false, error: new ParallelMapError(blockIndex, reply.reason) },
      );
    };
    const onError = (error: Error) => {
      settle({ ok: false, error: new ParallelMapError(blockIndex, error.message) });
    };
    const onExit = (code: number) => {
      settle({
        ok: false,
        error: new ParallelMapError(blockIndex, `worker exited with code ${code}`),
      });
    };

    worker.on("message", onMessage);
    worker.on("error", onError);
    worker.on("exit", onExit);

    const request: BlockRequest = { blockIndex, items };
    worker.postMessage(request);
  });

/**
 * Map `items` through `transform` on worker threads.
 *
 * @example
 * ```ts
 * const squares = await parallelMap(range, (n) => n * n, { parallelism: 2 });
 * ```
 *
 * @throws {InvalidCapacityError} for a non-positive or fractional option
 * @throws {ParallelMapError} (as a rejection) when the transform throws or a
 * worker dies; all workers are terminated before the promise settles
 */
export async function parallelMap<T, U>(
  items: readonly T[],
  transform: (item: T) => U,
  options?: ParallelMapOptions,
): Promise<U[]> {
  const requestedParallelism = options?.parallelism ?? availableParallelism();
  assertPositiveInteger(requestedParallelism, "parallelism");
  if (options?.blockSize !== undefined) {
    assertPositiveInteger(options.blockSize, "blockSize");
  }

  if (items.length === 0) {
    return [];
  }

  const blockSize =
    options?.blockSize ?? Math.max(1, Math.ceil(items.length / (requestedParallelism * 4)));
  const blockCount = Math.ceil(items.length / blockSize);
  const parallelism = Math.min(requestedParallelism, blockCount);
  const source = transform.toString();

  debug(
    "Mapping %d item(s) in %d block(s) of %d on %d worker(s)",
    items.length,
    blockCount,
    blockSize,
    parallelism,
  );

  const output = new Array<U>(items.length);
  const workers: Worker[] = [];
  let nextBlock = 0;

  async function* createGenerator(
    workerId: number,
  ): AsyncGenerator<{ start: number; results: U[] }, void, undefined> {
    const worker = spawnWorker(source, workerId);
    workers.push(worker);

    while (nextBlock < blockCount) {
      const blockIndex = nextBlock++;
      const start = blockIndex * blockSize;
      const outcome = await runBlock<T, U>(
        worker,
        blockIndex,
        items.slice(start, start + blockSize),
      );
      if (!outcome.ok) {
        throw outcome.error;
      }
      yield { start, results: outcome.results };
    }
  }

  try {
    for await (const { start, results } of poolRunTasks({
      maxPoolSize: parallelism,
      createGenerator,
    })) {
      results.forEach((result, offset) => {
        output[start + offset] = result;
      });
    }
  } finally {
    await Promise.all(workers.map((worker) => worker.terminate()));
    debug("Terminated %d worker(s)", workers.length);
  }

  return output;
}
