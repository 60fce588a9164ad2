import { toBuildError } from "../errors.js";
import { failure, type Outcome } from "./outcome.js";

export interface ParallelOptions {
  /** Maximum items in flight. 0 or undefined runs everything at once. */
  concurrency?: number;
}

/**
 * The error a worker-pool size would raise, or undefined when it is valid.
 */
export function concurrencyError(concurrency: number): RangeError | undefined {
  if (Number.isInteger(concurrency) && concurrency >= 0) {
    return undefined;
  }
  return new RangeError(
    `concurrency must be a non-negative integer, got: ${concurrency}`
  );
}

/**
 * Run `work` over every item concurrently and return the outcomes in input
 * order. A throwing or rejecting item becomes a Failure for that item only;
 * the returned promise itself never rejects.
 */
export async function parallelMap<I, T>(
  items: readonly I[],
  work: (item: I, index: number) => Promise<Outcome<T>>,
  options: ParallelOptions = {}
): Promise<Outcome<T>[]> {
  const concurrency = options.concurrency ?? 0;
  const invalid = concurrencyError(concurrency);
  if (invalid) {
    throw invalid;
  }

  const run = async (item: I, index: number): Promise<Outcome<T>> => {
    try {
      return await work(item, index);
    } catch (err) {
      return failure(toBuildError(err));
    }
  };

  if (concurrency === 0 || concurrency >= items.length) {
    return Promise.all(items.map((item, index) => run(item, index)));
  }

  const outcomes = new Array<Outcome<T>>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      outcomes[index] = await run(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));
  return outcomes;
}
