/**
 * Batched dispatch to external services.
 *
 * Splits the input into fixed-size batches, runs at most `concurrency` of
 * them at a time, retries transient failures with exponential backoff, and
 * turns a batch that still fails (or times out) into a BatchFailure record.
 * Results always come back in batch order, whatever order they finished in.
 */
import { setTimeout as delay } from "node:timers/promises";
import { BatchTimeoutError, ServiceRequestError, errorMessage } from "../errors";
import type { Logger } from "../log";

export interface BatchOptions {
  batchSize: number;
  concurrency: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  batchTimeoutMs: number;
  signal?: AbortSignal;
  /** Prefix for warning lines, e.g. "Human→Mouse ortholog lookup". */
  label?: string;
  logger?: Logger;
}

export interface BatchFailure {
  offset: number;
  size: number;
  attempts: number;
  error: string;
}

export interface BatchOutcome<R> {
  offset: number;
  size: number;
  value: R;
}

export interface BatchRun<R> {
  batchCount: number;
  succeeded: BatchOutcome<R>[];
  failures: BatchFailure[];
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function isRetryable(err: unknown): boolean {
  return err instanceof ServiceRequestError && err.transient;
}

async function withTimeout<R>(work: Promise<R>, timeoutMs: number): Promise<R> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BatchTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function throwIfAborted(signal: AbortSignal | undefined) {
  if (signal?.aborted) {
    throw signal.reason instanceof Error ? signal.reason : new Error("Run aborted");
  }
}

export async function runBatches<T, R>(
  items: readonly T[],
  worker: (batch: T[], offset: number) => Promise<R>,
  opts: BatchOptions,
): Promise<BatchRun<R>> {
  const batches = chunk(items, opts.batchSize);
  const slots: Array<BatchOutcome<R> | BatchFailure> = new Array(batches.length);
  let next = 0;

  const runOne = async (index: number) => {
    const batch = batches[index];
    const offset = index * opts.batchSize;
    let attempts = 0;

    for (;;) {
      throwIfAborted(opts.signal);
      attempts++;
      try {
        const value = await withTimeout(worker(batch, offset), opts.batchTimeoutMs);
        slots[index] = { offset, size: batch.length, value };
        return;
      } catch (err: unknown) {
        if (isRetryable(err) && attempts <= opts.maxRetries) {
          await delay(opts.retryBaseDelayMs * 2 ** (attempts - 1));
          continue;
        }
        const failure: BatchFailure = { offset, size: batch.length, attempts, error: errorMessage(err) };
        opts.logger?.warn(
          `  Warning: ${opts.label ?? "batch"} failed at offset ${offset} (${batch.length} items, ` +
            `${attempts} attempt${attempts === 1 ? "" : "s"}): ${failure.error}`,
        );
        slots[index] = failure;
        return;
      }
    }
  };

  const lane = async () => {
    while (next < batches.length) {
      const index = next++;
      await runOne(index);
    }
  };

  const lanes = Math.max(1, Math.min(opts.concurrency, batches.length));
  await Promise.all(Array.from({ length: lanes }, lane));

  const succeeded: BatchOutcome<R>[] = [];
  const failures: BatchFailure[] = [];
  for (const slot of slots) {
    if ("value" in slot) succeeded.push(slot);
    else failures.push(slot);
  }
  return { batchCount: batches.length, succeeded, failures };
}
