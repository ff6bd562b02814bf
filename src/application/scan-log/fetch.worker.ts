import type { IndexRange, LogEntry } from "../../core/log/logEntry.types";
import type { LogClient } from "../../ports/LogClient";
import type { BoundedQueue } from "../../shared/concurrency/boundedQueue";
import type { JsonLogger } from "../../shared/logging/jsonLogger";
import { retry } from "../../shared/retry/retry";
import { LogRequestError } from "../../core/log/log.errors";
import type { FetchRetryPolicy } from "./scanner.config";
import type { ScanProgressTracker } from "./scan.progress";
import { toErrorMessage, wrapFetchExhausted } from "./scan.error-handler";

export type FetchWorkerDeps = {
  id: number;
  client: LogClient;
  ranges: BoundedQueue<IndexRange>;
  entries: BoundedQueue<LogEntry>;
  progress: ScanProgressTracker;
  retryPolicy: FetchRetryPolicy;
  signal: AbortSignal;
  logger: JsonLogger;
};

class EmptyBatchError extends Error {
  constructor(start: number, end: number) {
    super(`Log returned no entries for ${start}..${end}`);
    this.name = "EmptyBatchError";
  }
}

const fetchWithPolicy = async (deps: FetchWorkerDeps, cursor: IndexRange) => {
  const { client, retryPolicy, signal, logger, id } = deps;
  const { start, end } = cursor;
  let attempts = 0;

  try {
    return await retry(
      async () => {
        attempts += 1;
        const batch = await client.fetchEntries(start, end, { signal });
        if (batch.length === 0) throw new EmptyBatchError(start, end);
        return batch;
      },
      {
        retries: retryPolicy.maxAttempts == null ? Number.POSITIVE_INFINITY : retryPolicy.maxAttempts - 1,
        minDelayMs: retryPolicy.minDelayMs,
        maxDelayMs: retryPolicy.maxDelayMs,
        jitterRatio: 0,
        signal,
        shouldRetry: (err) =>
          err instanceof LogRequestError && err.retryDelayMs != null ? { retry: true, delayMs: err.retryDelayMs } : true,
        onRetry: ({ attempt, delayMs, error }) => {
          logger.warn("scan.fetch_retry", { fetcher: id, start, end, attempt, delayMs, error: toErrorMessage(error) });
        },
        onGiveUp: ({ attempt, error }) => {
          logger.warn("scan.fetch_give_up", { fetcher: id, start, end, attempt, error: toErrorMessage(error) });
        }
      }
    );
  } catch (err) {
    if (signal.aborted) throw err;
    throw wrapFetchExhausted(err, { start, end, fetcher: id, attempts });
  }
};

/**
 * Delivers every entry of `range` to the entry queue in ascending index order,
 * re-fetching the remainder whenever the log truncates a response.
 */
const fetchRange = async (deps: FetchWorkerDeps, range: IndexRange): Promise<void> => {
  const { entries, progress, logger, id } = deps;
  const cursor: IndexRange = { start: range.start, end: range.end };

  while (cursor.start <= cursor.end) {
    logger.info("scan.fetching", { fetcher: id, start: cursor.start, end: cursor.end });
    const batch = await fetchWithPolicy(deps, cursor);

    const wanted = cursor.end - cursor.start + 1;
    if (batch.length > wanted) {
      logger.warn("scan.fetch_overflow", {
        fetcher: id,
        start: cursor.start,
        end: cursor.end,
        returned: batch.length
      });
    }

    for (const raw of batch.slice(0, wanted)) {
      await entries.push({ leafInput: raw.leafInput, extraData: raw.extraData, index: cursor.start });
      progress.addDelivered();
      cursor.start += 1;
    }
  }
};

export const runFetchWorker = async (deps: FetchWorkerDeps): Promise<void> => {
  while (true) {
    const range = await deps.ranges.pop();
    if (!range) break;
    await fetchRange(deps, range);
  }
  deps.logger.info("scan.fetcher_finished", { fetcher: deps.id });
};
