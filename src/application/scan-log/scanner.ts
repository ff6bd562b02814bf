import type { IndexRange, LogEntry } from "../../core/log/logEntry.types";
import { partitionRange } from "../../core/scan/partitionRange";
import type { LogClient } from "../../ports/LogClient";
import { createBoundedQueue } from "../../shared/concurrency/boundedQueue";
import { humanTime } from "../../shared/format/humanTime";
import { createJsonLogger, type JsonLogger } from "../../shared/logging/jsonLogger";
import { runFetchWorker } from "./fetch.worker";
import { runProcessWorker } from "./process.worker";
import { resolveScannerOptions, type ScannerOptions, type ScannerOptionsInput } from "./scanner.config";
import { scanAborted, scanInProgress, toErrorMessage } from "./scan.error-handler";
import { createScanProgressTracker, type ScanProgressTracker, type ScanSummary } from "./scan.progress";

export type ScanHandler = (scanner: Scanner, entry: LogEntry) => void | Promise<void>;

export type ScanState = "idle" | "partitioning" | "running" | "draining" | "complete" | "failed";

export type ScanCallOptions = {
  signal?: AbortSignal;
};

/**
 * Scans every entry of an index-addressed log with a pool of fetchers feeding
 * a pool of handler workers through two bounded queues.
 *
 * One scan at a time per instance; the instance itself is reusable.
 */
export class Scanner {
  readonly options: ScannerOptions;
  private readonly logger: JsonLogger;
  private currentState: ScanState = "idle";
  private progress?: ScanProgressTracker;

  constructor(
    readonly logUri: string,
    private readonly client: LogClient,
    options: ScannerOptionsInput = {}
  ) {
    this.options = resolveScannerOptions(options);
    this.logger = createJsonLogger({ base: { logUri }, quiet: this.options.quiet });
  }

  get state(): ScanState {
    return this.currentState;
  }

  /** Entries delivered to the entry queue by the current or last scan. */
  processed(): number {
    return this.progress?.processed() ?? 0;
  }

  async treeSize(): Promise<number> {
    return this.client.fetchTreeSize();
  }

  async scan(
    startIndex: number,
    endIndex: number,
    handler: ScanHandler,
    callOptions: ScanCallOptions = {}
  ): Promise<ScanSummary> {
    const active: ScanState[] = ["partitioning", "running", "draining"];
    if (active.includes(this.currentState)) throw scanInProgress();

    const { signal } = callOptions;
    if (signal?.aborted) throw scanAborted(signal.reason);

    const { numFetchWorkers, numProcessWorkers, batchSize } = this.options;

    this.currentState = "partitioning";
    const ranges = partitionRange(startIndex, endIndex, batchSize);
    const progress = createScanProgressTracker({ startIndex, endIndex, ranges: ranges.length });
    this.progress = progress;
    this.logger.info("scan.started", {
      startIndex,
      endIndex,
      ranges: ranges.length,
      batchSize,
      numFetchWorkers,
      numProcessWorkers
    });

    const workQueue = createBoundedQueue<IndexRange>(this.options.workQueueCapacity);
    const entryQueue = createBoundedQueue<LogEntry>(this.options.entryQueueCapacity);
    const controller = new AbortController();
    const outcome: { failure?: { error: unknown } } = {};

    // First failure wins; aborting both queues releases every suspended worker.
    const fail = (error: unknown) => {
      if (outcome.failure) return;
      outcome.failure = { error };
      controller.abort(error);
      workQueue.abort(error);
      entryQueue.abort(error);
    };
    const onCallerAbort = () => fail(scanAborted(signal?.reason));
    signal?.addEventListener("abort", onCallerAbort, { once: true });
    const settle = (work: Promise<void>) => work.catch(fail);

    this.currentState = "running";
    const processors = Array.from({ length: numProcessWorkers }, (_, id) =>
      settle(
        runProcessWorker({
          id,
          scanner: this,
          entries: entryQueue,
          handler,
          progress,
          logger: this.logger
        })
      )
    );
    const fetchers = Array.from({ length: numFetchWorkers }, (_, id) =>
      settle(
        runFetchWorker({
          id,
          client: this.client,
          ranges: workQueue,
          entries: entryQueue,
          progress,
          retryPolicy: this.options.fetchRetry,
          signal: controller.signal,
          logger: this.logger
        })
      )
    );
    const ticker = this.startProgressTicker(progress);

    try {
      for (const range of ranges) {
        await workQueue.push(range);
      }
      workQueue.close();

      // The entry queue may only close once no fetcher can push to it.
      this.currentState = "draining";
      await Promise.all(fetchers);
      entryQueue.close();
      await Promise.all(processors);
    } catch (error) {
      fail(error);
      await Promise.all([...fetchers, ...processors]);
    } finally {
      if (ticker) clearInterval(ticker);
      signal?.removeEventListener("abort", onCallerAbort);
    }

    if (outcome.failure) {
      this.currentState = "failed";
      this.logger.warn("scan.failed", {
        processed: progress.processed(),
        handled: progress.handled(),
        error: toErrorMessage(outcome.failure.error)
      });
      throw outcome.failure.error;
    }

    this.currentState = "complete";
    const summary = progress.summary();
    this.logger.info("scan.completed", {
      processed: summary.processed,
      handled: summary.handled,
      elapsed: humanTime(summary.elapsedMs / 1000)
    });
    return summary;
  }

  private startProgressTicker(progress: ScanProgressTracker): NodeJS.Timeout | undefined {
    const { quiet, progressIntervalMs } = this.options;
    if (quiet || progressIntervalMs <= 0) return undefined;

    const timer = setInterval(() => {
      const snapshot = progress.snapshot();
      this.logger.info("scan.progress", {
        processed: snapshot.processed,
        handled: snapshot.handled,
        toIndex: snapshot.toIndex,
        throughput: Number(snapshot.throughputPerSecond.toFixed(2)),
        eta: snapshot.etaSeconds == null ? null : humanTime(snapshot.etaSeconds)
      });
    }, progressIntervalMs);
    timer.unref();
    return timer;
  }
}

export const createScanner = (logUri: string, client: LogClient, options: ScannerOptionsInput = {}): Scanner =>
  new Scanner(logUri, client, options);
