import type { LogEntry } from "../../core/log/logEntry.types";
import type { BoundedQueue } from "../../shared/concurrency/boundedQueue";
import type { JsonLogger } from "../../shared/logging/jsonLogger";
import type { ScanProgressTracker } from "./scan.progress";

export type ProcessWorkerDeps<S> = {
  id: number;
  scanner: S;
  entries: BoundedQueue<LogEntry>;
  handler: (scanner: S, entry: LogEntry) => void | Promise<void>;
  progress: ScanProgressTracker;
  logger: JsonLogger;
};

/**
 * Feeds entries to the handler one at a time. Handler failures are not caught:
 * they reject the worker and abort the scan.
 */
export const runProcessWorker = async <S>(deps: ProcessWorkerDeps<S>): Promise<void> => {
  while (true) {
    const entry = await deps.entries.pop();
    if (!entry) break;
    await deps.handler(deps.scanner, entry);
    deps.progress.addHandled();
  }
  deps.logger.info("scan.processor_finished", { processor: deps.id });
};
