import type { LogEntry } from "../../core/log/logEntry.types";
import type { EntryDoc, EntryRepository } from "../../ports/EntryRepository";
import { wrapRepositoryFailure } from "../scan-log/scan.error-handler";

export const toEntryDoc = (logUri: string, entry: LogEntry, scannedAt: Date): EntryDoc => ({
  logUri,
  index: entry.index,
  leafInput: entry.leafInput,
  extraData: entry.extraData,
  scannedAt
});

/**
 * Scan handler that buffers entries and persists them with bulk upserts of
 * `flushSize` documents. Call `flush` after the scan to write the remainder.
 */
export const createEntryStore = (deps: {
  repo: EntryRepository;
  logUri: string;
  flushSize: number;
  now?: () => Date;
}) => {
  if (!Number.isInteger(deps.flushSize) || deps.flushSize < 1) {
    throw new Error("flushSize must be an integer >= 1");
  }

  const now = deps.now ?? (() => new Date());
  let buffer: EntryDoc[] = [];
  let stored = 0;

  const flush = async (): Promise<void> => {
    if (buffer.length === 0) return;

    // Swap first so concurrent handlers keep buffering while this batch is written.
    const batch = buffer;
    buffer = [];
    const indices = batch.map((doc) => doc.index);
    try {
      await deps.repo.upsertMany(batch);
    } catch (error) {
      throw wrapRepositoryFailure(error, {
        start: Math.min(...indices),
        end: Math.max(...indices),
        stored
      });
    }
    stored += batch.length;
  };

  return {
    handle: async (_scanner: unknown, entry: LogEntry): Promise<void> => {
      buffer.push(toEntryDoc(deps.logUri, entry, now()));
      if (buffer.length >= deps.flushSize) {
        await flush();
      }
    },
    flush,
    stored: () => stored,
    pending: () => buffer.length
  };
};
