import type { RawLogEntry } from "../core/log/logEntry.types";

export type FetchEntriesOptions = {
  signal?: AbortSignal;
};

export interface LogClient {
  /**
   * Entries for the inclusive range [start, end]. Logs may return fewer than
   * requested; returned entries are contiguous starting at `start`.
   */
  fetchEntries(start: number, end: number, options?: FetchEntriesOptions): Promise<RawLogEntry[]>;
  fetchTreeSize(): Promise<number>;
}
