export type IndexRange = {
  start: number; // inclusive
  end: number;   // inclusive
};

export type RawLogEntry = {
  leafInput: Buffer;
  extraData: Buffer;
};

/**
 * A log entry with the index assigned by the fetcher that retrieved it.
 */
export type LogEntry = Readonly<RawLogEntry & { index: number }>;
