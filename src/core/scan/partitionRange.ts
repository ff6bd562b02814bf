import type { IndexRange } from "../log/logEntry.types";

/**
 * Splits the half-open interval [startIndex, endIndex) into ascending inclusive
 * ranges of at most `batchSize` entries. Degenerate input yields no ranges, and
 * so do indices outside the safe integer range.
 */
export const partitionRange = (startIndex: number, endIndex: number, batchSize: number): IndexRange[] => {
  if (!Number.isSafeInteger(startIndex) || !Number.isSafeInteger(endIndex) || !Number.isInteger(batchSize)) return [];
  if (batchSize <= 0 || startIndex >= endIndex) return [];

  const ranges: IndexRange[] = [];
  for (let start = startIndex; start < endIndex; ) {
    // start + batchSize may pass MAX_SAFE_INTEGER; the remaining width never does.
    const end = start + Math.min(batchSize, endIndex - start) - 1;
    ranges.push({ start, end });
    start = end + 1;
  }
  return ranges;
};
