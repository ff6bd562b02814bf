export type ScanSummary = {
  startIndex: number;
  endIndex: number;
  ranges: number;
  processed: number; // entries delivered to the entry queue
  handled: number;   // handler invocations that returned
  elapsedMs: number;
};

export type ScanProgressSnapshot = {
  processed: number;
  handled: number;
  toIndex: number;
  throughputPerSecond: number;
  etaSeconds?: number;
  elapsedMs: number;
};

export type ScanProgressTracker = ReturnType<typeof createScanProgressTracker>;

export const createScanProgressTracker = (args: {
  startIndex: number;
  endIndex: number;
  ranges: number;
  now?: () => number;
}) => {
  const now = args.now ?? Date.now;
  const startedAt = now();
  const total = Math.max(0, args.endIndex - args.startIndex);
  let processed = 0;
  let handled = 0;

  const elapsedMs = () => now() - startedAt;

  return {
    addDelivered: () => {
      processed += 1;
    },
    addHandled: () => {
      handled += 1;
    },
    processed: () => processed,
    handled: () => handled,
    elapsedMs,
    snapshot: (): ScanProgressSnapshot => {
      const elapsed = elapsedMs();
      const throughputPerSecond = elapsed > 0 ? processed / (elapsed / 1000) : 0;
      const snapshot: ScanProgressSnapshot = {
        processed,
        handled,
        toIndex: args.startIndex + processed,
        throughputPerSecond,
        elapsedMs: elapsed
      };
      if (throughputPerSecond > 0) {
        snapshot.etaSeconds = (total - processed) / throughputPerSecond;
      }
      return snapshot;
    },
    summary: (): ScanSummary => ({
      startIndex: args.startIndex,
      endIndex: args.endIndex,
      ranges: args.ranges,
      processed,
      handled,
      elapsedMs: elapsedMs()
    })
  };
};
