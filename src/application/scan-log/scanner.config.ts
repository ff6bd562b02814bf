export type FetchRetryPolicy = {
  maxAttempts?: number; // per fetch call; undefined retries forever
  minDelayMs: number;
  maxDelayMs: number;
};

export type ScannerOptions = {
  batchSize: number;
  numFetchWorkers: number;
  numProcessWorkers: number;
  quiet: boolean;
  workQueueCapacity: number;
  entryQueueCapacity: number;
  progressIntervalMs: number; // 0 disables periodic progress logging
  fetchRetry: FetchRetryPolicy;
};

export type ScannerOptionsInput = Partial<Omit<ScannerOptions, "fetchRetry">> & {
  fetchRetry?: Partial<FetchRetryPolicy>;
};

export const defaultFetchRetryPolicy: FetchRetryPolicy = {
  minDelayMs: 0,
  maxDelayMs: 0
};

export const defaultScannerOptions: ScannerOptions = {
  batchSize: 1000,
  numFetchWorkers: 1,
  numProcessWorkers: 1,
  quiet: false,
  workQueueCapacity: 1000,
  entryQueueCapacity: 100000,
  progressIntervalMs: 0,
  fetchRetry: defaultFetchRetryPolicy
};

export const scannerCaps = {
  numFetchWorkers: { min: 1, max: 64 },
  numProcessWorkers: { min: 1, max: 256 },
  workQueueCapacity: { min: 1, max: 1_000_000 },
  entryQueueCapacity: { min: 1, max: 10_000_000 },
  progressIntervalMs: { min: 0, max: 3_600_000 },
  maxAttempts: { min: 1, max: 1000 },
  retryDelayMs: { min: 0, max: 60_000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateScannerOptions = (options: ScannerOptions): ScannerOptions => {
  // A non-positive batch size is legal and partitions into nothing.
  if (!Number.isInteger(options.batchSize)) {
    throw new Error(`batchSize=${String(options.batchSize)} must be an integer`);
  }
  assertIntegerInRange("numFetchWorkers", options.numFetchWorkers, scannerCaps.numFetchWorkers.min, scannerCaps.numFetchWorkers.max);
  assertIntegerInRange(
    "numProcessWorkers",
    options.numProcessWorkers,
    scannerCaps.numProcessWorkers.min,
    scannerCaps.numProcessWorkers.max
  );
  assertIntegerInRange(
    "workQueueCapacity",
    options.workQueueCapacity,
    scannerCaps.workQueueCapacity.min,
    scannerCaps.workQueueCapacity.max
  );
  assertIntegerInRange(
    "entryQueueCapacity",
    options.entryQueueCapacity,
    scannerCaps.entryQueueCapacity.min,
    scannerCaps.entryQueueCapacity.max
  );
  assertIntegerInRange(
    "progressIntervalMs",
    options.progressIntervalMs,
    scannerCaps.progressIntervalMs.min,
    scannerCaps.progressIntervalMs.max
  );

  const { maxAttempts, minDelayMs, maxDelayMs } = options.fetchRetry;
  if (maxAttempts != null) {
    assertIntegerInRange("fetchRetry.maxAttempts", maxAttempts, scannerCaps.maxAttempts.min, scannerCaps.maxAttempts.max);
  }
  assertIntegerInRange("fetchRetry.minDelayMs", minDelayMs, scannerCaps.retryDelayMs.min, scannerCaps.retryDelayMs.max);
  assertIntegerInRange("fetchRetry.maxDelayMs", maxDelayMs, minDelayMs, scannerCaps.retryDelayMs.max);
  return options;
};

export const resolveScannerOptions = (input: ScannerOptionsInput = {}): ScannerOptions =>
  validateScannerOptions({
    ...defaultScannerOptions,
    ...input,
    fetchRetry: { ...defaultFetchRetryPolicy, ...input.fetchRetry }
  });
