import {
  defaultScannerOptions,
  type ScannerOptions,
  scannerCaps,
  validateScannerOptions
} from "../../application/scan-log/scanner.config";

export const runtimeCaps = {
  batchSize: { min: 1, max: 10000 },
  timeoutMs: { min: 1000, max: 120000 },
  flushSize: { min: 1, max: 10000 }
} as const;

export type RuntimeConfig = {
  scannerOptions: ScannerOptions;
  range: { startIndex: number; endIndex?: number };
  timeoutMs: number;
  flushSize: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalNonNegativeInteger = (env: NodeJS.ProcessEnv, name: string): number | undefined =>
  parseOptionalIntInRange(env, name, { min: 0, max: Number.MAX_SAFE_INTEGER });

const parseFlag = (env: NodeJS.ProcessEnv, name: string): boolean => {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true";
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const minDelayMs =
    parseOptionalIntInRange(env, "SCAN_RETRY_MIN_DELAY_MS", scannerCaps.retryDelayMs) ??
    defaultScannerOptions.fetchRetry.minDelayMs;
  const maxDelayMs =
    parseOptionalIntInRange(env, "SCAN_RETRY_MAX_DELAY_MS", scannerCaps.retryDelayMs) ??
    Math.max(minDelayMs, defaultScannerOptions.fetchRetry.maxDelayMs);

  const scannerOptions = validateScannerOptions({
    ...defaultScannerOptions,
    batchSize: parseOptionalIntInRange(env, "SCAN_BATCH_SIZE", runtimeCaps.batchSize) ?? defaultScannerOptions.batchSize,
    numFetchWorkers:
      parseOptionalIntInRange(env, "SCAN_FETCH_WORKERS", scannerCaps.numFetchWorkers) ?? defaultScannerOptions.numFetchWorkers,
    numProcessWorkers:
      parseOptionalIntInRange(env, "SCAN_PROCESS_WORKERS", scannerCaps.numProcessWorkers) ??
      defaultScannerOptions.numProcessWorkers,
    quiet: parseFlag(env, "SCAN_QUIET"),
    progressIntervalMs:
      parseOptionalIntInRange(env, "SCAN_PROGRESS_INTERVAL_MS", scannerCaps.progressIntervalMs) ??
      defaultScannerOptions.progressIntervalMs,
    fetchRetry: {
      maxAttempts: parseOptionalIntInRange(env, "SCAN_MAX_FETCH_ATTEMPTS", scannerCaps.maxAttempts),
      minDelayMs,
      maxDelayMs
    }
  });

  const startIndex = parseOptionalNonNegativeInteger(env, "SCAN_START_INDEX") ?? 0;
  const endIndex = parseOptionalNonNegativeInteger(env, "SCAN_END_INDEX");

  const timeoutMs = parseOptionalIntInRange(env, "CT_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? 10000;
  const flushSize = parseOptionalIntInRange(env, "STORE_FLUSH_SIZE", runtimeCaps.flushSize) ?? 500;

  return { scannerOptions, range: { startIndex, endIndex }, timeoutMs, flushSize };
};
