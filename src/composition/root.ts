import type { ScanSummary } from "../application/scan-log/scan.progress";
import { createScanner } from "../application/scan-log/scanner";
import { createEntryStore } from "../application/store-entries/entryStore";
import { CtLogHttpClient } from "../infrastructure/ctlog/CtLogHttpClient";
import { MongoEntryRepository } from "../infrastructure/mongo/MongoEntryRepository";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type ScanRunResult = ScanSummary & { stored: number };

/**
 * Scans the configured log (up to its current tree size unless
 * SCAN_END_INDEX is set) and stores every entry in Mongo.
 */
export const runScan = async (opts: { signal?: AbortSignal } = {}): Promise<ScanRunResult> => {
  const env = loadEnv();
  const runtime = loadRuntimeConfigFromEnv();

  const client = new CtLogHttpClient(env.CT_LOG_URI, runtime.timeoutMs);
  const scanner = createScanner(env.CT_LOG_URI, client, runtime.scannerOptions);
  const repo = new MongoEntryRepository(env.MONGO_URI);

  try {
    const endIndex = runtime.range.endIndex ?? (await scanner.treeSize());
    const store = createEntryStore({ repo, logUri: env.CT_LOG_URI, flushSize: runtime.flushSize });

    const summary = await scanner.scan(runtime.range.startIndex, endIndex, store.handle, { signal: opts.signal });
    await store.flush();

    return { ...summary, stored: store.stored() };
  } finally {
    await repo.close();
  }
};
