#!/usr/bin/env node
import { ScanFatalError, type ScanErrorContext } from "../application/scan-log/scan.error-handler";
import { LogRequestError } from "../core/log/log.errors";
import { runScan } from "../composition/root";

const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

export type ScanFailureEnvelope = {
  event: "scan.failed";
  name: string;
  message: string;
  code?: string;
  context?: ScanErrorContext;
  status?: number;
  stack?: string;
};

const contextKeys = ["start", "end", "fetcher", "attempts", "stored"] as const;

// Only numeric positions reach stderr; causes and response payloads stay out.
const pickContext = (context: ScanErrorContext): ScanErrorContext | undefined => {
  const picked: ScanErrorContext = {};
  for (const key of contextKeys) {
    const value = context[key];
    if (typeof value === "number" && Number.isFinite(value)) picked[key] = value;
  }
  return Object.keys(picked).length > 0 ? picked : undefined;
};

const upstreamStatus = (err: unknown): number | undefined => {
  const source = err instanceof ScanFatalError ? err.cause : err;
  return source instanceof LogRequestError ? source.status : undefined;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};

export const toFailureEnvelope = (err: unknown, includeStack: boolean): ScanFailureEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const envelope: ScanFailureEnvelope = {
    event: "scan.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (err instanceof ScanFatalError) {
    envelope.code = err.code;
    const context = pickContext(err.context);
    if (context) envelope.context = context;
  }

  const status = upstreamStatus(err);
  if (status != null) envelope.status = status;

  if (includeStack && typeof error.stack === "string") envelope.stack = error.stack;

  return envelope;
};

/**
 * Runs one scan. SIGINT cancels it; the process then exits with 130 instead
 * of 1 so callers can tell an interrupt from a failure.
 */
export const executeScanCli = async (): Promise<void> => {
  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error("interrupted by SIGINT"));
  process.once("SIGINT", onSigint);

  try {
    const result = await runScan({ signal: controller.signal });
    console.log(JSON.stringify({ event: "scan.stored", stored: result.stored, processed: result.processed }));
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(toFailureEnvelope(err, isDebugMode())));
    process.exit(controller.signal.aborted ? EXIT_INTERRUPTED : EXIT_FAILURE);
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
};

if (require.main === module) {
  void executeScanCli();
}
