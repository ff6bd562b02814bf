export type ScanFailureCode = "fetch_exhausted" | "scan_aborted" | "scan_in_progress" | "repository_write_failed";

export type ScanErrorContext = {
  start?: number;
  end?: number;
  fetcher?: number;
  attempts?: number;
  stored?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class ScanFatalError extends Error {
  readonly code: ScanFailureCode;
  readonly context: ScanErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: ScanFailureCode; message: string; context?: ScanErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "ScanFatalError";
    this.code = args.code;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const wrapFetchExhausted = (
  reason: unknown,
  context: Required<Pick<ScanErrorContext, "start" | "end" | "fetcher" | "attempts">>
) =>
  new ScanFatalError({
    code: "fetch_exhausted",
    message: `Fetch of entries ${context.start}..${context.end} gave up after ${context.attempts} attempts: ${toErrorMessage(reason)}`,
    context,
    cause: reason
  });

export const scanAborted = (reason: unknown) =>
  new ScanFatalError({
    code: "scan_aborted",
    message: `Scan aborted: ${reason === undefined ? "no reason given" : toErrorMessage(reason)}`,
    cause: reason
  });

export const scanInProgress = () =>
  new ScanFatalError({
    code: "scan_in_progress",
    message: "A scan is already running on this scanner"
  });

export const wrapRepositoryFailure = (reason: unknown, context: Pick<ScanErrorContext, "start" | "end" | "stored">) => {
  const message = `Repository write failed for entries ${String(context.start)}..${String(context.end)}: ${toErrorMessage(reason)}`;
  return new ScanFatalError({
    code: "repository_write_failed",
    message,
    context,
    cause: unwrapCause(reason)
  });
};
