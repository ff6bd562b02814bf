export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryOptions = {
  retries: number;          // max attempts after initial try; Infinity retries forever
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  signal?: AbortSignal;     // checked before every attempt and while waiting
};

export class RetryAbortedError extends Error {
  readonly cause?: unknown;

  constructor(cause: unknown) {
    super("Retry aborted");
    this.name = "RetryAbortedError";
    this.cause = cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const throwIfAborted = (signal: AbortSignal | undefined) => {
  if (signal?.aborted) throw new RetryAbortedError(signal.reason);
};

const sleep = (ms: number, signal?: AbortSignal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RetryAbortedError(signal.reason));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new RetryAbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    signal
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    throwIfAborted(signal);
    try {
      return await fn();
    } catch (err) {
      // An abort while the attempt was in flight is not a failure of the attempt.
      throwIfAborted(signal);

      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      // exponent capped: 2 ** 1024 is Infinity
      const backoff = customDelayMs != null
        ? Math.min(maxDelayMs, customDelayMs)
        : Math.min(maxDelayMs, minDelayMs * Math.pow(2, Math.min(attempt, 30)));
      // small jitter to avoid thundering herd (still deterministic-ish)
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(backoff * normalizedJitterRatio * normalizedRandom);
      const waitMs = backoff + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleep(waitMs, signal);
      attempt += 1;
    }
  }
};
