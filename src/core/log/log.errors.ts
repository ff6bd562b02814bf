export class LogRequestError extends Error {
  readonly status?: number;
  readonly isTimeout: boolean;
  readonly retryDelayMs?: number;
  readonly requestUrl: string;

  constructor(args: { message: string; requestUrl: string; status?: number; isTimeout?: boolean; retryDelayMs?: number }) {
    super(args.message);
    this.name = "LogRequestError";
    this.requestUrl = args.requestUrl;
    this.status = args.status;
    this.isTimeout = args.isTimeout ?? false;
    this.retryDelayMs = args.retryDelayMs;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LogResponseError extends Error {
  readonly requestUrl: string;

  constructor(message: string, requestUrl: string) {
    super(message);
    this.name = "LogResponseError";
    this.requestUrl = requestUrl;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
