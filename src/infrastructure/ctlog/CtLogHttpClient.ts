import type { RawLogEntry } from "../../core/log/logEntry.types";
import type { FetchEntriesOptions, LogClient } from "../../ports/LogClient";
import { LogRequestError, LogResponseError } from "../../core/log/log.errors";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const decodeBase64Field = (entry: Record<string, unknown>, field: string, requestUrl: string): Buffer => {
  const value = entry[field];
  if (typeof value !== "string" || value.length % 4 !== 0 || !BASE64.test(value)) {
    throw new LogResponseError(`get-entries response has invalid ${field}`, requestUrl);
  }
  return Buffer.from(value, "base64");
};

/**
 * Client for the RFC 6962 JSON API (`/ct/v1/get-sth`, `/ct/v1/get-entries`)
 * using native fetch (Node 20). Does not retry; callers own the retry policy.
 */
export class CtLogHttpClient implements LogClient {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10000
  ) {}

  async fetchTreeSize(): Promise<number> {
    const url = this.buildUrl("get-sth");
    const body = await this.getJson(url);
    const treeSize = isRecord(body) ? body.tree_size : undefined;
    if (typeof treeSize !== "number" || !Number.isSafeInteger(treeSize) || treeSize < 0) {
      throw new LogResponseError("get-sth response has no valid tree_size", this.safeUrl(url));
    }
    return treeSize;
  }

  async fetchEntries(start: number, end: number, options: FetchEntriesOptions = {}): Promise<RawLogEntry[]> {
    const url = this.buildUrl("get-entries");
    url.searchParams.set("start", String(start));
    url.searchParams.set("end", String(end));

    const body = await this.getJson(url, options.signal);
    const safeRequestUrl = this.safeUrl(url);
    const entries = isRecord(body) ? body.entries : undefined;
    if (!Array.isArray(entries)) {
      throw new LogResponseError("get-entries response has no entries array", safeRequestUrl);
    }

    return entries.map((entry: unknown) => {
      if (!isRecord(entry)) {
        throw new LogResponseError("get-entries response has a non-object entry", safeRequestUrl);
      }
      return {
        leafInput: decodeBase64Field(entry, "leaf_input", safeRequestUrl),
        extraData: decodeBase64Field(entry, "extra_data", safeRequestUrl)
      };
    });
  }

  private buildUrl(endpoint: string): URL {
    const url = new URL(this.baseUrl);
    const prefix = url.pathname.endsWith("/") ? url.pathname : `${url.pathname}/`;
    url.pathname = `${prefix}ct/v1/${endpoint}`;
    return url;
  }

  // Credentials never reach logs or error messages.
  private safeUrl(url: URL): string {
    return `${url.origin}${url.pathname}${url.search}`;
  }

  private async getJson(url: URL, signal?: AbortSignal): Promise<unknown> {
    const safeRequestUrl = this.safeUrl(url);
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    // fetch refuses URLs with embedded credentials; send them as Basic auth.
    const headers: Record<string, string> = { accept: "application/json" };
    const requestUrl = new URL(url.toString());
    if (requestUrl.username || requestUrl.password) {
      const credentials = `${decodeURIComponent(requestUrl.username)}:${decodeURIComponent(requestUrl.password)}`;
      headers.authorization = `Basic ${Buffer.from(credentials).toString("base64")}`;
      requestUrl.username = "";
      requestUrl.password = "";
    }

    let res: Response;
    try {
      res = await fetch(requestUrl.toString(), { headers, signal: controller.signal });
    } catch (err) {
      if (timedOut) {
        throw new LogRequestError({
          message: `CT log request timeout after ${this.timeoutMs}ms`,
          requestUrl: safeRequestUrl,
          isTimeout: true
        });
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!res.ok) {
      await res.text().catch(() => "");
      let retryDelayMs: number | undefined;
      if (res.status === 429) {
        const retryAfter = res.headers.get("retry-after");
        if (retryAfter && /^\d+$/.test(retryAfter)) {
          retryDelayMs = Number(retryAfter) * 1000;
        }
      }
      throw new LogRequestError({
        message: `CT log request failed: ${res.status}`,
        requestUrl: safeRequestUrl,
        status: res.status,
        retryDelayMs
      });
    }

    try {
      return await res.json();
    } catch {
      throw new LogResponseError("CT log response is not valid JSON", safeRequestUrl);
    }
  }
}
