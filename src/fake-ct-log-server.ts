import http from "http";
import { URL } from "url";

/**
 * Minimal fake CT log for tests and local runs.
 * - GET /ct/v1/get-sth
 * - GET /ct/v1/get-entries?start=...&end=...
 * Entry `i` has leaf_input `leaf-<i>` and extra_data `extra-<i>` (base64 on the wire).
 * Batches are truncated to `maxBatch` entries, as real logs do.
 */
export type FakeCtLogOptions = {
  treeSize: number;
  maxBatch?: number;
  failures?: number;      // first N get-entries requests answer 500
  rateLimited?: number;   // next N get-entries requests answer 429 with Retry-After: 0
};

export type FakeCtLogRequest = {
  path: string;
  start?: number;
  end?: number;
  status: number;
};

export type FakeCtLogServer = {
  baseUrl: string;
  requests: () => FakeCtLogRequest[];
  close: () => Promise<void>;
};

export const leafInputFor = (index: number) => Buffer.from(`leaf-${index}`);
export const extraDataFor = (index: number) => Buffer.from(`extra-${index}`);

const sendJson = (res: http.ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(body));
};

const createFakeCtLogHandler = (opts: FakeCtLogOptions, requests: FakeCtLogRequest[] = []) => {
  const maxBatch = opts.maxBatch ?? 256;
  let failed = 0;
  let rateLimited = 0;

  return (req: http.IncomingMessage, res: http.ServerResponse) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname.endsWith("/ct/v1/get-sth")) {
      requests.push({ path: "get-sth", status: 200 });
      return sendJson(res, 200, {
        tree_size: opts.treeSize,
        timestamp: Date.now(),
        sha256_root_hash: "",
        tree_head_signature: ""
      });
    }

    if (!url.pathname.endsWith("/ct/v1/get-entries")) {
      res.writeHead(404);
      return res.end();
    }

    const start = Number(url.searchParams.get("start"));
    const end = Number(url.searchParams.get("end"));
    const record = (status: number) => requests.push({ path: "get-entries", start, end, status });

    if (failed < (opts.failures ?? 0)) {
      failed += 1;
      record(500);
      return sendJson(res, 500, { error: "temporary failure" });
    }

    if (rateLimited < (opts.rateLimited ?? 0)) {
      rateLimited += 1;
      record(429);
      return sendJson(res, 429, { error: "rate_limited" }, { "Retry-After": "0" });
    }

    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || start > end || start >= opts.treeSize) {
      record(400);
      return sendJson(res, 400, { error: "bad range" });
    }

    const last = Math.min(end, opts.treeSize - 1, start + maxBatch - 1);
    const entries: Array<{ leaf_input: string; extra_data: string }> = [];
    for (let i = start; i <= last; i += 1) {
      entries.push({
        leaf_input: leafInputFor(i).toString("base64"),
        extra_data: extraDataFor(i).toString("base64")
      });
    }

    record(200);
    return sendJson(res, 200, { entries });
  };
};

export const startFakeCtLogServer = async (
  opts: FakeCtLogOptions & { port?: number; host?: string }
): Promise<FakeCtLogServer> => {
  const requests: FakeCtLogRequest[] = [];
  const host = opts.host ?? "127.0.0.1";
  const server = http.createServer(createFakeCtLogHandler(opts, requests));
  await new Promise<void>((resolve) => {
    server.listen(opts.port ?? 0, host, () => resolve());
  });

  const address = server.address();
  if (address == null || typeof address === "string") {
    throw new Error("fake CT log did not bind to a TCP port");
  }
  return {
    baseUrl: `http://${host}:${address.port}`,
    requests: () => requests.slice(),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

if (require.main === module) {
  const port = Number(process.env.FAKE_CT_PORT ?? 3999);
  const treeSize = Number(process.env.FAKE_CT_TREE_SIZE ?? 2500);

  startFakeCtLogServer({ port, treeSize })
    .then((server) => {
      // eslint-disable-next-line no-console
      console.log(`Fake CT log on ${server.baseUrl} (tree_size=${treeSize})`);
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
