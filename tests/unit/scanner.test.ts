import { createScanner } from "../../src/application/scan-log/scanner";
import type { LogEntry, RawLogEntry } from "../../src/core/log/logEntry.types";
import type { LogClient } from "../../src/ports/LogClient";

const entryFor = (index: number): RawLogEntry => ({
  leafInput: Buffer.from(`leaf-${index}`),
  extraData: Buffer.from(`extra-${index}`)
});

const createFakeLogClient = (opts: { treeSize: number; respond?: (start: number, end: number) => number }) => {
  const calls: Array<{ start: number; end: number }> = [];

  const client: LogClient = {
    fetchEntries: async (start, end) => {
      calls.push({ start, end });
      const last = Math.min(end, opts.treeSize - 1);
      const count = opts.respond ? opts.respond(start, last) : last - start + 1;
      return Array.from({ length: count }, (_, i) => entryFor(start + i));
    },
    fetchTreeSize: async () => opts.treeSize
  };

  return { client, calls };
};

const collectingHandler = () => {
  const seen: LogEntry[] = [];
  return {
    seen,
    indices: () => seen.map((entry) => entry.index),
    handler: (_scanner: unknown, entry: LogEntry) => {
      seen.push(entry);
    }
  };
};

const range = (start: number, end: number) => Array.from({ length: end - start }, (_, i) => start + i);

describe("Scanner.scan", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it("delivers every index exactly once in batches of batchSize", async () => {
    const { client, calls } = createFakeLogClient({ treeSize: 5000 });
    const scanner = createScanner("test-log", client, { batchSize: 1000 });
    const collected = collectingHandler();

    const summary = await scanner.scan(0, 5000, collected.handler);

    expect(calls).toEqual([
      { start: 0, end: 999 },
      { start: 1000, end: 1999 },
      { start: 2000, end: 2999 },
      { start: 3000, end: 3999 },
      { start: 4000, end: 4999 }
    ]);
    expect(collected.indices()).toEqual(range(0, 5000));
    expect(scanner.processed()).toBe(5000);
    expect(summary).toMatchObject({ startIndex: 0, endIndex: 5000, ranges: 5, processed: 5000, handled: 5000 });
    expect(scanner.state).toBe("complete");
  });

  it("assigns indices from the fetched range, not from the payload", async () => {
    const { client } = createFakeLogClient({ treeSize: 50 });
    const scanner = createScanner("test-log", client, { batchSize: 7, quiet: true });
    const collected = collectingHandler();

    await scanner.scan(10, 30, collected.handler);

    expect(collected.seen).toHaveLength(20);
    for (const entry of collected.seen) {
      expect(entry.leafInput.toString()).toBe(`leaf-${entry.index}`);
      expect(entry.extraData.toString()).toBe(`extra-${entry.index}`);
    }
  });

  it("re-fetches the remainder when the log truncates a batch", async () => {
    const { client, calls } = createFakeLogClient({
      treeSize: 10,
      respond: (start, end) => Math.max(1, Math.floor((end - start + 1) / 2))
    });
    const scanner = createScanner("test-log", client, { batchSize: 10, quiet: true });
    const collected = collectingHandler();

    await scanner.scan(0, 10, collected.handler);

    expect(calls).toEqual([
      { start: 0, end: 9 },
      { start: 5, end: 9 },
      { start: 7, end: 9 },
      { start: 8, end: 9 },
      { start: 9, end: 9 }
    ]);
    expect(collected.indices()).toEqual(range(0, 10));
  });

  it("delivers in strictly ascending global order with one fetcher and one processor", async () => {
    const { client } = createFakeLogClient({ treeSize: 1000, respond: (start, end) => Math.min(3, end - start + 1) });
    const scanner = createScanner("test-log", client, {
      batchSize: 64,
      numFetchWorkers: 1,
      numProcessWorkers: 1,
      quiet: true
    });
    const collected = collectingHandler();

    await scanner.scan(0, 1000, collected.handler);

    expect(collected.indices()).toEqual(range(0, 1000));
  });

  it("delivers each index exactly once with several processors", async () => {
    const { client } = createFakeLogClient({ treeSize: 2000 });
    const scanner = createScanner("test-log", client, {
      batchSize: 100,
      numFetchWorkers: 1,
      numProcessWorkers: 8,
      quiet: true
    });
    const indices: number[] = [];

    await scanner.scan(0, 2000, async (_scanner, entry) => {
      await new Promise((resolve) => setImmediate(resolve));
      indices.push(entry.index);
    });

    expect(indices).toHaveLength(2000);
    expect([...indices].sort((a, b) => a - b)).toEqual(range(0, 2000));
  });

  it("delivers each index exactly once with several fetchers and processors", async () => {
    const { client } = createFakeLogClient({ treeSize: 3000, respond: (start, end) => Math.min(40, end - start + 1) });
    const scanner = createScanner("test-log", client, {
      batchSize: 250,
      numFetchWorkers: 4,
      numProcessWorkers: 3,
      workQueueCapacity: 2,
      entryQueueCapacity: 16,
      quiet: true
    });
    const collected = collectingHandler();

    const summary = await scanner.scan(0, 3000, collected.handler);

    expect([...collected.indices()].sort((a, b) => a - b)).toEqual(range(0, 3000));
    expect(summary.processed).toBe(3000);
    expect(summary.handled).toBe(3000);
  });

  it("passes the scanner itself to the handler", async () => {
    const { client } = createFakeLogClient({ treeSize: 3 });
    const scanner = createScanner("test-log", client, { quiet: true });
    const received: unknown[] = [];

    await scanner.scan(0, 3, (s) => {
      received.push(s);
    });

    expect(received).toEqual([scanner, scanner, scanner]);
  });

  it.each([
    { startIndex: 10, endIndex: 10, batchSize: 100 },
    { startIndex: 20, endIndex: 5, batchSize: 100 },
    { startIndex: 0, endIndex: 100, batchSize: 0 },
    { startIndex: 2 ** 53 - 1, endIndex: 2 ** 53 + 2, batchSize: 1 }
  ])("completes immediately for degenerate input %o", async ({ startIndex, endIndex, batchSize }) => {
    const { client, calls } = createFakeLogClient({ treeSize: 100 });
    const scanner = createScanner("test-log", client, { batchSize, quiet: true });
    const handler = jest.fn();

    const summary = await scanner.scan(startIndex, endIndex, handler);

    expect(summary).toMatchObject({ ranges: 0, processed: 0, handled: 0 });
    expect(handler).not.toHaveBeenCalled();
    expect(calls).toHaveLength(0);
  });

  it("resets the processed counter at the start of every scan", async () => {
    const { client } = createFakeLogClient({ treeSize: 100 });
    const scanner = createScanner("test-log", client, { batchSize: 10, quiet: true });

    await scanner.scan(0, 100, () => undefined);
    expect(scanner.processed()).toBe(100);

    await scanner.scan(40, 45, () => undefined);
    expect(scanner.processed()).toBe(5);
  });

  it("discards entries beyond the requested range and warns", async () => {
    const client: LogClient = {
      fetchEntries: async (start, end) => Array.from({ length: end - start + 4 }, (_, i) => entryFor(start + i)),
      fetchTreeSize: async () => 100
    };
    const scanner = createScanner("test-log", client, { batchSize: 5, quiet: true });
    const collected = collectingHandler();

    await scanner.scan(0, 10, collected.handler);

    expect(collected.indices()).toEqual(range(0, 10));
    const overflowLogs = warnSpy.mock.calls
      .map((call) => JSON.parse(String(call[0])) as Record<string, unknown>)
      .filter((log) => log.event === "scan.fetch_overflow");
    expect(overflowLogs).toEqual([
      { event: "scan.fetch_overflow", logUri: "test-log", fetcher: 0, start: 0, end: 4, returned: 8 },
      { event: "scan.fetch_overflow", logUri: "test-log", fetcher: 0, start: 5, end: 9, returned: 8 }
    ]);
  });

  it("propagates handler failures unchanged and stays reusable", async () => {
    const { client } = createFakeLogClient({ treeSize: 100 });
    const scanner = createScanner("test-log", client, { batchSize: 10, numProcessWorkers: 2, quiet: true });
    const failure = new Error("handler exploded");

    await expect(
      scanner.scan(0, 100, (_scanner, entry) => {
        if (entry.index === 42) throw failure;
      })
    ).rejects.toBe(failure);
    expect(scanner.state).toBe("failed");

    const collected = collectingHandler();
    await scanner.scan(0, 20, collected.handler);
    expect(collected.indices()).toEqual(range(0, 20));
    expect(scanner.state).toBe("complete");
  });

  it("rejects a second scan while one is in flight", async () => {
    const { client } = createFakeLogClient({ treeSize: 10 });
    const scanner = createScanner("test-log", client, { quiet: true });
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = scanner.scan(0, 3, async () => {
      await gate;
    });
    expect(scanner.state).toBe("running");

    await expect(scanner.scan(0, 1, () => undefined)).rejects.toMatchObject({
      name: "ScanFatalError",
      code: "scan_in_progress"
    });

    release();
    await expect(first).resolves.toMatchObject({ processed: 3, handled: 3 });
  });

  it("logs start and completion events unless quiet", async () => {
    const { client } = createFakeLogClient({ treeSize: 4 });
    const scanner = createScanner("test-log", client, { batchSize: 2 });

    await scanner.scan(0, 4, () => undefined);

    const events = logSpy.mock.calls.map((call) => (JSON.parse(String(call[0])) as { event: string }).event);
    expect(events[0]).toBe("scan.started");
    expect(events[events.length - 1]).toBe("scan.completed");
    expect(events.filter((event) => event === "scan.fetching")).toHaveLength(2);
    expect(events).toContain("scan.fetcher_finished");
    expect(events).toContain("scan.processor_finished");

    const started = JSON.parse(String(logSpy.mock.calls[0][0])) as Record<string, unknown>;
    expect(started).toEqual({
      event: "scan.started",
      logUri: "test-log",
      startIndex: 0,
      endIndex: 4,
      ranges: 2,
      batchSize: 2,
      numFetchWorkers: 1,
      numProcessWorkers: 1
    });
  });

  it("logs periodic progress while the scan runs", async () => {
    const { client } = createFakeLogClient({ treeSize: 3 });
    const scanner = createScanner("test-log", client, { progressIntervalMs: 5 });

    await scanner.scan(0, 3, async () => {
      await new Promise((resolve) => setTimeout(resolve, 25));
    });

    const progressLogs = logSpy.mock.calls
      .map((call) => JSON.parse(String(call[0])) as Record<string, unknown>)
      .filter((log) => log.event === "scan.progress");
    expect(progressLogs.length).toBeGreaterThan(0);
    expect(progressLogs[0]).toMatchObject({
      event: "scan.progress",
      logUri: "test-log",
      processed: expect.any(Number),
      handled: expect.any(Number),
      toIndex: expect.any(Number),
      throughput: expect.any(Number)
    });
    expect(progressLogs[0]).toHaveProperty("eta");
  });

  it("writes no info logs when quiet", async () => {
    const { client } = createFakeLogClient({ treeSize: 4 });
    const scanner = createScanner("test-log", client, { quiet: true });

    await scanner.scan(0, 4, () => undefined);

    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe("Scanner.treeSize", () => {
  it("returns the size reported by the log", async () => {
    const { client } = createFakeLogClient({ treeSize: 4242 });
    const scanner = createScanner("test-log", client);

    await expect(scanner.treeSize()).resolves.toBe(4242);
  });

  it("propagates a failure unchanged", async () => {
    const failure = new Error("sth unavailable");
    const client: LogClient = {
      fetchEntries: async () => [],
      fetchTreeSize: async () => {
        throw failure;
      }
    };
    const scanner = createScanner("test-log", client);

    await expect(scanner.treeSize()).rejects.toBe(failure);
  });
});
