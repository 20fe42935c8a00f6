import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { UsageAggregator, emptyAggregate } from "../src/core/aggregate.js";
import { CheckpointWriteError } from "../src/core/errors.js";
import type { PartialAggregate } from "../src/core/model.js";
import { literal } from "../src/core/signatures.js";
import { FileCheckpointStore, checkpointFileName } from "../src/infrastructure/checkpoint/FileCheckpointStore.js";

function aggregateWith(qname: string, calls: number): PartialAggregate {
  const aggregator = new UsageAggregator();
  for (let i = 0; i < calls; i++) {
    aggregator.record(qname, new Map([["a", literal(String(i))]]));
  }
  return aggregator.toAggregate();
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = [];
  for await (const item of items) {
    collected.push(item);
  }
  return collected;
}

describe("FileCheckpointStore", () => {
  let testDir: string;
  let store: FileCheckpointStore;

  beforeEach(async () => {
    testDir = join(tmpdir(), `checkpoint-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    store = new FileCheckpointStore(testDir, { retries: 2 });
    const opened = await store.open();
    expect(opened.ok).toBe(true);
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  it("records a file and recognises its fingerprint", async () => {
    const result = await store.recordProcessed("a.py", "f1", aggregateWith("pkg.fn", 1));

    expect(result.ok).toBe(true);
    expect(await store.isProcessed("a.py", "f1")).toBe(true);
    expect(await store.isProcessed("a.py", "f2")).toBe(false);
    expect(await store.isProcessed("b.py", "f1")).toBe(false);
  });

  it("replaces the previous record for the same file", async () => {
    await store.recordProcessed("a.py", "f1", aggregateWith("pkg.fn", 1));
    await store.recordProcessed("a.py", "f2", aggregateWith("pkg.fn", 3));

    const records = await collect(store.loadAll());
    expect(records).toHaveLength(1);
    expect(records[0].fingerprint).toBe("f2");
    expect(records[0].aggregate.callCounts).toEqual({ "pkg.fn": 3 });
  });

  it("serialises concurrent writes to one file in call order", async () => {
    await Promise.all([
      store.recordProcessed("a.py", "first", aggregateWith("pkg.fn", 1)),
      store.recordProcessed("a.py", "second", aggregateWith("pkg.fn", 2)),
      store.recordProcessed("b.py", "other", emptyAggregate()),
    ]);

    expect(await store.isProcessed("a.py", "second")).toBe(true);
    expect((await collect(store.loadAll())).map((r) => r.file).sort()).toEqual(["a.py", "b.py"]);
  });

  it("leaves no temporary files behind", async () => {
    await store.recordProcessed("a.py", "f1", emptyAggregate());
    expect(readdirSync(testDir)).toEqual([checkpointFileName("a.py")]);
  });

  it("skips corrupt and foreign records when loading", async () => {
    await store.recordProcessed("a.py", "f1", aggregateWith("pkg.fn", 2));
    writeFileSync(join(testDir, checkpointFileName("b.py")), "{ truncated");
    writeFileSync(join(testDir, checkpointFileName("c.py")), JSON.stringify({ file: "c.py", processed: true }));
    writeFileSync(join(testDir, "leftover.json.123.abcd.tmp"), "{}");

    const records = await collect(store.loadAll());
    expect(records.map((r) => r.file)).toEqual(["a.py"]);
    expect(await store.isProcessed("b.py", "f1")).toBe(false);
  });

  it("keeps the committed record when a replacement cannot be written", async () => {
    await store.recordProcessed("a.py", "f1", aggregateWith("pkg.fn", 1));

    // A directory at the target path makes every rename fail
    const blocked = new FileCheckpointStore(testDir, { retries: 2 });
    mkdirSync(join(testDir, checkpointFileName("b.py")));
    const result = await blocked.recordProcessed("b.py", "f1", emptyAggregate());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CheckpointWriteError);
      expect(result.error.attempts).toBe(2);
      expect(result.error.file).toBe("b.py");
    }
    expect(await store.isProcessed("a.py", "f1")).toBe(true);
    expect(readdirSync(testDir).filter((name) => name.endsWith(".tmp"))).toEqual([]);
  });

  it("fails to open where a file blocks the directory", async () => {
    const filePath = join(testDir, "not-a-dir");
    writeFileSync(filePath, "x");
    const result = await new FileCheckpointStore(join(filePath, "sub")).open();
    expect(result.ok).toBe(false);
  });

  it("returns nothing for a directory that does not exist", async () => {
    expect(await collect(new FileCheckpointStore(join(testDir, "missing")).loadAll())).toEqual([]);
  });
});
