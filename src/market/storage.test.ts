import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { StoreError } from "./errors";
import { FileArtifactStore, compareVersions, formatVersion } from "./storage";
import { makeFeatureSet, makeSeries } from "./testFixtures";

const AS_OF = "2024-01-03T00:00:00.000Z";
const COMMITTED_AT = new Date("2024-01-03T12:00:00.000Z");

describe("formatVersion / compareVersions", () => {
  it("formats a compact UTC timestamp", () => {
    expect(formatVersion(AS_OF)).toBe("20240103T000000Z");
    expect(formatVersion("2024-01-03T09:30:15.250+02:00")).toBe("20240103T073015Z");
  });

  it("rejects invalid timestamps", () => {
    expect(() => formatVersion("yesterday")).toThrow(StoreError);
  });

  it("orders revisions after their base version", () => {
    const sorted = ["20240103T000000Z~3", "20240104T000000Z", "20240103T000000Z~2", "20240103T000000Z"].sort(
      compareVersions
    );
    expect(sorted).toEqual(["20240103T000000Z", "20240103T000000Z~2", "20240103T000000Z~3", "20240104T000000Z"]);
  });
});

describe("FileArtifactStore", () => {
  let root: string;
  let store: FileArtifactStore;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "market-store-"));
    store = new FileArtifactStore(root, { now: () => COMMITTED_AT });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("round-trips a payload by key", async () => {
    const features = makeFeatureSet("AAPL", [100, 101, 102]);
    await store.put({ symbol: "AAPL", kind: "features", version: "20240103T000000Z" }, features);

    await expect(store.get({ symbol: "AAPL", kind: "features", version: "20240103T000000Z" })).resolves.toEqual(features);
    await expect(store.get({ symbol: "MSFT", kind: "features", version: "20240103T000000Z" })).resolves.toBeNull();
  });

  it("never overwrites a committed version", async () => {
    const key = { symbol: "AAPL", kind: "raw", version: "20240103T000000Z" } as const;
    await store.put(key, makeSeries("AAPL", [1, 2, 3]));

    await expect(store.put(key, makeSeries("AAPL", [4, 5, 6]))).rejects.toThrow(
      "AAPL/raw/20240103T000000Z is already committed; versions are immutable"
    );
    const stored = await store.get(key);
    expect(stored?.bars.map((b) => b.c)).toEqual([1, 2, 3]);
  });

  it("refuses to put to the latest pointer", async () => {
    await expect(
      store.put({ symbol: "AAPL", kind: "raw", version: "latest" }, makeSeries("AAPL", [1]))
    ).rejects.toThrow("Cannot put to the latest pointer; use advanceLatest");
  });

  it("rejects malformed versions", async () => {
    await expect(
      store.put({ symbol: "AAPL", kind: "raw", version: "../escape" }, makeSeries("AAPL", [1]))
    ).rejects.toThrow("Invalid artifact version: ../escape");
  });

  it("resolves latest through the pointer", async () => {
    await store.put({ symbol: "AAPL", kind: "features", version: "20240102T000000Z" }, makeFeatureSet("AAPL", [1, 2]));
    await store.put({ symbol: "AAPL", kind: "features", version: "20240103T000000Z" }, makeFeatureSet("AAPL", [1, 2, 3]));

    await expect(store.get({ symbol: "AAPL", kind: "features", version: "latest" })).resolves.toBeNull();

    const pointer = await store.advanceLatest("AAPL", "features", "20240102T000000Z");
    expect(pointer).toEqual({
      symbol: "AAPL",
      kind: "features",
      version: "20240102T000000Z",
      committedAt: COMMITTED_AT.toISOString()
    });

    const latest = await store.get({ symbol: "AAPL", kind: "features", version: "latest" });
    expect(latest?.rows).toHaveLength(2);
  });

  it("does not advance to a missing version", async () => {
    await expect(store.advanceLatest("AAPL", "forecast", "20240103T000000Z")).rejects.toThrow(
      "Cannot advance AAPL/forecast to missing version 20240103T000000Z"
    );
    await expect(store.getLatestPointer("AAPL", "forecast")).resolves.toBeNull();
  });

  it("restores or removes a pointer", async () => {
    await store.put({ symbol: "AAPL", kind: "raw", version: "20240102T000000Z" }, makeSeries("AAPL", [1]));
    await store.put({ symbol: "AAPL", kind: "raw", version: "20240103T000000Z" }, makeSeries("AAPL", [2]));
    const first = await store.advanceLatest("AAPL", "raw", "20240102T000000Z");
    await store.advanceLatest("AAPL", "raw", "20240103T000000Z");

    await store.restoreLatest("AAPL", "raw", first);
    await expect(store.getLatestPointer("AAPL", "raw")).resolves.toEqual(first);

    await store.restoreLatest("AAPL", "raw", null);
    await expect(store.getLatestPointer("AAPL", "raw")).resolves.toBeNull();
  });

  it("lists versions and allocates revisions for a repeated as-of", async () => {
    await expect(store.nextVersion("AAPL", "raw", AS_OF)).resolves.toBe("20240103T000000Z");

    await store.put({ symbol: "AAPL", kind: "raw", version: "20240103T000000Z" }, makeSeries("AAPL", [1]));
    await expect(store.nextVersion("AAPL", "raw", AS_OF)).resolves.toBe("20240103T000000Z~2");

    await store.put({ symbol: "AAPL", kind: "raw", version: "20240103T000000Z~2" }, makeSeries("AAPL", [1]));
    await store.put({ symbol: "AAPL", kind: "raw", version: "20240101T000000Z" }, makeSeries("AAPL", [1]));
    await store.advanceLatest("AAPL", "raw", "20240103T000000Z~2");

    await expect(store.listVersions("AAPL", "raw")).resolves.toEqual([
      "20240101T000000Z",
      "20240103T000000Z",
      "20240103T000000Z~2"
    ]);
    await expect(store.nextVersion("AAPL", "raw", AS_OF)).resolves.toBe("20240103T000000Z~3");
  });

  it("keeps symbols apart on disk", async () => {
    await store.put({ symbol: "BRK.B", kind: "raw", version: "20240103T000000Z" }, makeSeries("BRK.B", [1]));

    await expect(store.listVersions("BRK.B", "raw")).resolves.toEqual(["20240103T000000Z"]);
    await expect(store.listVersions("BRK", "raw")).resolves.toEqual([]);
  });

  it("reports corrupt JSON as a StoreError", async () => {
    const key = { symbol: "AAPL", kind: "raw", version: "20240103T000000Z" } as const;
    await store.put(key, makeSeries("AAPL", [1]));
    await writeFile(store.objectPath("AAPL", "raw", "20240103T000000Z"), "{not json", "utf8");

    await expect(store.get(key)).rejects.toThrow(StoreError);
  });

  it("writes run records as compact JSON", async () => {
    const record = {
      runId: "run-1",
      asOf: AS_OF,
      force: false,
      startedAt: AS_OF,
      endedAt: AS_OF,
      symbols: [],
      totals: { committed: 0, partially_committed: 0, failed: 0, unchanged: 0 }
    };
    await store.writeRunRecord(record);

    await expect(store.readRunRecord("run-1")).resolves.toEqual(record);
    await expect(readFile(path.join(root, "_runs", "run-1.json"), "utf8")).resolves.toBe(`${JSON.stringify(record)}\n`);
  });
});
