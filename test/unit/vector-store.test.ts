import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StoreWriteFailureError } from "../../src/errors";
import {
  SYNC_KEYS,
  SqliteVectorStore,
  bruteForceKnn,
  decodeVector,
  distanceToSimilarity,
  encodeVector,
} from "../../src/vector-store";
import { DIMS, record, unit } from "../helpers";

const vec = (...xs: number[]) => Float32Array.from(xs);

describe("distanceToSimilarity", () => {
  it("maps squared distance of unit vectors to cosine similarity, clamped to [0, 1]", () => {
    expect(distanceToSimilarity(0)).toBe(1);
    expect(distanceToSimilarity(0.5)).toBe(0.75);
    expect(distanceToSimilarity(2)).toBe(0);
    expect(distanceToSimilarity(4)).toBe(0);
  });
});

describe("vector encoding", () => {
  it("round-trips through a little-endian f32 blob", () => {
    const v = vec(0.5, -1.25, 3, 0);
    const buf = encodeVector(v);
    expect(buf.byteLength).toBe(16);
    expect(Array.from(decodeVector(buf))).toEqual([0.5, -1.25, 3, 0]);
  });
});

describe("bruteForceKnn", () => {
  it("returns ascending distance with uid tie-break", () => {
    const vectors = new Map<string, Float32Array>([
      ["c", vec(0, 1, 0, 0)],
      ["a", vec(1, 0, 0, 0)],
      ["b", vec(0, 1, 0, 0)],
    ]);
    const out = bruteForceKnn(vectors, vec(1, 0, 0, 0), 10);
    expect(out).toEqual([
      { uid: "a", distance: 0 },
      { uid: "b", distance: 2 },
      { uid: "c", distance: 2 },
    ]);
    expect(bruteForceKnn(vectors, vec(1, 0, 0, 0), 2).map((n) => n.uid)).toEqual(["a", "b"]);
    expect(bruteForceKnn(vectors, vec(1, 0, 0, 0), 0)).toEqual([]);
  });
});

describe("SqliteVectorStore", () => {
  let store: SqliteVectorStore;

  beforeEach(() => {
    store = new SqliteVectorStore({ storePath: ":memory:", dimensions: DIMS, modelName: "fake-model" });
  });

  afterEach(async () => {
    await store.close();
  });

  it("stores and reads back a unit with its context", async () => {
    const r = record(
      unit("b1", "nested", 100, { parentUid: "b0", ancestors: ["Top", "Middle"] }),
      150,
    );
    await store.upsert(r, vec(1, 0, 0, 0));

    expect(await store.get("b1")).toEqual(r);
    expect(await store.get("missing")).toBeUndefined();
    expect(await store.count()).toBe(1);
  });

  it("keeps a null parent uid", async () => {
    const r = record(unit("b1", "orphan", 100, { parentUid: null }));
    await store.upsert(r, vec(1, 0, 0, 0));
    expect((await store.get("b1"))?.parentUid).toBeNull();
  });

  it("replaces metadata and vector on re-upsert", async () => {
    await store.upsert(record(unit("b1", "old", 100)), vec(1, 0, 0, 0));
    await store.knn(vec(1, 0, 0, 0), 1); // hydrate the in-memory copy
    await store.upsert(record(unit("b1", "new", 200)), vec(0, 1, 0, 0));

    expect((await store.get("b1"))?.content).toBe("new");
    expect(await store.knn(vec(0, 1, 0, 0), 1)).toEqual([{ uid: "b1", distance: 0 }]);
    expect(await store.count()).toBe(1);
  });

  it("getMany returns only the uids it finds", async () => {
    await store.upsertBatch([
      { record: record(unit("a", "one", 1)), vector: vec(1, 0, 0, 0) },
      { record: record(unit("b", "two", 2)), vector: vec(0, 1, 0, 0) },
    ]);
    const found = await store.getMany(["a", "zz", "b"]);
    expect([...found.keys()]).toEqual(["a", "b"]);
    expect(await store.allIdentifiers()).toEqual(new Set(["a", "b"]));
  });

  it("answers knn from stored vectors", async () => {
    await store.upsertBatch([
      { record: record(unit("far", "x", 1)), vector: vec(0, 0, 1, 0) },
      { record: record(unit("near", "y", 1)), vector: vec(0.6, 0.8, 0, 0) },
      { record: record(unit("same", "z", 1)), vector: vec(1, 0, 0, 0) },
    ]);
    const out = await store.knn(vec(1, 0, 0, 0), 2);
    expect(out.map((n) => n.uid)).toEqual(["same", "near"]);
    expect(out[1].distance).toBeCloseTo(0.8, 5);
  });

  it("rejects a query of the wrong dimension", async () => {
    await expect(store.knn(vec(1, 0, 0), 1)).rejects.toBeInstanceOf(RangeError);
  });

  it("writes a batch atomically", async () => {
    await store.knn(vec(1, 0, 0, 0), 5); // hydrate before the failed write
    const write = store.upsertBatch([
      { record: record(unit("good", "fine", 1)), vector: vec(1, 0, 0, 0) },
      { record: record(unit("bad", "short vector", 1)), vector: vec(1, 0, 0) },
    ]);

    await expect(write).rejects.toBeInstanceOf(StoreWriteFailureError);
    expect(await store.get("good")).toBeUndefined();
    expect(await store.get("bad")).toBeUndefined();
    expect(await store.count()).toBe(0);
    expect(await store.knn(vec(1, 0, 0, 0), 5)).toEqual([]);
  });

  it("replaces the whole index inside the batch's transaction", async () => {
    await store.upsert(record(unit("old", "x", 1)), vec(1, 0, 0, 0));
    await store.setSyncState(SYNC_KEYS.watermark, "1234");
    await store.knn(vec(1, 0, 0, 0), 5);

    const failed = store.upsertBatch(
      [{ record: record(unit("bad", "short vector", 2)), vector: vec(1, 0, 0) }],
      { replaceAll: true },
    );
    await expect(failed).rejects.toBeInstanceOf(StoreWriteFailureError);
    expect(await store.get("old")).toMatchObject({ content: "x" });
    expect(await store.getSyncState(SYNC_KEYS.watermark)).toBe("1234");

    await store.upsertBatch([{ record: record(unit("new", "z", 3)), vector: vec(0, 1, 0, 0) }], {
      replaceAll: true,
    });
    expect(await store.allIdentifiers()).toEqual(new Set(["new"]));
    expect(await store.getSyncState(SYNC_KEYS.watermark)).toBeUndefined();
    expect(await store.knn(vec(1, 0, 0, 0), 5)).toEqual([{ uid: "new", distance: 2 }]);
  });

  it("persists sync state and clears everything on demand", async () => {
    expect(await store.getSyncState(SYNC_KEYS.watermark)).toBeUndefined();
    await store.setSyncState(SYNC_KEYS.watermark, "1234");
    await store.upsert(record(unit("a", "one", 1)), vec(1, 0, 0, 0));
    expect(await store.getSyncState(SYNC_KEYS.watermark)).toBe("1234");

    await store.clear();

    expect(await store.getSyncState(SYNC_KEYS.watermark)).toBeUndefined();
    expect(await store.count()).toBe(0);
    expect(await store.knn(vec(1, 0, 0, 0), 5)).toEqual([]);
  });
});

describe("SqliteVectorStore on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "vector-store-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const open = (modelName: string, dimensions = DIMS) =>
    new SqliteVectorStore({ storePath: path.join(dir, "nested", "index.db"), dimensions, modelName });

  it("reopens with the same model and keeps the data", async () => {
    const first = open("model-a");
    await first.upsert(record(unit("a", "one", 1)), vec(1, 0, 0, 0));
    await first.setSyncState(SYNC_KEYS.watermark, "1");
    await first.close();

    const second = open("model-a");
    expect(await second.count()).toBe(1);
    expect(await second.getSyncState(SYNC_KEYS.watermark)).toBe("1");
    expect(await second.knn(vec(1, 0, 0, 0), 1)).toEqual([{ uid: "a", distance: 0 }]);
    await second.close();
  });

  it("starts cold when the model changes", async () => {
    const first = open("model-a");
    await first.upsert(record(unit("a", "one", 1)), vec(1, 0, 0, 0));
    await first.setSyncState(SYNC_KEYS.watermark, "1");
    await first.close();

    const second = open("model-b");
    expect(await second.count()).toBe(0);
    expect(await second.getSyncState(SYNC_KEYS.watermark)).toBeUndefined();
    await second.close();
  });

  it("starts cold when the dimensions change", async () => {
    const first = open("model-a");
    await first.upsert(record(unit("a", "one", 1)), vec(1, 0, 0, 0));
    await first.close();

    const second = open("model-a", 3);
    expect(await second.count()).toBe(0);
    await second.upsert(record(unit("b", "two", 2)), vec(0, 1, 0));
    expect(await second.count()).toBe(1);
    await second.close();
  });
});
