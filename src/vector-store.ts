import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { StoreWriteFailureError, errorMessage } from "./errors";
import type { UnitRecord } from "./types";

/** Well-known sync-state keys. */
export const SYNC_KEYS = {
  watermark: "last_sync_timestamp",
  status: "status",
  lastMode: "last_sync_mode",
  lastAt: "last_sync_at",
} as const;

export type SyncStatus = "not_initialized" | "in_progress" | "completed";

export interface Neighbor {
  uid: string;
  /** Squared Euclidean distance to the query vector. */
  distance: number;
}

export interface StoreEntry {
  record: UnitRecord;
  vector: Float32Array;
}

export interface UpsertOptions {
  /** Drop every unit, vector and sync-state entry in the same transaction. */
  replaceAll?: boolean;
}

/**
 * Durable keyed storage of unit metadata and vectors plus a small sync-state
 * table. Metadata and vector for one uid are always written together.
 */
export interface VectorStore {
  upsert(record: UnitRecord, vector: Float32Array): Promise<void>;
  /** Atomic over the whole batch: all entries become visible, or none. */
  upsertBatch(entries: readonly StoreEntry[], opts?: UpsertOptions): Promise<void>;
  get(uid: string): Promise<UnitRecord | undefined>;
  getMany(uids: readonly string[]): Promise<Map<string, UnitRecord>>;
  /** Ascending distance; ties broken by uid. */
  knn(query: Float32Array, k: number): Promise<Neighbor[]>;
  allIdentifiers(): Promise<Set<string>>;
  count(): Promise<number>;
  getSyncState(key: string): Promise<string | undefined>;
  setSyncState(key: string, value: string): Promise<void>;
  /** Discard every unit, vector and sync-state entry (full rebuild). */
  clear(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Convert a squared Euclidean distance into a similarity in [0, 1]. For
 * unit-length vectors this is their cosine similarity, clamped at 0.
 */
export function distanceToSimilarity(distance: number): number {
  return Math.min(1, Math.max(0, 1 - distance / 2));
}

/** Squared Euclidean distance between two equal-length vectors. */
export function squaredDistance(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return sum;
}

function compareNeighbors(a: Neighbor, b: Neighbor): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  return a.uid < b.uid ? -1 : a.uid > b.uid ? 1 : 0;
}

/**
 * Exact brute-force KNN over an in-memory vector map, keeping a sorted
 * window of at most k neighbors.
 */
export function bruteForceKnn(
  vectors: Iterable<[string, Float32Array]>,
  query: Float32Array,
  k: number,
): Neighbor[] {
  const limit = Math.floor(k);
  if (limit <= 0) return [];
  const top: Neighbor[] = [];
  for (const [uid, vec] of vectors) {
    const candidate = { uid, distance: squaredDistance(query, vec) };
    if (top.length === limit && compareNeighbors(candidate, top[limit - 1]) >= 0) continue;
    // binary search for insertion point
    let lo = 0;
    let hi = top.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareNeighbors(top[mid], candidate) <= 0) lo = mid + 1;
      else hi = mid;
    }
    top.splice(lo, 0, candidate);
    if (top.length > limit) top.pop();
  }
  return top;
}

export function encodeVector(v: Float32Array): Buffer {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength);
}

export function decodeVector(buf: Buffer): Float32Array {
  // copy: the source buffer may be pooled / unaligned
  const out = new Float32Array(buf.byteLength / 4);
  new Uint8Array(out.buffer).set(buf);
  return out;
}

interface UnitRow {
  uid: string;
  content: string;
  page_uid: string;
  page_title: string;
  parent_uid: string | null;
  ancestors: string;
  last_modified: number;
  embedded_at: number;
}

interface VectorRow {
  uid: string;
  embedding: Buffer;
}

export interface SqliteVectorStoreOptions {
  /** Database file path, or ":memory:". */
  storePath: string;
  dimensions: number;
  modelName: string;
  verbose?: boolean;
}

/**
 * SQLite-backed {@link VectorStore}. Vectors are stored as little-endian f32
 * blobs; KNN runs over an in-memory copy that is hydrated on first use and
 * updated only after a write transaction commits.
 */
export class SqliteVectorStore implements VectorStore {
  private readonly db: Database.Database;
  private readonly dimensions: number;
  private readonly modelName: string;
  private readonly verbose: boolean;
  private vectors: Map<string, Float32Array> | null = null;

  public constructor(opts: SqliteVectorStoreOptions) {
    this.dimensions = opts.dimensions;
    this.modelName = opts.modelName;
    this.verbose = !!opts.verbose;
    if (opts.storePath !== ":memory:") {
      fs.mkdirSync(path.dirname(opts.storePath), { recursive: true });
    }
    this.db = new Database(opts.storePath);
    if (opts.storePath !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.initSchema();
    console.error(`[MCP] Vector store opened at ${opts.storePath}`);
  }

  public getDimensions(): number {
    return this.dimensions;
  }

  public async upsert(record: UnitRecord, vector: Float32Array): Promise<void> {
    await this.upsertBatch([{ record, vector }]);
  }

  public async upsertBatch(entries: readonly StoreEntry[], opts: UpsertOptions = {}): Promise<void> {
    const replaceAll = !!opts.replaceAll;
    if (entries.length === 0 && !replaceAll) return;
    const insertUnit = this.db.prepare(`
      INSERT OR REPLACE INTO units
        (uid, content, page_uid, page_title, parent_uid, ancestors, last_modified, embedded_at)
      VALUES (@uid, @content, @page_uid, @page_title, @parent_uid, @ancestors, @last_modified, @embedded_at)
    `);
    const insertVector = this.db.prepare(
      "INSERT OR REPLACE INTO vectors (uid, embedding) VALUES (?, ?)",
    );
    const write = this.db.transaction((batch: readonly StoreEntry[]) => {
      if (replaceAll) this.db.exec("DELETE FROM vectors; DELETE FROM units; DELETE FROM sync_state;");
      for (const { record, vector } of batch) {
        insertUnit.run(toRow(record));
        insertVector.run(record.uid, encodeVector(vector));
      }
    });
    try {
      write(entries);
    } catch (e) {
      throw new StoreWriteFailureError(
        `Failed to write ${entries.length} unit(s): ${errorMessage(e)}`,
        { cause: e },
      );
    }
    // Only reached after commit.
    if (replaceAll) {
      this.vectors = new Map();
      console.error(`[MCP] Previous index replaced`);
    }
    if (this.vectors) {
      for (const { record, vector } of entries) this.vectors.set(record.uid, Float32Array.from(vector));
    }
    if (this.verbose) console.error(`[MCP][verbose] Committed ${entries.length} unit(s)`);
  }

  public async get(uid: string): Promise<UnitRecord | undefined> {
    const row = this.db
      .prepare<[string], UnitRow>("SELECT * FROM units WHERE uid = ?")
      .get(uid);
    return row ? fromRow(row) : undefined;
  }

  public async getMany(uids: readonly string[]): Promise<Map<string, UnitRecord>> {
    const out = new Map<string, UnitRecord>();
    const stmt = this.db.prepare<[string], UnitRow>("SELECT * FROM units WHERE uid = ?");
    for (const uid of uids) {
      const row = stmt.get(uid);
      if (row) out.set(uid, fromRow(row));
    }
    return out;
  }

  public async knn(query: Float32Array, k: number): Promise<Neighbor[]> {
    if (query.length !== this.dimensions) {
      throw new RangeError(
        `Query vector has ${query.length} dimensions, index expects ${this.dimensions}`,
      );
    }
    return bruteForceKnn(this.loadVectors(), query, k);
  }

  public async allIdentifiers(): Promise<Set<string>> {
    const rows = this.db.prepare<[], { uid: string }>("SELECT uid FROM vectors").all();
    return new Set(rows.map((r) => r.uid));
  }

  public async count(): Promise<number> {
    const row = this.db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM vectors").get();
    return row?.n ?? 0;
  }

  public async getSyncState(key: string): Promise<string | undefined> {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM sync_state WHERE key = ?")
      .get(key);
    return row?.value;
  }

  public async setSyncState(key: string, value: string): Promise<void> {
    try {
      this.db
        .prepare("INSERT OR REPLACE INTO sync_state (key, value) VALUES (?, ?)")
        .run(key, value);
    } catch (e) {
      throw new StoreWriteFailureError(`Failed to write sync state '${key}': ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }

  public async clear(): Promise<void> {
    this.db.transaction(() => {
      this.db.exec("DELETE FROM vectors; DELETE FROM units; DELETE FROM sync_state;");
    })();
    this.vectors = new Map();
    console.error(`[MCP] All vector store data dropped`);
  }

  public async close(): Promise<void> {
    this.db.close();
    this.vectors = null;
  }

  private loadVectors(): Map<string, Float32Array> {
    if (this.vectors) return this.vectors;
    const map = new Map<string, Float32Array>();
    const rows = this.db.prepare<[], VectorRow>("SELECT uid, embedding FROM vectors").iterate();
    for (const row of rows) map.set(row.uid, decodeVector(row.embedding));
    this.vectors = map;
    if (this.verbose) console.error(`[MCP][verbose] Loaded ${map.size} vectors into memory`);
    return map;
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS index_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
    const meta = this.db.prepare<[string], { value: string }>(
      "SELECT value FROM index_meta WHERE key = ?",
    );
    const storedModel = meta.get("model_name")?.value;
    const storedDims = meta.get("dimensions")?.value;
    if (
      (storedModel !== undefined && storedModel !== this.modelName) ||
      (storedDims !== undefined && Number(storedDims) !== this.dimensions)
    ) {
      console.error(
        `[MCP] Stored index incompatible (model/dimensions differ: ${storedModel}/${storedDims}). Performing cold rebuild.`,
      );
      this.db.exec(`
        DROP TABLE IF EXISTS vectors;
        DROP TABLE IF EXISTS units;
        DROP TABLE IF EXISTS sync_state;
      `);
    }

    const byteLength = this.dimensions * 4;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS units (
        uid TEXT PRIMARY KEY,
        content TEXT NOT NULL,
        page_uid TEXT NOT NULL,
        page_title TEXT NOT NULL,
        parent_uid TEXT,
        ancestors TEXT NOT NULL,
        last_modified INTEGER NOT NULL,
        embedded_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS vectors (
        uid TEXT PRIMARY KEY,
        embedding BLOB NOT NULL CHECK (length(embedding) = ${byteLength})
      );
      CREATE TABLE IF NOT EXISTS sync_state (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_units_last_modified ON units(last_modified);
    `);
    const setMeta = this.db.prepare("INSERT OR REPLACE INTO index_meta (key, value) VALUES (?, ?)");
    setMeta.run("model_name", this.modelName);
    setMeta.run("dimensions", String(this.dimensions));
  }
}

function toRow(r: UnitRecord): UnitRow {
  return {
    uid: r.uid,
    content: r.content,
    page_uid: r.pageUid,
    page_title: r.pageTitle,
    parent_uid: r.parentUid,
    ancestors: JSON.stringify(r.ancestors),
    last_modified: r.lastModified,
    embedded_at: r.embeddedAt,
  };
}

function parseAncestors(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((s): s is string => typeof s === "string") : [];
}

function fromRow(row: UnitRow): UnitRecord {
  return {
    uid: row.uid,
    content: row.content,
    pageUid: row.page_uid,
    pageTitle: row.page_title,
    parentUid: row.parent_uid,
    ancestors: parseAncestors(row.ancestors),
    lastModified: row.last_modified,
    embeddedAt: row.embedded_at,
  };
}
