import { EmbeddingService } from "./embeddings";
import { StoreWriteFailureError, errorMessage } from "./errors";
import { StatusManager, statusManager } from "./status";
import {
  isStale,
  type SourceGraphClient,
  type SyncMode,
  type SyncReport,
  type UnitRecord,
  type UnitSnapshot,
} from "./types";
import { SYNC_KEYS, type StoreEntry, type VectorStore } from "./vector-store";

export type SyncPhase = "idle" | "diffing" | "embedding" | "committing";

export const DEFAULT_COMMIT_INTERVAL = 256;
export const DEFAULT_STORE_RETRIES = 2;

/**
 * Options required to construct a {@link SyncCoordinator}. `source`,
 * `embeddings` and `store` are mandatory; everything else has a default.
 */
export interface SyncCoordinatorOptions {
  source: SourceGraphClient;
  embeddings: EmbeddingService;
  store: VectorStore;
  /** Units per atomic sub-batch commit (default 256). */
  commitInterval?: number;
  /** Extra attempts for a failed sub-batch commit before aborting (default 2). */
  storeRetries?: number;
  /** Clock in epoch ms; injectable for tests. */
  now?: () => number;
  status?: StatusManager;
  verbose?: boolean;
}

export interface SyncRunOptions {
  /** Deadline / cancellation; checked before every sub-batch. */
  signal?: AbortSignal;
}

export interface FullSyncOptions extends SyncRunOptions {
  /** Discard the whole store (units, vectors, sync state) before repopulating. */
  rebuild?: boolean;
}

interface ScheduledRun {
  mode: SyncMode;
  promise: Promise<SyncReport>;
  /** Started with an abort signal, so it may stop before finishing. */
  cancellable: boolean;
}

/**
 * Whether a request can be answered by joining `run`: a full run covers an
 * incremental request, and a request without a deadline never joins a run
 * that can be cancelled under it.
 */
function covers(run: ScheduledRun, mode: SyncMode, signal: AbortSignal | undefined): boolean {
  if (run.mode !== "full" && mode === "full") return false;
  return !run.cancellable || signal !== undefined;
}

/** Order used for processing: oldest edit first, uid as tie-break. */
function byEditTime(a: UnitSnapshot, b: UnitSnapshot): number {
  if (a.lastModified !== b.lastModified) return a.lastModified - b.lastModified;
  return a.uid < b.uid ? -1 : a.uid > b.uid ? 1 : 0;
}

/**
 * Highest watermark that is safe once the first `committed` units of
 * `sorted` are durable: every unit at or below it must be committed, and it
 * never exceeds `now`. Returns null when no committed unit qualifies.
 */
export function safeWatermark(
  sorted: readonly UnitSnapshot[],
  committed: number,
  now: number,
): number | null {
  const boundary = committed < sorted.length ? sorted[committed].lastModified : Infinity;
  for (let i = Math.min(committed, sorted.length) - 1; i >= 0; i--) {
    const t = sorted[i].lastModified;
    if (t < boundary && t <= now) return t;
  }
  return null;
}

/** Whether a fetched unit must be (re)embedded given what the store holds for it. */
export function needsEmbedding(snapshot: UnitSnapshot, stored: UnitRecord | undefined): boolean {
  if (!stored) return true;
  if (snapshot.lastModified > stored.lastModified) return true;
  if (isStale({ ...snapshot, embeddedAt: stored.embeddedAt })) return true;
  return EmbeddingService.formatUnit(snapshot) !== EmbeddingService.formatUnit(stored);
}

/**
 * Reconciles the vector store with the source graph. Detects new/changed
 * units, re-embeds them, commits them in atomic sub-batches and advances the
 * sync watermark only past work that is durably stored.
 *
 * At most one sync runs at a time per instance. A request arriving while one
 * is in flight joins it; a full sync requested during an incremental one is
 * queued once behind it.
 */
export class SyncCoordinator {
  private readonly source: SourceGraphClient;
  private readonly embeddings: EmbeddingService;
  private readonly store: VectorStore;
  private readonly commitInterval: number;
  private readonly storeRetries: number;
  private readonly now: () => number;
  private readonly status: StatusManager;
  private readonly verbose: boolean;
  private phase: SyncPhase = "idle";
  private running: ScheduledRun | null = null;
  private queued: ScheduledRun | null = null;

  public constructor(opts: SyncCoordinatorOptions) {
    this.source = opts.source;
    this.embeddings = opts.embeddings;
    this.store = opts.store;
    this.commitInterval = Math.max(1, Math.floor(opts.commitInterval ?? DEFAULT_COMMIT_INTERVAL));
    this.storeRetries = Math.max(0, Math.floor(opts.storeRetries ?? DEFAULT_STORE_RETRIES));
    this.now = opts.now ?? Date.now;
    this.status = opts.status ?? statusManager;
    this.verbose = !!opts.verbose;
  }

  public getPhase(): SyncPhase {
    return this.phase;
  }

  public isSyncing(): boolean {
    return this.running !== null;
  }

  /** Current watermark, or null if the index was never synced. */
  public async getWatermark(): Promise<number | null> {
    const raw = await this.store.getSyncState(SYNC_KEYS.watermark);
    if (raw === undefined) return null;
    const n = Number(raw);
    return Number.isFinite(n) ? n : null;
  }

  /** Tool-facing entry point. */
  public sync(full: boolean, opts: FullSyncOptions = {}): Promise<SyncReport> {
    return full ? this.fullSync(opts) : this.incrementalSync(opts);
  }

  /** Fetch and (re)embed every unit of the source graph. */
  public fullSync(opts: FullSyncOptions = {}): Promise<SyncReport> {
    return this.schedule("full", opts.signal, () => this.runFull(opts));
  }

  /** Embed only units modified after the watermark; a no-op when nothing changed. */
  public incrementalSync(opts: SyncRunOptions = {}): Promise<SyncReport> {
    return this.schedule("incremental", opts.signal, () => this.runIncremental(opts));
  }

  /**
   * Reconciliation pass: uids present in the store but no longer returned by
   * the source graph. Costs a full fetch; nothing is purged.
   */
  public async findOrphans(signal?: AbortSignal): Promise<string[]> {
    const [stored, current] = await Promise.all([
      this.store.allIdentifiers(),
      this.source.fetchAll(signal),
    ]);
    const live = new Set(current.map((u) => u.uid));
    return [...stored].filter((uid) => !live.has(uid)).sort();
  }

  // -------------------- Scheduling --------------------

  private schedule(
    mode: SyncMode,
    signal: AbortSignal | undefined,
    run: () => Promise<SyncReport>,
  ): Promise<SyncReport> {
    const current = this.running;
    if (!current) return this.start(mode, signal, run);

    const join = (p: Promise<SyncReport>) => p.then((r) => ({ ...r, coalesced: true }));
    if (covers(current, mode, signal)) return join(current.promise);
    if (this.queued && covers(this.queued, mode, signal)) return join(this.queued.promise);

    const after = (this.queued ?? current).promise;
    const promise: Promise<SyncReport> = after
      .catch(() => undefined) // the queued run does not depend on the outcome
      .then(() => {
        if (this.queued?.promise === promise) this.queued = null;
        return this.schedule(mode, signal, run);
      });
    this.queued = { mode, promise, cancellable: signal !== undefined };
    return promise;
  }

  private start(
    mode: SyncMode,
    signal: AbortSignal | undefined,
    run: () => Promise<SyncReport>,
  ): Promise<SyncReport> {
    const promise = run().finally(() => {
      this.running = null;
      this.phase = "idle";
    });
    this.running = { mode, promise, cancellable: signal !== undefined };
    return promise;
  }

  // -------------------- Runs --------------------

  private async runFull(opts: FullSyncOptions): Promise<SyncReport> {
    const started = Date.now();
    this.status.markSyncStarted();
    try {
      await this.store.setSyncState(SYNC_KEYS.status, "in_progress");
      this.phase = "diffing";
      const units = await this.source.fetchAll(opts.signal);
      console.error(`[MCP] Full sync: ${units.length} units fetched`);
      if (opts.rebuild) console.error(`[MCP] Full rebuild: existing index is replaced on first commit`);
      return await this.process("full", units, started, opts.signal, !!opts.rebuild);
    } catch (e) {
      if (opts.signal?.aborted) return this.cancelledBeforeCommit("full", started);
      this.status.markSyncFailed(errorMessage(e));
      throw e;
    }
  }

  private async runIncremental(opts: SyncRunOptions): Promise<SyncReport> {
    const watermark = await this.getWatermark();
    if (watermark === null) {
      console.error(`[MCP] No sync watermark found. Performing full sync.`);
      return this.runFull({ signal: opts.signal });
    }

    const started = Date.now();
    this.status.markSyncStarted();
    try {
      this.phase = "diffing";
      const units = await this.source.fetchModifiedSince(watermark, opts.signal);
      if (units.length === 0) {
        if (this.verbose) console.error(`[MCP][verbose] No changes since ${watermark}`);
        const report = this.report("incremental", 0, started, watermark, false);
        this.status.markSyncFinished(report);
        return report;
      }
      console.error(`[MCP] Incremental sync: ${units.length} units modified since ${watermark}`);
      await this.store.setSyncState(SYNC_KEYS.status, "in_progress");
      return await this.process("incremental", units, started, opts.signal);
    } catch (e) {
      if (opts.signal?.aborted) return this.cancelledBeforeCommit("incremental", started);
      this.status.markSyncFailed(errorMessage(e));
      throw e;
    }
  }

  /**
   * Embed and commit `units` in sub-batches, advancing the watermark after
   * each commit. Units already stored with identical input are skipped but
   * still count as durable for the watermark. With `replace`, the first
   * commit also drops the previous index, so a rebuild that fails before it
   * leaves the old index intact.
   */
  private async process(
    mode: SyncMode,
    units: readonly UnitSnapshot[],
    started: number,
    signal?: AbortSignal,
    replace = false,
  ): Promise<SyncReport> {
    const now = this.now();
    const sorted = [...units].sort(byEditTime);
    const target = safeWatermark(sorted, sorted.length, now);
    if (this.verbose) console.error(`[MCP][verbose] Target watermark: ${target ?? "none"}`);

    let pendingReplace = replace;
    let watermark = await this.getWatermark();
    let embedded = 0;
    let cancelled = false;

    for (let i = 0; i < sorted.length; i += this.commitInterval) {
      if (signal?.aborted) {
        cancelled = true;
        console.error(`[MCP] Sync cancelled after ${i}/${sorted.length} units`);
        break;
      }
      const slice = sorted.slice(i, i + this.commitInterval);

      try {
        this.phase = "diffing";
        const existing = pendingReplace
          ? new Map<string, UnitRecord>()
          : await this.store.getMany(slice.map((u) => u.uid));
        const pending = await this.withContext(
          slice.filter((u) => needsEmbedding(u, existing.get(u.uid))),
          signal,
        );

        if (pending.length > 0) {
          this.phase = "embedding";
          const vectors = await this.embeddings.embedBatch(pending.map(EmbeddingService.formatUnit));
          this.phase = "committing";
          const embeddedAt = this.now();
          const entries: StoreEntry[] = pending.map((u, j) => ({
            record: { ...u, embeddedAt: Math.max(embeddedAt, u.lastModified) },
            vector: vectors[j],
          }));
          await this.commitWithRetry(entries, pendingReplace);
          embedded += entries.length;
        }
      } catch (e) {
        if (!signal?.aborted) throw e;
        cancelled = true;
        console.error(`[MCP] Sync cancelled after ${i}/${sorted.length} units`);
        break;
      }
      if (pendingReplace) {
        pendingReplace = false;
        watermark = null;
        await this.store.setSyncState(SYNC_KEYS.status, "in_progress");
      }

      const safe = safeWatermark(sorted, i + slice.length, now);
      if (safe !== null && (watermark === null || safe > watermark)) {
        await this.store.setSyncState(SYNC_KEYS.watermark, String(safe));
        watermark = safe;
      }
      if (this.verbose) {
        const done = Math.min(sorted.length, i + slice.length);
        console.error(`[MCP][verbose] Sync progress: ${done}/${sorted.length} (embedded ${embedded})`);
      }
    }

    if (pendingReplace && !cancelled) {
      // Nothing to commit: the source graph is empty.
      await this.commitWithRetry([], true);
      watermark = null;
    }
    if (!cancelled) {
      await this.store.setSyncState(SYNC_KEYS.status, "completed");
      await this.store.setSyncState(SYNC_KEYS.lastMode, mode);
      await this.store.setSyncState(SYNC_KEYS.lastAt, String(this.now()));
    }
    const report = this.report(mode, embedded, started, watermark, cancelled);
    this.status.setIndexCounts(await this.store.count(), watermark);
    this.status.markSyncFinished(report);
    console.error(
      `[MCP] ${mode === "full" ? "Full" : "Incremental"} sync ${cancelled ? "cancelled" : "complete"}: embedded ${embedded}, watermark ${watermark ?? "none"}`,
    );
    return report;
  }

  /** Fill in ancestor text for nested units that arrived without it. */
  private async withContext(
    units: UnitSnapshot[],
    signal?: AbortSignal,
  ): Promise<UnitSnapshot[]> {
    const out: UnitSnapshot[] = [];
    for (const u of units) {
      const nested = u.parentUid !== null && u.parentUid !== u.pageUid;
      if (nested && u.ancestors.length === 0) {
        out.push({ ...u, ancestors: await this.source.fetchAncestorChain(u.uid, signal) });
      } else {
        out.push(u);
      }
    }
    return out;
  }

  private async commitWithRetry(entries: StoreEntry[], replaceAll = false): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await this.store.upsertBatch(entries, { replaceAll });
        return;
      } catch (e) {
        if (!(e instanceof StoreWriteFailureError) || attempt >= this.storeRetries) throw e;
        console.error(
          `[MCP] Sub-batch commit failed (attempt ${attempt + 1}/${this.storeRetries + 1}): ${e.message}. Retrying...`,
        );
      }
    }
  }

  /** A run whose fetch was aborted by its signal before anything was committed. */
  private async cancelledBeforeCommit(mode: SyncMode, started: number): Promise<SyncReport> {
    const report = this.report(mode, 0, started, await this.getWatermark(), true);
    this.status.markSyncFinished(report);
    console.error(`[MCP] ${mode === "full" ? "Full" : "Incremental"} sync cancelled before its first commit`);
    return report;
  }

  private report(
    mode: SyncMode,
    unitsProcessed: number,
    started: number,
    watermark: number | null,
    cancelled: boolean,
  ): SyncReport {
    return {
      mode,
      unitsProcessed,
      elapsedMs: Date.now() - started,
      newWatermark: watermark,
      cancelled,
      coalesced: false,
    };
  }
}
