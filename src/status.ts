import { APP_VERSION } from "./config";
import type { SyncMode, SyncReport } from "./types";

/**
 * Counters and markers describing the vector index. Updated in place by the
 * sync coordinator after each commit.
 */
export interface IndexStatus {
  /** Number of units with a stored vector. */
  units: number;
  /** Current sync watermark (epoch ms), null before the first sync. */
  watermark: number | null;
  /** True while a sync is running. */
  syncing: boolean;
  /** Summary of the most recent finished sync, if any. */
  lastSync: {
    mode: SyncMode;
    unitsProcessed: number;
    elapsedMs: number;
    cancelled: boolean;
    finishedAt: string;
  } | null;
  /** Message of the most recent failed sync; cleared by the next success. */
  lastError: string | null;
}

/** Server lifecycle and index state, served by `index_status` and GET /health. */
export interface ServerStatus {
  version: string;
  /** Source graph being indexed. */
  graphName: string;
  /** Embedding model id; empty until the model is loaded. */
  modelName: string;
  /** 'stdio', 'http' or 'unknown' before startup selects one. */
  transport: string;
  /** True once the store is open and the model is loaded. */
  ready: boolean;
  startedAt: string;
  index: IndexStatus;
}

/** Owner of the status snapshot; the sync coordinator and bootstrap write through it. */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      graphName: initial?.graphName ?? "",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      index: initial?.index ?? {
        units: 0,
        watermark: null,
        syncing: false,
        lastSync: null,
        lastError: null,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setGraphName(name: string) {
    this.data.graphName = name;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  public setIndexCounts(units: number, watermark: number | null) {
    this.data.index.units = units;
    this.data.index.watermark = watermark;
  }

  public markSyncStarted() {
    this.data.index.syncing = true;
  }

  public markSyncFinished(report: SyncReport) {
    this.data.index.syncing = false;
    this.data.index.lastError = null;
    this.data.index.lastSync = {
      mode: report.mode,
      unitsProcessed: report.unitsProcessed,
      elapsedMs: report.elapsedMs,
      cancelled: report.cancelled,
      finishedAt: new Date().toISOString(),
    };
  }

  public markSyncFailed(message: string) {
    this.data.index.syncing = false;
    this.data.index.lastError = message;
  }

  /** Mark the server as able to answer queries. */
  public markReady() {
    this.data.ready = true;
  }

  /** Live reference; callers must not mutate it. */
  public getStatus(): ServerStatus {
    return this.data;
  }

  public toJSON() {
    return this.data;
  }
}

// Process-wide default; tests construct their own.
export const statusManager = new StatusManager();
