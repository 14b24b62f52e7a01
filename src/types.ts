/**
 * Shared unit type used throughout the sync, persistence and ranking layers.
 * Represents a single block of the source graph together with the context
 * that is folded into its embedding.
 */
export interface UnitSnapshot {
  /** Stable, globally unique block uid. */
  readonly uid: string;
  /** Block text content. */
  readonly content: string;
  /** Uid of the page containing the block. */
  readonly pageUid: string;
  /** Title of the page containing the block. */
  readonly pageTitle: string;
  /** Uid of the direct parent (block or page); null when unknown. */
  readonly parentUid: string | null;
  /** Text of ancestor blocks, ordered root → direct parent. */
  readonly ancestors: readonly string[];
  /** Last edit time in epoch milliseconds. */
  readonly lastModified: number;
}

/** A unit as persisted in the index. */
export interface UnitRecord extends UnitSnapshot {
  /** Epoch ms of the commit that wrote the unit's current vector. */
  readonly embeddedAt: number;
}

/** True when the unit changed after its vector was written. */
export function isStale(unit: UnitSnapshot & { embeddedAt?: number | null }): boolean {
  return unit.embeddedAt == null || unit.lastModified > unit.embeddedAt;
}

/**
 * Source-graph client consumed by the sync layer. Implementations own their
 * transport concerns (retries, redirects, rate limits).
 */
export interface SourceGraphClient {
  fetchAll(signal?: AbortSignal): Promise<UnitSnapshot[]>;
  /** Units whose lastModified is strictly greater than `timestamp`. */
  fetchModifiedSince(timestamp: number, signal?: AbortSignal): Promise<UnitSnapshot[]>;
  /** Ancestor block texts for one unit, root → direct parent. */
  fetchAncestorChain(uid: string, signal?: AbortSignal): Promise<string[]>;
}

export type SyncMode = "full" | "incremental";

/** Outcome of a single sync invocation. */
export interface SyncReport {
  mode: SyncMode;
  unitsProcessed: number;
  elapsedMs: number;
  /** Watermark after the run; null when the index has never been synced. */
  newWatermark: number | null;
  /** Stopped early by its deadline / abort signal. */
  cancelled: boolean;
  /** Joined a sync that was already in flight instead of starting one. */
  coalesced: boolean;
}

/** One ranked hit. Ephemeral: built per query, never persisted. */
export interface SearchResult {
  uid: string;
  /** Raw similarity in [0, 1]. */
  similarity: number;
  /** Similarity plus recency boost. */
  score: number;
  /** 1-based rank position. */
  rank: number;
  unit: UnitRecord;
}

export type SearchStatus = "ok" | "index_empty";

export interface SearchResponse {
  status: SearchStatus;
  results: SearchResult[];
  /** Message of a failed pre-query sync; the search ran on the existing index. */
  syncError?: string;
}
