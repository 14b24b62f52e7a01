import type { EmbeddingService } from "./embeddings";
import { ModelUnavailableError, errorMessage } from "./errors";
import type { SyncCoordinator } from "./sync";
import type { SearchResponse, SearchResult, UnitRecord } from "./types";
import { distanceToSimilarity, type Neighbor, type VectorStore } from "./vector-store";

export const MS_PER_DAY = 86_400_000;

/** Ranking knobs. Every field may be overridden per call. */
export interface RankingOptions {
  /** Minimum raw similarity; applied before the recency boost. */
  minSimilarity: number;
  recencyWindowDays: number;
  recencyMaxBoost: number;
}

export const DEFAULT_RANKING: RankingOptions = {
  minSimilarity: 0.3,
  recencyWindowDays: 30,
  recencyMaxBoost: 0.1,
};

export interface SearchRankerOptions {
  embeddings: EmbeddingService;
  store: VectorStore;
  /** When given, an incremental sync runs before each query. */
  sync?: SyncCoordinator;
  ranking?: Partial<RankingOptions>;
  /** Candidates fetched per requested result, to leave room for filtering (default 3). */
  overFetch?: number;
  /** Max time a query waits for its pre-query sync (default 5000 ms). */
  syncTimeoutMs?: number;
  now?: () => number;
}

export interface SearchOptions extends Partial<RankingOptions> {
  limit?: number;
}

/**
 * Linear recency boost: `maxBoost` at age 0, falling to 0 at the end of the
 * window and staying 0 beyond it. Future timestamps count as age 0.
 */
export function recencyBoost(ageDays: number, windowDays: number, maxBoost: number): number {
  if (windowDays <= 0 || maxBoost <= 0) return 0;
  const age = Math.max(0, ageDays);
  return maxBoost * Math.max(0, 1 - age / windowDays);
}

/**
 * Turn KNN candidates into ranked results: similarity conversion, threshold
 * on raw similarity, additive recency boost, score-descending order with uid
 * tie-break, truncation to `limit`.
 */
export function rankCandidates(
  candidates: readonly Neighbor[],
  units: ReadonlyMap<string, UnitRecord>,
  ranking: RankingOptions,
  limit: number,
  now: number,
): SearchResult[] {
  const scored: Omit<SearchResult, "rank">[] = [];
  for (const c of candidates) {
    const unit = units.get(c.uid);
    if (!unit) continue;
    const similarity = distanceToSimilarity(c.distance);
    if (similarity < ranking.minSimilarity) continue;
    const ageDays = (now - unit.lastModified) / MS_PER_DAY;
    const boost = recencyBoost(ageDays, ranking.recencyWindowDays, ranking.recencyMaxBoost);
    scored.push({ uid: c.uid, similarity, score: similarity + boost, unit });
  }
  scored.sort((a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    return a.uid < b.uid ? -1 : a.uid > b.uid ? 1 : 0;
  });
  return scored.slice(0, Math.max(0, limit)).map((r, i) => ({ ...r, rank: i + 1 }));
}

/**
 * Query-time pipeline: refresh the index, embed the query, fetch nearest
 * neighbors and rank them by similarity plus recency.
 */
export class SearchRanker {
  private readonly embeddings: EmbeddingService;
  private readonly store: VectorStore;
  private readonly sync?: SyncCoordinator;
  private readonly ranking: RankingOptions;
  private readonly overFetch: number;
  private readonly syncTimeoutMs: number;
  private readonly now: () => number;

  public constructor(opts: SearchRankerOptions) {
    this.embeddings = opts.embeddings;
    this.store = opts.store;
    this.sync = opts.sync;
    this.ranking = { ...DEFAULT_RANKING, ...opts.ranking };
    this.overFetch = Math.max(1, opts.overFetch ?? 3);
    this.syncTimeoutMs = opts.syncTimeoutMs ?? 5000;
    this.now = opts.now ?? Date.now;
  }

  public getRanking(): RankingOptions {
    return { ...this.ranking };
  }

  public async search(query: string, opts: SearchOptions = {}): Promise<SearchResponse> {
    const limit = Math.max(1, Math.floor(opts.limit ?? 10));
    const ranking: RankingOptions = {
      minSimilarity: opts.minSimilarity ?? this.ranking.minSimilarity,
      recencyWindowDays: opts.recencyWindowDays ?? this.ranking.recencyWindowDays,
      recencyMaxBoost: opts.recencyMaxBoost ?? this.ranking.recencyMaxBoost,
    };

    const syncError = await this.refresh();

    if ((await this.store.count()) === 0) {
      return { status: "index_empty", results: [], ...(syncError ? { syncError } : {}) };
    }

    const vector = await this.embeddings.embed(query);
    const candidates = await this.store.knn(vector, limit * this.overFetch);
    const units = await this.store.getMany(candidates.map((c) => c.uid));
    const results = rankCandidates(candidates, units, ranking, limit, this.now());
    return { status: "ok", results, ...(syncError ? { syncError } : {}) };
  }

  /**
   * Run an incremental sync bounded by `syncTimeoutMs`. Source and store
   * failures degrade to searching the existing index; a timed-out sync is
   * aborted at its next sub-batch boundary and finishes in the background.
   *
   * @returns The failure message, if the sync failed.
   * @throws {ModelUnavailableError} The model cannot embed the query either.
   */
  private async refresh(): Promise<string | undefined> {
    if (!this.sync) return undefined;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.syncTimeoutMs);
    });
    const run = this.sync.incrementalSync({ signal: controller.signal });
    try {
      const outcome = await Promise.race([run, timedOut]);
      if (outcome === "timeout") {
        controller.abort();
        console.error(`[MCP] Pre-search sync exceeded ${this.syncTimeoutMs}ms; searching current index`);
        void run.catch((e) => console.error(`[MCP] Background sync failed:`, e));
      }
      return undefined;
    } catch (e) {
      if (e instanceof ModelUnavailableError) throw e;
      const message = errorMessage(e);
      console.error(`[MCP] Pre-search sync failed, searching stale index: ${message}`);
      return message;
    } finally {
      clearTimeout(timer);
    }
  }
}
