/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load and normalize configuration (dotenv + env vars, see config.ts).
 * 2. Load the embedding model eagerly so the first query is fast.
 * 3. Open the SQLite vector store (cold-resets itself if model/dimensions changed).
 * 4. Wire the Roam client, sync coordinator and search ranker.
 * 5. Start an MCP server over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http), which also serves /health.
 *
 * The index is not synced at startup: the first `semantic_search` performs an
 * incremental sync (a full one when no watermark exists) bounded by
 * SYNC_TIMEOUT_MS, and `sync_index` can be called explicitly.
 *
 * Exposed tools: sync_index, semantic_search, index_status.
 */
import { getConfig } from "./config";
import { EmbeddingService } from "./embeddings";
import { RoamGraphClient } from "./roam-client";
import { SearchRanker } from "./search";
import { createServer } from "./server";
import { statusManager } from "./status";
import { SyncCoordinator } from "./sync";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";
import { SqliteVectorStore } from "./vector-store";

const config = await getConfig();
const { VERBOSE, MCP_TRANSPORT } = config;

statusManager.setGraphName(config.ROAM_GRAPH_NAME);

// Errors surface at startup rather than inside the first tool call.
const embeddings = new EmbeddingService({
  modelName: config.MODEL_NAME,
  dimensions: config.EMBEDDING_DIMENSIONS,
  batchSize: config.EMBED_BATCH_SIZE,
});
await embeddings.init();
statusManager.setModelName(embeddings.getModelName());

const store = new SqliteVectorStore({
  storePath: config.INDEX_STORE_PATH,
  dimensions: embeddings.getDimensions(),
  modelName: embeddings.getModelName(),
  verbose: VERBOSE,
});

const source = new RoamGraphClient({
  apiToken: config.ROAM_API_TOKEN,
  graphName: config.ROAM_GRAPH_NAME,
  verbose: VERBOSE,
});

const sync = new SyncCoordinator({
  source,
  embeddings,
  store,
  commitInterval: config.COMMIT_INTERVAL,
  storeRetries: config.STORE_RETRIES,
  verbose: VERBOSE,
});

const search = new SearchRanker({
  embeddings,
  store,
  sync,
  syncTimeoutMs: config.SYNC_TIMEOUT_MS,
  ranking: {
    minSimilarity: config.SEARCH_MIN_SIMILARITY,
    recencyWindowDays: config.RECENCY_WINDOW_DAYS,
    recencyMaxBoost: config.RECENCY_MAX_BOOST,
  },
});

statusManager.setIndexCounts(await store.count(), await sync.getWatermark());
statusManager.markReady();
console.error(`[MCP] Index ready: ${statusManager.getStatus().index.units} units`);

const shutdown = (signal: string) => {
  console.error(`[MCP] Received ${signal}, closing vector store`);
  void store
    .close()
    .catch((e) => console.error("[MCP] Failed to close vector store:", e))
    .finally(() => process.exit(0));
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

const useHttp = MCP_TRANSPORT === "http" || MCP_TRANSPORT === "streamable-http";
const deps = { sync, search, store };

if (useHttp) {
  statusManager.markTransport("http");
  await startHttpTransport(() => createServer(deps));
} else {
  statusManager.markTransport("stdio");
  await startStdioTransport(() => createServer(deps));
}
