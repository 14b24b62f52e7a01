import { z } from "zod";
import { APP_VERSION } from "./config";
import { ModelUnavailableError, errorMessage } from "./errors";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Server,
} from "./mcp-sdk";
import type { SearchRanker } from "./search";
import { StatusManager, statusManager } from "./status";
import type { SyncCoordinator } from "./sync";
import type { SearchResponse } from "./types";
import type { VectorStore } from "./vector-store";

export const SERVER_NAME = "roam-semantic-index";

/** Shared, long-lived state closed over by every server instance. */
export interface ServerDeps {
  sync: SyncCoordinator;
  search: SearchRanker;
  store: VectorStore;
  status?: StatusManager;
}

const SyncIndexArgs = z.object({
  full: z.boolean().optional(),
  rebuild: z.boolean().optional(),
});

const SemanticSearchArgs = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  limit: z.number().int().min(1).max(50).optional(),
  min_similarity: z.number().min(0).max(1).optional(),
  recency_window_days: z.number().min(0).optional(),
  recency_max_boost: z.number().min(0).max(1).optional(),
});

/** Static tool schemas returned by tools/list. */
export const TOOLS = [
  {
    name: "sync_index",
    description:
      "Bring the local vector index up to date with the Roam graph. Incremental by default: only blocks edited since the last sync are re-embedded.",
    inputSchema: {
      type: "object" as const,
      properties: {
        full: {
          type: "boolean",
          description: "Re-scan every block instead of only recently edited ones (default false).",
        },
        rebuild: {
          type: "boolean",
          description: "Discard the existing index before a full sync. Implies full=true.",
        },
      },
    },
  },
  {
    name: "semantic_search",
    description:
      "Search Roam blocks by meaning. Results are ranked by cosine similarity plus a small boost for recently edited blocks, and include page title and parent-block path for context.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: { type: "string", description: "Natural language search query." },
        limit: {
          type: "number",
          description: "Maximum number of results (1-50). Defaults to 10.",
          minimum: 1,
          maximum: 50,
        },
        min_similarity: {
          type: "number",
          description: "Minimum cosine similarity (0-1) before recency is applied.",
          minimum: 0,
          maximum: 1,
        },
        recency_window_days: {
          type: "number",
          description: "Age in days after which the recency boost reaches 0.",
          minimum: 0,
        },
        recency_max_boost: {
          type: "number",
          description: "Boost given to a block edited just now (0 disables recency).",
          minimum: 0,
          maximum: 1,
        },
      },
      required: ["query"],
    },
  },
  {
    name: "index_status",
    description: "Report index size, sync watermark, embedding model and the outcome of the last sync.",
    inputSchema: { type: "object" as const, properties: {} },
  },
];

function parseArgs<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, detail);
  }
  return parsed.data;
}

function textResult(payload: unknown, isError = false) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/** Flatten search results into the tool's wire shape. */
export function toSearchPayload(response: SearchResponse) {
  return {
    status: response.status,
    ...(response.syncError ? { syncError: response.syncError } : {}),
    results: response.results.map((r) => ({
      uid: r.uid,
      similarity: Number(r.similarity.toFixed(4)),
      score: Number(r.score.toFixed(4)),
      rank: r.rank,
      content: r.unit.content,
      pageTitle: r.unit.pageTitle,
      pageUid: r.unit.pageUid,
      ancestors: r.unit.ancestors,
      lastModified: r.unit.lastModified,
    })),
  };
}

/**
 * Factory for a new MCP Server instance with tool handlers.
 *
 * One server is created per transport session (the HTTP transport may host
 * several); the index, model and sync coordinator in `deps` are shared.
 */
export function createServer(deps: ServerDeps): Server {
  const status = deps.status ?? statusManager;
  const server = new Server(
    { name: SERVER_NAME, version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: rawArgs } = req.params;
    try {
      if (name === "sync_index") {
        const { full = false, rebuild = false } = parseArgs(SyncIndexArgs, rawArgs);
        const report = await deps.sync.sync(full || rebuild, { rebuild });
        return textResult(report);
      }

      if (name === "semantic_search") {
        const args = parseArgs(SemanticSearchArgs, rawArgs);
        const response = await deps.search.search(args.query, {
          limit: args.limit,
          minSimilarity: args.min_similarity,
          recencyWindowDays: args.recency_window_days,
          recencyMaxBoost: args.recency_max_boost,
        });
        return textResult(toSearchPayload(response));
      }

      if (name === "index_status") {
        status.setIndexCounts(await deps.store.count(), await deps.sync.getWatermark());
        return textResult(status.getStatus());
      }
    } catch (e) {
      if (e instanceof McpError) throw e;
      if (e instanceof ModelUnavailableError) throw new McpError(ErrorCode.InternalError, e.message);
      console.error(`[MCP] Tool ${name} failed:`, e);
      return textResult({ error: errorMessage(e) }, true);
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  });

  return server;
}
