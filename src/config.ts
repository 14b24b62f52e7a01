import { configureTransformersCache } from "./cache";
import { DEFAULT_BATCH_SIZE, DEFAULT_DIMENSIONS, DEFAULT_MODEL_NAME } from "./embeddings";
import dotenv from "dotenv";
import fsSync from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call.
// Prefer the project-root .env next to src/; otherwise fall back to the cwd lookup.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  ROAM_API_TOKEN: string;
  ROAM_GRAPH_NAME: string;
  INDEX_STORE_PATH: string;
  MODEL_NAME: string;
  EMBEDDING_DIMENSIONS: number;
  EMBED_BATCH_SIZE: number;
  COMMIT_INTERVAL: number;
  STORE_RETRIES: number;
  SYNC_TIMEOUT_MS: number;
  SEARCH_MIN_SIMILARITY: number;
  RECENCY_WINDOW_DAYS: number;
  RECENCY_MAX_BOOST: number;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/** Tolerant truthy parsing (supports several common forms). */
export function parseFlag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Positive integer with fallback; non-numeric or out-of-range values use the default. */
export function parseCount(raw: string | undefined, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

/** Non-negative float with fallback, optionally clamped to `max`. */
export function parseFraction(raw: string | undefined, fallback: number, max = Infinity): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) && n >= 0 ? Math.min(max, n) : fallback;
}

/** Default database path: `~/.roam-mcp/<graph>_vectors.db`. */
export function defaultStorePath(graphName: string): string {
  const safe = graphName.replace(/[^A-Za-z0-9._-]/g, "_");
  return path.join(os.homedir(), ".roam-mcp", `${safe}_vectors.db`);
}

/** Build the config from an environment map. Pure; does no I/O. */
export function readConfig(env: Env = process.env): Config {
  const ROAM_API_TOKEN = env.ROAM_API_TOKEN?.trim() ?? "";
  const ROAM_GRAPH_NAME = env.ROAM_GRAPH_NAME?.trim() ?? "";
  const missing = [
    ...(ROAM_API_TOKEN ? [] : ["ROAM_API_TOKEN"]),
    ...(ROAM_GRAPH_NAME ? [] : ["ROAM_GRAPH_NAME"]),
  ];
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variable(s): ${missing.join(", ")}`);
  }

  // Store path; ":memory:" keeps the index in RAM for throwaway sessions.
  const INDEX_STORE_PATH = env.INDEX_STORE_PATH?.trim() || defaultStorePath(ROAM_GRAPH_NAME);

  // Model and dimensions are recorded in the store; changing either triggers a rebuild.
  const MODEL_NAME = env.MODEL_NAME?.trim() || DEFAULT_MODEL_NAME;
  const EMBEDDING_DIMENSIONS = parseCount(env.EMBEDDING_DIMENSIONS, DEFAULT_DIMENSIONS, 1, 8192);
  const EMBED_BATCH_SIZE = parseCount(env.EMBED_BATCH_SIZE, DEFAULT_BATCH_SIZE, 1, 1024);

  const COMMIT_INTERVAL = parseCount(env.COMMIT_INTERVAL, 256, 1, 100_000);
  const STORE_RETRIES = parseCount(env.STORE_RETRIES, 2, 0, 10);
  const SYNC_TIMEOUT_MS = parseCount(env.SYNC_TIMEOUT_MS, 5000, 0);

  const SEARCH_MIN_SIMILARITY = parseFraction(env.SEARCH_MIN_SIMILARITY, 0.3, 1);
  const RECENCY_WINDOW_DAYS = parseFraction(env.RECENCY_WINDOW_DAYS, 30);
  const RECENCY_MAX_BOOST = parseFraction(env.RECENCY_MAX_BOOST, 0.1, 1);

  const VERBOSE = parseFlag(env.VERBOSE);

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  return {
    ROAM_API_TOKEN,
    ROAM_GRAPH_NAME,
    INDEX_STORE_PATH,
    MODEL_NAME,
    EMBEDDING_DIMENSIONS,
    EMBED_BATCH_SIZE,
    COMMIT_INTERVAL,
    STORE_RETRIES,
    SYNC_TIMEOUT_MS,
    SEARCH_MIN_SIMILARITY,
    RECENCY_WINDOW_DAYS,
    RECENCY_MAX_BOOST,
    VERBOSE,
    MCP_TRANSPORT,
  };
}

export async function getConfig(): Promise<Config> {
  // Configure the transformers cache before any pipeline is created.
  await configureTransformersCache(process.env.TRANSFORMERS_CACHE).catch((e) =>
    console.error("[MCP] Failed to set TRANSFORMERS cache directory:", e),
  );
  const config = readConfig();
  if (config.INDEX_STORE_PATH !== ":memory:") {
    fsSync.mkdirSync(path.dirname(config.INDEX_STORE_PATH), { recursive: true });
  }
  return config;
}
