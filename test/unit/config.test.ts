import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, defaultStorePath, parseCount, parseFlag, readConfig } from "../../src/config";

const required = { ROAM_API_TOKEN: "test-secret", ROAM_GRAPH_NAME: "test-graph" };

describe("readConfig", () => {
  it("names every missing required variable", () => {
    expect(() => readConfig({})).toThrow(
      new ConfigError("Missing required environment variable(s): ROAM_API_TOKEN, ROAM_GRAPH_NAME"),
    );
    expect(() => readConfig({ ROAM_API_TOKEN: "test-secret", ROAM_GRAPH_NAME: "  " })).toThrow(
      "Missing required environment variable(s): ROAM_GRAPH_NAME",
    );
  });

  it("fills in defaults", () => {
    expect(readConfig(required)).toEqual({
      ROAM_API_TOKEN: "test-secret",
      ROAM_GRAPH_NAME: "test-graph",
      INDEX_STORE_PATH: path.join(os.homedir(), ".roam-mcp", "test-graph_vectors.db"),
      MODEL_NAME: "Xenova/all-MiniLM-L6-v2",
      EMBEDDING_DIMENSIONS: 384,
      EMBED_BATCH_SIZE: 64,
      COMMIT_INTERVAL: 256,
      STORE_RETRIES: 2,
      SYNC_TIMEOUT_MS: 5000,
      SEARCH_MIN_SIMILARITY: 0.3,
      RECENCY_WINDOW_DAYS: 30,
      RECENCY_MAX_BOOST: 0.1,
      VERBOSE: false,
      MCP_TRANSPORT: "",
    });
  });

  it("accepts overrides and ignores unusable values", () => {
    const config = readConfig({
      ...required,
      INDEX_STORE_PATH: ":memory:",
      COMMIT_INTERVAL: "32.9",
      STORE_RETRIES: "0",
      EMBED_BATCH_SIZE: "lots",
      SEARCH_MIN_SIMILARITY: "1.5",
      RECENCY_MAX_BOOST: "-1",
      VERBOSE: " Yes ",
      MCP_TRANSPORT: "HTTP",
    });
    expect(config).toMatchObject({
      INDEX_STORE_PATH: ":memory:",
      COMMIT_INTERVAL: 32,
      STORE_RETRIES: 0,
      EMBED_BATCH_SIZE: 64,
      SEARCH_MIN_SIMILARITY: 1,
      RECENCY_MAX_BOOST: 0.1,
      VERBOSE: true,
      MCP_TRANSPORT: "http",
    });
  });
});

describe("parsers", () => {
  it("parseFlag accepts the usual truthy spellings", () => {
    expect(["1", "true", "YES", "on"].map(parseFlag)).toEqual([true, true, true, true]);
    expect(["", "0", "off", "nope"].map(parseFlag)).toEqual([false, false, false, false]);
    expect(parseFlag(undefined)).toBe(false);
  });

  it("parseCount clamps and floors", () => {
    expect(parseCount("10", 5, 1, 8)).toBe(8);
    expect(parseCount("0", 5)).toBe(5);
    expect(parseCount(undefined, 5)).toBe(5);
    expect(parseCount("7.8", 5)).toBe(7);
  });

  it("defaultStorePath keeps graph names file-safe", () => {
    expect(defaultStorePath("my graph/2")).toBe(
      path.join(os.homedir(), ".roam-mcp", "my_graph_2_vectors.db"),
    );
  });
});
