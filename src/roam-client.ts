/**
 * Source-graph client for the Roam Research backend query API.
 *
 * All reads go through `POST {base}/api/graph/{graph}/q` with a Datalog query
 * and positional args. The API answers the first request of a session with a
 * 307 to a peer host; that host is cached and used for later calls.
 *
 * Retry policy:
 *  - network errors, timeouts and 5xx: exponential backoff (default 3 retries,
 *    1s doubling, capped at 16s), then SourceUnreachableError.
 *  - 429: separate budget (default 3 retries, 10s doubling) since the API limits
 *    graphs to ~50 requests per minute.
 *  - 400 / 401: not retried.
 */
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import {
  InvalidQueryError,
  SourceAuthError,
  SourceUnreachableError,
  errorMessage,
} from "./errors";
import type { SourceGraphClient, UnitSnapshot } from "./types";

export const ROAM_API_BASE = "https://api.roamresearch.com";

export interface RoamClientOptions {
  apiToken: string;
  graphName: string;
  baseUrl?: string;
  maxRetries?: number;
  initialBackoffMs?: number;
  backoffMultiplier?: number;
  maxBackoffMs?: number;
  rateLimitRetries?: number;
  rateLimitBackoffMs?: number;
  requestTimeoutMs?: number;
  verbose?: boolean;
}

/** Rows of the block queries: uid, string, edit time, page uid, page title, parent uid. */
const BlockRowSchema = z.tuple([z.string(), z.string(), z.number(), z.string(), z.string(), z.string()]);

/** Rows of the ancestor queries: uid, string, parent uid. */
const AncestorRowSchema = z.tuple([z.string(), z.string(), z.string()]);

const QueryResponseSchema = z.object({ result: z.array(z.unknown()) });

const BLOCK_CLAUSES = `
  [?b :block/uid ?uid]
  [?b :block/string ?string]
  [?b :edit/time ?edit-time]
  [?b :block/page ?page]
  [?page :block/uid ?page-uid]
  [?page :node/title ?page-title]
  [?parent :block/children ?b]
  [?parent :block/uid ?parent-uid]`;

const ALL_BLOCKS_QUERY = `[:find ?uid ?string ?edit-time ?page-uid ?page-title ?parent-uid
  :where ${BLOCK_CLAUSES}]`;

const MODIFIED_BLOCKS_QUERY = `[:find ?uid ?string ?edit-time ?page-uid ?page-title ?parent-uid
  :in $ ?since
  :where ${BLOCK_CLAUSES}
  [(> ?edit-time ?since)]]`;

const ANCESTOR_CLAUSES = `
  [?b :block/parents ?a]
  [?a :block/uid ?a-uid]
  [?a :block/string ?a-string]
  [?p :block/children ?a]
  [?p :block/uid ?p-uid]`;

const MODIFIED_ANCESTORS_QUERY = `[:find ?a-uid ?a-string ?p-uid
  :in $ ?since
  :where
  [?b :edit/time ?edit-time]
  [(> ?edit-time ?since)]
  ${ANCESTOR_CLAUSES}]`;

const BLOCK_ANCESTORS_QUERY = `[:find ?a-uid ?a-string ?p-uid
  :in $ ?uid
  :where
  [?b :block/uid ?uid]
  ${ANCESTOR_CLAUSES}]`;

const BLOCK_PARENT_QUERY = `[:find ?p-uid
  :in $ ?uid
  :where
  [?b :block/uid ?uid]
  [?p :block/children ?b]
  [?p :block/uid ?p-uid]]`;

/** Block text and parent pointer, used to resolve ancestor chains locally. */
export interface TreeNode {
  text: string;
  parentUid: string;
}

/**
 * Walk up from `parentUid` through `nodes`, returning ancestor texts ordered
 * root → direct parent. Stops at the first uid not in `nodes` (the page).
 */
export function resolveAncestors(parentUid: string, nodes: ReadonlyMap<string, TreeNode>): string[] {
  const chain: string[] = [];
  const seen = new Set<string>();
  let cursor: string | undefined = parentUid;
  while (cursor !== undefined && !seen.has(cursor)) {
    seen.add(cursor);
    const node = nodes.get(cursor);
    if (!node) break;
    chain.push(node.text);
    cursor = node.parentUid;
  }
  return chain.reverse();
}

class RateLimitedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RateLimitedError";
  }
}

/** Parse a peer redirect location into the base URL to use for later calls. */
export function parseRedirect(location: string): string {
  const match = /https:\/\/(peer-\d+).*?:(\d+)/.exec(location);
  if (!match) throw new InvalidQueryError(`Could not parse redirect URL: ${location}`);
  return `https://${match[1]}.api.roamresearch.com:${match[2]}`;
}

export class RoamGraphClient implements SourceGraphClient {
  private readonly apiToken: string;
  private readonly graphName: string;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly backoffMultiplier: number;
  private readonly maxBackoffMs: number;
  private readonly rateLimitRetries: number;
  private readonly rateLimitBackoffMs: number;
  private readonly requestTimeoutMs: number;
  private readonly verbose: boolean;
  private peerBase: string | null = null;

  public constructor(opts: RoamClientOptions) {
    if (!opts.apiToken) throw new SourceAuthError("Roam API token not provided");
    if (!opts.graphName) throw new SourceAuthError("Roam graph name not provided");
    this.apiToken = opts.apiToken;
    this.graphName = opts.graphName;
    this.baseUrl = opts.baseUrl ?? ROAM_API_BASE;
    this.maxRetries = opts.maxRetries ?? 3;
    this.initialBackoffMs = opts.initialBackoffMs ?? 1000;
    this.backoffMultiplier = opts.backoffMultiplier ?? 2;
    this.maxBackoffMs = opts.maxBackoffMs ?? 16_000;
    this.rateLimitRetries = opts.rateLimitRetries ?? 3;
    this.rateLimitBackoffMs = opts.rateLimitBackoffMs ?? 10_000;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? 30_000;
    this.verbose = !!opts.verbose;
  }

  public async fetchAll(signal?: AbortSignal): Promise<UnitSnapshot[]> {
    const rows = await this.query(ALL_BLOCKS_QUERY, [], signal);
    const blocks = this.parseRows(rows, BlockRowSchema);
    // Every block is in the result, so chains resolve from the same rows.
    const nodes = new Map<string, TreeNode>();
    for (const [uid, text, , , , parentUid] of blocks) nodes.set(uid, { text, parentUid });
    const units = blocks.map((row) => toSnapshot(row, nodes));
    console.error(`[MCP] Fetched ${units.length} blocks for sync`);
    return units;
  }

  public async fetchModifiedSince(timestamp: number, signal?: AbortSignal): Promise<UnitSnapshot[]> {
    const rows = await this.query(MODIFIED_BLOCKS_QUERY, [timestamp], signal);
    const blocks = this.parseRows(rows, BlockRowSchema);
    if (blocks.length === 0) return [];
    const ancestorRows = await this.query(MODIFIED_ANCESTORS_QUERY, [timestamp], signal);
    const nodes = new Map<string, TreeNode>();
    for (const [uid, text, parentUid] of this.parseRows(ancestorRows, AncestorRowSchema)) {
      nodes.set(uid, { text, parentUid });
    }
    const units = blocks.map((row) => toSnapshot(row, nodes));
    console.error(`[MCP] Fetched ${units.length} blocks modified since ${timestamp}`);
    return units;
  }

  public async fetchAncestorChain(uid: string, signal?: AbortSignal): Promise<string[]> {
    if (!uid || uid.includes("\u0000")) throw new InvalidQueryError(`Invalid block uid: ${JSON.stringify(uid)}`);
    const parentRows = this.parseRows(
      await this.query(BLOCK_PARENT_QUERY, [uid], signal),
      z.tuple([z.string()]),
    );
    if (parentRows.length === 0) return [];
    const nodes = new Map<string, TreeNode>();
    const ancestorRows = await this.query(BLOCK_ANCESTORS_QUERY, [uid], signal);
    for (const [aUid, text, parentUid] of this.parseRows(ancestorRows, AncestorRowSchema)) {
      nodes.set(aUid, { text, parentUid });
    }
    return resolveAncestors(parentRows[0][0], nodes);
  }

  /** Run a Datalog query and return its raw result rows. */
  public async query(query: string, args: unknown[], signal?: AbortSignal): Promise<unknown[]> {
    const body = JSON.stringify({ query, args });
    let backoff = this.rateLimitBackoffMs;
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.callOnce(`/api/graph/${this.graphName}/q`, body, signal, 0);
      } catch (e) {
        if (!(e instanceof RateLimitedError)) throw e;
        if (attempt >= this.rateLimitRetries) {
          console.error(`[MCP] Rate limit exceeded after ${attempt + 1} attempts`);
          throw new SourceUnreachableError(e.message, { cause: e, status: 429 });
        }
        console.error(
          `[MCP] Rate limit hit (attempt ${attempt + 1}/${this.rateLimitRetries + 1}). Waiting ${backoff}ms before retry...`,
        );
        await sleep(backoff, undefined, { signal });
        backoff = Math.min(backoff * this.backoffMultiplier, this.maxBackoffMs * 4);
      }
    }
  }

  private parseRows<T extends z.ZodTypeAny>(rows: unknown[], schema: T): z.infer<T>[] {
    const out: z.infer<T>[] = [];
    let skipped = 0;
    for (const row of rows) {
      const parsed = schema.safeParse(row);
      if (parsed.success) out.push(parsed.data);
      else skipped++;
    }
    if (skipped > 0 && this.verbose) {
      console.error(`[MCP][verbose] Skipped ${skipped} malformed result row(s)`);
    }
    return out;
  }

  private async callOnce(
    path: string,
    body: string,
    signal: AbortSignal | undefined,
    redirects: number,
  ): Promise<unknown[]> {
    const url = (this.peerBase ?? this.baseUrl) + path;
    if (this.verbose) console.error(`[MCP][verbose] POST ${url}`);
    const res = await this.post(url, body, signal);

    if (res.status >= 300 && res.status < 400) {
      const location = res.headers.get("location");
      if (!location) throw new InvalidQueryError(`Redirect (HTTP ${res.status}) without Location header`);
      if (redirects >= 3) throw new SourceUnreachableError(`Too many redirects (last: ${location})`);
      this.peerBase = parseRedirect(location);
      console.error(`[MCP] Cached redirect URL: ${this.peerBase}`);
      return this.callOnce(path, body, signal, redirects + 1);
    }

    if (!res.ok) {
      const text = await res.text();
      if (res.status === 400) throw new InvalidQueryError(`Bad request (HTTP 400): ${text}`);
      if (res.status === 401) throw new SourceAuthError("Authentication error (HTTP 401): Invalid token");
      if (res.status === 429) throw new RateLimitedError(`Rate limit exceeded (HTTP 429): ${text}`);
      throw new SourceUnreachableError(`Roam API error (HTTP ${res.status}): ${text}`, {
        status: res.status,
      });
    }

    const parsed = QueryResponseSchema.safeParse(await res.json());
    if (!parsed.success) throw new InvalidQueryError("Unexpected query response shape");
    return parsed.data.result;
  }

  /** One POST with network-level retries (connection errors, timeouts, 5xx). */
  private async post(url: string, body: string, signal?: AbortSignal): Promise<Response> {
    let backoff = this.initialBackoffMs;
    let lastError: unknown;
    let lastStatus: number | undefined;
    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      const timeout = AbortSignal.timeout(this.requestTimeoutMs);
      try {
        const res = await fetch(url, {
          method: "POST",
          redirect: "manual",
          headers: {
            "Content-Type": "application/json; charset=utf-8",
            Authorization: `Bearer ${this.apiToken}`,
            "x-authorization": `Bearer ${this.apiToken}`,
          },
          body,
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
        });
        if (res.status < 500) return res;
        lastStatus = res.status;
        lastError = new Error(`HTTP ${res.status}: ${await res.text()}`);
      } catch (e) {
        if (signal?.aborted) throw e;
        lastError = e;
        lastStatus = undefined;
      }
      if (attempt < this.maxRetries) {
        console.error(
          `[MCP] Attempt ${attempt + 1}/${this.maxRetries + 1} failed: ${errorMessage(lastError)}. Retrying in ${backoff}ms...`,
        );
        await sleep(backoff, undefined, { signal });
        backoff = Math.min(backoff * this.backoffMultiplier, this.maxBackoffMs);
      }
    }
    console.error(`[MCP] All ${this.maxRetries + 1} attempts failed. Last error: ${errorMessage(lastError)}`);
    throw new SourceUnreachableError(
      `Roam API unreachable after ${this.maxRetries + 1} attempts: ${errorMessage(lastError)}`,
      { cause: lastError, status: lastStatus },
    );
  }
}

function toSnapshot(
  [uid, content, lastModified, pageUid, pageTitle, parentUid]: z.infer<typeof BlockRowSchema>,
  nodes: ReadonlyMap<string, TreeNode>,
): UnitSnapshot {
  return {
    uid,
    content,
    pageUid,
    pageTitle,
    parentUid,
    ancestors: parentUid === pageUid ? [] : resolveAncestors(parentUid, nodes),
    lastModified,
  };
}
