import type { FeatureExtractor, ModelLoader } from "../src/embeddings";
import type { SourceGraphClient, UnitRecord, UnitSnapshot } from "../src/types";

export const DIMS = 4;
export const DAY = 86_400_000;
export const T0 = Date.UTC(2026, 0, 1);

/** Default vector for texts that match no key. */
export const FALLBACK = [0, 0, 0, 1];

/**
 * Deterministic stand-in for a transformer model: each text maps to the
 * vector of the longest key it contains.
 */
export function fakeExtractor(table: Record<string, number[]>): FeatureExtractor {
  const keys = Object.keys(table).sort((a, b) => b.length - a.length);
  return async (texts) =>
    texts.map((text) => {
      const key = keys.find((k) => text.includes(k));
      return Float32Array.from(key ? table[key] : FALLBACK);
    });
}

export function fakeLoader(table: Record<string, number[]>): ModelLoader {
  return async () => fakeExtractor(table);
}

export function unit(
  uid: string,
  content: string,
  lastModified: number,
  overrides: Partial<UnitSnapshot> = {},
): UnitSnapshot {
  return {
    uid,
    content,
    pageUid: "page1",
    pageTitle: "Notes",
    parentUid: "page1",
    ancestors: [],
    lastModified,
    ...overrides,
  };
}

export function record(snapshot: UnitSnapshot, embeddedAt = snapshot.lastModified): UnitRecord {
  return { ...snapshot, embeddedAt };
}

/** Hand-controlled promise gate. */
export function gate() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

/** In-memory source graph. */
export class MemorySource implements SourceGraphClient {
  public readonly units = new Map<string, UnitSnapshot>();
  public readonly chains = new Map<string, string[]>();
  public calls = { fetchAll: 0, fetchModifiedSince: 0, fetchAncestorChain: 0 };
  /** When set, every fetch waits on it, then honors its abort signal. */
  public wait: Promise<void> | null = null;
  /** When set, every fetch rejects with it. */
  public failure: Error | null = null;

  public constructor(units: UnitSnapshot[] = []) {
    for (const u of units) this.units.set(u.uid, u);
  }

  public put(u: UnitSnapshot): void {
    this.units.set(u.uid, u);
  }

  public async fetchAll(signal?: AbortSignal): Promise<UnitSnapshot[]> {
    this.calls.fetchAll++;
    await this.ready(signal);
    return [...this.units.values()];
  }

  public async fetchModifiedSince(timestamp: number, signal?: AbortSignal): Promise<UnitSnapshot[]> {
    this.calls.fetchModifiedSince++;
    await this.ready(signal);
    return [...this.units.values()].filter((u) => u.lastModified > timestamp);
  }

  public async fetchAncestorChain(uid: string, signal?: AbortSignal): Promise<string[]> {
    this.calls.fetchAncestorChain++;
    await this.ready(signal);
    return this.chains.get(uid) ?? [];
  }

  private async ready(signal?: AbortSignal): Promise<void> {
    if (this.wait) await this.wait;
    signal?.throwIfAborted();
    if (this.failure) throw this.failure;
  }
}
