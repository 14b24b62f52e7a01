import { ModelUnavailableError, errorMessage } from "./errors";
import type { UnitSnapshot } from "./types";

export const DEFAULT_MODEL_NAME = "Xenova/all-MiniLM-L6-v2";
export const DEFAULT_DIMENSIONS = 384;
export const DEFAULT_BATCH_SIZE = 64;

/** Embeds an ordered batch of texts, returning one vector per input in the same order. */
export type FeatureExtractor = (texts: string[]) => Promise<Float32Array[]>;

/** Resolves a model identifier into a ready-to-use extractor. */
export type ModelLoader = (modelName: string) => Promise<FeatureExtractor>;

/**
 * Default loader backed by a @xenova/transformers feature-extraction pipeline
 * with mean pooling and L2 normalization.
 */
export const transformersLoader: ModelLoader = async (modelName) => {
  const { pipeline } = await import("@xenova/transformers");
  const extractor = await pipeline("feature-extraction", modelName);
  return async (texts) => {
    const output = await extractor(texts, { pooling: "mean", normalize: true });
    const data: unknown = output.data;
    if (!(data instanceof Float32Array)) {
      throw new ModelUnavailableError(`Model ${modelName} did not return float32 output`);
    }
    const width = output.dims[output.dims.length - 1];
    return texts.map((_, i) => data.slice(i * width, (i + 1) * width));
  };
};

export interface EmbeddingOptions {
  /** Model id; defaults to all-MiniLM-L6-v2. */
  modelName?: string;
  /** Expected vector length. Output of any other length is treated as an unusable model. */
  dimensions?: number;
  /** Max texts per model call; bounds peak memory. */
  batchSize?: number;
  loader?: ModelLoader;
}

/**
 * Encapsulates embedding model initialization and helpers for turning units
 * into vectors. A single instance can be reused for any number of calls.
 */
export class EmbeddingService {
  private readonly modelName: string;
  private readonly dimensions: number;
  private readonly batchSize: number;
  private readonly loader: ModelLoader;
  private extractor: FeatureExtractor | null = null;
  private loading: Promise<FeatureExtractor> | null = null;

  public constructor(opts: EmbeddingOptions = {}) {
    this.modelName = opts.modelName?.trim() || DEFAULT_MODEL_NAME;
    this.dimensions = opts.dimensions ?? DEFAULT_DIMENSIONS;
    this.batchSize = Math.max(1, Math.floor(opts.batchSize ?? DEFAULT_BATCH_SIZE));
    this.loader = opts.loader ?? transformersLoader;
  }

  /** @returns Resolved (possibly defaulted) underlying model identifier. */
  public getModelName(): string {
    return this.modelName;
  }

  public getDimensions(): number {
    return this.dimensions;
  }

  /**
   * Lazily load the underlying model (idempotent). Concurrent callers share one
   * load. A failed load is not cached, so a later operation may try again.
   *
   * @throws {ModelUnavailableError} If the model cannot be loaded.
   */
  public async init(): Promise<void> {
    if (this.extractor) return;
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null;
      });
    }
    this.extractor = await this.loading;
  }

  /** Embed a single text. Shares the batch code path, so results match {@link embedBatch}. */
  public async embed(text: string): Promise<Float32Array> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  /**
   * Embed texts in slices of `batchSize`. The result has the same length and
   * order as the input.
   *
   * @throws {ModelUnavailableError} If the model cannot be loaded or returns
   *         vectors of the wrong count or dimension. Not retried here.
   */
  public async embedBatch(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) return [];
    await this.init();
    const extractor = this.extractor;
    if (!extractor) throw new ModelUnavailableError(`Model ${this.modelName} is not loaded`);

    const out: Float32Array[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const slice = texts.slice(i, i + this.batchSize);
      const vectors = await extractor(slice);
      if (vectors.length !== slice.length) {
        throw new ModelUnavailableError(
          `Model ${this.modelName} returned ${vectors.length} vectors for ${slice.length} inputs`,
        );
      }
      for (const v of vectors) {
        if (v.length !== this.dimensions) {
          throw new ModelUnavailableError(
            `Model ${this.modelName} produced ${v.length}-dim vectors, index expects ${this.dimensions}`,
          );
        }
        out.push(v);
      }
    }
    return out;
  }

  /**
   * Build the embedding input for a unit: page title, ancestor path and
   * content, in that order, so hierarchical context biases the vector.
   */
  public static formatUnit(unit: Pick<UnitSnapshot, "content" | "pageTitle" | "ancestors">): string {
    const parts: string[] = [];
    if (unit.pageTitle) parts.push(`Page: ${unit.pageTitle}`);
    if (unit.ancestors.length > 0) parts.push(`Path: ${unit.ancestors.join(" > ")}`);
    parts.push(`Content: ${unit.content}`);
    return parts.join("\n");
  }

  private async load(): Promise<FeatureExtractor> {
    console.error(`[MCP] Loading embedding model: ${this.modelName}`);
    try {
      const extractor = await this.loader(this.modelName);
      console.error(`[MCP] Model ready: ${this.modelName}`);
      return extractor;
    } catch (e) {
      throw new ModelUnavailableError(
        `Failed to load embedding model ${this.modelName}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }
}
