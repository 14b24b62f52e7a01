// Model download cache for @xenova/transformers.
import fs from "node:fs/promises";
import path from "node:path";

/**
 * Point the transformers runtime at an on-disk model cache. Must run before
 * the first pipeline is created.
 *
 * Directory precedence: `cacheDir`, TRANSFORMERS_CACHE, `./.cache/transformers`.
 * @returns The directory in use.
 */
export async function configureTransformersCache(cacheDir?: string): Promise<string> {
  const dir =
    cacheDir?.trim() ||
    process.env.TRANSFORMERS_CACHE?.trim() ||
    path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  // Loaded on demand: the runtime pulls in native ONNX bindings.
  const { env } = await import("@xenova/transformers");
  env.useBrowserCache = false;
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[MCP] Using TRANSFORMERS cache at: ${env.cacheDir}`);
  return dir;
}
