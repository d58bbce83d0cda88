/**
 * Where @xenova/transformers keeps downloaded model weights, and whether it
 * may fetch them at all. Must run before the first pipeline is created.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@xenova/transformers";
import { embedderLogger as log } from "./logger";

export interface ModelCacheOptions {
  /** Cache directory; falls back to TRANSFORMERS_CACHE, then ./.cache/transformers. */
  dir?: string;
  /** Only use models already in the cache. */
  offline?: boolean;
}

export function resolveModelCacheDir(dir?: string): string {
  return path.resolve(
    dir?.trim() || process.env.TRANSFORMERS_CACHE?.trim() || ".cache/transformers",
  );
}

/** Point the runtime at an on-disk cache. Returns the directory in use. */
export async function configureModelCache(opts: ModelCacheOptions = {}): Promise<string> {
  const dir = resolveModelCacheDir(opts.dir);
  const offline = opts.offline ?? false;
  try {
    await fs.mkdir(dir, { recursive: true });
  } catch (e) {
    // Read-only volumes still work when the model is already present.
    log.warn({ dir, err: e }, "Could not create model cache directory");
  }
  Object.assign(env, {
    cacheDir: dir,
    useBrowserCache: false,
    allowLocalModels: true,
    allowRemoteModels: !offline,
  });
  log.info({ dir, offline }, "Model cache configured");
  return dir;
}
