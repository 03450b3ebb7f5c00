import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { logger } from "../config/logger.js";
import { writeFileAtomic } from "./atomic-write.js";
import { emptyState, type LabState, labStateSchema } from "./types.js";

const STATE_FILE = "state.json";
const MANIFESTS_DIR = "manifests";
const IMAGES_DIR = "images";
const REPOS_DIR = "repos";

/** Cache file name for a manifest URL: every `/`, `:` and `.` becomes `_`. */
export function manifestCacheFileName(url: string): string {
  return `${url.replace(/[/:.]/g, "_")}.yml`;
}

/**
 * Owns the on-disk layout under the base directory and the JSON state
 * document. The document is always read whole and written whole; there is no
 * cross-process locking, so two concurrent invocations against the same base
 * directory can lose each other's updates.
 */
export class StateStore {
  constructor(readonly baseDir: string) {}

  get stateFile(): string {
    return join(this.baseDir, STATE_FILE);
  }

  get manifestsDir(): string {
    return join(this.baseDir, MANIFESTS_DIR);
  }

  /** Scratch area for build contexts. */
  get imagesDir(): string {
    return join(this.baseDir, IMAGES_DIR);
  }

  /** Git clone cache, one directory per sanitized repository URL. */
  get reposDir(): string {
    return join(this.baseDir, REPOS_DIR);
  }

  async init(): Promise<void> {
    await mkdir(this.manifestsDir, { recursive: true });
    await mkdir(this.imagesDir, { recursive: true });
    await mkdir(this.reposDir, { recursive: true });
  }

  async load(): Promise<LabState> {
    let content: string;
    try {
      content = await readFile(this.stateFile, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return emptyState();
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new StateError(`Failed to parse state: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = labStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateError(`Failed to parse state: ${parsed.error.issues.map((i) => i.message).join(", ")}`);
    }
    return parsed.data;
  }

  async save(state: LabState): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    await writeFileAtomic(this.stateFile, `${JSON.stringify(state, null, 2)}\n`);
  }

  /** Load, apply `mutate`, and write back. Returns whatever `mutate` returns. */
  async update<T>(mutate: (state: LabState) => T | Promise<T>): Promise<T> {
    const state = await this.load();
    const result = await mutate(state);
    await this.save(state);
    return result;
  }

  async cacheManifest(url: string, content: string): Promise<string> {
    await mkdir(this.manifestsDir, { recursive: true });
    const path = join(this.manifestsDir, manifestCacheFileName(url));
    await writeFile(path, content, "utf-8");
    logger.debug("Cached manifest", { url, path });
    return path;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export class StateError extends Error {
  constructor(message: string) {
    super(`State error: ${message}`);
    this.name = "StateError";
  }
}
