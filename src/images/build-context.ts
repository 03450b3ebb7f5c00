import { createReadStream } from "node:fs";
import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { join, posix } from "node:path";
import * as tar from "tar";
import { logger } from "../config/logger.js";

export const DEFAULT_DOCKERFILE = "Dockerfile";

/** A tar build context staged on disk, ready to send to the daemon. */
export interface BuildContext {
  archivePath: string;
  /** Dockerfile path relative to the context root. */
  dockerfile: string;
}

/**
 * Normalize an in-context Dockerfile path to a relative POSIX path.
 * Paths that climb out of the context are rejected.
 */
export function normalizeDockerfilePath(path: string = DEFAULT_DOCKERFILE): string {
  const normalized = posix.normalize(path.replace(/\\/g, "/")).replace(/^\/+/, "");
  if (normalized === ".." || normalized.startsWith("../") || normalized === "." || normalized === "") {
    throw new BuildContextError(`Dockerfile path '${path}' is outside the build context`);
  }
  return normalized;
}

/** Whether an archive entry is the Dockerfile at the context root. */
export function isRootDockerfile(entryPath: string): boolean {
  return posix.normalize(entryPath).replace(/^\/+/, "") === DEFAULT_DOCKERFILE;
}

/**
 * Stages build contexts under `<imagesDir>/<app>/`. Each call starts from
 * an empty scratch directory.
 */
export class BuildContextStager {
  private readonly imagesDir: string;

  constructor(imagesDir: string) {
    this.imagesDir = imagesDir;
  }

  scratchDirFor(appName: string): string {
    return join(this.imagesDir, appName);
  }

  /** A context holding nothing but the given Dockerfile. */
  async fromDockerfile(appName: string, dockerfile: string): Promise<BuildContext> {
    const { contextDir, archivePath } = await this.resetScratch(appName);
    await writeFile(join(contextDir, DEFAULT_DOCKERFILE), dockerfile, { mode: 0o644 });
    await archive(contextDir, archivePath, [DEFAULT_DOCKERFILE]);
    return { archivePath, dockerfile: DEFAULT_DOCKERFILE };
  }

  /**
   * Merge a fetched Dockerfile into a fetched context archive (tar or
   * tar.gz). A root-level Dockerfile in the archive is dropped, so the
   * result holds exactly one: the fetched one.
   */
  async fromRemoteContext(appName: string, dockerfile: string, contextArchive: Buffer): Promise<BuildContext> {
    const { scratchDir, contextDir, archivePath } = await this.resetScratch(appName);
    const sourcePath = join(scratchDir, "remote-context.tar");
    await writeFile(sourcePath, contextArchive);

    let dropped = false;
    await tar.extract({
      file: sourcePath,
      cwd: contextDir,
      filter: (path) => {
        if (!isRootDockerfile(path)) return true;
        dropped = true;
        return false;
      },
    });
    if (dropped) {
      logger.info(`Replacing Dockerfile from remote context for ${appName}`);
    }

    await writeFile(join(contextDir, DEFAULT_DOCKERFILE), dockerfile, { mode: 0o644 });
    await archive(contextDir, archivePath, await readdir(contextDir));
    return { archivePath, dockerfile: DEFAULT_DOCKERFILE };
  }

  /** Archive a working tree, leaving out `.git`. */
  async fromDirectory(appName: string, dir: string, dockerfilePath?: string): Promise<BuildContext> {
    const dockerfile = normalizeDockerfilePath(dockerfilePath);
    const { archivePath } = await this.resetScratch(appName);
    const entries = (await readdir(dir)).filter((name) => name !== ".git");
    if (entries.length === 0) {
      throw new BuildContextError(`Nothing to build in ${dir}`);
    }
    await archive(dir, archivePath, entries);
    return { archivePath, dockerfile };
  }

  open(context: BuildContext): NodeJS.ReadableStream {
    return createReadStream(context.archivePath);
  }

  private async resetScratch(
    appName: string,
  ): Promise<{ scratchDir: string; contextDir: string; archivePath: string }> {
    const scratchDir = this.scratchDirFor(appName);
    const contextDir = join(scratchDir, "context");
    await rm(scratchDir, { recursive: true, force: true });
    await mkdir(contextDir, { recursive: true });
    return { scratchDir, contextDir, archivePath: join(scratchDir, "context.tar") };
  }
}

async function archive(cwd: string, file: string, entries: string[]): Promise<void> {
  await tar.create({ cwd, file, portable: true }, entries);
}

export class BuildContextError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BuildContextError";
  }
}
