import { execFile } from "node:child_process";
import { access, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { promisify } from "node:util";
import { logger } from "../config/logger.js";
import type { Progress } from "./progress.js";

const execFileAsync = promisify(execFile);

/** Runs `git` with the given arguments and resolves with trimmed stdout. */
export type GitRunner = (args: string[], cwd?: string) => Promise<string>;

/** Default runner: the `git` executable with an explicit argument array. */
export const execGit: GitRunner = async (args, cwd) => {
  const { stdout } = await execFileAsync("git", args, { cwd, maxBuffer: 16 * 1024 * 1024 });
  return stdout.trim();
};

const FETCH_FLAGS = ["--tags", "--prune", "--force", "--update-head-ok"];

/**
 * Mirror upstream branches into local ones as well as `origin/*`, so a branch
 * name resolved literally is never older than what was just fetched.
 */
const FETCH_REFSPECS = ["+refs/heads/*:refs/heads/*", "+refs/heads/*:refs/remotes/origin/*"];

export interface GitCheckout {
  dir: string;
  commit: string;
}

/** Filesystem-safe cache directory name for a repository URL. */
export function sanitizeRepoUrl(url: string): string {
  return url.replace(/[^a-zA-Z0-9._-]/g, "_");
}

/**
 * Keeps one clone per repository URL under `reposDir` and checks out the
 * requested ref, detached.
 */
export class GitSource {
  private readonly reposDir: string;
  private readonly git: GitRunner;

  constructor(reposDir: string, git: GitRunner = execGit) {
    this.reposDir = reposDir;
    this.git = git;
  }

  repoDirFor(url: string): string {
    return join(this.reposDir, sanitizeRepoUrl(url));
  }

  /**
   * Clone or fetch `repo`, then force-checkout `ref` detached (tried
   * literally, then as `origin/<ref>`). Without a ref the remote's default
   * branch is used.
   */
  async *checkout(repo: string, ref?: string): Progress<GitCheckout> {
    const dir = this.repoDirFor(repo);

    if (await pathExists(join(dir, ".git"))) {
      yield { phase: "git", message: `Fetching updates for ${repo}` };
      try {
        await this.git(["fetch", "origin", ...FETCH_FLAGS, ...FETCH_REFSPECS], dir);
      } catch (err) {
        throw new GitCloneError(repo, `fetch failed: ${gitErrorMessage(err)}`);
      }
    } else {
      yield { phase: "git", message: `Cloning ${repo}` };
      await mkdir(this.reposDir, { recursive: true });
      try {
        await this.git(["clone", repo, dir]);
      } catch (err) {
        throw new GitCloneError(repo, gitErrorMessage(err));
      }
    }

    const label = ref ?? "default branch";
    const commit = ref
      ? await this.resolveRef(dir, ref, [ref, `origin/${ref}`])
      : await this.resolveRef(dir, "HEAD", ["origin/HEAD", "HEAD"]);
    yield { phase: "git", message: `Checking out ${label} (${commit.slice(0, 12)})` };
    try {
      await this.git(["checkout", "--force", "--detach", commit], dir);
    } catch (err) {
      throw new GitCheckoutError(ref ?? "HEAD", gitErrorMessage(err));
    }
    logger.info(`Checked out ${repo} at ${label}`, { commit });
    return { dir, commit };
  }

  private async resolveRef(dir: string, ref: string, candidates: string[]): Promise<string> {
    for (const candidate of candidates) {
      try {
        return await this.git(["rev-parse", "--verify", `${candidate}^{commit}`], dir);
      } catch (err) {
        logger.debug(`Ref ${candidate} did not resolve`, { error: gitErrorMessage(err) });
      }
    }
    throw new GitCheckoutError(ref, "ref not found in repository");
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Prefer git's own stderr over the generic "Command failed" message. */
function gitErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    if ("stderr" in err && typeof err.stderr === "string" && err.stderr.trim()) {
      return err.stderr.trim();
    }
    return err.message;
  }
  return String(err);
}

export class GitCloneError extends Error {
  readonly repo: string;

  constructor(repo: string, message: string) {
    super(`Failed to clone repository '${repo}': ${message}`);
    this.name = "GitCloneError";
    this.repo = repo;
  }
}

export class GitCheckoutError extends Error {
  readonly ref: string;

  constructor(ref: string, message: string) {
    super(`Failed to checkout ref '${ref}': ${message}`);
    this.name = "GitCheckoutError";
    this.ref = ref;
  }
}
