import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { writeFileAtomic } from "../state/atomic-write.js";
import { StateError } from "../state/state-store.js";
import type { ManifestMeta } from "./types.js";

const ACCEPTED_FILE = "accepted-manifests.json";

export const acceptedManifestSchema = z.object({
  /** ISO 8601 time of acceptance. */
  acceptedAt: z.string(),
  author: z.string().optional(),
  email: z.string().optional(),
  url: z.string().optional(),
  description: z.string().optional(),
});
export type AcceptedManifest = z.infer<typeof acceptedManifestSchema>;

const acceptedFileSchema = z.object({
  manifests: z.record(z.string(), acceptedManifestSchema).default(() => ({})),
});
type AcceptedFile = z.infer<typeof acceptedFileSchema>;

/** Remembers which manifest URLs the user has chosen to trust. */
export class TrustStore {
  private readonly baseDir: string;
  private readonly now: () => Date;

  constructor(baseDir: string, now: () => Date = () => new Date()) {
    this.baseDir = baseDir;
    this.now = now;
  }

  get file(): string {
    return join(this.baseDir, ACCEPTED_FILE);
  }

  /** Accepted manifests keyed by URL. */
  async list(): Promise<Record<string, AcceptedManifest>> {
    return (await this.read()).manifests;
  }

  async isAccepted(url: string): Promise<boolean> {
    return url in (await this.read()).manifests;
  }

  /** Record `url` as trusted along with the publisher details it declared. */
  async accept(url: string, meta: ManifestMeta): Promise<void> {
    const accepted = await this.read();
    accepted.manifests[url] = {
      acceptedAt: this.now().toISOString(),
      author: meta.author,
      email: meta.email,
      url: meta.url,
      description: meta.description,
    };
    await this.write(accepted);
    logger.info("Accepted manifest", { url });
  }

  /** Forget a previously accepted URL. Returns false if it was not accepted. */
  async forget(url: string): Promise<boolean> {
    const accepted = await this.read();
    if (!(url in accepted.manifests)) return false;
    delete accepted.manifests[url];
    await this.write(accepted);
    logger.info("Forgot manifest", { url });
    return true;
  }

  private async read(): Promise<AcceptedFile> {
    let content: string;
    try {
      content = await readFile(this.file, "utf-8");
    } catch (err) {
      if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
        return { manifests: {} };
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new StateError(`Failed to parse accepted manifests: ${err instanceof Error ? err.message : String(err)}`);
    }
    const parsed = acceptedFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateError(
        `Failed to parse accepted manifests: ${parsed.error.issues.map((i) => i.message).join(", ")}`,
      );
    }
    return parsed.data;
  }

  private async write(accepted: AcceptedFile): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    await writeFileAtomic(this.file, `${JSON.stringify(accepted, null, 2)}\n`);
  }
}
