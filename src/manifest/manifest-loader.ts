import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { type FetchFn, fetchText, RemoteFetchError } from "../remote/fetch.js";
import { ManifestValidationError, toApp } from "./app.js";
import { type Manifest, rawManifestSchema } from "./types.js";

/** Parse and validate manifest YAML. */
export function parseManifest(content: string): Manifest {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ManifestParseError(err instanceof Error ? err.message : String(err));
  }

  const result = rawManifestSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ManifestParseError(detail);
  }

  const names = new Set<string>();
  for (const app of result.data.apps) {
    if (names.has(app.name)) {
      throw new ManifestValidationError(`Duplicate app name '${app.name}'`);
    }
    names.add(app.name);
  }

  return {
    meta: result.data.meta,
    apps: result.data.apps.map(toApp),
    signature: result.data.signature,
  };
}

/** Whether a manifest location names a local file rather than a remote URL. */
export function isLocalManifest(location: string): boolean {
  return location.startsWith("file://") || location.startsWith("/") || location.startsWith(".");
}

/**
 * Read manifest text from `location`: `file://` URLs and absolute or
 * `./`-relative paths are read from disk, anything else is fetched over HTTP.
 */
export async function readManifestText(location: string, fetchFn: FetchFn = fetch): Promise<string> {
  if (!isLocalManifest(location)) {
    return fetchText(location, "manifest", fetchFn);
  }
  const path = location.startsWith("file://") ? fileURLToPath(location) : location;
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    throw new RemoteFetchError("manifest", location, err instanceof Error ? err.message : String(err));
  }
}

export class ManifestParseError extends Error {
  constructor(detail: string) {
    super(`Failed to parse manifest: ${detail}`);
    this.name = "ManifestParseError";
  }
}
