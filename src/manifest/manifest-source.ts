import type { Progress } from "../images/progress.js";
import type { FetchFn } from "../remote/fetch.js";
import type { StateStore } from "../state/state-store.js";
import { parseManifest, readManifestText } from "./manifest-loader.js";
import type { TrustStore } from "./trust-store.js";
import type { Manifest } from "./types.js";

export interface FetchedManifest {
  url: string;
  manifest: Manifest;
  /** The YAML exactly as fetched. */
  text: string;
}

/** Asks whether to trust a manifest seen for the first time. */
export type TrustPrompt = (fetched: FetchedManifest) => Promise<boolean>;

export interface LoadOptions {
  /** Accept an unseen manifest without asking. */
  autoAccept: boolean;
  prompt: TrustPrompt;
}

/**
 * Fetches manifests and enforces the trust workflow: a URL must be accepted
 * once, interactively or with auto-accept, before its apps can be used.
 */
export class ManifestSource {
  private readonly store: StateStore;
  private readonly trust: TrustStore;
  private readonly fetchFn: FetchFn;

  constructor(store: StateStore, trust: TrustStore, fetchFn: FetchFn = fetch) {
    this.store = store;
    this.trust = trust;
    this.fetchFn = fetchFn;
  }

  /** Fetch and parse without any trust check. */
  async *fetch(url: string): Progress<FetchedManifest> {
    yield { phase: "fetch", message: `Fetching manifest from ${url}` };
    const text = await readManifestText(url, this.fetchFn);
    return { url, manifest: parseManifest(text), text };
  }

  /** Fetch, require trust, and cache a manifest. */
  async *load(url: string, options: LoadOptions): Progress<Manifest> {
    const fetched = yield* this.fetch(url);

    if (!(await this.trust.isAccepted(url))) {
      let accepted = options.autoAccept;
      if (accepted) {
        yield { phase: "step", message: "Auto-accepting manifest (-y flag)" };
      } else {
        accepted = await options.prompt(fetched);
      }
      if (!accepted) throw new ManifestRejectedError(url);

      await this.trust.accept(url, fetched.manifest.meta);
      yield { phase: "step", message: "Manifest accepted and remembered for future use" };
    }

    await this.store.cacheManifest(url, fetched.text);
    yield { phase: "step", message: `Loaded ${fetched.manifest.apps.length} applications` };
    return fetched.manifest;
  }

  isAccepted(url: string): Promise<boolean> {
    return this.trust.isAccepted(url);
  }
}

export class ManifestRejectedError extends Error {
  readonly url: string;

  constructor(url: string) {
    super(`Manifest from ${url} was not accepted`);
    this.name = "ManifestRejectedError";
    this.url = url;
  }
}
