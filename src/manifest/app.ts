import type { App, DockerfileApp, GitApp, Manifest, PortConfig, RawApp } from "./types.js";

/** Repository namespace for images this tool builds itself. */
export const IMAGE_NAMESPACE = "vuln-pkg";

/**
 * The image reference a container for `app` runs from. Prebuilt apps use the
 * declared image; built apps get `vuln-pkg/<name>:<version>`.
 */
export function effectiveImage(app: App): string {
  switch (app.type) {
    case "prebuilt":
      return app.image;
    case "dockerfile":
    case "git":
      return `${IMAGE_NAMESPACE}/${app.name}:${app.version}`;
  }
}

/** Ports routed through the reverse proxy, in declaration order. */
export function httpPorts(app: Pick<App, "ports">): PortConfig[] {
  return app.ports.filter((p) => p.protocol === "http");
}

/** TCP/UDP ports that need a host-port mapping, in declaration order. */
export function directPorts(app: Pick<App, "ports">): PortConfig[] {
  return app.ports.filter((p) => p.protocol !== "http");
}

/** Whether the app's image is built locally rather than pulled. */
export function isCustomBuild(app: App): app is DockerfileApp | GitApp {
  return app.type !== "prebuilt";
}

export function findApp(manifest: Manifest, name: string): App | undefined {
  return manifest.apps.find((app) => app.name === name);
}

/** Case-insensitive match against name, description and tags. */
export function matchesQuery(app: App, query: string): boolean {
  const needle = query.toLowerCase();
  return (
    app.name.toLowerCase().includes(needle) ||
    app.description.toLowerCase().includes(needle) ||
    app.tags.some((tag) => tag.toLowerCase().includes(needle))
  );
}

/**
 * Convert a manifest entry into the `App` union, enforcing that the fields
 * its kind requires are present.
 */
export function toApp(raw: RawApp): App {
  const common = {
    name: raw.name,
    version: raw.version,
    ports: raw.ports,
    tags: raw.tags,
    description: raw.description,
    env: raw.env,
  };

  switch (raw.type) {
    case "prebuilt": {
      if (!raw.image) {
        throw new ManifestValidationError(`Prebuilt app '${raw.name}' requires 'image' field`);
      }
      return { ...common, type: "prebuilt", image: raw.image };
    }
    case "dockerfile": {
      // Inline content wins when both are given.
      if (raw.dockerfile) {
        return { ...common, type: "dockerfile", dockerfile: { kind: "inline", content: raw.dockerfile } };
      }
      if (raw.dockerfile_url) {
        return {
          ...common,
          type: "dockerfile",
          dockerfile: { kind: "remote", url: raw.dockerfile_url, contextUrl: raw.context_url },
        };
      }
      throw new ManifestValidationError(
        `Dockerfile app '${raw.name}' requires 'dockerfile' or 'dockerfile_url' field`,
      );
    }
    case "git": {
      if (!raw.repo) {
        throw new ManifestValidationError(`Git app '${raw.name}' requires 'repo' field`);
      }
      return { ...common, type: "git", repo: raw.repo, ref: raw.ref, dockerfilePath: raw.dockerfile_path };
    }
  }
}

export class ManifestValidationError extends Error {
  constructor(message: string) {
    super(`Manifest validation error: ${message}`);
    this.name = "ManifestValidationError";
  }
}
