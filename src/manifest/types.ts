import { z } from "zod";

/** Docker-compatible application names: lowercase alphanumerics and hyphens, 1-63 chars. */
export const APP_NAME_RE = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

/** Protocol a declared port is exposed with. HTTP goes through the proxy, TCP/UDP is published directly. */
export const protocolSchema = z.enum(["http", "tcp", "udp"]);
export type Protocol = z.infer<typeof protocolSchema>;

const portNumberSchema = z.number().int().min(1).max(65535);

export const portConfigSchema = z.object({
  port: portNumberSchema,
  protocol: protocolSchema.default("http"),
  label: z.string().optional(),
});
export type PortConfig = z.infer<typeof portConfigSchema>;

/** A manifest port is either a bare number (HTTP) or a full config object. */
export const portEntrySchema = z.union([
  portNumberSchema.transform((port): PortConfig => ({ port, protocol: "http" })),
  portConfigSchema,
]);

export const packageTypeSchema = z.enum(["prebuilt", "dockerfile", "git"]);
export type PackageType = z.infer<typeof packageTypeSchema>;

/**
 * One application entry as written in the manifest YAML. Kind-specific fields
 * are all optional here; `toApp` turns the record into the `App` union and
 * rejects entries whose kind is missing its required fields.
 */
export const rawAppSchema = z.object({
  name: z.string().regex(APP_NAME_RE, "App names must be lowercase alphanumerics and hyphens"),
  version: z.coerce.string().min(1),
  type: packageTypeSchema.default("prebuilt"),
  image: z.string().min(1).optional(),
  ports: z.array(portEntrySchema).default(() => []),
  tags: z.array(z.string()).default(() => []),
  description: z.string().default(""),
  env: z.array(z.string()).default(() => []),
  dockerfile: z.string().min(1).optional(),
  dockerfile_url: z.string().url().optional(),
  context_url: z.string().url().optional(),
  repo: z.string().min(1).optional(),
  ref: z.string().min(1).optional(),
  dockerfile_path: z.string().min(1).optional(),
});
export type RawApp = z.infer<typeof rawAppSchema>;

export const manifestMetaSchema = z.object({
  author: z.string().optional(),
  email: z.string().optional(),
  url: z.string().optional(),
  description: z.string().optional(),
});
export type ManifestMeta = z.infer<typeof manifestMetaSchema>;

export const rawManifestSchema = z.object({
  meta: manifestMetaSchema.default(() => ({})),
  apps: z.array(rawAppSchema),
  signature: z.string().optional(),
});

interface AppCommon {
  name: string;
  version: string;
  ports: PortConfig[];
  tags: string[];
  description: string;
  /** `KEY=value` entries passed to the container verbatim. */
  env: string[];
}

/** Pulled from a registry by reference. */
export interface PrebuiltApp extends AppCommon {
  type: "prebuilt";
  image: string;
}

export type DockerfileSource =
  | { kind: "inline"; content: string }
  | { kind: "remote"; url: string; contextUrl?: string };

/** Built from an inline Dockerfile or one fetched from a URL. */
export interface DockerfileApp extends AppCommon {
  type: "dockerfile";
  dockerfile: DockerfileSource;
}

/** Built from the Dockerfile of a cloned Git repository. */
export interface GitApp extends AppCommon {
  type: "git";
  repo: string;
  ref?: string;
  /** Path of the Dockerfile inside the repository (default `Dockerfile`). */
  dockerfilePath?: string;
}

export type App = PrebuiltApp | DockerfileApp | GitApp;

export interface Manifest {
  meta: ManifestMeta;
  apps: App[];
  signature?: string;
}
