/** Image the shared reverse proxy runs. */
export const PROXY_IMAGE = "traefik:v3.0";

/** Fixed name of the single reverse-proxy container. */
export const PROXY_CONTAINER_NAME = "vuln-pkg-traefik";

/** Label-key prefix the proxy watches for. */
export const PROXY_LABEL_PREFIX = "traefik";

/** Proxy entrypoint names. */
export const ENTRYPOINTS = {
  web: "web",
  websecure: "websecure",
} as const;

export interface RoutingOptions {
  /** Base domain; hostnames are `<subdomain>.<domain>`. */
  domain: string;
  /** Also publish each HTTP port on the TLS entrypoint. */
  https: boolean;
}

export interface RoutingLabels {
  /** Container labels keyed by proxy label key. */
  labels: Record<string, string>;
  /** Resolved hostnames, one per HTTP port, in declaration order. */
  hostnames: string[];
}
