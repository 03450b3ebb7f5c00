import type { AllocatedPort } from "../state/types.js";

/** Ownership label every managed container carries; the value is the app name. */
export const MANAGED_LABEL = "vuln-pkg";

/** Value of `MANAGED_LABEL` on the reverse-proxy container. */
export const PROXY_LABEL_VALUE = "traefik";

/** Name of the shared bridge network. */
export const NETWORK_NAME = "vuln-pkg";

/** App containers are named `vuln-pkg-<app>`. */
export const CONTAINER_PREFIX = "vuln-pkg-";

/** Seconds the daemon waits after SIGTERM before killing a container. */
export const STOP_GRACE_SECONDS = 10;

export function containerNameFor(appName: string): string {
  return `${CONTAINER_PREFIX}${appName}`;
}

/** Everything `createContainer` needs; the manager adds ownership labels. */
export interface CreateContainerOptions {
  appName: string;
  image: string;
  networkId: string;
  /** Routing labels from the label builder. */
  labels: Record<string, string>;
  env: string[];
  /** Host port mappings for TCP/UDP ports. */
  ports: AllocatedPort[];
}

export type ContainerState = "running" | "stopped" | "missing";

/** A managed app container as seen by the daemon. */
export interface ManagedContainer {
  id: string;
  appName: string;
  running: boolean;
}
