import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import type { ContainerManager } from "../containers/container-manager.js";
import { MANAGED_LABEL, NETWORK_NAME, PROXY_LABEL_VALUE } from "../containers/types.js";
import type { ImagePuller } from "../images/image-puller.js";
import type { Progress } from "../images/progress.js";
import { PROXY_ENABLE_LABEL } from "./routing-labels.js";
import { ENTRYPOINTS, PROXY_CONTAINER_NAME, PROXY_IMAGE, type RoutingOptions } from "./types.js";

const DOCKER_SOCKET_TARGET = "/var/run/docker.sock";
const HTTPS_ENTRYPOINT_ARG = `--entrypoints.${ENTRYPOINTS.websecure}.address=:443`;

export interface ProxyContainer {
  id: string;
  running: boolean;
}

/** Proxy arguments: dashboard on, Docker discovery limited to opted-in containers on the lab network. */
export function proxyArgs(https: boolean): string[] {
  const args = [
    "--api.dashboard=true",
    "--api.insecure=true",
    "--providers.docker=true",
    "--providers.docker.exposedbydefault=false",
    `--providers.docker.network=${NETWORK_NAME}`,
    `--entrypoints.${ENTRYPOINTS.web}.address=:80`,
  ];
  if (https) {
    args.push(HTTPS_ENTRYPOINT_ARG);
  }
  return args;
}

/** Labels the proxy puts on itself so its dashboard is served at `traefik.<domain>`. */
export function proxyLabels(domain: string): Record<string, string> {
  return {
    [MANAGED_LABEL]: PROXY_LABEL_VALUE,
    [PROXY_ENABLE_LABEL]: "true",
    "traefik.http.routers.traefik-dashboard.rule": `Host(\`traefik.${domain}\`)`,
    "traefik.http.routers.traefik-dashboard.service": "api@internal",
  };
}

/**
 * Keeps exactly one reverse-proxy container running on the lab network.
 */
export class ProxyBootstrapper {
  private readonly docker: Docker;
  private readonly containers: ContainerManager;
  private readonly puller: ImagePuller;
  private readonly dockerSocket: string;

  constructor(docker: Docker, containers: ContainerManager, puller: ImagePuller, dockerSocket = DOCKER_SOCKET_TARGET) {
    this.docker = docker;
    this.containers = containers;
    this.puller = puller;
    this.dockerSocket = dockerSocket;
  }

  async findProxy(): Promise<ProxyContainer | null> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { name: [PROXY_CONTAINER_NAME] },
    });
    const match = containers.find((c) => c.Names.includes(`/${PROXY_CONTAINER_NAME}`));
    if (!match) return null;
    return { id: match.Id, running: match.State === "running" };
  }

  /** Whether the proxy container was started with the HTTPS entrypoint. */
  async servesHttps(id: string): Promise<boolean> {
    const info = await this.docker.getContainer(id).inspect();
    return (info.Config.Cmd ?? []).includes(HTTPS_ENTRYPOINT_ARG);
  }

  /**
   * Return the running proxy's id, creating it if needed. A proxy container
   * that exists but is not running is replaced, not resumed, so it never
   * comes back with stale arguments. A running proxy without the HTTPS
   * entrypoint is recreated when HTTPS is requested.
   */
  async *ensureProxy(networkId: string, options: RoutingOptions): Progress<string> {
    const existing = await this.findProxy();
    if (existing?.running) {
      if (!options.https || (await this.servesHttps(existing.id))) {
        logger.debug("Proxy already running", { containerId: existing.id });
        return existing.id;
      }
      yield { phase: "step", message: "Recreating reverse proxy with HTTPS enabled" };
      logger.info("Recreating proxy to add the HTTPS entrypoint", { containerId: existing.id });
      await this.containers.stop(existing.id);
      await this.containers.remove(existing.id);
    } else if (existing) {
      logger.info("Replacing stopped proxy container", { containerId: existing.id });
      await this.containers.remove(existing.id);
    }

    yield* this.puller.ensure(PROXY_IMAGE);

    const ports = options.https ? ["80/tcp", "443/tcp"] : ["80/tcp"];
    const container = await this.docker.createContainer({
      name: PROXY_CONTAINER_NAME,
      Image: PROXY_IMAGE,
      Cmd: proxyArgs(options.https),
      Labels: proxyLabels(options.domain),
      ExposedPorts: Object.fromEntries(ports.map((p) => [p, {}])),
      HostConfig: {
        PortBindings: Object.fromEntries(
          ports.map((p) => [p, [{ HostIp: "0.0.0.0", HostPort: p.split("/")[0] }]]),
        ),
        Mounts: [{ Type: "bind", Source: this.dockerSocket, Target: DOCKER_SOCKET_TARGET, ReadOnly: true }],
      },
      NetworkingConfig: {
        EndpointsConfig: {
          [NETWORK_NAME]: { NetworkID: networkId },
        },
      },
    });
    await this.containers.start(container.id);

    logger.info("Started proxy", { containerId: container.id, https: options.https });
    return container.id;
  }

  /** Stop and remove the proxy if it exists. */
  async teardown(): Promise<void> {
    const existing = await this.findProxy();
    if (!existing) return;
    if (existing.running) {
      await this.containers.stop(existing.id);
    }
    await this.containers.remove(existing.id);
    logger.info("Proxy torn down", { containerId: existing.id });
  }
}
