import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import { PROXY_ENABLE_LABEL } from "../proxy/routing-labels.js";
import type { AllocatedPort } from "../state/types.js";
import { dockerStatusCode, isNotFound } from "./docker-errors.js";
import {
  containerNameFor,
  type ContainerState,
  type CreateContainerOptions,
  MANAGED_LABEL,
  type ManagedContainer,
  NETWORK_NAME,
  PROXY_LABEL_VALUE,
  STOP_GRACE_SECONDS,
} from "./types.js";

/**
 * Creates, starts, stops and removes lab app containers. The daemon is the
 * source of truth; nothing here reads persisted state.
 */
export class ContainerManager {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  /**
   * Create (but do not start) the container for an app. A container left
   * over under the same name is force-removed first, so a stopped instance
   * is recreated with fresh labels and ports rather than resumed.
   */
  async createContainer(options: CreateContainerOptions): Promise<string> {
    const name = containerNameFor(options.appName);

    const stale = await this.findByName(options.appName);
    if (stale) {
      logger.info(`Removing stale container ${name}`, { containerId: stale.id });
      await this.remove(stale.id);
    }

    const { exposedPorts, portBindings } = publishPorts(options.ports);
    const container = await this.docker.createContainer({
      name,
      Image: options.image,
      Env: options.env.length > 0 ? options.env : undefined,
      Labels: {
        [MANAGED_LABEL]: options.appName,
        [PROXY_ENABLE_LABEL]: "true",
        ...options.labels,
      },
      ExposedPorts: exposedPorts,
      HostConfig: {
        PortBindings: portBindings,
      },
      NetworkingConfig: {
        EndpointsConfig: {
          [NETWORK_NAME]: { NetworkID: options.networkId },
        },
      },
    });

    logger.info(`Created container ${name}`, { containerId: container.id, image: options.image });
    return container.id;
  }

  async start(containerId: string): Promise<void> {
    await this.docker.getContainer(containerId).start();
    logger.info(`Started container ${containerId}`);
  }

  /** Graceful stop. A container that is already stopped is left as is. */
  async stop(containerId: string): Promise<void> {
    try {
      await this.docker.getContainer(containerId).stop({ t: STOP_GRACE_SECONDS });
      logger.info(`Stopped container ${containerId}`);
    } catch (err: unknown) {
      // 304: container already stopped
      if (dockerStatusCode(err) !== 304) throw err;
      logger.info(`Container ${containerId} was already stopped`);
    }
  }

  /** Force-remove regardless of state. Already-gone containers are ignored. */
  async remove(containerId: string): Promise<void> {
    try {
      await this.docker.getContainer(containerId).remove({ force: true });
      logger.info(`Removed container ${containerId}`);
    } catch (err: unknown) {
      if (!isNotFound(err)) throw err;
      logger.info(`Container ${containerId} already gone`);
    }
  }

  /** Every app container carrying the ownership label, in any state. The proxy is excluded. */
  async listManaged(): Promise<ManagedContainer[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: { label: [MANAGED_LABEL] },
    });

    const results: ManagedContainer[] = [];
    for (const c of containers) {
      const appName = c.Labels?.[MANAGED_LABEL] ?? "unknown";
      if (appName === PROXY_LABEL_VALUE) continue;
      results.push({ id: c.Id, appName, running: c.State === "running" });
    }
    return results;
  }

  /** Locate an app's container by its derived name. */
  async findByName(appName: string): Promise<ManagedContainer | null> {
    const name = containerNameFor(appName);
    const containers = await this.docker.listContainers({
      all: true,
      filters: { name: [name] },
    });

    // Docker's name filter is a substring match, so verify exact match
    const match = containers.find((c) => c.Names.includes(`/${name}`));
    if (!match) return null;
    return { id: match.Id, appName, running: match.State === "running" };
  }

  /** Live state of a container; a 404 means it is gone. */
  async containerState(containerId: string): Promise<ContainerState> {
    try {
      const info = await this.docker.getContainer(containerId).inspect();
      return info.State.Running ? "running" : "stopped";
    } catch (err: unknown) {
      if (isNotFound(err)) return "missing";
      throw err;
    }
  }

  /** Whether the daemon reports the container running; a missing container is not running. */
  async isRunning(containerId: string): Promise<boolean> {
    return (await this.containerState(containerId)) === "running";
  }

  async countRunning(): Promise<number> {
    const containers = await this.listManaged();
    return containers.filter((c) => c.running).length;
  }
}

function publishPorts(ports: AllocatedPort[]): {
  exposedPorts: Record<string, Record<string, never>>;
  portBindings: Record<string, Array<{ HostIp: string; HostPort: string }>>;
} {
  const exposedPorts: Record<string, Record<string, never>> = {};
  const portBindings: Record<string, Array<{ HostIp: string; HostPort: string }>> = {};
  for (const p of ports) {
    const key = `${p.containerPort}/${p.protocol}`;
    exposedPorts[key] = {};
    portBindings[key] = [{ HostIp: "0.0.0.0", HostPort: String(p.hostPort) }];
  }
  return { exposedPorts, portBindings };
}
