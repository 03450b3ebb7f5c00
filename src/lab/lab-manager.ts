import { logger } from "../config/logger.js";
import type { ContainerManager } from "../containers/container-manager.js";
import type { ImageAcquirer } from "../images/image-acquirer.js";
import type { Progress } from "../images/progress.js";
import { directPorts, effectiveImage, findApp, isCustomBuild, matchesQuery } from "../manifest/app.js";
import type { App, Manifest, PackageType } from "../manifest/types.js";
import type { LabNetworkManager } from "../network/lab-network.js";
import { allocatePorts, DEFAULT_PORT_RANGE, type PortRange, usedHostPorts } from "../ports/port-allocator.js";
import type { ProxyBootstrapper } from "../proxy/proxy-bootstrapper.js";
import { buildRoutingLabels } from "../proxy/routing-labels.js";
import type { RoutingOptions } from "../proxy/types.js";
import type { StateStore } from "../state/state-store.js";
import { type AllocatedPort, type AppState, emptyAppState, type LabState } from "../state/types.js";
import {
  AppAlreadyRunningError,
  AppNotFoundError,
  AppNotInstalledError,
  AppNotRebuildableError,
  AppNotRunningError,
} from "./errors.js";

export interface InstallResult {
  app: string;
  image: string;
  imageSource: PackageType;
  gitCommit?: string;
}

export interface RunResult {
  app: string;
  containerId: string;
  hostnames: string[];
  ports: AllocatedPort[];
  domain: string;
  https: boolean;
}

export interface StopResult {
  app: string;
  /** False when the container had already stopped on its own. */
  wasRunning: boolean;
}

export interface RemoveResult {
  app: string;
  /** The proxy was torn down because nothing is left running. */
  proxyStopped: boolean;
  /** Purge was requested but image removal is not supported; nothing was purged. */
  purgeSkipped: boolean;
}

export interface RemoveOptions {
  purge?: boolean;
}

export interface StatusEntry {
  app: string;
  running: boolean;
  containerId?: string;
  hostnames: string[];
  ports: AllocatedPort[];
}

export interface AppListing {
  app: App;
  installed: boolean;
  running: boolean;
}

export interface LabManagerDeps {
  store: StateStore;
  acquirer: ImageAcquirer;
  containers: ContainerManager;
  network: LabNetworkManager;
  proxy: ProxyBootstrapper;
  portRange?: PortRange;
  now?: () => Date;
}

/** Resolve an app by name or fail with `AppNotFoundError`. */
export function requireApp(manifest: Manifest, name: string): App {
  const app = findApp(manifest, name);
  if (!app) throw new AppNotFoundError(name);
  return app;
}

/**
 * Runs each lab command end to end: image acquisition, network and proxy
 * bootstrap, port allocation, container lifecycle and state persistence.
 */
export class LabManager {
  private readonly store: StateStore;
  private readonly acquirer: ImageAcquirer;
  private readonly containers: ContainerManager;
  private readonly network: LabNetworkManager;
  private readonly proxy: ProxyBootstrapper;
  private readonly portRange: PortRange;
  private readonly now: () => Date;

  constructor(deps: LabManagerDeps) {
    this.store = deps.store;
    this.acquirer = deps.acquirer;
    this.containers = deps.containers;
    this.network = deps.network;
    this.proxy = deps.proxy;
    this.portRange = deps.portRange ?? DEFAULT_PORT_RANGE;
    this.now = deps.now ?? (() => new Date());
  }

  /** Pull or build the app's image and record it as installed. */
  async *install(app: App): Progress<InstallResult> {
    yield { phase: "step", message: `Installing ${app.name}` };
    const acquired = yield* this.acquirer.acquire(app);

    await this.store.update((state) => {
      const entry = entryFor(state, app.name);
      entry.installed = true;
      entry.imageSource = acquired.imageSource;
      entry.imageTag = acquired.imageTag;
      entry.gitCommit = acquired.gitCommit;
      entry.builtAt = this.now().toISOString();
    });

    return {
      app: app.name,
      image: acquired.imageTag,
      imageSource: acquired.imageSource,
      gitCommit: acquired.gitCommit,
    };
  }

  /** Install if needed, then start the app behind the proxy. */
  async *run(app: App, options: RoutingOptions): Progress<RunResult> {
    const current = (await this.store.load()).apps[app.name];
    if (current?.running && current.containerId && (await this.containers.isRunning(current.containerId))) {
      throw new AppAlreadyRunningError(app.name);
    }

    if (!(await this.acquirer.isPresent(app))) {
      yield* this.install(app);
    }

    yield { phase: "step", message: `Ensuring ${this.network.networkName} network exists` };
    const networkId = await this.network.ensureNetwork();

    yield { phase: "step", message: "Ensuring reverse proxy is running" };
    const proxyId = yield* this.proxy.ensureProxy(networkId, options);

    const state = await this.store.load();
    const direct = directPorts(app);
    const hostPorts = allocatePorts(usedHostPorts(state, app.name), direct.length, this.portRange);
    const ports: AllocatedPort[] = direct.map((p, i) => ({
      containerPort: p.port,
      hostPort: hostPorts[i],
      protocol: p.protocol,
      label: p.label,
    }));
    const { labels, hostnames } = buildRoutingLabels(app.name, app.ports, options);

    yield { phase: "step", message: `Creating container for ${app.name}` };
    const containerId = await this.containers.createContainer({
      appName: app.name,
      image: effectiveImage(app),
      networkId,
      labels,
      env: app.env,
      ports,
    });

    yield { phase: "step", message: "Starting container" };
    await this.containers.start(containerId);

    state.networkId = networkId;
    state.proxyContainerId = proxyId;
    const entry = entryFor(state, app.name);
    entry.installed = true;
    // Image was already local, so install never recorded it.
    if (!entry.imageTag) {
      entry.imageSource = app.type;
      entry.imageTag = effectiveImage(app);
    }
    entry.running = true;
    entry.containerId = containerId;
    entry.hostnames = hostnames;
    entry.ports = ports;
    await this.store.save(state);

    logger.info(`Started ${app.name}`, { containerId, hostnames, ports: ports.map((p) => p.hostPort) });
    return { app: app.name, containerId, hostnames, ports, domain: options.domain, https: options.https };
  }

  async stop(name: string): Promise<StopResult> {
    const state = await this.store.load();
    const entry = state.apps[name];
    if (!entry) throw new AppNotInstalledError(name);
    if (!entry.running || !entry.containerId) throw new AppNotRunningError(name);

    // Stopped behind our back: already in the desired state.
    const wasRunning = await this.containers.isRunning(entry.containerId);
    if (wasRunning) {
      await this.containers.stop(entry.containerId);
    }

    entry.running = false;
    await this.store.save(state);
    return { app: name, wasRunning };
  }

  /**
   * Remove the app's container and state entry. Tears the proxy down once no
   * managed container is left running. Image removal is not performed.
   */
  async remove(name: string, options: RemoveOptions = {}): Promise<RemoveResult> {
    const state = await this.store.load();
    const entry = state.apps[name];
    if (!entry) throw new AppNotInstalledError(name);

    if (entry.containerId) {
      if (await this.containers.isRunning(entry.containerId)) {
        await this.containers.stop(entry.containerId);
      }
      await this.containers.remove(entry.containerId);
    }
    if (options.purge) {
      logger.warn(`Image removal is not implemented, keeping the image for ${name}`);
    }
    delete state.apps[name];

    let proxyStopped = false;
    if ((await this.containers.countRunning()) === 0) {
      logger.info("No managed apps running, stopping proxy");
      await this.proxy.teardown();
      state.proxyContainerId = undefined;
      proxyStopped = true;
    }

    await this.store.save(state);
    return { app: name, proxyStopped, purgeSkipped: options.purge === true };
  }

  /** Rebuild a Dockerfile or git app's image from its source. */
  async *rebuild(app: App): Progress<InstallResult> {
    if (!isCustomBuild(app)) throw new AppNotRebuildableError(app.name);

    yield { phase: "step", message: `Rebuilding ${app.name}` };
    const acquired = yield* this.acquirer.build(app);

    await this.store.update((state) => {
      const entry = entryFor(state, app.name);
      entry.installed = true;
      entry.imageSource = acquired.imageSource;
      entry.imageTag = acquired.imageTag;
      entry.gitCommit = acquired.gitCommit;
      entry.builtAt = this.now().toISOString();
    });

    return {
      app: app.name,
      image: acquired.imageTag,
      imageSource: acquired.imageSource,
      gitCommit: acquired.gitCommit,
    };
  }

  /** Every recorded instance with its live running flag, sorted by name. */
  async status(): Promise<StatusEntry[]> {
    const state = await this.store.load();
    const entries: StatusEntry[] = [];
    for (const name of Object.keys(state.apps).sort()) {
      const entry = state.apps[name];
      const running = entry.containerId ? await this.containers.isRunning(entry.containerId) : false;
      entries.push({
        app: name,
        running,
        containerId: entry.containerId,
        hostnames: entry.hostnames,
        ports: entry.ports,
      });
    }
    return entries;
  }

  async list(manifest: Manifest): Promise<AppListing[]> {
    const state = await this.store.load();
    return manifest.apps.map((app) => listing(app, state.apps[app.name]));
  }

  async search(manifest: Manifest, query: string): Promise<AppListing[]> {
    const state = await this.store.load();
    return manifest.apps.filter((app) => matchesQuery(app, query)).map((app) => listing(app, state.apps[app.name]));
  }
}

function entryFor(state: LabState, name: string): AppState {
  let entry = state.apps[name];
  if (!entry) {
    entry = emptyAppState();
    state.apps[name] = entry;
  }
  return entry;
}

function listing(app: App, entry: AppState | undefined): AppListing {
  return { app, installed: entry?.installed ?? false, running: entry?.running ?? false };
}
