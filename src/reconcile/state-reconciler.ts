import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import type { ContainerManager } from "../containers/container-manager.js";
import type { StateStore } from "../state/state-store.js";
import { clearContainerFields } from "../state/types.js";

export interface ReconcileSummary {
  /** The daemon could not be reached, so nothing was checked. */
  skipped: boolean;
  /** Apps whose running flag was cleared. */
  stopped: string[];
  /** Apps whose container is gone; all container fields were cleared. */
  gone: string[];
  /** The cached proxy id was dropped. */
  proxyCleared: boolean;
}

/**
 * Corrects persisted running flags against what the daemon reports. Runs
 * before every command; an unreachable daemon is not an error here.
 */
export class StateReconciler {
  private readonly docker: Docker;
  private readonly containers: ContainerManager;
  private readonly store: StateStore;

  constructor(docker: Docker, containers: ContainerManager, store: StateStore) {
    this.docker = docker;
    this.containers = containers;
    this.store = store;
  }

  async reconcile(): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { skipped: false, stopped: [], gone: [], proxyCleared: false };

    try {
      await this.docker.ping();
    } catch (err) {
      logger.debug("Docker unreachable, skipping state reconciliation", {
        error: err instanceof Error ? err.message : String(err),
      });
      summary.skipped = true;
      return summary;
    }

    const state = await this.store.load();

    for (const [name, app] of Object.entries(state.apps)) {
      if (!app.running) continue;

      if (!app.containerId) {
        clearContainerFields(app);
        summary.gone.push(name);
        continue;
      }

      const live = await this.containers.containerState(app.containerId);
      if (live === "missing") {
        clearContainerFields(app);
        summary.gone.push(name);
      } else if (live === "stopped") {
        app.running = false;
        summary.stopped.push(name);
      }
    }

    if (state.proxyContainerId && !(await this.containers.isRunning(state.proxyContainerId))) {
      state.proxyContainerId = undefined;
      summary.proxyCleared = true;
    }

    if (summary.stopped.length > 0 || summary.gone.length > 0 || summary.proxyCleared) {
      await this.store.save(state);
      logger.info("Reconciled state with Docker", {
        stopped: summary.stopped,
        gone: summary.gone,
        proxyCleared: summary.proxyCleared,
      });
    }
    return summary;
  }
}
