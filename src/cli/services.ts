import Docker from "dockerode";
import type { Config } from "../config/index.js";
import { ContainerManager } from "../containers/container-manager.js";
import { BuildContextStager } from "../images/build-context.js";
import { GitSource } from "../images/git-source.js";
import { ImageAcquirer } from "../images/image-acquirer.js";
import { ImageBuilder } from "../images/image-builder.js";
import { ImagePuller } from "../images/image-puller.js";
import { LabManager } from "../lab/lab-manager.js";
import { ManifestSource } from "../manifest/manifest-source.js";
import { TrustStore } from "../manifest/trust-store.js";
import { LabNetworkManager } from "../network/lab-network.js";
import { ProxyBootstrapper } from "../proxy/proxy-bootstrapper.js";
import { StateReconciler } from "../reconcile/state-reconciler.js";
import { StateStore } from "../state/state-store.js";

/** Everything a command needs, wired against one Docker client. */
export interface CliServices {
  store: StateStore;
  trust: TrustStore;
  manifests: ManifestSource;
  reconciler: StateReconciler;
  lab: LabManager;
}

export function createServices(config: Config): CliServices {
  const docker = new Docker({ socketPath: config.dockerSocket });
  const store = new StateStore(config.home);
  const trust = new TrustStore(config.home);
  const containers = new ContainerManager(docker);
  const puller = new ImagePuller(docker);

  const acquirer = new ImageAcquirer({
    puller,
    builder: new ImageBuilder(docker),
    stager: new BuildContextStager(store.imagesDir),
    git: new GitSource(store.reposDir),
  });

  return {
    store,
    trust,
    manifests: new ManifestSource(store, trust),
    reconciler: new StateReconciler(docker, containers, store),
    lab: new LabManager({
      store,
      acquirer,
      containers,
      network: new LabNetworkManager(docker),
      proxy: new ProxyBootstrapper(docker, containers, puller, config.dockerSocket),
      portRange: config.portRange,
    }),
  };
}
