import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import { dockerStatusCode } from "../containers/docker-errors.js";
import { MANAGED_LABEL, NETWORK_NAME } from "../containers/types.js";

/**
 * Manages the single bridge network every lab container and the reverse
 * proxy attach to.
 */
export class LabNetworkManager {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  get networkName(): string {
    return NETWORK_NAME;
  }

  /**
   * Ensure the lab network exists and return its id. Creates it only when
   * no network with the exact name is found. Safe to call repeatedly.
   */
  async ensureNetwork(): Promise<string> {
    const existing = await this.findNetworkId();
    if (existing) {
      logger.debug(`Lab network ${NETWORK_NAME} already exists`, { networkId: existing });
      return existing;
    }

    try {
      const network = await this.docker.createNetwork({
        Name: NETWORK_NAME,
        Driver: "bridge",
        Labels: { [MANAGED_LABEL]: "network" },
      });
      logger.info(`Created lab network ${NETWORK_NAME}`, { networkId: network.id });
      return network.id;
    } catch (err: unknown) {
      // Another invocation created it between lookup and create.
      if (dockerStatusCode(err) === 409) {
        const raced = await this.findNetworkId();
        if (raced) {
          logger.info(`Lab network ${NETWORK_NAME} was created concurrently, using existing`);
          return raced;
        }
      }
      throw err;
    }
  }

  async findNetworkId(): Promise<string | null> {
    const networks = await this.docker.listNetworks({
      filters: { name: [NETWORK_NAME] },
    });

    // Docker's name filter is a substring match, so verify exact match
    const match = networks.find((n) => n.Name === NETWORK_NAME);
    return match ? match.Id : null;
  }
}
