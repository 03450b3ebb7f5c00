import type Docker from "dockerode";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { NETWORK_NAME } from "../containers/types.js";
import { proxyArgs } from "../proxy/proxy-bootstrapper.js";
import { LabNetworkManager } from "./lab-network.js";

function mockDocker() {
  return {
    createNetwork: vi.fn().mockResolvedValue({ id: "net-new" }),
    listNetworks: vi.fn().mockResolvedValue([]),
  };
}

function conflictError() {
  return Object.assign(new Error("network with name vuln-pkg already exists"), { statusCode: 409 });
}

describe("LabNetworkManager", () => {
  let docker: ReturnType<typeof mockDocker>;
  let manager: LabNetworkManager;

  beforeEach(() => {
    docker = mockDocker();
    manager = new LabNetworkManager(docker as unknown as Docker);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("names the network the proxy discovers containers on", () => {
    expect(manager.networkName).toBe(NETWORK_NAME);
    expect(proxyArgs(false)).toContain(`--providers.docker.network=${manager.networkName}`);
  });

  describe("ensureNetwork", () => {
    it("creates a bridge network when none exists", async () => {
      const id = await manager.ensureNetwork();

      expect(id).toBe("net-new");
      expect(docker.createNetwork).toHaveBeenCalledWith({
        Name: "vuln-pkg",
        Driver: "bridge",
        Labels: { "vuln-pkg": "network" },
      });
    });

    it("returns the existing id without creating", async () => {
      docker.listNetworks.mockResolvedValue([{ Id: "net-1", Name: "vuln-pkg" }]);

      expect(await manager.ensureNetwork()).toBe("net-1");
      expect(docker.createNetwork).not.toHaveBeenCalled();
    });

    it("ignores networks whose name only contains the lab name", async () => {
      docker.listNetworks.mockResolvedValue([{ Id: "net-other", Name: "vuln-pkg-old" }]);

      expect(await manager.ensureNetwork()).toBe("net-new");
    });

    it("creates at most once across repeated calls", async () => {
      docker.listNetworks
        .mockResolvedValueOnce([])
        .mockResolvedValue([{ Id: "net-new", Name: "vuln-pkg" }]);

      const first = await manager.ensureNetwork();
      const second = await manager.ensureNetwork();

      expect(first).toBe("net-new");
      expect(second).toBe("net-new");
      expect(docker.createNetwork).toHaveBeenCalledTimes(1);
    });

    it("re-looks up the network after a 409 conflict", async () => {
      docker.createNetwork.mockRejectedValue(conflictError());
      docker.listNetworks
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce([{ Id: "net-raced", Name: "vuln-pkg" }]);

      expect(await manager.ensureNetwork()).toBe("net-raced");
    });

    it("propagates other daemon errors", async () => {
      docker.createNetwork.mockRejectedValue(Object.assign(new Error("boom"), { statusCode: 500 }));

      await expect(manager.ensureNetwork()).rejects.toThrow("boom");
    });
  });
});
