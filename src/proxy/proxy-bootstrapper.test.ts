import { Readable } from "node:stream";
import type Docker from "dockerode";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ContainerManager } from "../containers/container-manager.js";
import { ImagePuller } from "../images/image-puller.js";
import { drain } from "../images/progress.js";
import { ProxyBootstrapper, proxyArgs, proxyLabels } from "./proxy-bootstrapper.js";

function mockContainer() {
  return {
    start: vi.fn().mockResolvedValue(undefined),
    stop: vi.fn().mockResolvedValue(undefined),
    remove: vi.fn().mockResolvedValue(undefined),
    inspect: vi.fn().mockResolvedValue({ Config: { Cmd: proxyArgs(false) } }),
  };
}

function mockDocker(container = mockContainer()) {
  const image = { inspect: vi.fn().mockResolvedValue({}) };
  return {
    listContainers: vi.fn().mockResolvedValue([]),
    createContainer: vi.fn().mockResolvedValue({ id: "proxy-new" }),
    getContainer: vi.fn().mockReturnValue(container),
    getImage: vi.fn().mockReturnValue(image),
    pull: vi.fn().mockImplementation(async () => Readable.from([])),
    modem: {
      followProgress: vi.fn((_stream: unknown, onFinished: (err: Error | null, output: object[]) => void) =>
        onFinished(null, []),
      ),
    },
    container,
    image,
  };
}

function proxyInfo(id: string, state: string) {
  return { Id: id, Names: ["/vuln-pkg-traefik"], State: state, Labels: { "vuln-pkg": "traefik" } };
}

describe("proxyArgs", () => {
  it("enables the web entrypoint and opt-in discovery on the lab network", () => {
    expect(proxyArgs(false)).toEqual([
      "--api.dashboard=true",
      "--api.insecure=true",
      "--providers.docker=true",
      "--providers.docker.exposedbydefault=false",
      "--providers.docker.network=vuln-pkg",
      "--entrypoints.web.address=:80",
    ]);
  });

  it("adds the secure entrypoint for https", () => {
    expect(proxyArgs(true)).toContain("--entrypoints.websecure.address=:443");
  });
});

describe("proxyLabels", () => {
  it("routes the dashboard under traefik.<domain>", () => {
    expect(proxyLabels("lab.test")).toEqual({
      "vuln-pkg": "traefik",
      "traefik.enable": "true",
      "traefik.http.routers.traefik-dashboard.rule": "Host(`traefik.lab.test`)",
      "traefik.http.routers.traefik-dashboard.service": "api@internal",
    });
  });
});

describe("ProxyBootstrapper", () => {
  let docker: ReturnType<typeof mockDocker>;
  let bootstrapper: ProxyBootstrapper;

  beforeEach(() => {
    docker = mockDocker();
    const d = docker as unknown as Docker;
    bootstrapper = new ProxyBootstrapper(d, new ContainerManager(d), new ImagePuller(d), "/run/docker.sock");
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates and starts the proxy when none exists", async () => {
    const id = await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: true }), () => {});

    expect(id).toBe("proxy-new");
    expect(docker.createContainer).toHaveBeenCalledWith({
      name: "vuln-pkg-traefik",
      Image: "traefik:v3.0",
      Cmd: proxyArgs(true),
      Labels: proxyLabels("lab.test"),
      ExposedPorts: { "80/tcp": {}, "443/tcp": {} },
      HostConfig: {
        PortBindings: {
          "80/tcp": [{ HostIp: "0.0.0.0", HostPort: "80" }],
          "443/tcp": [{ HostIp: "0.0.0.0", HostPort: "443" }],
        },
        Mounts: [{ Type: "bind", Source: "/run/docker.sock", Target: "/var/run/docker.sock", ReadOnly: true }],
      },
      NetworkingConfig: { EndpointsConfig: { "vuln-pkg": { NetworkID: "net-1" } } },
    });
    expect(docker.getContainer).toHaveBeenCalledWith("proxy-new");
    expect(docker.container.start).toHaveBeenCalled();
  });

  it("binds only port 80 without https", async () => {
    await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: false }), () => {});

    const [opts] = docker.createContainer.mock.calls[0];
    expect(opts.ExposedPorts).toEqual({ "80/tcp": {} });
  });

  it("creates at most once across repeated calls", async () => {
    docker.listContainers.mockResolvedValueOnce([]).mockResolvedValue([proxyInfo("proxy-new", "running")]);

    const first = await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: false }), () => {});
    const second = await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: false }), () => {});

    expect(first).toBe("proxy-new");
    expect(second).toBe("proxy-new");
    expect(docker.createContainer).toHaveBeenCalledTimes(1);
  });

  it("replaces a proxy container that is not running", async () => {
    docker.listContainers.mockResolvedValue([proxyInfo("proxy-old", "exited")]);

    const id = await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: false }), () => {});

    expect(id).toBe("proxy-new");
    expect(docker.getContainer).toHaveBeenCalledWith("proxy-old");
    expect(docker.container.remove).toHaveBeenCalledWith({ force: true });
    expect(docker.createContainer).toHaveBeenCalledTimes(1);
  });

  it("recreates a running proxy that lacks the HTTPS entrypoint when HTTPS is requested", async () => {
    docker.listContainers.mockResolvedValue([proxyInfo("proxy-1", "running")]);
    const events: string[] = [];

    const id = await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: true }), (e) =>
      events.push(e.message),
    );

    expect(id).toBe("proxy-new");
    expect(events).toEqual(["Recreating reverse proxy with HTTPS enabled"]);
    expect(docker.container.stop).toHaveBeenCalledWith({ t: 10 });
    expect(docker.container.remove).toHaveBeenCalledWith({ force: true });
    const [opts] = docker.createContainer.mock.calls[0];
    expect(opts.Cmd).toEqual(proxyArgs(true));
  });

  it("keeps a running proxy that already serves HTTPS", async () => {
    docker.listContainers.mockResolvedValue([proxyInfo("proxy-1", "running")]);
    docker.container.inspect.mockResolvedValue({ Config: { Cmd: proxyArgs(true) } });

    const id = await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: true }), () => {});

    expect(id).toBe("proxy-1");
    expect(docker.createContainer).not.toHaveBeenCalled();
  });

  it("does not inspect a running proxy when HTTPS is not requested", async () => {
    docker.listContainers.mockResolvedValue([proxyInfo("proxy-1", "running")]);

    await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: false }), () => {});

    expect(docker.container.inspect).not.toHaveBeenCalled();
  });

  it("pulls the proxy image when absent", async () => {
    docker.image.inspect.mockRejectedValue(Object.assign(new Error("no such image"), { statusCode: 404 }));

    await drain(bootstrapper.ensureProxy("net-1", { domain: "lab.test", https: false }), () => {});

    expect(docker.pull).toHaveBeenCalledWith("traefik:v3.0");
  });

  describe("findProxy", () => {
    it("ignores containers whose names only contain the proxy name", async () => {
      docker.listContainers.mockResolvedValue([
        { Id: "x", Names: ["/vuln-pkg-traefik-old"], State: "running", Labels: {} },
      ]);

      expect(await bootstrapper.findProxy()).toBeNull();
    });
  });

  describe("teardown", () => {
    it("stops and removes a running proxy", async () => {
      docker.listContainers.mockResolvedValue([proxyInfo("proxy-1", "running")]);

      await bootstrapper.teardown();

      expect(docker.container.stop).toHaveBeenCalledWith({ t: 10 });
      expect(docker.container.remove).toHaveBeenCalledWith({ force: true });
    });

    it("does nothing when there is no proxy", async () => {
      await bootstrapper.teardown();

      expect(docker.getContainer).not.toHaveBeenCalled();
    });
  });
});
