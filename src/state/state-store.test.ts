import { mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { manifestCacheFileName, StateError, StateStore } from "./state-store.js";
import { clearContainerFields, emptyAppState } from "./types.js";

describe("StateStore", () => {
  let baseDir: string;
  let store: StateStore;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "vuln-pkg-state-"));
    store = new StateStore(baseDir);
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("creates the directory layout", async () => {
    await store.init();

    expect((await stat(join(baseDir, "manifests"))).isDirectory()).toBe(true);
    expect((await stat(join(baseDir, "images"))).isDirectory()).toBe(true);
    expect((await stat(join(baseDir, "repos"))).isDirectory()).toBe(true);
  });

  it("returns empty state when no state file exists", async () => {
    await expect(store.load()).resolves.toEqual({ apps: {} });
  });

  it("round-trips state through disk", async () => {
    const state = {
      apps: {
        dvwa: {
          ...emptyAppState(),
          installed: true,
          running: true,
          containerId: "abc123",
          hostnames: ["dvwa.lab.test"],
          imageTag: "vulnerables/web-dvwa",
        },
      },
      networkId: "net-1",
    };

    await store.save(state);

    await expect(store.load()).resolves.toEqual(state);
  });

  it("fills defaults for fields missing from older state files", async () => {
    await writeFile(
      join(baseDir, "state.json"),
      JSON.stringify({ apps: { dvwa: { installed: true, running: false, hostnames: [] } } }),
    );

    const state = await store.load();

    expect(state.apps.dvwa).toEqual({
      installed: true,
      running: false,
      hostnames: [],
      ports: [],
      imageSource: "prebuilt",
    });
  });

  it("leaves no temp files behind after saving", async () => {
    await store.save({ apps: {} });
    await store.save({ apps: {}, proxyContainerId: "proxy-1" });

    expect(await readdir(baseDir)).toEqual(["state.json"]);
    expect(JSON.parse(await readFile(join(baseDir, "state.json"), "utf-8"))).toEqual({
      apps: {},
      proxyContainerId: "proxy-1",
    });
  });

  it("applies updates read-modify-write", async () => {
    await store.save({ apps: { dvwa: emptyAppState() } });

    const result = await store.update((state) => {
      state.apps.dvwa.installed = true;
      return "done";
    });

    expect(result).toBe("done");
    expect((await store.load()).apps.dvwa.installed).toBe(true);
  });

  it("raises StateError for a corrupt state file", async () => {
    await writeFile(join(baseDir, "state.json"), "{not json");

    await expect(store.load()).rejects.toThrow(StateError);
  });

  it("caches manifests under a sanitized file name", async () => {
    const path = await store.cacheManifest("https://vulns.example.test/apps.yml", "apps: []\n");

    expect(path).toBe(join(baseDir, "manifests", "https___vulns_example_test_apps_yml.yml"));
    expect(await readFile(path, "utf-8")).toBe("apps: []\n");
  });
});

describe("manifestCacheFileName", () => {
  it("replaces slashes, colons and dots", () => {
    expect(manifestCacheFileName("https://vulns.io/apps.yml")).toBe("https___vulns_io_apps_yml.yml");
  });
});

describe("clearContainerFields", () => {
  it("drops every live-container field and keeps install metadata", () => {
    const app = {
      ...emptyAppState(),
      installed: true,
      running: true,
      containerId: "abc",
      hostnames: ["a.lab.test"],
      ports: [{ containerPort: 27017, hostPort: 40000, protocol: "tcp" as const }],
      imageTag: "mongo:8.0.16",
    };

    clearContainerFields(app);

    expect(app).toEqual({
      ...emptyAppState(),
      installed: true,
      imageTag: "mongo:8.0.16",
    });
  });
});
