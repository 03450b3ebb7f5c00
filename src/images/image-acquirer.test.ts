import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import type Docker from "dockerode";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import type { App, DockerfileApp, GitApp } from "../manifest/types.js";
import { type FetchFn, RemoteFetchError } from "../remote/fetch.js";
import { BuildContextStager } from "./build-context.js";
import { type GitRunner, GitSource } from "./git-source.js";
import { ImageAcquirer } from "./image-acquirer.js";
import { ImageBuilder } from "./image-builder.js";
import { ImagePuller } from "./image-puller.js";
import { drain, type ProgressEvent } from "./progress.js";

function mockDocker() {
  const image = { inspect: vi.fn().mockResolvedValue({}) };
  return {
    getImage: vi.fn().mockReturnValue(image),
    pull: vi.fn().mockImplementation(async () => Readable.from([])),
    buildImage: vi.fn().mockImplementation(async (context: NodeJS.ReadableStream) => {
      context.resume();
      return Readable.from([]);
    }),
    modem: {
      followProgress: vi.fn((_stream: unknown, onFinished: (err: Error | null, output: object[]) => void) =>
        onFinished(null, []),
      ),
    },
    image,
  };
}

const common = { version: "1.0", ports: [], tags: [], description: "", env: [] };

describe("ImageAcquirer", () => {
  let root: string;
  let docker: ReturnType<typeof mockDocker>;
  let fetchFn: Mock<FetchFn>;
  let git: Mock<GitRunner>;
  let acquirer: ImageAcquirer;
  let events: ProgressEvent[];

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "vuln-pkg-acq-"));
    docker = mockDocker();
    fetchFn = vi.fn<FetchFn>();
    git = vi.fn<GitRunner>(async (args) => (args[0] === "rev-parse" ? "abc123" : ""));
    acquirer = new ImageAcquirer({
      puller: new ImagePuller(docker as unknown as Docker),
      builder: new ImageBuilder(docker as unknown as Docker),
      stager: new BuildContextStager(join(root, "images")),
      git: new GitSource(join(root, "repos"), git),
      fetchFn,
    });
    events = [];
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("leaves a present prebuilt image alone", async () => {
    const app: App = { ...common, name: "dvwa", type: "prebuilt", image: "vulnerables/web-dvwa:latest" };

    const result = await drain(acquirer.acquire(app), (e) => events.push(e));

    expect(result).toEqual({ imageSource: "prebuilt", imageTag: "vulnerables/web-dvwa:latest" });
    expect(docker.pull).not.toHaveBeenCalled();
    expect(events).toEqual([{ phase: "pull", message: "Image vulnerables/web-dvwa:latest already exists" }]);
  });

  it("pulls an absent prebuilt image", async () => {
    docker.image.inspect.mockRejectedValue(Object.assign(new Error("no such image"), { statusCode: 404 }));
    const app: App = { ...common, name: "dvwa", type: "prebuilt", image: "vulnerables/web-dvwa:latest" };

    await drain(acquirer.acquire(app), (e) => events.push(e));

    expect(docker.pull).toHaveBeenCalledWith("vulnerables/web-dvwa:latest");
  });

  it("builds an inline Dockerfile app under its synthesized tag", async () => {
    const app: DockerfileApp = {
      ...common,
      name: "x",
      type: "dockerfile",
      dockerfile: { kind: "inline", content: "FROM alpine\n" },
    };

    const result = await drain(acquirer.acquire(app), (e) => events.push(e));

    expect(result).toEqual({ imageSource: "dockerfile", imageTag: "vuln-pkg/x:1.0", gitCommit: undefined });
    expect(docker.buildImage).toHaveBeenCalledWith(expect.anything(), { t: "vuln-pkg/x:1.0", dockerfile: "Dockerfile" });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("fetches a remote Dockerfile before building", async () => {
    fetchFn.mockResolvedValue(new Response("FROM nginx\n"));
    const app: DockerfileApp = {
      ...common,
      name: "x",
      type: "dockerfile",
      dockerfile: { kind: "remote", url: "https://files.test/Dockerfile" },
    };

    await drain(acquirer.acquire(app), (e) => events.push(e));

    expect(fetchFn).toHaveBeenCalledWith("https://files.test/Dockerfile");
    expect(events[0]).toEqual({ phase: "fetch", message: "Fetching Dockerfile from https://files.test/Dockerfile" });
    expect(docker.buildImage).toHaveBeenCalledTimes(1);
  });

  it("surfaces a failed Dockerfile fetch as RemoteFetchError", async () => {
    fetchFn.mockResolvedValue(new Response("missing", { status: 404, statusText: "Not Found" }));
    const app: DockerfileApp = {
      ...common,
      name: "x",
      type: "dockerfile",
      dockerfile: { kind: "remote", url: "https://files.test/Dockerfile" },
    };

    const err = await drain(acquirer.acquire(app), () => {}).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteFetchError);
    expect(docker.buildImage).not.toHaveBeenCalled();
  });

  it("builds a git app from the checked-out tree and records the commit", async () => {
    const app: GitApp = {
      ...common,
      name: "juice",
      type: "git",
      repo: "https://example.test/juice.git",
      ref: "v2",
      dockerfilePath: "docker/Dockerfile",
    };
    const repoDir = join(root, "repos", "https___example.test_juice.git");
    await mkdir(join(repoDir, ".git"), { recursive: true });
    await writeFile(join(repoDir, "server.js"), "//\n");

    const result = await drain(acquirer.acquire(app), (e) => events.push(e));

    expect(result).toEqual({ imageSource: "git", imageTag: "vuln-pkg/juice:1.0", gitCommit: "abc123" });
    expect(docker.buildImage).toHaveBeenCalledWith(expect.anything(), {
      t: "vuln-pkg/juice:1.0",
      dockerfile: "docker/Dockerfile",
    });
  });

  it("reports presence by the effective image", async () => {
    const app: DockerfileApp = {
      ...common,
      name: "x",
      type: "dockerfile",
      dockerfile: { kind: "inline", content: "FROM alpine\n" },
    };

    expect(await acquirer.isPresent(app)).toBe(true);
    expect(docker.getImage).toHaveBeenCalledWith("vuln-pkg/x:1.0");
  });
});
