import { logger } from "../config/logger.js";
import { effectiveImage } from "../manifest/app.js";
import type { App, DockerfileApp, GitApp, PackageType } from "../manifest/types.js";
import { type FetchFn, fetchBytes, fetchText } from "../remote/fetch.js";
import type { BuildContext, BuildContextStager } from "./build-context.js";
import type { GitSource } from "./git-source.js";
import type { ImageBuilder } from "./image-builder.js";
import type { ImagePuller } from "./image-puller.js";
import type { Progress } from "./progress.js";

export interface AcquiredImage {
  imageSource: PackageType;
  imageTag: string;
  /** Commit the image was built from, for git apps. */
  gitCommit?: string;
}

export interface ImageAcquirerDeps {
  puller: ImagePuller;
  builder: ImageBuilder;
  stager: BuildContextStager;
  git: GitSource;
  fetchFn?: FetchFn;
}

/**
 * Produces the effective image for an app: pulled for prebuilt apps, built
 * for Dockerfile and git apps. Every build goes through `ImageBuilder`.
 */
export class ImageAcquirer {
  private readonly puller: ImagePuller;
  private readonly builder: ImageBuilder;
  private readonly stager: BuildContextStager;
  private readonly git: GitSource;
  private readonly fetchFn: FetchFn;

  constructor(deps: ImageAcquirerDeps) {
    this.puller = deps.puller;
    this.builder = deps.builder;
    this.stager = deps.stager;
    this.git = deps.git;
    this.fetchFn = deps.fetchFn ?? fetch;
  }

  /** Whether the app's effective image is already present locally. */
  async isPresent(app: App): Promise<boolean> {
    return this.puller.exists(effectiveImage(app));
  }

  /** Pull a prebuilt image if it is absent; always build the others. */
  async *acquire(app: App): Progress<AcquiredImage> {
    const imageTag = effectiveImage(app);
    switch (app.type) {
      case "prebuilt": {
        const pulled = yield* this.puller.ensure(imageTag);
        if (!pulled) {
          yield { phase: "pull", message: `Image ${imageTag} already exists` };
        }
        return { imageSource: "prebuilt", imageTag };
      }
      case "dockerfile":
      case "git":
        return yield* this.build(app);
    }
  }

  /** Build a Dockerfile or git app from scratch, tagged with its effective image. */
  async *build(app: DockerfileApp | GitApp): Progress<AcquiredImage> {
    const imageTag = effectiveImage(app);
    let context: BuildContext;
    let gitCommit: string | undefined;

    if (app.type === "git") {
      const checkout = yield* this.git.checkout(app.repo, app.ref);
      gitCommit = checkout.commit;
      context = await this.stager.fromDirectory(app.name, checkout.dir, app.dockerfilePath);
    } else {
      context = yield* this.stageDockerfile(app);
    }

    logger.info(`Build context for ${app.name} staged`, { archive: context.archivePath });
    yield* this.builder.build(this.stager.open(context), imageTag, context.dockerfile);
    return { imageSource: app.type, imageTag, gitCommit };
  }

  private async *stageDockerfile(app: DockerfileApp): Progress<BuildContext> {
    const source = app.dockerfile;
    if (source.kind === "inline") {
      return this.stager.fromDockerfile(app.name, source.content);
    }

    yield { phase: "fetch", message: `Fetching Dockerfile from ${source.url}` };
    const dockerfile = await fetchText(source.url, "dockerfile", this.fetchFn);
    if (!source.contextUrl) {
      return this.stager.fromDockerfile(app.name, dockerfile);
    }

    yield { phase: "fetch", message: `Fetching build context from ${source.contextUrl}` };
    const archive = await fetchBytes(source.contextUrl, "context", this.fetchFn);
    return this.stager.fromRemoteContext(app.name, dockerfile, archive);
  }
}
