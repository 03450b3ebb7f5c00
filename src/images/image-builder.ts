import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import { followDaemonProgress, frameError, frameMessage, type Progress } from "./progress.js";

/**
 * The single build primitive every custom image goes through. Build output
 * is streamed back; the first error frame fails the build for good.
 */
export class ImageBuilder {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  /**
   * Build `tag` from a tar build context.
   * @param dockerfile - Dockerfile path inside the context.
   */
  async *build(context: NodeJS.ReadableStream, tag: string, dockerfile = "Dockerfile"): Progress<void> {
    logger.info(`Building image ${tag}`, { dockerfile });
    const stream = await this.docker.buildImage(context, { t: tag, dockerfile });

    for await (const frame of followDaemonProgress(this.docker, stream)) {
      const error = frameError(frame);
      if (error !== undefined) throw new ImageBuildError(tag, error);
      const message = frameMessage(frame);
      if (message) yield { phase: "build", message };
    }
    logger.info(`Built image ${tag}`);
  }
}

export class ImageBuildError extends Error {
  readonly image: string;

  constructor(image: string, message: string) {
    super(`Failed to build image '${image}': ${message}`);
    this.name = "ImageBuildError";
    this.image = image;
  }
}
