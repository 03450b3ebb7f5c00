import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import { isNotFound } from "../containers/docker-errors.js";
import { followDaemonProgress, frameError, frameMessage, type Progress } from "./progress.js";

/** Local image presence checks and registry pulls. */
export class ImagePuller {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  /** Whether the image is present locally. Any daemon error other than 404 propagates. */
  async exists(image: string): Promise<boolean> {
    try {
      await this.docker.getImage(image).inspect();
      return true;
    } catch (err: unknown) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  /** Pull `image`, yielding daemon status lines. An error frame aborts the pull. */
  async *pull(image: string): Progress<void> {
    logger.info(`Pulling image ${image}`);
    const stream: NodeJS.ReadableStream = await this.docker.pull(image);

    for await (const frame of followDaemonProgress(this.docker, stream)) {
      const error = frameError(frame);
      if (error !== undefined) throw new ImagePullError(image, error);
      const message = frameMessage(frame);
      if (message) yield { phase: "pull", message };
    }
    logger.info(`Pulled image ${image}`);
  }

  /** Pull only if absent. Returns whether a pull happened. */
  async *ensure(image: string): Progress<boolean> {
    if (await this.exists(image)) {
      logger.debug(`Image ${image} already present`);
      return false;
    }
    yield* this.pull(image);
    return true;
  }
}

export class ImagePullError extends Error {
  readonly image: string;

  constructor(image: string, message: string) {
    super(`Failed to pull image '${image}': ${message}`);
    this.name = "ImagePullError";
    this.image = image;
  }
}
