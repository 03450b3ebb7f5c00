import { z } from "zod";
import { packageTypeSchema, protocolSchema } from "../manifest/types.js";

/** A TCP/UDP container port published on a host port from the allocation range. */
export const allocatedPortSchema = z.object({
  containerPort: z.number().int(),
  hostPort: z.number().int(),
  protocol: protocolSchema,
  label: z.string().optional(),
});
export type AllocatedPort = z.infer<typeof allocatedPortSchema>;

export const appStateSchema = z.object({
  installed: z.boolean().default(false),
  running: z.boolean().default(false),
  containerId: z.string().optional(),
  hostnames: z.array(z.string()).default(() => []),
  ports: z.array(allocatedPortSchema).default(() => []),
  /** How the image was obtained. */
  imageSource: packageTypeSchema.default("prebuilt"),
  imageTag: z.string().optional(),
  gitCommit: z.string().optional(),
  /** ISO 8601 timestamp of the last install or rebuild. */
  builtAt: z.string().optional(),
});
export type AppState = z.infer<typeof appStateSchema>;

export const labStateSchema = z.object({
  apps: z.record(z.string(), appStateSchema).default(() => ({})),
  networkId: z.string().optional(),
  proxyContainerId: z.string().optional(),
});
export type LabState = z.infer<typeof labStateSchema>;

export function emptyState(): LabState {
  return { apps: {} };
}

export function emptyAppState(): AppState {
  return { installed: false, running: false, hostnames: [], ports: [], imageSource: "prebuilt" };
}

/** Drop everything that describes a live container. */
export function clearContainerFields(app: AppState): void {
  app.running = false;
  app.containerId = undefined;
  app.hostnames = [];
  app.ports = [];
}
