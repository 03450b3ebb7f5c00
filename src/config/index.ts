import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_PORT_RANGE } from "../ports/port-allocator.js";

export const DEFAULT_MANIFEST_URL = "https://raw.githubusercontent.com/neutrno2211/vuln-pkg/main/manifest.yml";

export const configSchema = z
  .object({
    /** Base directory for state, manifest cache, build scratch area and git clones. */
    home: z.string().min(1).default(join(homedir(), ".vuln-pkg")),
    manifestUrl: z.string().min(1).default(DEFAULT_MANIFEST_URL),
    dockerSocket: z.string().min(1).default("/var/run/docker.sock"),
    logLevel: z.enum(["error", "warn", "info", "debug"]).default("warn"),
    portRange: z
      .object({
        start: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT_RANGE.start),
        end: z.coerce.number().int().min(1).max(65535).default(DEFAULT_PORT_RANGE.end),
      })
      .default({ ...DEFAULT_PORT_RANGE })
      .refine((range) => range.start <= range.end, "Port range start must not exceed its end"),
  })
  .strict();

export type Config = z.infer<typeof configSchema>;

/** Build the config from an environment map. Unset variables fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    home: env.VULN_PKG_HOME || undefined,
    manifestUrl: env.VULN_PKG_MANIFEST_URL || undefined,
    dockerSocket: env.DOCKER_SOCKET || undefined,
    logLevel: env.LOG_LEVEL || undefined,
    portRange: {
      start: env.VULN_PKG_PORT_RANGE_START || undefined,
      end: env.VULN_PKG_PORT_RANGE_END || undefined,
    },
  });
}

export const config = loadConfig(process.env);
