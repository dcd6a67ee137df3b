/**
 * Runtime configuration, read from the environment and validated with zod.
 */

import { z } from "zod";

export const DEFAULT_DOCKER_SOCKET = "/var/run/docker.sock";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  DOCKER_SOCKET: z.string().min(1).default(DEFAULT_DOCKER_SOCKET),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  INVENTORY_HOST: z.string().min(1).default("127.0.0.1"),
  INVENTORY_PORT: z.coerce.number().int().min(1).max(65_535).default(7440),
  INVENTORY_CAPTURE_STATE_TIMESTAMPS: booleanFlag,
});

export interface InventoryConfig {
  dockerSocket: string;
  logLevel: "error" | "warn" | "info" | "debug";
  host: string;
  port: number;
  /** Copy State.StartedAt / State.FinishedAt onto each record. */
  captureStateTimestamps: boolean;
}

/**
 * Parse configuration from an environment map.
 * Throws with the offending variable names when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    dockerSocket: e.DOCKER_SOCKET,
    logLevel: e.LOG_LEVEL,
    host: e.INVENTORY_HOST,
    port: e.INVENTORY_PORT,
    captureStateTimestamps: e.INVENTORY_CAPTURE_STATE_TIMESTAMPS,
  };
}
