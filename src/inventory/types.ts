/**
 * Inventory record and related types.
 */

/** Derived lifecycle state of a container. */
export type ContainerState = "Running" | "Paused" | "Failed" | "Stopped";

/**
 * One container as observed during a sweep. Fields the engine did not report
 * are left absent. The `environmentVar`, `command`, `links` and `ports` fields
 * hold compact (unindented) JSON text.
 */
export interface InventoryRecord {
  instanceId?: string;
  /**
   * Image reference from the inspect payload until the collector applies the
   * host stamp, after which it carries the collecting host's name.
   */
  imageId?: string;
  /** Engine creation timestamp, verbatim. */
  createdTime?: string;
  containerHostname?: string;
  /** JSON text of Config.Env. */
  environmentVar?: string;
  /** JSON text of Config.Cmd. */
  command?: string;
  composeGroup?: string;
  exitCode?: number;
  state?: ContainerState;
  startedAt?: string;
  finishedAt?: string;
  /** JSON text of HostConfig.Links. */
  links?: string;
  /** JSON text of HostConfig.PortBindings. */
  ports?: string;
}

/** A parsed JSON object of unknown shape, e.g. an inspect payload or one of its blocks. */
export type JsonObject = Record<string, unknown>;

export interface MapperOptions {
  /** Copy State.StartedAt / State.FinishedAt onto the record. Default false. */
  captureStateTimestamps?: boolean;
}

export const COMPOSE_PROJECT_LABEL = "com.docker.compose.project";

export function createRecord(): InventoryRecord {
  return {};
}
