/**
 * Payload → record mapping for the three inspect sub-objects.
 *
 * Each mapper reads one block of a `docker inspect` payload and fills the
 * fields it owns. A missing block emits a warning and leaves those fields
 * absent; nothing here throws on malformed input.
 */

import type { DiagnosticOperation, DiagnosticSink } from "./diagnostics.js";
import type { ContainerState, InventoryRecord, JsonObject, MapperOptions } from "./types.js";
import { COMPOSE_PROJECT_LABEL } from "./types.js";

// ---------------------------------------------------------------------------
// JSON helpers
// ---------------------------------------------------------------------------

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

export function readObject(obj: JsonObject, key: string): JsonObject | undefined {
  const value = obj[key];
  return isJsonObject(value) ? value : undefined;
}

/** JSON text of a key's value, or undefined when the key is missing. */
export function serializeValue(obj: JsonObject, key: string): string | undefined {
  if (!(key in obj) || obj[key] === undefined) return undefined;
  return JSON.stringify(obj[key]);
}

/** `true` and non-zero numbers count as set. */
export function isFlagSet(value: unknown): boolean {
  return value === true || (typeof value === "number" && value !== 0);
}

function readExitCode(state: JsonObject): number {
  const value = state.ExitCode;
  return typeof value === "number" && Number.isFinite(value) ? Math.trunc(value) : 0;
}

function warnMissing(sink: DiagnosticSink, payload: JsonObject, operation: DiagnosticOperation, block: string): void {
  const id = readString(payload, "Id") ?? null;
  sink.emit({
    severity: "warning",
    message: `Container ${id ?? "<unknown>"} has no ${block} block`,
    containerId: id,
    operation,
  });
}

// ---------------------------------------------------------------------------
// State derivation
// ---------------------------------------------------------------------------

export function deriveState(exitCode: number, running: unknown, paused: unknown): ContainerState {
  if (exitCode !== 0) return "Failed";
  if (isFlagSet(running)) return "Running";
  if (isFlagSet(paused)) return "Paused";
  return "Stopped";
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

export function mapConfig(record: InventoryRecord, payload: JsonObject, sink: DiagnosticSink): void {
  const config = readObject(payload, "Config");
  if (!config) {
    warnMissing(sink, payload, "config", "Config");
    return;
  }

  const hostname = readString(config, "Hostname");
  if (hostname !== undefined) record.containerHostname = hostname;

  const env = serializeValue(config, "Env");
  if (env !== undefined) record.environmentVar = env;

  const cmd = serializeValue(config, "Cmd");
  if (cmd !== undefined) record.command = cmd;

  const labels = readObject(config, "Labels");
  if (labels) {
    const group = readString(labels, COMPOSE_PROJECT_LABEL);
    if (group !== undefined) record.composeGroup = group;
  }
}

export function mapState(
  record: InventoryRecord,
  payload: JsonObject,
  sink: DiagnosticSink,
  options: MapperOptions = {},
): void {
  const state = readObject(payload, "State");
  if (!state) {
    warnMissing(sink, payload, "state", "State");
    return;
  }

  const exitCode = readExitCode(state);
  record.exitCode = exitCode;
  record.state = deriveState(exitCode, state.Running, state.Paused);

  const startedAt = readString(state, "StartedAt");
  const finishedAt = readString(state, "FinishedAt");
  if (options.captureStateTimestamps) {
    if (startedAt !== undefined) record.startedAt = startedAt;
    if (finishedAt !== undefined) record.finishedAt = finishedAt;
  }
}

export function mapHostConfig(record: InventoryRecord, payload: JsonObject, sink: DiagnosticSink): void {
  const hostConfig = readObject(payload, "HostConfig");
  if (!hostConfig) {
    warnMissing(sink, payload, "hostConfig", "HostConfig");
    return;
  }

  const links = serializeValue(hostConfig, "Links");
  if (links !== undefined) record.links = links;

  const ports = serializeValue(hostConfig, "PortBindings");
  if (ports !== undefined) record.ports = ports;
}
