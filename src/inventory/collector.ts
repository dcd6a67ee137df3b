/**
 * Collection sweep: list every container, inspect each in order, stamp the
 * records with the collecting host's name.
 */

import { hostname as osHostname } from "node:os";
import { DockerContainerLister, DockerTransport } from "../engine/docker-client.js";
import type { IdentifierLister, TransportClient } from "../engine/types.js";
import type { DiagnosticChannel } from "./diagnostics.js";
import { openDiagnosticChannel } from "./diagnostics.js";
import { inspectContainer } from "./inspect.js";
import type { InventoryRecord } from "./types.js";
import { createRecord } from "./types.js";

export interface CollectOptions {
  transport?: TransportClient;
  lister?: IdentifierLister;
  resolveHostname?: () => string;
  /** Channel for this sweep; closed when the sweep ends. */
  channel?: DiagnosticChannel;
  captureStateTimestamps?: boolean;
}

/** Host name of this machine, or "" when it cannot be resolved. */
export function resolveHostName(resolve: () => string = osHostname): string {
  try {
    return resolve() || "";
  } catch {
    return "";
  }
}

/**
 * Record the collecting host on a record. The value goes into `imageId`,
 * which downstream consumers read as the host column.
 */
export function stampHost(record: InventoryRecord, host: string): void {
  record.imageId = host;
}

export async function collectInventory(options: CollectOptions = {}): Promise<InventoryRecord[]> {
  const channel = options.channel ?? openDiagnosticChannel();
  const mapperOptions = { captureStateTimestamps: options.captureStateTimestamps ?? false };

  const host = resolveHostName(options.resolveHostname);
  const results: InventoryRecord[] = [];

  try {
    const transport = options.transport ?? new DockerTransport();
    const lister = options.lister ?? new DockerContainerLister();
    const ids = await lister.listContainerIds(true);
    for (const id of ids) {
      let record: InventoryRecord;
      try {
        record = await inspectContainer(id, transport, channel, mapperOptions);
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        channel.emit({
          severity: "error",
          message: `Inspecting container ${id} failed: ${msg}`,
          containerId: id,
          operation: "inspect",
        });
        record = createRecord();
      }
      results.push(record);
      stampHost(record, host);
    }
  } finally {
    channel.close(results.length);
  }
  return results;
}
