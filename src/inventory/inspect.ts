/**
 * Inspect one container and map the reply into an inventory record.
 */

import { inspectRequest } from "../engine/docker-client.js";
import type { TransportClient } from "../engine/types.js";
import type { DiagnosticSink } from "./diagnostics.js";
import { isJsonObject, mapConfig, mapHostConfig, mapState, readString } from "./mapper.js";
import type { InventoryRecord, MapperOptions } from "./types.js";
import { createRecord } from "./types.js";

export async function inspectContainer(
  id: string,
  transport: TransportClient,
  sink: DiagnosticSink,
  options: MapperOptions = {},
): Promise<InventoryRecord> {
  const record = createRecord();

  const [payload] = await transport.getResponse([inspectRequest(id)]);
  if (!isJsonObject(payload)) {
    sink.emit({
      severity: "warning",
      message: `Inspecting container ${id} returned no payload`,
      containerId: id,
      operation: "inspect",
    });
    return record;
  }

  const instanceId = readString(payload, "Id");
  if (instanceId !== undefined) record.instanceId = instanceId;
  const image = readString(payload, "Image");
  if (image !== undefined) record.imageId = image;
  const created = readString(payload, "Created");
  if (created !== undefined) record.createdTime = created;

  mapConfig(record, payload, sink);
  mapState(record, payload, sink, options);
  mapHostConfig(record, payload, sink);

  return record;
}
