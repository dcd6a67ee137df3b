export { loadConfig, type InventoryConfig } from "./config.js";
export { createApp, startDaemon } from "./daemon/index.js";
export {
  DockerContainerLister,
  DockerTransport,
  dockerCall,
  getDocker,
  getModem,
  inspectRequest,
  parseRequestLine,
  setDocker,
  setModem,
} from "./engine/docker-client.js";
export type { IdentifierLister, RequestLine, TransportClient } from "./engine/types.js";
export { collectInventory, resolveHostName, stampHost, type CollectOptions } from "./inventory/collector.js";
export {
  DiagnosticChannel,
  openDiagnosticChannel,
  type DiagnosticEvent,
  type DiagnosticSink,
  type SweepSummary,
} from "./inventory/diagnostics.js";
export { inspectContainer } from "./inventory/inspect.js";
export { deriveState, mapConfig, mapHostConfig, mapState } from "./inventory/mapper.js";
export type { ContainerState, InventoryRecord, MapperOptions } from "./inventory/types.js";
export {
  CollectingContext,
  InventoryProvider,
  type ProviderContext,
  type ProviderResult,
} from "./provider/inventory-provider.js";
