/**
 * Engine-facing boundaries used by the inventory pipeline.
 */

/** Sends raw request lines to the engine, one parsed payload (or null) back per line. */
export interface TransportClient {
  getResponse(requests: readonly string[]): Promise<Array<unknown | null>>;
}

/** Lists container ids in engine order. */
export interface IdentifierLister {
  listContainerIds(all: boolean): Promise<string[]>;
}

/** A parsed `<METHOD> <PATH> HTTP/1.1` request line. */
export interface RequestLine {
  method: string;
  path: string;
}

/** Engine API status codes; `true` marks success, a string is the failure message. */
export const INSPECT_STATUS_CODES: Record<number, true | string> = {
  200: true,
  404: "no such container",
  500: "server error",
};
