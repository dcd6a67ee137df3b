/**
 * Docker Engine access: dockerode for listing, docker-modem for raw request
 * lines. Engine failures are logged and surface as empty results.
 */

import DockerModem from "docker-modem";
import Docker from "dockerode";
import { DEFAULT_DOCKER_SOCKET } from "../config.js";
import { logger } from "../logger.js";
import type { IdentifierLister, RequestLine, TransportClient } from "./types.js";
import { INSPECT_STATUS_CODES } from "./types.js";

/** The part of docker-modem the transport uses. */
export interface Dialer {
  dial(options: DockerModem.DialOptions, callback: (err: unknown, result: unknown) => void): void;
}

/** The part of dockerode the lister uses. */
export interface ContainerSource {
  listContainers(options: { all: boolean }): Promise<Array<{ Id: string }>>;
}

let _docker: ContainerSource | undefined;
let _modem: Dialer | undefined;

/** Engine socket from DOCKER_SOCKET; the rest of the environment is not consulted. */
export function dockerSocketPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.DOCKER_SOCKET || DEFAULT_DOCKER_SOCKET;
}

/** Return a singleton Dockerode client bound to the configured socket. */
export function getDocker(): ContainerSource {
  if (!_docker) {
    _docker = new Docker({ socketPath: dockerSocketPath() });
  }
  return _docker;
}

/** Replace the singleton, e.g. with a test double. */
export function setDocker(docker: ContainerSource | undefined): void {
  _docker = docker;
}

/** Return a singleton docker-modem bound to the configured socket. */
export function getModem(): Dialer {
  if (!_modem) {
    _modem = new DockerModem({ socketPath: dockerSocketPath() });
  }
  return _modem;
}

export function setModem(modem: Dialer | undefined): void {
  _modem = modem;
}

/**
 * Wrap a docker API call with a human-readable error context.
 */
export async function dockerCall<T>(label: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`[docker] ${label}: ${msg}`);
  }
}

// ---------------------------------------------------------------------------
// Request lines
// ---------------------------------------------------------------------------

const REQUEST_LINE = /^([A-Z]+) (\/\S*) HTTP\/1\.[01]\r?\n?/;

/** Request line for inspecting one container. */
export function inspectRequest(id: string): string {
  return `GET /containers/${id}/json HTTP/1.1\r\n\r\n`;
}

export function parseRequestLine(request: string): RequestLine | null {
  const match = REQUEST_LINE.exec(request);
  if (!match) return null;
  return { method: match[1], path: match[2] };
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export class DockerTransport implements TransportClient {
  constructor(private readonly modem: Dialer = getModem()) {}

  /** Requests are sent one after another; output order matches input order. */
  async getResponse(requests: readonly string[]): Promise<Array<unknown | null>> {
    const responses: Array<unknown | null> = [];
    for (const request of requests) {
      responses.push(await this.send(request));
    }
    return responses;
  }

  private async send(request: string): Promise<unknown | null> {
    const line = parseRequestLine(request);
    if (!line) {
      logger.error("[docker] Malformed request line", { request: JSON.stringify(request) });
      return null;
    }

    try {
      const result = await dockerCall(`${line.method} ${line.path}`, () => this.dial(line));
      return result ?? null;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.warn(msg, { path: line.path });
      return null;
    }
  }

  private dial(line: RequestLine): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      this.modem.dial(
        { path: line.path, method: line.method, options: {}, statusCodes: INSPECT_STATUS_CODES },
        (err, result) => {
          if (err) reject(err instanceof Error ? err : new Error(String(err)));
          else resolve(result);
        },
      );
    });
  }
}

// ---------------------------------------------------------------------------
// Identifier lister
// ---------------------------------------------------------------------------

export class DockerContainerLister implements IdentifierLister {
  constructor(private readonly docker: ContainerSource = getDocker()) {}

  async listContainerIds(all: boolean): Promise<string[]> {
    try {
      const containers = await dockerCall("list containers", () => this.docker.listContainers({ all }));
      return containers.map((c) => c.Id);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(msg);
      return [];
    }
  }
}
