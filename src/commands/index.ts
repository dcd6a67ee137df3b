/**
 * CLI command dispatch.
 */

import { loadConfig } from "../config.js";
import { startDaemon } from "../daemon/index.js";
import { collectInventory } from "../inventory/collector.js";
import { logger } from "../logger.js";

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;

export function help(): string {
  return `
container-inventory - Docker container inventory collector

Usage:
  container-inventory collect [--pretty]            Print one inventory sweep as JSON
  container-inventory serve [--port N] [--host H]   Serve the inventory over HTTP
  container-inventory help                          Show this help

Environment:
  DOCKER_SOCKET                        Engine socket (default /var/run/docker.sock)
  LOG_LEVEL                            error | warn | info | debug (default info)
  INVENTORY_HOST / INVENTORY_PORT      HTTP bind address (default 127.0.0.1:7440)
  INVENTORY_CAPTURE_STATE_TIMESTAMPS   Copy StartedAt/FinishedAt onto records (default false)
`;
}

/** Value following `--name`, if any. */
export function flagValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : undefined;
}

export async function main(argv: string[]): Promise<number> {
  const [command, ...args] = argv;

  switch (command) {
    case "collect": {
      const config = loadConfig();
      logger.level = config.logLevel;
      const records = await collectInventory({ captureStateTimestamps: config.captureStateTimestamps });
      const pretty = args.includes("--pretty");
      console.log(JSON.stringify(records, null, pretty ? 2 : undefined));
      return EXIT_OK;
    }
    case "serve": {
      const config = loadConfig({
        ...process.env,
        INVENTORY_PORT: flagValue(args, "--port") ?? process.env.INVENTORY_PORT,
        INVENTORY_HOST: flagValue(args, "--host") ?? process.env.INVENTORY_HOST,
      });
      logger.level = config.logLevel;
      const daemon = startDaemon(config);
      const shutdown = () => {
        daemon.close().then(
          () => process.exit(EXIT_OK),
          (err: unknown) => {
            logger.error(`[daemon] Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
            process.exit(EXIT_INVALID);
          },
        );
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
      return EXIT_OK;
    }
    case undefined:
    case "help":
    case "--help":
      console.log(help());
      return EXIT_OK;
    default:
      console.error(`Unknown command: ${command}`);
      console.error(help());
      return EXIT_INVALID;
  }
}
