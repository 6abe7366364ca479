/**
 * `dockgate serve` - run the gateway daemon in the foreground.
 */
import { startDaemon } from "../daemon/index.js";
import { logger } from "../logger.js";
import { EXIT_OK, EXIT_RUNTIME } from "../types.js";

export interface ServeArgs {
  port?: number;
  host?: string;
}

/** Parse `serve` flags; throws on anything it does not understand. */
export function parseServeArgs(args: string[]): ServeArgs {
  const result: ServeArgs = {};
  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    const value = args[i + 1];
    if (flag === "--port") {
      const port = Number(value);
      if (!value || !Number.isInteger(port) || port < 1 || port > 65535) {
        throw new Error(`Invalid --port value: ${value ?? "(missing)"}`);
      }
      result.port = port;
      i++;
    } else if (flag === "--host") {
      if (!value) throw new Error("Missing --host value");
      result.host = value;
      i++;
    } else {
      throw new Error(`Unknown option: ${flag}`);
    }
  }
  return result;
}

export async function serveCommand(args: string[]): Promise<void> {
  const server = await startDaemon(parseServeArgs(args));

  const shutdown = (signal: string) => {
    logger.info(`[daemon] ${signal} received, shutting down`);
    server.close((err?: Error) => {
      if (err) {
        logger.error(`[daemon] Close failed: ${err.message}`);
        process.exit(EXIT_RUNTIME);
      }
      process.exit(EXIT_OK);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
