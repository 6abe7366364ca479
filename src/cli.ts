#!/usr/bin/env node

/**
 * dockgate CLI
 */

import { help } from "./commands/help.js";
import { serveCommand } from "./commands/serve.js";
import { errorMessage, logger } from "./logger.js";
import { EXIT_INVALID, EXIT_RUNTIME } from "./types.js";

async function main(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  switch (command) {
    case undefined:
    case "help":
    case "--help":
    case "-h":
      help();
      return;
    case "serve":
      await serveCommand(rest);
      return;
    default:
      console.error(`Unknown command: ${command}`);
      help();
      process.exit(EXIT_INVALID);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  logger.error(`[cli] ${errorMessage(err)}`);
  process.exit(EXIT_RUNTIME);
});
