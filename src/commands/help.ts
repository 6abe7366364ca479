export function help(): void {
  console.log(`
dockgate - run containers on loopback ports and proxy HTTP traffic to them

Usage:
  dockgate serve [--port <n>] [--host <addr>]   Start the gateway daemon
  dockgate help                                 Show this help

Environment:
  DOCKGATE_HOME           Directory holding config.json (default ~/.dockgate)
  DOCKGATE_PORT           Daemon port (default 8800)
  DOCKGATE_HOST           Daemon bind address (default 127.0.0.1)
  DOCKGATE_PUBLISH_HOST   Host address container ports are published on
  LOG_LEVEL               debug | info | warn | error
`);
}
