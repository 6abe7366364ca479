/**
 * Ephemeral loopback port reservation.
 *
 * The socket is closed before the port is handed out, so the reservation is
 * advisory: another process may take the port before the container runtime
 * binds it. Callers that need a stronger guarantee retry the whole `run`.
 */

import { createServer } from "node:net";
import { PortAllocationFailed } from "./errors.js";
import { LOOPBACK_HOST } from "./types.js";

export type PortReserver = () => Promise<number>;

/** Bind port 0 on loopback, read back the OS-assigned port, release it. */
export function reservePort(host: string = LOOPBACK_HOST): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const server = createServer();
    server.unref();
    server.once("error", (err: Error) => {
      reject(new PortAllocationFailed(`Could not reserve a port on ${host}: ${err.message}`, { cause: err }));
    });
    server.listen({ port: 0, host, exclusive: true }, () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        server.close();
        reject(new PortAllocationFailed(`Could not read back the port bound on ${host}`));
        return;
      }
      const { port } = address;
      server.close((err) => {
        if (err) {
          reject(new PortAllocationFailed(`Could not release port ${port}: ${err.message}`, { cause: err }));
        } else {
          resolve(port);
        }
      });
    });
  });
}
