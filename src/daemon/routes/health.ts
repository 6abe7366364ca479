/**
 * Liveness and runtime-reachability probes. Unauthenticated.
 */

import { Hono } from "hono";
import type { ContainerGateway } from "../../platform/gateway.js";

export function createHealthRouter(gateway: ContainerGateway): Hono {
  const router = new Hono();

  router.get("/health", (c) => c.json({ status: "ok" }));

  // Fails with 503 (RuntimeUnavailable) when the container runtime is unreachable.
  router.get("/healthz", async (c) => {
    await gateway.ping();
    return c.json({ ok: true });
  });

  return router;
}
