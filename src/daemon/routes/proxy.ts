/**
 * Reverse proxy endpoints
 *
 * GET /proxy/:id     : upstream the container is reachable on
 * ANY /proxy/:id/*   : forward the request to the container verbatim
 *
 * Other methods on the bare /proxy/:id answer 405; they are never forwarded.
 */

import { Hono } from "hono";
import type { ContainerGateway } from "../../platform/gateway.js";
import { PROXY_METHODS } from "../../platform/proxy.js";
import { validateContainerRef } from "../validation.js";

export const PROXY_MOUNT = "/proxy";

/** Statuses whose responses must not carry a body. */
const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304]);

/**
 * Raw (still percent-encoded) path below `/proxy/:id/`.
 */
export function proxySubPath(pathname: string, containerId: string): string {
  const prefix = `${PROXY_MOUNT}/${containerId}/`;
  return pathname.startsWith(prefix) ? pathname.slice(prefix.length) : "";
}

export function createProxyRouter(gateway: ContainerGateway): Hono {
  const router = new Hono();

  router.get("/:id", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);
    return c.json(await gateway.proxyTarget(id));
  });

  // Hono's "/:id/*" also matches "/:id"; claim it first so nothing reaches the upstream root.
  router.on(
    PROXY_METHODS.filter((m) => m !== "GET"),
    "/:id",
    (c) => c.json({ error: "Method not allowed" }, 405, { Allow: "GET" }),
  );

  router.on([...PROXY_METHODS], "/:id/*", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);

    const url = new URL(c.req.url);
    const method = c.req.method.toUpperCase();
    const body = method === "GET" ? null : new Uint8Array(await c.req.arrayBuffer());

    const result = await gateway.forward({
      containerId: id,
      subPath: proxySubPath(url.pathname, id),
      method,
      query: url.search.slice(1),
      body,
      headers: c.req.raw.headers,
    });

    return new Response(NULL_BODY_STATUSES.has(result.status) ? null : result.body, {
      status: result.status,
      headers: result.headers,
    });
  });

  return router;
}
