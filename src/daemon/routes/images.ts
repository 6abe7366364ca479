/**
 * Image endpoints: list local images, pull by reference.
 */

import { Hono } from "hono";
import type { ContainerGateway } from "../../platform/gateway.js";
import { parseJsonBody, PullImageSchema } from "../validation.js";

export function createImagesRouter(gateway: ContainerGateway): Hono {
  const router = new Hono();

  router.get("/", async (c) => c.json(await gateway.listImages()));

  router.post("/pull", async (c) => {
    const parsed = await parseJsonBody(c, PullImageSchema);
    if (!parsed.ok) return parsed.response;
    return c.json({ id: await gateway.pullImage(parsed.data.image) });
  });

  return router;
}
