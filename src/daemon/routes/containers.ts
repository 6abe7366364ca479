/**
 * Container lifecycle REST endpoints
 *
 * run, list, get, start, stop, delete, logs, exec.
 */

import { Hono } from "hono";
import { logger } from "../../logger.js";
import type { ContainerGateway } from "../../platform/gateway.js";
import type { ContainerDescriptor } from "../../platform/types.js";
import {
  ExecSchema,
  LogsQuerySchema,
  parseJsonBody,
  parseQuery,
  RemoveQuerySchema,
  RunContainerSchema,
  StopQuerySchema,
  validateContainerRef,
} from "../validation.js";

/** Wire shape of a container; absent values are null. */
export function toContainerJson(d: ContainerDescriptor) {
  return {
    id: d.id,
    name: d.name,
    image: d.image,
    status: d.status,
    labels: d.labels,
    containerPort: d.containerPort,
    hostPort: d.hostPort,
  };
}

export function createContainersRouter(gateway: ContainerGateway): Hono {
  const router = new Hono();

  // GET /containers: managed containers, running or not
  router.get("/", async (c) => {
    const containers = await gateway.list();
    return c.json(containers.map(toContainerJson));
  });

  // POST /containers/run: create, start, optionally wait for readiness
  router.post("/run", async (c) => {
    const parsed = await parseJsonBody(c, RunContainerSchema);
    if (!parsed.ok) return parsed.response;

    const descriptor = await gateway.run(parsed.data);
    logger.info({ message: "[containers] Run", id: descriptor.id, hostPort: descriptor.hostPort });
    return c.json(toContainerJson(descriptor), 201);
  });

  router.get("/:id", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);
    return c.json(toContainerJson(await gateway.info(id)));
  });

  router.post("/:id/start", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);
    await gateway.start(id);
    return c.json({ id, status: "running" });
  });

  router.post("/:id/stop", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);
    const query = parseQuery(c, StopQuerySchema);
    if (!query.ok) return query.response;

    await gateway.stop(id, query.data.timeout);
    return c.json({ id, status: "stopped" });
  });

  router.delete("/:id", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);
    const query = parseQuery(c, RemoveQuerySchema);
    if (!query.ok) return query.response;

    await gateway.remove(id, query.data.force);
    return c.json({ id, removed: true });
  });

  // GET /containers/:id/logs: text, or a live stream with ?follow=true
  router.get("/:id/logs", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);
    const query = parseQuery(c, LogsQuerySchema);
    if (!query.ok) return query.response;

    const { tail, follow } = query.data;
    if (follow) {
      const stream = await gateway.followLogs(id, tail);
      return c.body(stream, 200, {
        "Content-Type": "text/plain; charset=utf-8",
        "Cache-Control": "no-cache",
      });
    }
    return c.text(await gateway.readLogs(id, tail));
  });

  router.post("/:id/exec", async (c) => {
    const id = c.req.param("id");
    validateContainerRef(id);
    const parsed = await parseJsonBody(c, ExecSchema);
    if (!parsed.ok) return parsed.response;

    const { command, ...options } = parsed.data;
    const result = await gateway.exec(id, command, options);
    return c.json({ id, ...result });
  });

  return router;
}
