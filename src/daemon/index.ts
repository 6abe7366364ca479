/**
 * dockgate daemon - HTTP API server
 *
 * Hono app exposing container lifecycle, image, and reverse-proxy routes over
 * a ContainerGateway backed by the Docker Engine API.
 */

import { type ServerType, serve } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger as requestLogger } from "hono/logger";
import { config as centralConfig, type GatewayConfig } from "../core/config.js";
import { errorMessage, logger } from "../logger.js";
import { GatewayError } from "../platform/errors.js";
import { ContainerGateway } from "../platform/gateway.js";
import { DockerRuntime } from "../platform/runtime.js";
import { createContainersRouter, createHealthRouter, createImagesRouter, createProxyRouter, PROXY_MOUNT } from "./routes/index.js";

export interface DaemonConfig {
  port?: number;
  host?: string;
}

function jsonError(status: number, body: Record<string, unknown>): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function createApp(gateway: ContainerGateway): Hono {
  const app = new Hono();

  // Middleware. Proxied paths get no CORS handling: OPTIONS there belongs to the upstream.
  const corsMiddleware = cors();
  app.use("*", async (c, next) => (c.req.path.startsWith(`${PROXY_MOUNT}/`) ? next() : corsMiddleware(c, next)));
  app.use(
    "*",
    requestLogger((line: string) => logger.info(`[http] ${line}`)),
  );

  app.get("/", (c) =>
    c.json({
      name: "dockgate",
      version: "0.1.0",
      status: "running",
    }),
  );

  app.route("/", createHealthRouter(gateway));
  app.route("/images", createImagesRouter(gateway));
  app.route("/containers", createContainersRouter(gateway));
  app.route(PROXY_MOUNT, createProxyRouter(gateway));

  app.onError((err, c) => {
    if (err instanceof GatewayError) {
      logger.log(err.statusCode >= 500 ? "error" : "warn", `[daemon] ${c.req.method} ${c.req.path} -> ${err.statusCode} ${err.code}: ${err.message}`);
      return jsonError(err.statusCode, { error: err.message, code: err.code });
    }
    if (err instanceof HTTPException) {
      return jsonError(err.status, { error: err.message });
    }
    logger.error(`[daemon] Unhandled route error: ${err.message}`);
    return jsonError(500, { error: "Internal server error" });
  });

  return app;
}

/** Gateway wired to Docker with the loaded configuration. */
export function createGateway(cfg: GatewayConfig): ContainerGateway {
  return new ContainerGateway(new DockerRuntime({ publishHost: cfg.gateway.publishHost }), {
    settleMs: cfg.gateway.settleMs,
    stopTimeoutSeconds: cfg.gateway.stopTimeoutSeconds,
    upstreamTimeoutMs: cfg.gateway.upstreamTimeoutMs,
    followRedirects: cfg.gateway.followRedirects,
    defaultReadinessTimeoutSeconds: cfg.readiness.defaultTimeoutSeconds,
    readiness: {
      pollIntervalMs: cfg.readiness.pollIntervalMs,
      attemptTimeoutMs: cfg.readiness.attemptTimeoutMs,
    },
  });
}

export async function startDaemon(overrides: DaemonConfig = {}): Promise<ServerType> {
  const cfg = await centralConfig.load();
  const port = overrides.port ?? cfg.daemon.port;
  const host = overrides.host ?? cfg.daemon.host;

  const gateway = createGateway(cfg);
  try {
    await gateway.ping();
    logger.info("[daemon] Container runtime reachable");
  } catch (err: unknown) {
    // The daemon still starts; /healthz reports the runtime as unavailable.
    logger.warn(`[daemon] Container runtime not reachable at startup: ${errorMessage(err)}`);
  }

  const app = createApp(gateway);
  return new Promise<ServerType>((resolve) => {
    const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
      logger.info(`[daemon] Listening on http://${host}:${info.port}`);
      resolve(server);
    });
  });
}
