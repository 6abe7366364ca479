import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { ContainerNotFound, NoPublishedPort, PortAllocationFailed, ValidationFailed } from "../../src/platform/errors.js";
import { ContainerGateway } from "../../src/platform/gateway.js";
import type { ReadinessWaiter } from "../../src/platform/readiness.js";
import { FakeRuntime } from "../mocks/fake-runtime.js";

describe("ContainerGateway", () => {
  let runtime: FakeRuntime;
  let awaitReady: Mock<ReadinessWaiter>;
  let gateway: ContainerGateway;

  beforeEach(() => {
    runtime = new FakeRuntime();
    awaitReady = vi.fn<ReadinessWaiter>(async (hostPort, healthPath) => ({
      url: `http://127.0.0.1:${hostPort}/${healthPath}`,
      attempts: 1,
      elapsedMs: 0,
    }));
    gateway = new ContainerGateway(runtime, {
      settleMs: 0,
      reservePort: async () => 41234,
      awaitReady,
    });
  });

  // ── run ─────────────────────────────────────────────────────────
  describe("run", () => {
    it("publishes on the allocated port when none is given", async () => {
      const d = await gateway.run({ image: "nginx:latest", containerPort: 80 });
      expect(d.hostPort).toBe(41234);
      expect(d.containerPort).toBe(80);
      expect(d.status).toBe("running");
      expect(d.managed).toBe(true);
      expect(runtime.created[0]?.labels).toEqual({ "dockgate.managed": "true", "dockgate.container_port": "80" });
    });

    it("uses an explicit host port without allocating", async () => {
      const reservePort = vi.fn(async () => 1);
      const explicit = new ContainerGateway(runtime, { settleMs: 0, reservePort, awaitReady });
      const d = await explicit.run({ image: "nginx:latest", containerPort: 80, hostPort: 9090 });
      expect(d.hostPort).toBe(9090);
      expect(reservePort).not.toHaveBeenCalled();
    });

    it("treats host port 0 as a request to allocate", async () => {
      const d = await gateway.run({ image: "nginx:latest", containerPort: 80, hostPort: 0 });
      expect(d.hostPort).toBe(41234);
    });

    it("does not touch the runtime when allocation fails", async () => {
      const failing = new ContainerGateway(runtime, {
        settleMs: 0,
        reservePort: async () => {
          throw new PortAllocationFailed("no ports left");
        },
      });
      await expect(failing.run({ image: "nginx:latest", containerPort: 80 })).rejects.toBeInstanceOf(
        PortAllocationFailed,
      );
      expect(runtime.createAndStart).not.toHaveBeenCalled();
    });

    it("passes name, env, command and parsed volumes to the runtime", async () => {
      const d = await gateway.run({
        image: "app:1.0",
        containerPort: 3000,
        name: "api",
        env: { MODE: "test" },
        command: ["node", "server.js"],
        volumes: ["/srv/a:/a:ro", "broken"],
        restartPolicy: "unless-stopped",
      });

      expect(d.name).toBe("api");
      expect(runtime.created[0]).toMatchObject({
        image: "app:1.0",
        name: "api",
        env: { MODE: "test" },
        command: ["node", "server.js"],
        restartPolicy: "unless-stopped",
        volumes: [{ hostPath: "/srv/a", containerPath: "/a", mode: "ro" }],
        labels: { "dockgate.managed": "true", "dockgate.container_port": "3000", "dockgate.name": "api" },
      });
    });

    it("applies the default restart policy when none is given", async () => {
      await gateway.run({ image: "nginx:latest", containerPort: 80 });
      expect(runtime.created[0]).toMatchObject({ restartPolicy: "unless-stopped" });
    });

    it("rejects autoRemove when the restart policy falls back to the default", async () => {
      await expect(gateway.run({ image: "nginx:latest", containerPort: 80, autoRemove: true })).rejects.toBeInstanceOf(
        ValidationFailed,
      );
      expect(runtime.createAndStart).not.toHaveBeenCalled();
    });

    it("accepts autoRemove with restart policy no", async () => {
      await gateway.run({ image: "nginx:latest", containerPort: 80, autoRemove: true, restartPolicy: "no" });
      expect(runtime.created[0]).toMatchObject({ autoRemove: true, restartPolicy: "no" });
    });

    it("rejects autoRemove together with a restart policy", async () => {
      await expect(
        gateway.run({ image: "nginx:latest", containerPort: 80, autoRemove: true, restartPolicy: "always" }),
      ).rejects.toBeInstanceOf(ValidationFailed);
      expect(runtime.createAndStart).not.toHaveBeenCalled();
    });

    it("waits for readiness only when asked", async () => {
      await gateway.run({ image: "nginx:latest", containerPort: 80 });
      expect(awaitReady).not.toHaveBeenCalled();

      await gateway.run({ image: "nginx:latest", containerPort: 80, waitReady: true, healthPath: "/health", waitTimeout: 5 });
      expect(awaitReady).toHaveBeenCalledWith(41234, "/health", 5, {});
    });

    it("defaults the health path and timeout", async () => {
      const configured = new ContainerGateway(runtime, {
        settleMs: 0,
        reservePort: async () => 5000,
        awaitReady,
        defaultReadinessTimeoutSeconds: 12,
        readiness: { pollIntervalMs: 50 },
      });
      await configured.run({ image: "nginx:latest", containerPort: 80, waitReady: true });
      expect(awaitReady).toHaveBeenCalledWith(5000, "/", 12, { pollIntervalMs: 50 });
    });
  });

  // ── list / info ─────────────────────────────────────────────────
  describe("list", () => {
    it("returns managed containers only", async () => {
      await gateway.run({ image: "nginx:latest", containerPort: 80 });
      runtime.add({ Id: "foreign", Config: { Image: "redis", Labels: {} }, State: { Status: "running" } });

      const all = await gateway.list();
      expect(all.map((d) => d.id)).toEqual(["container1"]);
    });

    it("skips containers removed between listing and inspection", async () => {
      await gateway.run({ image: "nginx:latest", containerPort: 80 });
      runtime.vanished = ["gone"];
      expect((await gateway.list()).map((d) => d.id)).toEqual(["container1"]);
    });

    it("reflects mutations made outside the gateway", async () => {
      const { id } = await gateway.run({ image: "nginx:latest", containerPort: 80 });
      await runtime.stop(id, 0);
      expect((await gateway.info(id)).status).toBe("exited");
    });
  });

  // ── lifecycle ───────────────────────────────────────────────────
  describe("lifecycle", () => {
    it("stops with the configured grace period by default", async () => {
      const { id } = await gateway.run({ image: "nginx:latest", containerPort: 80 });
      await gateway.stop(id);
      expect(runtime.stop).toHaveBeenCalledWith(id, 10);
      await gateway.stop(id, 2);
      expect(runtime.stop).toHaveBeenLastCalledWith(id, 2);
    });

    it("propagates ContainerNotFound", async () => {
      await expect(gateway.info("missing")).rejects.toBeInstanceOf(ContainerNotFound);
      await expect(gateway.remove("missing")).rejects.toBeInstanceOf(ContainerNotFound);
    });
  });

  // ── logs ────────────────────────────────────────────────────────
  describe("logs", () => {
    it("reads logs as text", async () => {
      const { id } = await gateway.run({ image: "nginx:latest", containerPort: 80 });
      runtime.logLines = ["first\n", "second\n"];
      expect(await gateway.readLogs(id)).toBe("first\nsecond\n");
    });

    it("follows logs as a stream", async () => {
      const { id } = await gateway.run({ image: "nginx:latest", containerPort: 80 });
      runtime.logLines = ["a", "b"];
      const text = await new Response(await gateway.followLogs(id)).text();
      expect(text).toBe("ab");
    });
  });

  describe("followLogs cancellation", () => {
    it("closes the log connection when the reader goes away mid-wait", async () => {
      const { id } = await gateway.run({ image: "nginx:latest", containerPort: 80 });
      runtime.logLines = ["booted\n"];
      runtime.holdLogsOpen = true;

      const reader = (await gateway.followLogs(id)).getReader();
      const first = await reader.read();
      expect(new TextDecoder().decode(first.value)).toBe("booted\n");

      const pending = reader.read();
      await reader.cancel("client disconnected");

      expect(runtime.closeLogs).toHaveBeenCalledOnce();
      expect(runtime.logSources[0]?.destroyed).toBe(true);
      expect(await pending).toEqual({ done: true, value: undefined });
    });
  });

  // ── proxy ───────────────────────────────────────────────────────
  describe("proxyTarget", () => {
    it("names the loopback upstream", async () => {
      const { id } = await gateway.run({ image: "nginx:latest", containerPort: 80 });
      expect(await gateway.proxyTarget(id)).toEqual({ containerId: id, upstream: "http://127.0.0.1:41234" });
    });

    it("fails with NoPublishedPort for a container without a port label", async () => {
      runtime.add({ Id: "bare", Config: { Image: "x", Labels: { "dockgate.managed": "true" } }, State: { Status: "running" } });
      await expect(gateway.proxyTarget("bare")).rejects.toBeInstanceOf(NoPublishedPort);
    });
  });
});
