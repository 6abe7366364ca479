import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import { NoPublishedPort } from "../../src/platform/errors.js";
import { reservePort } from "../../src/platform/port-allocator.js";
import {
  buildUpstreamUrl,
  filterHeaders,
  ProxyDispatcher,
  type ForwardRequest,
  type ProxyOptions,
} from "../../src/platform/proxy.js";
import type { ContainerDescriptor } from "../../src/platform/types.js";

const servers: Server[] = [];

function listen(handler: (req: IncomingMessage, res: ServerResponse) => void): Promise<number> {
  return new Promise((resolve) => {
    const server = createServer(handler);
    servers.push(server);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      resolve(address !== null && typeof address !== "string" ? address.port : 0);
    });
  });
}

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(
    servers.splice(0).map(
      (server) =>
        new Promise<void>((resolve) => {
          server.closeAllConnections();
          server.close(() => resolve());
        }),
    ),
  );
});

function descriptor(hostPort: number | null): ContainerDescriptor {
  return {
    id: "c0ffee",
    name: "web",
    image: "app:latest",
    status: "running",
    labels: { "dockgate.managed": "true", "dockgate.container_port": "8000" },
    managed: true,
    containerPort: 8000,
    hostPort,
  };
}

function dispatcherFor(hostPort: number | null, options: ProxyOptions = {}): ProxyDispatcher {
  return new ProxyDispatcher(async () => descriptor(hostPort), options);
}

function request(overrides: Partial<ForwardRequest> = {}): ForwardRequest {
  return { containerId: "c0ffee", subPath: "", method: "GET", headers: [], ...overrides };
}

/** Answers with what it received. */
function echo(req: IncomingMessage, res: ServerResponse): void {
  const chunks: Buffer[] = [];
  req.on("data", (c: Buffer) => chunks.push(c));
  req.on("end", () => {
    res.writeHead(200, { "Content-Type": "application/json", "X-Upstream": "yes" });
    res.end(
      JSON.stringify({
        method: req.method,
        url: req.url,
        headers: req.headers,
        body: Buffer.concat(chunks).toString("utf-8"),
      }),
    );
  });
}

const decode = (body: Uint8Array) => new TextDecoder().decode(body);

describe("filterHeaders", () => {
  const input: Array<[string, string]> = [
    ["Content-Type", "text/plain"],
    ["Connection", "keep-alive"],
    ["X-Trace", "abc"],
    ["TRANSFER-ENCODING", "chunked"],
    ["Host", "example.test"],
    ["Accept", "*/*"],
  ];

  it("drops hop-by-hop headers in any case and keeps the rest in order", () => {
    expect(filterHeaders(input)).toEqual([
      ["Content-Type", "text/plain"],
      ["X-Trace", "abc"],
      ["Accept", "*/*"],
    ]);
  });

  it("is idempotent", () => {
    expect(filterHeaders(filterHeaders(input))).toEqual(filterHeaders(input));
  });
});

describe("buildUpstreamUrl", () => {
  it("keeps the loopback authority whatever the sub-path", () => {
    expect(buildUpstreamUrl(5000, "status")).toBe("http://127.0.0.1:5000/status");
    expect(buildUpstreamUrl(5000, "//evil.test/x")).toBe("http://127.0.0.1:5000/evil.test/x");
    expect(buildUpstreamUrl(5000, "")).toBe("http://127.0.0.1:5000/");
  });

  it("appends the raw query", () => {
    expect(buildUpstreamUrl(5000, "a/b", "x=1&y=%20")).toBe("http://127.0.0.1:5000/a/b?x=1&y=%20");
  });
});

describe("ProxyDispatcher.forward", () => {
  it("relays status, body and content type", async () => {
    const port = await listen((req, res) => {
      if (req.url === "/status") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ ok: true }));
      } else {
        res.writeHead(404);
        res.end();
      }
    });

    const result = await dispatcherFor(port).forward(request({ subPath: "/status" }));
    expect(result.status).toBe(200);
    expect(decode(result.body)).toBe('{"ok":true}');
    expect(result.contentType).toBe("application/json");
  });

  it("passes method, query and body through", async () => {
    const port = await listen(echo);
    const result = await dispatcherFor(port).forward(
      request({
        subPath: "items/7",
        method: "post",
        query: "x=1&y=two",
        body: new TextEncoder().encode("payload"),
        headers: [["Content-Type", "text/plain"]],
      }),
    );

    const seen = JSON.parse(decode(result.body));
    expect(seen.method).toBe("POST");
    expect(seen.url).toBe("/items/7?x=1&y=two");
    expect(seen.body).toBe("payload");
    expect(seen.headers["content-type"]).toBe("text/plain");
  });

  it("strips hop-by-hop request headers and sets host to the upstream", async () => {
    const port = await listen(echo);
    const result = await dispatcherFor(port).forward(
      request({
        headers: [
          ["Host", "gateway.test"],
          ["Keep-Alive", "timeout=5"],
          ["Proxy-Connection", "keep-alive"],
          ["TE", "trailers"],
          ["X-Trace", "abc"],
        ],
      }),
    );

    const seen = JSON.parse(decode(result.body));
    expect(seen.headers.host).toBe(`127.0.0.1:${port}`);
    expect(seen.headers["x-trace"]).toBe("abc");
    expect(seen.headers["proxy-connection"]).toBeUndefined();
    expect(seen.headers.te).toBeUndefined();
  });

  it("strips hop-by-hop response headers", async () => {
    const port = await listen(echo);
    const result = await dispatcherFor(port).forward(request());

    const names = result.headers.map(([name]) => name.toLowerCase());
    expect(names).toContain("x-upstream");
    expect(names).not.toContain("connection");
    expect(names).not.toContain("keep-alive");
    expect(names).not.toContain("transfer-encoding");
  });

  it("sends no body with GET", async () => {
    const port = await listen(echo);
    const result = await dispatcherFor(port).forward(request({ body: new TextEncoder().encode("ignored") }));
    expect(JSON.parse(decode(result.body)).body).toBe("");
  });

  it("follows redirects by default", async () => {
    const port = await listen((req, res) => {
      if (req.url === "/old") {
        res.writeHead(302, { Location: "/new" });
        res.end();
      } else {
        res.end("arrived");
      }
    });
    const result = await dispatcherFor(port).forward(request({ subPath: "old" }));
    expect(result.status).toBe(200);
    expect(decode(result.body)).toBe("arrived");
  });

  it("hands back the redirect when following is off", async () => {
    const port = await listen((_req, res) => {
      res.writeHead(302, { Location: "/new" });
      res.end();
    });
    const result = await dispatcherFor(port, { followRedirects: false }).forward(request({ subPath: "old" }));
    expect(result.status).toBe(302);
  });

  it("returns 502 when nothing listens on the bound port", async () => {
    const port = await reservePort();
    const result = await dispatcherFor(port).forward(request());

    expect(result.status).toBe(502);
    expect(result.contentType).toBe("application/json");
    const body = JSON.parse(decode(result.body));
    expect(body.error).toBe("Upstream request failed");
    expect(body.detail).toMatch(/^fetch failed/);
  });

  it("returns 502 when the upstream is too slow", async () => {
    const port = await listen((_req, res) => {
      setTimeout(() => res.end("late"), 500);
    });
    const result = await dispatcherFor(port, { timeoutMs: 100 }).forward(request());

    expect(result.status).toBe(502);
    expect(JSON.parse(decode(result.body)).detail).toBe("timed out after 100ms");
  });

  it("fails with NoPublishedPort before any connection when the port is unbound", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch");
    await expect(dispatcherFor(null).forward(request({ subPath: "status" }))).rejects.toBeInstanceOf(NoPublishedPort);
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
