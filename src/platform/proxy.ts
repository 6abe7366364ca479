/**
 * Reverse proxy dispatcher: forwards one inbound request to the loopback
 * port currently bound to a container's declared service port.
 *
 * The target is resolved from a fresh inspection on every call and each call
 * opens its own upstream request. Transport failures never escape: they come
 * back as a well-formed 502 result.
 */

import { errorMessage, logger } from "../logger.js";
import type { ContainerDescriptor } from "./types.js";
import { NoPublishedPort, UpstreamForwardFailed } from "./errors.js";
import { upstreamBase } from "./registry-view.js";

/** Headers meaningful to a single transport leg only. Matched case-insensitively. */
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  "connection",
  "proxy-connection",
  "keep-alive",
  "transfer-encoding",
  "te",
  "trailer",
  "upgrade",
  "host",
]);

/** Request headers the fetch transport refuses to relay. */
const TRANSPORT_REQUEST_HEADERS: ReadonlySet<string> = new Set(["expect"]);

/**
 * Response headers describing the upstream wire body; fetch has already
 * decoded it, so they no longer hold for the bytes passed on.
 */
const DECODED_BODY_HEADERS: ReadonlySet<string> = new Set(["content-encoding", "content-length"]);

export const PROXY_METHODS = ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"] as const;

export type HeaderPairs = Iterable<[string, string]>;

export interface ForwardRequest {
  containerId: string;
  /** Path below the container root, taken literally. */
  subPath: string;
  method: string;
  /** Raw query string, without the leading `?`. */
  query?: string;
  body?: Uint8Array | null;
  headers: HeaderPairs;
}

export interface ForwardResult {
  status: number;
  headers: Array<[string, string]>;
  body: Uint8Array;
  contentType: string | null;
}

export type DescriptorResolver = (containerId: string) => Promise<ContainerDescriptor>;

export interface ProxyOptions {
  /** Upper bound for the whole upstream exchange. Default 60 s. */
  timeoutMs?: number;
  followRedirects?: boolean;
}

/** Drop hop-by-hop headers; every other header keeps its name and value. */
export function filterHeaders(headers: HeaderPairs, excluded: ReadonlySet<string> = HOP_BY_HOP_HEADERS): Array<[string, string]> {
  const kept: Array<[string, string]> = [];
  for (const [name, value] of headers) {
    if (!excluded.has(name.toLowerCase())) {
      kept.push([name, value]);
    }
  }
  return kept;
}

/** Join the loopback base with a sub-path; leading slashes cannot change the authority. */
export function buildUpstreamUrl(hostPort: number, subPath: string, query?: string): string {
  const path = subPath.replace(/^\/+/, "");
  return `${upstreamBase(hostPort)}${path}${query ? `?${query}` : ""}`;
}

const encoder = new TextEncoder();

/** The 502 result handed back in place of an upstream response. */
export function upstreamFailureResult(err: UpstreamForwardFailed): ForwardResult {
  return {
    status: err.statusCode,
    headers: [["content-type", "application/json"]],
    body: encoder.encode(JSON.stringify({ error: "Upstream request failed", detail: err.detail })),
    contentType: "application/json",
  };
}

export class ProxyDispatcher {
  private readonly timeoutMs: number;
  private readonly followRedirects: boolean;

  constructor(
    private readonly resolve: DescriptorResolver,
    options: ProxyOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.followRedirects = options.followRedirects ?? true;
  }

  /** Loopback port to forward to, or NoPublishedPort. */
  async resolveHostPort(containerId: string): Promise<number> {
    const descriptor = await this.resolve(containerId);
    if (descriptor.hostPort === null) {
      throw new NoPublishedPort(containerId);
    }
    return descriptor.hostPort;
  }

  async forward(request: ForwardRequest): Promise<ForwardResult> {
    const hostPort = await this.resolveHostPort(request.containerId);
    const url = buildUpstreamUrl(hostPort, request.subPath, request.query);
    const method = request.method.toUpperCase();
    const headers = filterHeaders(filterHeaders(request.headers), TRANSPORT_REQUEST_HEADERS);
    const body = method === "GET" || !request.body || request.body.byteLength === 0 ? undefined : request.body;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        method,
        headers,
        body,
        redirect: this.followRedirects ? "follow" : "manual",
        signal: controller.signal,
      });
      const payload = new Uint8Array(await response.arrayBuffer());
      const responseHeaders = filterHeaders(filterHeaders(response.headers), DECODED_BODY_HEADERS);

      logger.debug(`[proxy] ${method} ${url} -> ${response.status}`);
      return {
        status: response.status,
        headers: responseHeaders,
        body: payload,
        contentType: response.headers.get("content-type"),
      };
    } catch (err: unknown) {
      const detail = controller.signal.aborted ? `timed out after ${this.timeoutMs}ms` : describeFetchError(err);
      const failure = new UpstreamForwardFailed(url, detail, { cause: err });
      logger.warn(`[proxy] ${method} ${url} failed: ${detail}`);
      return upstreamFailureResult(failure);
    } finally {
      clearTimeout(timer);
    }
  }
}

/** fetch wraps socket errors as "fetch failed"; surface the underlying cause. */
function describeFetchError(err: unknown): string {
  const message = errorMessage(err);
  if (err instanceof Error && err.cause !== undefined) {
    return `${message}: ${errorMessage(err.cause)}`;
  }
  return message;
}
