/**
 * Readiness gate: polls a container's health path on its loopback port until
 * it answers 2xx or a wall-clock deadline passes.
 *
 * Bounded by time, not attempts: a slow upstream gets fewer probes rather than
 * failing early. A probe never outlives the overall deadline.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage, logger } from "../logger.js";
import { ReadinessTimeout } from "./errors.js";
import { LOOPBACK_HOST } from "./types.js";

export interface ReadinessOptions {
  /** Pause between failed probes. Default 500 ms. */
  pollIntervalMs?: number;
  /** Upper bound for a single probe. Default 2 000 ms. */
  attemptTimeoutMs?: number;
}

export interface ReadinessResult {
  url: string;
  attempts: number;
  elapsedMs: number;
}

export type ProbeResult = { ok: true; status: number } | { ok: false; error: string };

export type ReadinessWaiter = (
  hostPort: number,
  healthPath: string,
  timeoutSeconds: number,
  options?: ReadinessOptions,
) => Promise<ReadinessResult>;

const DEFAULT_POLL_INTERVAL_MS = 500;
const DEFAULT_ATTEMPT_TIMEOUT_MS = 2_000;

export function readinessUrl(hostPort: number, healthPath: string): string {
  return `http://${LOOPBACK_HOST}:${hostPort}/${healthPath.replace(/^\/+/, "")}`;
}

/** One GET with no auth and no custom headers; 2xx means ready. */
export async function probe(url: string, timeoutMs: number): Promise<ProbeResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { method: "GET", signal: controller.signal });
    await response.body?.cancel();
    if (response.status >= 200 && response.status < 300) {
      return { ok: true, status: response.status };
    }
    return { ok: false, error: `HTTP ${response.status}` };
  } catch (err: unknown) {
    return { ok: false, error: controller.signal.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err) };
  } finally {
    clearTimeout(timer);
  }
}

export async function awaitReady(
  hostPort: number,
  healthPath: string,
  timeoutSeconds: number,
  options: ReadinessOptions = {},
): Promise<ReadinessResult> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
  const url = readinessUrl(hostPort, healthPath);
  const startedAt = Date.now();
  const deadline = startedAt + timeoutSeconds * 1000;

  let attempts = 0;
  let lastError = "no probe completed";

  while (Date.now() < deadline) {
    attempts++;
    const result = await probe(url, Math.min(attemptTimeoutMs, deadline - Date.now()));
    if (result.ok) {
      const elapsedMs = Date.now() - startedAt;
      logger.info(`[readiness] ${url} ready after ${elapsedMs}ms (${attempts} probe(s))`);
      return { url, attempts, elapsedMs };
    }
    lastError = result.error;
    logger.debug(`[readiness] ${url} not ready: ${lastError}`);

    const remaining = deadline - Date.now();
    if (remaining <= 0) break;
    await sleep(Math.min(pollIntervalMs, remaining));
  }

  logger.warn(`[readiness] ${url} not ready after ${timeoutSeconds}s: ${lastError}`);
  throw new ReadinessTimeout(url, timeoutSeconds, lastError);
}
