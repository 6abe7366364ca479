/**
 * Registry view: derives a ContainerDescriptor from a raw inspection record.
 *
 * Pure: the runtime's labels are the only source of truth, nothing is cached.
 * Missing or malformed port data degrades the descriptor instead of throwing.
 */

import type { ContainerDescriptor, ContainerStatus, RawContainerRecord } from "./types.js";
import { CONTAINER_STATUSES, LOOPBACK_HOST, MANAGED_LABEL, NAME_LABEL, PORT_LABEL } from "./types.js";

const DIGITS = /^\d+$/;

/** Parse a decimal TCP port, or null when it is not one. */
export function parsePort(value: string | undefined | null): number | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  if (!DIGITS.test(trimmed)) return null;
  const port = Number(trimmed);
  return port >= 1 && port <= 65535 ? port : null;
}

function normalizeStatus(status: string | undefined): ContainerStatus {
  const match = CONTAINER_STATUSES.find((s) => s === status);
  return match ?? "unknown";
}

/** Labels written on every container the gateway creates. */
export function managedLabels(containerPort: number, name?: string): Record<string, string> {
  const labels: Record<string, string> = {
    [MANAGED_LABEL]: "true",
    [PORT_LABEL]: String(containerPort),
  };
  if (name) {
    labels[NAME_LABEL] = name;
  }
  return labels;
}

export function isManaged(labels: Record<string, string> | null | undefined): boolean {
  return labels?.[MANAGED_LABEL] === "true";
}

/**
 * Host port bound to `<containerPort>/tcp`, taken from the first binding.
 */
export function boundHostPort(record: RawContainerRecord, containerPort: number): number | null {
  const bindings = record.NetworkSettings?.Ports?.[`${containerPort}/tcp`];
  if (!bindings || bindings.length === 0) return null;
  return parsePort(bindings[0]?.HostPort);
}

export function describeContainer(record: RawContainerRecord): ContainerDescriptor {
  const labels = { ...(record.Config?.Labels ?? {}) };
  const containerPort = parsePort(labels[PORT_LABEL]);
  const rawName = record.Name?.replace(/^\//, "");

  return {
    id: record.Id ?? "",
    name: rawName || labels[NAME_LABEL] || null,
    image: record.Config?.Image ?? "",
    status: normalizeStatus(record.State?.Status),
    labels,
    managed: isManaged(labels),
    containerPort,
    hostPort: containerPort === null ? null : boundHostPort(record, containerPort),
  };
}

/** Loopback base URL for a bound host port, with trailing slash. */
export function upstreamBase(hostPort: number): string {
  return `http://${LOOPBACK_HOST}:${hostPort}/`;
}
