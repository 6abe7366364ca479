import { logger } from "../logger.js";
import type { VolumeMount } from "./types.js";

/**
 * Parse bind strings of the form `host:container[:mode]`.
 *
 * Splits from the right so Windows drive letters (`C:/data:/data:ro`) keep
 * their colon. An entry missing either path is skipped and the rest still
 * parse. Mode is case-insensitive; anything but `ro` becomes `rw`.
 */
export function parseVolumeSpecs(specs: readonly string[]): VolumeMount[] {
  const mounts: VolumeMount[] = [];
  for (const spec of specs) {
    const parts = rsplit(spec, ":", 2);
    const [hostPath, containerPath, rawMode] = parts;
    if (parts.length < 2 || !hostPath || !containerPath) {
      logger.warn(`[volumes] Skipping malformed volume spec "${spec}"`);
      continue;
    }
    const mode = (rawMode || "rw").toLowerCase();
    mounts.push({
      hostPath,
      containerPath,
      mode: mode === "ro" ? "ro" : "rw",
    });
  }
  return mounts;
}

/** Render mounts as runtime bind strings. */
export function toBinds(mounts: readonly VolumeMount[]): string[] {
  return mounts.map((m) => `${m.hostPath}:${m.containerPath}:${m.mode}`);
}

function rsplit(value: string, separator: string, maxSplit: number): string[] {
  const parts: string[] = [];
  let rest = value;
  while (parts.length < maxSplit) {
    const idx = rest.lastIndexOf(separator);
    if (idx === -1) break;
    parts.unshift(rest.slice(idx + separator.length));
    rest = rest.slice(0, idx);
  }
  parts.unshift(rest);
  return parts;
}
