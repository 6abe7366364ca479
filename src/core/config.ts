/**
 * Configuration management for dockgate
 *
 * Defaults, overridden by $DOCKGATE_HOME/config.json, overridden by
 * environment variables.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errorMessage, logger } from "../logger.js";
import { CONFIG_FILE } from "../paths.js";

export interface GatewayConfig {
  daemon: {
    port: number;
    host: string;
  };
  gateway: {
    /** Host interface container ports are published on. */
    publishHost: string;
    /** Upper bound for one forwarded request, in ms. */
    upstreamTimeoutMs: number;
    followRedirects: boolean;
    /** Pause between create-and-start and the first inspection, in ms. */
    settleMs: number;
    stopTimeoutSeconds: number;
  };
  readiness: {
    pollIntervalMs: number;
    attemptTimeoutMs: number;
    defaultTimeoutSeconds: number;
  };
}

const DEFAULT_CONFIG: GatewayConfig = {
  daemon: {
    port: 8800,
    host: "127.0.0.1",
  },
  gateway: {
    publishHost: "127.0.0.1",
    upstreamTimeoutMs: 60_000,
    followRedirects: true,
    settleMs: 300,
    stopTimeoutSeconds: 10,
  },
  readiness: {
    pollIntervalMs: 500,
    attemptTimeoutMs: 2_000,
    defaultTimeoutSeconds: 30,
  },
};

const positiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    daemon: z
      .object({
        port: z.number().int().min(1).max(65535),
        host: z.string().min(1),
      })
      .partial(),
    gateway: z
      .object({
        publishHost: z.string().min(1),
        upstreamTimeoutMs: positiveInt,
        followRedirects: z.boolean(),
        settleMs: z.number().int().min(0),
        stopTimeoutSeconds: z.number().int().min(0),
      })
      .partial(),
    readiness: z
      .object({
        pollIntervalMs: positiveInt,
        attemptTimeoutMs: positiveInt,
        defaultTimeoutSeconds: positiveInt,
      })
      .partial(),
  })
  .partial();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

function cloneDefaults(): GatewayConfig {
  return {
    daemon: { ...DEFAULT_CONFIG.daemon },
    gateway: { ...DEFAULT_CONFIG.gateway },
    readiness: { ...DEFAULT_CONFIG.readiness },
  };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function parsePort(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const port = parseInt(raw, 10);
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : undefined;
}

export class ConfigManager {
  private config: GatewayConfig = cloneDefaults();

  constructor(private readonly file: string = CONFIG_FILE) {}

  async load(): Promise<GatewayConfig> {
    this.config = cloneDefaults();

    let raw: string | undefined;
    try {
      raw = await readFile(this.file, "utf-8");
    } catch (err: unknown) {
      if (!isErrnoException(err) || err.code !== "ENOENT") {
        logger.error(`[config] Failed to read ${this.file}: ${errorMessage(err)}`);
      }
    }

    if (raw !== undefined) {
      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (err: unknown) {
        logger.error(`[config] ${this.file} is not valid JSON: ${errorMessage(err)}`);
      }
      const parsed = ConfigFileSchema.safeParse(json);
      if (parsed.success) {
        this.apply(parsed.data);
      } else if (json !== undefined) {
        logger.error({ message: `[config] Ignoring invalid ${this.file}`, issues: parsed.error.issues });
      }
    }

    this.applyEnvironmentOverrides();
    return this.get();
  }

  /** Layer overrides on top of the current values. */
  apply(overrides: ConfigOverrides): void {
    this.config = {
      daemon: { ...this.config.daemon, ...overrides.daemon },
      gateway: { ...this.config.gateway, ...overrides.gateway },
      readiness: { ...this.config.readiness, ...overrides.readiness },
    };
  }

  /**
   * Environment variables take precedence over config file values
   */
  private applyEnvironmentOverrides(): void {
    const port = parsePort(process.env.DOCKGATE_PORT);
    if (port !== undefined) {
      this.config.daemon.port = port;
    }
    if (process.env.DOCKGATE_HOST) {
      this.config.daemon.host = process.env.DOCKGATE_HOST;
    }
    if (process.env.DOCKGATE_PUBLISH_HOST) {
      this.config.gateway.publishHost = process.env.DOCKGATE_PUBLISH_HOST;
    }
    const timeout = parseInt(process.env.DOCKGATE_UPSTREAM_TIMEOUT_MS ?? "", 10);
    if (Number.isInteger(timeout) && timeout > 0) {
      this.config.gateway.upstreamTimeoutMs = timeout;
    }
  }

  get(): GatewayConfig {
    return {
      daemon: { ...this.config.daemon },
      gateway: { ...this.config.gateway },
      readiness: { ...this.config.readiness },
    };
  }

  reset(): void {
    this.config = cloneDefaults();
  }
}

// Singleton instance
export const config = new ConfigManager();
