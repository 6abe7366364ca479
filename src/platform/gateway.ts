/**
 * ContainerGateway: run / list / info / start / stop / remove / logs / exec /
 * proxy for managed containers.
 *
 * Holds no authoritative state: every descriptor is rebuilt from a fresh
 * runtime inspection, so concurrent mutations are always observed as they are.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../logger.js";
import { ContainerNotFound, ValidationFailed } from "./errors.js";
import { bridge, collectText } from "./log-stream.js";
import { reservePort, type PortReserver } from "./port-allocator.js";
import { type ForwardRequest, type ForwardResult, ProxyDispatcher } from "./proxy.js";
import { awaitReady, type ReadinessOptions, type ReadinessWaiter } from "./readiness.js";
import { describeContainer, managedLabels, upstreamBase } from "./registry-view.js";
import type { ContainerRuntime } from "./runtime.js";
import {
  type ContainerDescriptor,
  DEFAULT_RESTART_POLICY,
  type ExecOptions,
  type ExecResult,
  type ImageSummary,
  type ProxyTarget,
  type RunContainerOptions,
} from "./types.js";
import { parseVolumeSpecs } from "./volumes.js";

export interface GatewayOptions {
  /** Pause between create-and-start and the first inspection. Default 300 ms. */
  settleMs?: number;
  /** Default grace period for `stop`. Default 10 s. */
  stopTimeoutSeconds?: number;
  /** Readiness timeout when `run` asks to wait but gives none. Default 30 s. */
  defaultReadinessTimeoutSeconds?: number;
  readiness?: ReadinessOptions;
  upstreamTimeoutMs?: number;
  followRedirects?: boolean;
  /** Overrides for tests. */
  reservePort?: PortReserver;
  awaitReady?: ReadinessWaiter;
}

export class ContainerGateway {
  private readonly settleMs: number;
  private readonly stopTimeoutSeconds: number;
  private readonly defaultReadinessTimeoutSeconds: number;
  private readonly readinessOptions: ReadinessOptions;
  private readonly reservePort: PortReserver;
  private readonly awaitReady: ReadinessWaiter;
  private readonly dispatcher: ProxyDispatcher;

  constructor(
    private readonly runtime: ContainerRuntime,
    options: GatewayOptions = {},
  ) {
    this.settleMs = options.settleMs ?? 300;
    this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? 10;
    this.defaultReadinessTimeoutSeconds = options.defaultReadinessTimeoutSeconds ?? 30;
    this.readinessOptions = options.readiness ?? {};
    this.reservePort = options.reservePort ?? (() => reservePort());
    this.awaitReady = options.awaitReady ?? awaitReady;
    this.dispatcher = new ProxyDispatcher((id) => this.info(id), {
      timeoutMs: options.upstreamTimeoutMs,
      followRedirects: options.followRedirects,
    });
  }

  async ping(): Promise<void> {
    await this.runtime.ping();
  }

  // ------- run -------
  async run(options: RunContainerOptions): Promise<ContainerDescriptor> {
    const restartPolicy = options.restartPolicy ?? DEFAULT_RESTART_POLICY;
    if (options.autoRemove && restartPolicy !== "no") {
      throw new ValidationFailed(`autoRemove cannot be combined with restart policy "${restartPolicy}"`);
    }

    const hostPort = options.hostPort ? options.hostPort : await this.reservePort();
    const containerId = await this.runtime.createAndStart({
      image: options.image,
      containerPort: options.containerPort,
      hostPort,
      name: options.name,
      env: options.env,
      command: options.command,
      labels: managedLabels(options.containerPort, options.name),
      restartPolicy,
      autoRemove: options.autoRemove,
      volumes: options.volumes ? parseVolumeSpecs(options.volumes) : undefined,
      network: options.network,
    });
    logger.info({ message: "[gateway] Container started", containerId, image: options.image, hostPort });

    if (this.settleMs > 0) {
      await sleep(this.settleMs);
    }

    if (options.waitReady) {
      await this.awaitReady(
        hostPort,
        options.healthPath ?? "/",
        options.waitTimeout ?? this.defaultReadinessTimeoutSeconds,
        this.readinessOptions,
      );
    }

    return this.info(containerId);
  }

  // ------- describe -------
  async info(containerId: string): Promise<ContainerDescriptor> {
    return describeContainer(await this.runtime.inspect(containerId));
  }

  async list(): Promise<ContainerDescriptor[]> {
    const ids = await this.runtime.listManaged();
    const descriptors: ContainerDescriptor[] = [];
    for (const id of ids) {
      try {
        descriptors.push(await this.info(id));
      } catch (err: unknown) {
        // Removed between list and inspect.
        if (!(err instanceof ContainerNotFound)) throw err;
        logger.debug(`[gateway] ${id} vanished while listing`);
      }
    }
    return descriptors;
  }

  // ------- lifecycle -------
  async start(containerId: string): Promise<void> {
    await this.runtime.start(containerId);
  }

  async stop(containerId: string, timeoutSeconds: number = this.stopTimeoutSeconds): Promise<void> {
    await this.runtime.stop(containerId, timeoutSeconds);
  }

  async remove(containerId: string, force = false): Promise<void> {
    await this.runtime.remove(containerId, force);
  }

  // ------- logs -------
  async readLogs(containerId: string, tail?: number): Promise<string> {
    const logs = await this.runtime.streamLogs(containerId, { tail, follow: false });
    return collectText(logs.chunks);
  }

  async followLogs(containerId: string, tail?: number): Promise<ReadableStream<Uint8Array>> {
    const logs = await this.runtime.streamLogs(containerId, { tail, follow: true });
    return bridge(logs.chunks, { onCancel: () => logs.close() });
  }

  // ------- exec -------
  async exec(containerId: string, command: string | string[], options?: ExecOptions): Promise<ExecResult> {
    return this.runtime.exec(containerId, command, options);
  }

  // ------- images -------
  async listImages(): Promise<ImageSummary[]> {
    return this.runtime.listImages();
  }

  async pullImage(image: string): Promise<string> {
    return this.runtime.pullImage(image);
  }

  // ------- proxy -------
  async proxyTarget(containerId: string): Promise<ProxyTarget> {
    const hostPort = await this.dispatcher.resolveHostPort(containerId);
    return { containerId, upstream: upstreamBase(hostPort).replace(/\/$/, "") };
  }

  async forward(request: ForwardRequest): Promise<ForwardResult> {
    return this.dispatcher.forward(request);
  }
}
