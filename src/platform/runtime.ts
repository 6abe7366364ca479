/**
 * Runtime adapter: the container runtime's control operations as the
 * gateway sees them, implemented over the Docker Engine API.
 */

import { Readable } from "node:stream";
import type Docker from "dockerode";
import { errorMessage, logger } from "../logger.js";
import { dockerCall, ensureImage, getDocker, isNotModified, pullImage, translateDockerError } from "./docker-client.js";
import { demuxFrames, logPayloads, once } from "./log-stream.js";
import type {
  CreateContainerSpec,
  ExecOptions,
  ExecResult,
  ImageSummary,
  LogOptions,
  LogStream,
  RawContainerRecord,
} from "./types.js";
import { LOOPBACK_HOST, MANAGED_LABEL } from "./types.js";
import { toBinds } from "./volumes.js";

export interface ContainerRuntime {
  /** Resolves when the control channel answers. */
  ping(): Promise<void>;
  /** Create and start a container, returning its id. */
  createAndStart(spec: CreateContainerSpec): Promise<string>;
  inspect(containerId: string): Promise<RawContainerRecord>;
  start(containerId: string): Promise<void>;
  stop(containerId: string, timeoutSeconds: number): Promise<void>;
  remove(containerId: string, force: boolean): Promise<void>;
  /** Ids of every container carrying the managed marker, running or not. */
  listManaged(): Promise<string[]>;
  /**
   * Log payload bytes. Finite unless `follow` is set; not restartable.
   */
  streamLogs(containerId: string, options: LogOptions): Promise<LogStream>;
  exec(containerId: string, command: string | string[], options?: ExecOptions): Promise<ExecResult>;
  listImages(): Promise<ImageSummary[]>;
  /** Pull an image and return its id. */
  pullImage(image: string): Promise<string>;
}

/**
 * Split a command string into argv, honouring single and double quotes and
 * backslash escapes outside single quotes.
 */
export function splitCommand(command: string): string[] {
  const args: string[] = [];
  let current = "";
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < command.length; i++) {
    const ch = command[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < command.length) {
        current += command[++i];
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === "\\" && i + 1 < command.length) {
      current += command[++i];
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        args.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }
  if (inToken) args.push(current);
  return args;
}

function toArgv(command: string | string[]): string[] {
  return typeof command === "string" ? splitCommand(command) : command;
}

function toEnvList(env: Record<string, string> | undefined): string[] {
  return Object.entries(env ?? {}).map(([k, v]) => `${k}=${v}`);
}

function shortImageId(id: string): string {
  return id.replace(/^sha256:/, "").slice(0, 12);
}

export interface DockerRuntimeOptions {
  /** Host interface published ports bind to. */
  publishHost?: string;
}

export class DockerRuntime implements ContainerRuntime {
  private readonly publishHost: string;

  constructor(options: DockerRuntimeOptions = {}) {
    this.publishHost = options.publishHost ?? LOOPBACK_HOST;
  }

  private docker(): Docker {
    return getDocker();
  }

  async ping(): Promise<void> {
    await dockerCall("ping", () => this.docker().ping());
  }

  // ------- create + start -------
  async createAndStart(spec: CreateContainerSpec): Promise<string> {
    const docker = this.docker();
    await ensureImage(spec.image);

    const portKey = `${spec.containerPort}/tcp`;
    const options: Docker.ContainerCreateOptions = {
      name: spec.name,
      Image: spec.image,
      Env: toEnvList(spec.env),
      Labels: spec.labels,
      ExposedPorts: { [portKey]: {} },
      HostConfig: {
        PortBindings: {
          [portKey]: [{ HostIp: this.publishHost, HostPort: String(spec.hostPort) }],
        },
        AutoRemove: spec.autoRemove ?? false,
        RestartPolicy: { Name: spec.restartPolicy },
        ...(spec.volumes && spec.volumes.length > 0 ? { Binds: toBinds(spec.volumes) } : {}),
        ...(spec.network ? { NetworkMode: spec.network } : {}),
      },
    };
    if (spec.command !== undefined) {
      options.Cmd = toArgv(spec.command);
    }

    const container = await dockerCall("create container", () => docker.createContainer(options), {
      image: spec.image,
      name: spec.name,
    });
    logger.info(`[docker] Created container ${spec.name ?? container.id.slice(0, 12)} for ${spec.image}`);

    try {
      await dockerCall(`start ${container.id.slice(0, 12)}`, () => container.start(), { containerId: container.id });
    } catch (err: unknown) {
      // Do not leave a created-but-never-started container behind.
      await container.remove({ force: true }).catch((removeErr: unknown) => {
        logger.warn(`[docker] Cleanup of ${container.id.slice(0, 12)} failed: ${errorMessage(removeErr)}`);
      });
      throw err;
    }

    logger.info(`[docker] Started ${container.id.slice(0, 12)} (${portKey} -> ${this.publishHost}:${spec.hostPort})`);
    return container.id;
  }

  // ------- inspect -------
  async inspect(containerId: string): Promise<RawContainerRecord> {
    const container = this.docker().getContainer(containerId);
    return dockerCall(`inspect ${containerId}`, () => container.inspect(), { containerId });
  }

  // ------- start / stop / remove -------
  async start(containerId: string): Promise<void> {
    const container = this.docker().getContainer(containerId);
    try {
      await container.start();
    } catch (err: unknown) {
      if (!isNotModified(err)) throw translateDockerError(`start ${containerId}`, err, { containerId });
    }
    logger.info(`[docker] Started ${containerId}`);
  }

  async stop(containerId: string, timeoutSeconds: number): Promise<void> {
    const container = this.docker().getContainer(containerId);
    try {
      await container.stop({ t: timeoutSeconds });
    } catch (err: unknown) {
      if (!isNotModified(err)) throw translateDockerError(`stop ${containerId}`, err, { containerId });
    }
    logger.info(`[docker] Stopped ${containerId}`);
  }

  async remove(containerId: string, force: boolean): Promise<void> {
    const container = this.docker().getContainer(containerId);
    await dockerCall(`remove ${containerId}`, () => container.remove({ force }), { containerId });
    logger.info(`[docker] Removed ${containerId}${force ? " (forced)" : ""}`);
  }

  // ------- list -------
  async listManaged(): Promise<string[]> {
    const containers = await dockerCall("list containers", () =>
      this.docker().listContainers({
        all: true,
        filters: { label: [`${MANAGED_LABEL}=true`] },
      }),
    );
    return containers.map((c) => c.Id);
  }

  // ------- logs -------
  async streamLogs(containerId: string, options: LogOptions): Promise<LogStream> {
    const info = await this.inspect(containerId);
    const tty = info.Config?.Tty ?? false;
    const container = this.docker().getContainer(containerId);
    const base = { stdout: true, stderr: true, ...(options.tail !== undefined ? { tail: options.tail } : {}) };

    if (options.follow) {
      const stream = await dockerCall(`logs ${containerId}`, () => container.logs({ ...base, follow: true }), {
        containerId,
      });
      return {
        chunks: logPayloads(stream, tty),
        close: () => {
          // Destroying the response closes the Engine connection and ends the pending read.
          if (stream instanceof Readable && !stream.destroyed) stream.destroy();
        },
      };
    }

    const output = await dockerCall(`logs ${containerId}`, () => container.logs({ ...base, follow: false }), {
      containerId,
    });
    return { chunks: logPayloads(once(output), tty), close: () => {} };
  }

  // ------- exec -------
  async exec(containerId: string, command: string | string[], options: ExecOptions = {}): Promise<ExecResult> {
    const container = this.docker().getContainer(containerId);
    const tty = options.tty ?? false;
    const exec = await dockerCall(
      `exec in ${containerId}`,
      () =>
        container.exec({
          Cmd: toArgv(command),
          AttachStdout: true,
          AttachStderr: true,
          Tty: tty,
          ...(options.workdir ? { WorkingDir: options.workdir } : {}),
          ...(options.env ? { Env: toEnvList(options.env) } : {}),
        }),
      { containerId },
    );

    const stream = await dockerCall(`exec start in ${containerId}`, () => exec.start({ hijack: true, stdin: false }), {
      containerId,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    if (tty) {
      for await (const chunk of logPayloads(stream, true)) {
        stdout.push(Buffer.from(chunk));
      }
    } else {
      for await (const frame of demuxFrames(stream)) {
        (frame.stream === "stderr" ? stderr : stdout).push(frame.payload);
      }
    }

    const result = await dockerCall(`exec inspect in ${containerId}`, () => exec.inspect(), { containerId });
    return {
      exitCode: result.ExitCode ?? 0,
      stdout: Buffer.concat(stdout).toString("utf-8"),
      stderr: stderr.length > 0 ? Buffer.concat(stderr).toString("utf-8") : null,
    };
  }

  // ------- images -------
  async listImages(): Promise<ImageSummary[]> {
    const images = await dockerCall("list images", () => this.docker().listImages());
    return images.map((img) => ({
      id: shortImageId(img.Id),
      repoTags: (img.RepoTags ?? []).filter((tag) => tag !== "<none>:<none>"),
      size: img.Size ?? 0,
    }));
  }

  async pullImage(image: string): Promise<string> {
    logger.info(`[docker] Pulling image ${image}`);
    await pullImage(image);
    const info = await dockerCall(`inspect image ${image}`, () => this.docker().getImage(image).inspect(), { image });
    return info.Id;
  }
}
