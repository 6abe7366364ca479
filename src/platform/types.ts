/**
 * Container gateway types for the platform layer.
 */

/** Label marking a container as managed by this gateway. */
export const MANAGED_LABEL = "dockgate.managed";
/** Label recording the container-internal port the caller asked to expose. */
export const PORT_LABEL = "dockgate.container_port";
/** Label recording the friendly name given at creation. */
export const NAME_LABEL = "dockgate.name";

/** Address every proxied and probed upstream lives on. */
export const LOOPBACK_HOST = "127.0.0.1";

export const CONTAINER_STATUSES = ["created", "running", "paused", "restarting", "exited", "dead"] as const;

export type ContainerStatus = (typeof CONTAINER_STATUSES)[number] | "unknown";

export const RESTART_POLICIES = ["no", "on-failure", "always", "unless-stopped"] as const;

export type RestartPolicy = (typeof RESTART_POLICIES)[number];

/** Applied whenever a run request names no restart policy, over HTTP or in process. */
export const DEFAULT_RESTART_POLICY: RestartPolicy = "unless-stopped";

/** Normalized view of one container, rebuilt from a fresh inspection on every use. */
export interface ContainerDescriptor {
  id: string;
  name: string | null;
  image: string;
  status: ContainerStatus;
  labels: Record<string, string>;
  /** Whether the container carries `dockgate.managed=true`. */
  managed: boolean;
  /** Container-internal service port, recovered from {@link PORT_LABEL}. */
  containerPort: number | null;
  /** Loopback port currently bound to `containerPort`. */
  hostPort: number | null;
}

export interface HostPortBinding {
  HostIp?: string;
  HostPort?: string;
}

/**
 * The subset of a runtime inspection record the registry view reads.
 * Every field may be missing; the runtime reports unpublished ports as `null`.
 */
export interface RawContainerRecord {
  Id?: string;
  Name?: string;
  Config?: {
    Image?: string;
    Labels?: Record<string, string> | null;
    Tty?: boolean;
  } | null;
  State?: {
    Status?: string;
  } | null;
  NetworkSettings?: {
    Ports?: Record<string, HostPortBinding[] | null | undefined> | null;
  } | null;
}

export interface VolumeMount {
  hostPath: string;
  containerPath: string;
  mode: "ro" | "rw";
}

/** Everything the runtime needs to create and start one container. */
export interface CreateContainerSpec {
  image: string;
  containerPort: number;
  hostPort: number;
  name?: string;
  env?: Record<string, string>;
  command?: string | string[];
  labels: Record<string, string>;
  restartPolicy: RestartPolicy;
  autoRemove?: boolean;
  volumes?: VolumeMount[];
  network?: string;
}

/** A log read: its payload bytes, and a way to drop the connection behind them. */
export interface LogStream {
  chunks: AsyncIterable<Uint8Array>;
  /** Release the underlying connection. Safe to call more than once. */
  close(): void;
}

export interface LogOptions {
  /** Number of lines from the end. Absent means all. */
  tail?: number;
  follow: boolean;
}

export interface ExecOptions {
  workdir?: string;
  env?: Record<string, string>;
  tty?: boolean;
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string | null;
}

export interface ImageSummary {
  id: string;
  repoTags: string[];
  size: number;
}

/** Options accepted by the gateway's `run` operation. */
export interface RunContainerOptions {
  image: string;
  containerPort: number;
  /** Absent or 0 lets the allocator pick one. */
  hostPort?: number;
  name?: string;
  env?: Record<string, string>;
  command?: string | string[];
  autoRemove?: boolean;
  restartPolicy?: RestartPolicy;
  /** Bind strings in the form `host:container[:mode]`. */
  volumes?: string[];
  network?: string;
  waitReady?: boolean;
  healthPath?: string;
  waitTimeout?: number;
}

export interface ProxyTarget {
  containerId: string;
  upstream: string;
}
