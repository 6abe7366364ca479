/**
 * Dockerode wrapper with error handling.
 *
 * Thin layer around the dockerode client that turns Engine API failures into
 * the gateway's typed errors and pulls images on demand for the runtime adapter.
 */

import Docker from "dockerode";
import { errorMessage, logger } from "../logger.js";
import {
  ContainerNotFound,
  GatewayError,
  ImageNotFound,
  NameConflict,
  OperationFailed,
  RuntimeUnavailable,
} from "./errors.js";

let _docker: Docker | undefined;

/** Return a singleton Dockerode client (honours DOCKER_HOST). */
export function getDocker(): Docker {
  if (!_docker) {
    _docker = new Docker();
  }
  return _docker;
}

/** Errors raised when the control channel itself cannot be reached. */
const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ENOENT", "EACCES", "ECONNRESET", "EPIPE", "ETIMEDOUT"]);

interface EngineError extends Error {
  statusCode?: number;
  code?: string;
}

function asEngineError(err: unknown): EngineError | undefined {
  return err instanceof Error ? err : undefined;
}

/** What a failing call was about, used to pick the right error class. */
export interface DockerCallContext {
  containerId?: string;
  image?: string;
  name?: string;
}

/** Map a dockerode failure onto the gateway error taxonomy. */
export function translateDockerError(label: string, err: unknown, context: DockerCallContext = {}): GatewayError {
  if (err instanceof GatewayError) return err;

  const engineErr = asEngineError(err);
  const msg = errorMessage(err);

  if (engineErr?.code && CONNECTION_ERROR_CODES.has(engineErr.code)) {
    return new RuntimeUnavailable(`Container runtime unreachable (${label}): ${msg}`, { cause: err });
  }

  const status = engineErr?.statusCode;
  if (status === 404) {
    if (context.containerId) return new ContainerNotFound(context.containerId, { cause: err });
    if (context.image) return new ImageNotFound(context.image, { cause: err });
  }
  if (status === 409 && context.name) {
    return new NameConflict(context.name, { cause: err });
  }

  const clientError = status !== undefined && status >= 400 && status < 500;
  return new OperationFailed(`${label}: ${msg}`, clientError ? status : 500, { cause: err });
}

/**
 * Wrap a docker API call with error translation.
 */
export async function dockerCall<T>(label: string, fn: () => Promise<T>, context: DockerCallContext = {}): Promise<T> {
  try {
    return await fn();
  } catch (err: unknown) {
    throw translateDockerError(label, err, context);
  }
}

/** True when the engine answered 304 (container already in the requested state). */
export function isNotModified(err: unknown): boolean {
  return asEngineError(err)?.statusCode === 304;
}

/**
 * Pull an image if it is not already present locally.
 * Resolves when the pull stream finishes.
 */
export async function ensureImage(image: string): Promise<void> {
  const docker = getDocker();
  try {
    await docker.getImage(image).inspect();
    return;
  } catch (err: unknown) {
    if (asEngineError(err)?.statusCode !== 404) {
      throw translateDockerError(`inspect image ${image}`, err);
    }
  }

  logger.info(`[docker] Pulling image ${image}`);
  await pullImage(image);
}

/** Registry answers meaning the reference does not resolve to an image. */
const UNRESOLVED_REFERENCE = /manifest unknown|not found|repository does not exist|pull access denied|invalid reference format/i;

/**
 * Errors inside the progress stream carry no status code, only the engine's
 * message. Unresolvable references become ImageNotFound; anything else
 * (disk full, registry unreachable mid-pull) is an operation failure.
 */
export function translatePullError(image: string, err: unknown): GatewayError {
  const msg = errorMessage(err);
  if (UNRESOLVED_REFERENCE.test(msg)) {
    return new ImageNotFound(image, { cause: err });
  }
  return new OperationFailed(`pull ${image}: ${msg}`, 500, { cause: err });
}

/** Pull an image and wait for the progress stream to finish. */
export async function pullImage(image: string): Promise<void> {
  const docker = getDocker();
  const stream = await dockerCall(`pull ${image}`, () => docker.pull(image), { image });
  await new Promise<void>((resolve, reject) => {
    docker.modem.followProgress(stream, (err: Error | null) => {
      if (err) reject(translatePullError(image, err));
      else resolve();
    });
  });
}
