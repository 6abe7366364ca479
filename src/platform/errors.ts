/**
 * Gateway error taxonomy.
 *
 * Each failure category carries the HTTP status class it surfaces as, so a
 * caller can tell bad input from an unready container from broken infrastructure.
 */

export type GatewayErrorCode =
  | "PORT_ALLOCATION_FAILED"
  | "RUNTIME_UNAVAILABLE"
  | "CONTAINER_NOT_FOUND"
  | "NAME_CONFLICT"
  | "IMAGE_NOT_FOUND"
  | "NO_PUBLISHED_PORT"
  | "READINESS_TIMEOUT"
  | "UPSTREAM_FORWARD_FAILED"
  | "VALIDATION_FAILED"
  | "OPERATION_FAILED";

/** Typed error with an associated HTTP status code. */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: GatewayErrorCode,
    public readonly statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "GatewayError";
  }
}

export class PortAllocationFailed extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PORT_ALLOCATION_FAILED", 500, options);
    this.name = "PortAllocationFailed";
  }
}

export class RuntimeUnavailable extends GatewayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "RUNTIME_UNAVAILABLE", 503, options);
    this.name = "RuntimeUnavailable";
  }
}

export class ContainerNotFound extends GatewayError {
  constructor(
    public readonly containerId: string,
    options?: { cause?: unknown },
  ) {
    super(`No such container: ${containerId}`, "CONTAINER_NOT_FOUND", 404, options);
    this.name = "ContainerNotFound";
  }
}

export class NameConflict extends GatewayError {
  constructor(
    public readonly containerName: string,
    options?: { cause?: unknown },
  ) {
    super(`Container name "${containerName}" is already in use`, "NAME_CONFLICT", 409, options);
    this.name = "NameConflict";
  }
}

export class ImageNotFound extends GatewayError {
  constructor(
    public readonly image: string,
    options?: { cause?: unknown },
  ) {
    super(`Image not found: ${image}`, "IMAGE_NOT_FOUND", 400, options);
    this.name = "ImageNotFound";
  }
}

export class NoPublishedPort extends GatewayError {
  constructor(public readonly containerId: string) {
    super("Container has no published port", "NO_PUBLISHED_PORT", 400);
    this.name = "NoPublishedPort";
  }
}

export class ReadinessTimeout extends GatewayError {
  constructor(
    public readonly url: string,
    public readonly timeoutSeconds: number,
    public readonly lastError: string,
  ) {
    super(`${url} not ready after ${timeoutSeconds}s (last result: ${lastError})`, "READINESS_TIMEOUT", 504);
    this.name = "ReadinessTimeout";
  }
}

export class UpstreamForwardFailed extends GatewayError {
  constructor(
    public readonly upstream: string,
    public readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Upstream request to ${upstream} failed: ${detail}`, "UPSTREAM_FORWARD_FAILED", 502, options);
    this.name = "UpstreamForwardFailed";
  }
}

export class ValidationFailed extends GatewayError {
  constructor(message: string) {
    super(message, "VALIDATION_FAILED", 400);
    this.name = "ValidationFailed";
  }
}

export class OperationFailed extends GatewayError {
  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, "OPERATION_FAILED", statusCode, options);
    this.name = "OperationFailed";
  }
}
