/**
 * Request schemas for daemon HTTP routes
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import { DEFAULT_RESTART_POLICY, RESTART_POLICIES } from "../platform/types.js";

/**
 * Give an image reference the `latest` tag when it names neither a tag nor a
 * digest. Only the last path segment is checked, so a registry port
 * (`registry:5000/app`) is not mistaken for a tag.
 */
export function withDefaultTag(image: string): string {
  if (image.includes("@")) return image;
  const lastSegment = image.slice(image.lastIndexOf("/") + 1);
  return lastSegment.includes(":") ? image : `${image}:latest`;
}

const port = z.number().int().min(1).max(65535);

const imageRef = z
  .string()
  .trim()
  .min(1, "Image is required")
  .regex(/^[^\s]+$/, "Image reference must not contain whitespace");

const envMap = z.record(z.string(), z.string());

const command = z.union([z.string().min(1), z.array(z.string()).min(1)]);

export const RunContainerSchema = z
  .object({
    image: imageRef.transform(withDefaultTag),
    containerPort: port,
    hostPort: z.union([port, z.literal(0)]).optional(),
    name: z
      .string()
      .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, "Name must be alphanumeric with _ . - and not start with a symbol")
      .optional(),
    env: envMap.optional(),
    command: command.optional(),
    autoRemove: z.boolean().default(false),
    restartPolicy: z.enum(RESTART_POLICIES).default(DEFAULT_RESTART_POLICY),
    volumes: z.array(z.string()).optional(),
    network: z.string().min(1).optional(),
    waitReady: z.boolean().default(false),
    healthPath: z.string().optional(),
    waitTimeout: z.number().int().min(1).max(3600).default(30),
  })
  .refine((v) => !(v.autoRemove && v.restartPolicy !== "no"), {
    message: 'autoRemove requires restartPolicy "no"',
    path: ["restartPolicy"],
  });

export const PullImageSchema = z.object({
  image: imageRef.transform(withDefaultTag),
});

export const ExecSchema = z.object({
  command,
  workdir: z.string().min(1).optional(),
  env: envMap.optional(),
  tty: z.boolean().default(false),
});

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((v) => v === "true" || v === "1");

export const StopQuerySchema = z.object({
  timeout: z.coerce.number().int().min(0).max(3600).optional(),
});

export const RemoveQuerySchema = z.object({
  force: booleanFlag,
});

export const LogsQuerySchema = z.object({
  tail: z.coerce.number().int().min(0).optional(),
  follow: booleanFlag,
});

export type Parsed<T> = { ok: true; data: T } | { ok: false; response: Response };

/** Read and validate a JSON request body, or produce the 400 response to return. */
export async function parseJsonBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<Parsed<z.output<S>>> {
  const body: unknown = await c.req.json().catch(() => null);
  if (body === null || typeof body !== "object") {
    return { ok: false, response: c.json({ error: "Invalid JSON body" }, 400) };
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    return { ok: false, response: c.json({ error: "Validation failed", details: parsed.error.issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}

/** Validate query parameters, or produce the 400 response to return. */
export function parseQuery<S extends z.ZodTypeAny>(c: Context, schema: S): Parsed<z.output<S>> {
  const parsed = schema.safeParse(c.req.query());
  if (!parsed.success) {
    return { ok: false, response: c.json({ error: "Invalid query parameters", details: parsed.error.issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}

const CONTAINER_REF = /^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/;

/** Container ids and names as they may appear in a URL segment. */
export function validateContainerRef(ref: string): void {
  if (!CONTAINER_REF.test(ref)) {
    throw new HTTPException(400, { message: "Invalid container id" });
  }
}
