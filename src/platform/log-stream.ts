/**
 * Log stream bridging.
 *
 * The runtime hands out logs as a pull-style async sequence; HTTP responses
 * consume a push-style ReadableStream. `bridge` pulls exactly one chunk per
 * consumer read, so at most one chunk is in flight and order is preserved.
 */

import { errorMessage, logger } from "../logger.js";

export type StreamKind = "stdin" | "stdout" | "stderr";

export interface LogFrame {
  stream: StreamKind;
  payload: Buffer;
}

const STREAM_KINDS: Record<number, StreamKind> = { 0: "stdin", 1: "stdout", 2: "stderr" };

/** Size of the header preceding every frame of a non-TTY attach/log stream. */
const FRAME_HEADER_BYTES = 8;

function toBuffer(chunk: Uint8Array | string): Buffer {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/**
 * Split a multiplexed stream into frames: 1 byte stream id, 3 bytes padding,
 * 4 bytes big-endian payload length, then the payload. Frames may straddle
 * chunk boundaries. A truncated trailing frame is emitted as raw stdout.
 */
export async function* demuxFrames(source: AsyncIterable<Uint8Array | string>): AsyncGenerator<LogFrame> {
  let pending: Buffer = Buffer.alloc(0);
  for await (const chunk of source) {
    const buf = toBuffer(chunk);
    pending = pending.length === 0 ? buf : Buffer.concat([pending, buf]);

    while (pending.length >= FRAME_HEADER_BYTES) {
      const size = pending.readUInt32BE(4);
      if (pending.length < FRAME_HEADER_BYTES + size) break;
      yield {
        stream: STREAM_KINDS[pending[0]] ?? "stdout",
        payload: pending.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + size),
      };
      pending = pending.subarray(FRAME_HEADER_BYTES + size);
    }
  }
  if (pending.length > 0) {
    yield { stream: "stdout", payload: pending };
  }
}

/** Payload bytes of a log stream, demultiplexed unless the container has a TTY. */
export async function* logPayloads(source: AsyncIterable<Uint8Array | string>, tty: boolean): AsyncGenerator<Uint8Array> {
  if (tty) {
    for await (const chunk of source) {
      yield toBuffer(chunk);
    }
    return;
  }
  for await (const frame of demuxFrames(source)) {
    yield frame.payload;
  }
}

/** Wrap a single buffer as a one-shot async sequence. */
export async function* once(chunk: Uint8Array): AsyncGenerator<Uint8Array> {
  yield chunk;
}

export interface BridgeOptions {
  /**
   * Releases the transport behind the source. Called first on cancel, so a
   * pull still waiting for the next chunk settles instead of blocking
   * `iterator.return()` forever.
   */
  onCancel?: () => void;
}

/**
 * Adapt a pull sequence to a push stream. Pulls only when the consumer asks
 * (highWaterMark 0), closes when the source is exhausted, and on cancel
 * (e.g. client disconnect) releases the source and returns its iterator.
 */
export function bridge(source: AsyncIterable<Uint8Array>, options: BridgeOptions = {}): ReadableStream<Uint8Array> {
  const iterator = source[Symbol.asyncIterator]();
  let cancelled = false;
  return new ReadableStream<Uint8Array>(
    {
      async pull(controller) {
        try {
          const { value, done } = await iterator.next();
          if (cancelled) return;
          if (done) {
            controller.close();
          } else {
            controller.enqueue(value);
          }
        } catch (err: unknown) {
          if (cancelled) return;
          logger.warn(`[logs] Source stream failed: ${errorMessage(err)}`);
          controller.error(err);
        }
      },
      async cancel(reason) {
        cancelled = true;
        options.onCancel?.();
        try {
          await iterator.return?.(reason);
        } catch (err: unknown) {
          // The released transport fails the pending pull; nothing is left to deliver.
          logger.debug(`[logs] Source closed on cancel: ${errorMessage(err)}`);
        }
      },
    },
    { highWaterMark: 0 },
  );
}

/** Drain a byte sequence into a UTF-8 string (invalid bytes become U+FFFD). */
export async function collectText(source: AsyncIterable<Uint8Array>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(toBuffer(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8");
}
