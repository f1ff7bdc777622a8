import { MAX_FRAME_SIZE } from "./constants.js";
import { MalformedFrameError } from "./errors.js";
import { decodeFrame, extractFrame } from "./frame.js";
import type { RelayMessage } from "./message.js";

export type FrameResult =
  | { status: "incomplete"; buffered: number }
  | { status: "message"; message: RelayMessage; raw: Buffer };

/**
 * MessageFramer turns an append-only byte stream into messages.
 *
 * Responsibilities:
 * - Keep unconsumed bytes across calls
 * - Extract one frame at a time, only once it is fully buffered
 * - Decode each frame into an immutable RelayMessage
 *
 * An incomplete frame leaves the buffer untouched. A malformed frame throws
 * MalformedFrameError; the framer is then unusable and a new one is needed
 * for the next connection.
 */
export class MessageFramer {
  private buffer: Buffer = Buffer.alloc(0);
  private failed: Error | null = null;

  /**
   * Append bytes received from the transport
   */
  append(chunk: Buffer): void {
    if (chunk.length === 0) return;
    if (this.buffer.length + chunk.length > MAX_FRAME_SIZE * 2) {
      this.fail(
        new MalformedFrameError(
          `Receive buffer exceeded limit: ${this.buffer.length + chunk.length} bytes`
        )
      );
    }
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Try to extract the next message. Safe to call with nothing buffered.
   */
  next(): FrameResult {
    if (this.failed) throw this.failed;

    let result: ReturnType<typeof extractFrame>;
    let message: RelayMessage;
    try {
      result = extractFrame(this.buffer);
      if (!result) {
        return { status: "incomplete", buffered: this.buffer.length };
      }
      message = decodeFrame(result.frame);
    } catch (err) {
      return this.fail(err);
    }

    const raw = this.buffer.subarray(0, result.frame.length);
    this.buffer = result.remaining;
    return { status: "message", message, raw };
  }

  /**
   * Append a chunk and return every message it completes, in order
   */
  push(chunk: Buffer): RelayMessage[] {
    this.append(chunk);
    const messages: RelayMessage[] = [];
    for (let result = this.next(); result.status === "message"; result = this.next()) {
      messages.push(result.message);
    }
    return messages;
  }

  /**
   * Number of bytes waiting for the rest of their frame
   */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  private fail(err: unknown): never {
    this.failed = err instanceof Error ? err : new MalformedFrameError(String(err));
    this.buffer = Buffer.alloc(0);
    throw this.failed;
  }
}
