/**
 * Frame Extraction and Decoding
 *
 * Implements the relay binary frame:
 * | length (4B) | compression (1B) | id (str) | type (3B) | object | type | object | ... |
 *
 * The length counts the whole frame, including the length field itself.
 * When the compression flag is set, everything after it is a zlib stream.
 * All numeric fields use Big Endian (network byte order).
 */

import { inflateSync } from "node:zlib";
import {
  Compression,
  HEADER_SIZE,
  LENGTH_FIELD_SIZE,
  MAX_FRAME_SIZE,
} from "./constants.js";
import { ByteCursor } from "./cursor.js";
import { decodeString, decodeTypedObject } from "./decoder.js";
import { IncompleteFrameError, MalformedFrameError } from "./errors.js";
import { RelayMessage } from "./message.js";
import type { Frame, RelayObject } from "./types.js";

/**
 * Extract a complete frame from buffer (used by the framer)
 *
 * @param buffer - Receive buffer
 * @returns Frame object if complete, null if more data needed
 */
export function extractFrame(
  buffer: Buffer
): { frame: Frame; remaining: Buffer } | null {
  // Need at least 4 bytes for length
  if (buffer.length < LENGTH_FIELD_SIZE) {
    return null;
  }

  const frameLength = buffer.readUInt32BE(0);

  if (frameLength < HEADER_SIZE) {
    throw new MalformedFrameError(
      `Frame too short: declared ${frameLength} bytes, header alone is ${HEADER_SIZE}`
    );
  }
  if (frameLength > MAX_FRAME_SIZE) {
    throw new MalformedFrameError(
      `Frame too large: ${frameLength} bytes exceeds ${MAX_FRAME_SIZE}`
    );
  }

  // Not enough data yet
  if (buffer.length < frameLength) {
    return null;
  }

  const frame: Frame = {
    length: frameLength,
    compression: buffer.readUInt8(LENGTH_FIELD_SIZE),
    body: buffer.subarray(HEADER_SIZE, frameLength),
  };

  return { frame, remaining: buffer.subarray(frameLength) };
}

/**
 * Decode the body of a complete frame into a message
 *
 * The objects must end exactly on the frame boundary: running out of bytes
 * inside a complete frame is malformed, not incomplete.
 */
export function decodeFrame(frame: Frame): RelayMessage {
  let body: Buffer;
  switch (frame.compression) {
    case Compression.OFF:
      body = frame.body;
      break;
    case Compression.ZLIB:
      try {
        body = inflateSync(frame.body);
      } catch (err) {
        throw new MalformedFrameError(
          `Decompression failed: ${err instanceof Error ? err.message : String(err)}`
        );
      }
      break;
    default:
      throw new MalformedFrameError(`Unknown compression flag: ${frame.compression}`);
  }

  const cursor = new ByteCursor(body);
  const objects: RelayObject[] = [];
  let id: string;

  try {
    id = decodeString(cursor) ?? "";
    while (cursor.remaining > 0) {
      objects.push(decodeTypedObject(cursor));
    }
  } catch (err) {
    if (err instanceof IncompleteFrameError) {
      throw new MalformedFrameError(
        `Frame ends inside an object at byte ${cursor.position} of ${body.length}: ${err.message}`
      );
    }
    throw err;
  }

  return new RelayMessage({
    id,
    objects,
    size: frame.length,
    uncompressedSize: HEADER_SIZE + body.length,
    compressed: frame.compression === Compression.ZLIB,
  });
}
