/**
 * Object and Frame Encoding
 *
 * Inverse of the decoder: produces relay wire bytes for any RelayObject and
 * complete frames for a message id plus objects. The client never sends
 * binary frames; this is what a relay emits, used to drive the codec
 * without a live WeeChat.
 */

import { deflateSync } from "node:zlib";
import {
  Compression,
  HEADER_SIZE,
  NULL_LENGTH,
  NULL_POINTER,
  type TypeTag,
} from "./constants.js";
import { ProtocolError } from "./errors.js";
import type { EncodedFrame, HData, RelayObject } from "./types.js";

function encodeUInt32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32BE(value, 0);
  return buffer;
}

function encodeInt32(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeInt32BE(value, 0);
  return buffer;
}

function encodeShortAscii(text: string): Buffer {
  if (text.length > 0xff) {
    throw new ProtocolError(`Value too long for 1-byte length: ${text.length}`);
  }
  return Buffer.concat([Buffer.from([text.length]), Buffer.from(text, "latin1")]);
}

function encodeLengthPrefixed(bytes: Buffer | null): Buffer {
  if (bytes === null) {
    return encodeUInt32(NULL_LENGTH);
  }
  return Buffer.concat([encodeUInt32(bytes.length), bytes]);
}

export function encodeTypeTag(tag: TypeTag): Buffer {
  return Buffer.from(tag, "latin1");
}

export function encodeString(value: string | null): Buffer {
  return encodeLengthPrefixed(value === null ? null : Buffer.from(value, "utf8"));
}

export function encodePointer(pointer: string): Buffer {
  const hex = pointer.startsWith("0x") ? pointer.slice(2) : pointer;
  return encodeShortAscii(pointer === NULL_POINTER || hex.length === 0 ? "0" : hex);
}

function encodeHData(hdata: HData): Buffer {
  const parts: Buffer[] = [
    encodeString(hdata.path.length > 0 ? hdata.path.join("/") : null),
    encodeString(
      hdata.keys.length > 0
        ? hdata.keys.map((key) => `${key.name}:${key.type}`).join(",")
        : null
    ),
    encodeInt32(hdata.rows.length),
  ];

  for (const row of hdata.rows) {
    if (row.pointers.length !== hdata.path.length) {
      throw new ProtocolError(
        `hdata row has ${row.pointers.length} pointers for a path of ${hdata.path.length}`
      );
    }
    for (const pointer of row.pointers) {
      parts.push(encodePointer(pointer));
    }
    for (const key of hdata.keys) {
      const value = row.values.get(key.name);
      if (!value || value.type !== key.type) {
        throw new ProtocolError(`hdata row is missing ${key.name}:${key.type}`);
      }
      parts.push(encodeObject(value));
    }
  }

  return Buffer.concat(parts);
}

/**
 * Encode a value without its type tag
 */
export function encodeObject(object: RelayObject): Buffer {
  switch (object.type) {
    case "chr": {
      const buffer = Buffer.alloc(1);
      buffer.writeInt8(object.value, 0);
      return buffer;
    }
    case "int":
      return encodeInt32(object.value);
    case "lon":
      return encodeShortAscii(object.value.toString());
    case "str":
      return encodeString(object.value);
    case "buf":
      return encodeLengthPrefixed(object.value);
    case "ptr":
      return encodePointer(object.value);
    case "tim":
      return encodeShortAscii(String(object.value));
    case "htb": {
      const { keyType, valueType, entries } = object.value;
      return Buffer.concat([
        encodeTypeTag(keyType),
        encodeTypeTag(valueType),
        encodeInt32(entries.length),
        ...entries.flatMap((entry) => [encodeObject(entry.key), encodeObject(entry.value)]),
      ]);
    }
    case "hda":
      return encodeHData(object.value);
    case "inf":
      return Buffer.concat([encodeString(object.value.name), encodeString(object.value.value)]);
    case "inl": {
      const parts: Buffer[] = [
        encodeString(object.value.name),
        encodeInt32(object.value.items.length),
      ];
      for (const item of object.value.items) {
        parts.push(encodeInt32(item.size));
        for (const [name, value] of item) {
          parts.push(encodeString(name), encodeTypeTag(value.type), encodeObject(value));
        }
      }
      return Buffer.concat(parts);
    }
    case "arr":
      return Buffer.concat([
        encodeTypeTag(object.value.elementType),
        encodeInt32(object.value.values.length),
        ...object.value.values.map((value) => encodeObject(value)),
      ]);
  }
}

/**
 * Encode a type tag followed by its value
 */
export function encodeTypedObject(object: RelayObject): Buffer {
  return Buffer.concat([encodeTypeTag(object.type), encodeObject(object)]);
}

/**
 * Encode a complete frame
 *
 * @param id - Message id ("" for push messages)
 * @param objects - Objects carried by the frame, in order
 * @param compression - Compress the body with zlib
 */
export function encodeFrame(
  id: string,
  objects: readonly RelayObject[],
  compression: Compression = Compression.OFF
): EncodedFrame {
  let body = Buffer.concat([encodeString(id), ...objects.map(encodeTypedObject)]);
  if (compression === Compression.ZLIB) {
    body = deflateSync(body);
  }

  const buffer = Buffer.alloc(HEADER_SIZE + body.length);
  buffer.writeUInt32BE(buffer.length, 0); // length, including itself
  buffer.writeUInt8(compression, 4); // compression
  body.copy(buffer, HEADER_SIZE);

  return { buffer };
}
