/**
 * Protocol Constants
 *
 * Wire type tags, frame layout and protocol limits for the WeeChat relay
 * binary protocol.
 */

// Frame structure sizes
export const LENGTH_FIELD_SIZE = 4;
export const COMPRESSION_FIELD_SIZE = 1;
export const HEADER_SIZE = LENGTH_FIELD_SIZE + COMPRESSION_FIELD_SIZE; // length(4) + compression(1)
export const TYPE_TAG_SIZE = 3;
export const MAX_FRAME_SIZE = 10 * 1024 * 1024; // 10MB safety limit

// A 4-byte length of all ones marks a null string or buffer
export const NULL_LENGTH = 0xffffffff;

// Pointer value meaning "no object"
export const NULL_POINTER = "0x0";

// Compression flag (1 byte, after the length)
export enum Compression {
  OFF = 0x00,
  ZLIB = 0x01,
}

// Object type tags (3 ASCII bytes)
export const TYPE_TAGS = [
  "chr",
  "int",
  "lon",
  "str",
  "buf",
  "ptr",
  "tim",
  "htb",
  "hda",
  "inf",
  "inl",
  "arr",
] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

export function isTypeTag(value: string): value is TypeTag {
  return TYPE_TAGS.some((tag) => tag === value);
}
