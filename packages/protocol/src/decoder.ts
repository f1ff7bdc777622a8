/**
 * Object Decoding
 *
 * Stateless decoders for each relay wire type. Each one reads exactly one
 * value from the cursor and leaves it positioned after that value.
 *
 *   chr  | int8                                  |
 *   int  | int32                                 |
 *   lon  | len (1B) | decimal ASCII              |
 *   str  | len (4B, 0xFFFFFFFF = null) | UTF-8   |
 *   buf  | len (4B, 0xFFFFFFFF = null) | bytes   |
 *   ptr  | len (1B) | hex ASCII                  |
 *   tim  | len (1B) | decimal ASCII              |
 *   htb  | key type | value type | count | pairs |
 *   hda  | h-path (str) | keys (str) | count | rows |
 *   inf  | name (str) | value (str)              |
 *   inl  | name (str) | count | items            |
 *   arr  | type | count | values                 |
 */

import { ByteCursor } from "./cursor.js";
import {
  NULL_LENGTH,
  NULL_POINTER,
  TYPE_TAG_SIZE,
  isTypeTag,
  type TypeTag,
} from "./constants.js";
import { MalformedFrameError } from "./errors.js";
import type {
  HData,
  HDataKey,
  HDataRow,
  Hashtable,
  Info,
  Infolist,
  RelayArray,
  RelayObject,
  RelayObjectOf,
} from "./types.js";

type ObjectDecoders = {
  [T in TypeTag]: (cursor: ByteCursor) => RelayObjectOf<T>;
};

const HEX_PATTERN = /^[0-9a-fA-F]+$/;
const DECIMAL_PATTERN = /^-?[0-9]+$/;

/**
 * Read a 3-byte type tag
 */
export function decodeTypeTag(cursor: ByteCursor): TypeTag {
  const tag = cursor.readAscii(TYPE_TAG_SIZE);
  if (!isTypeTag(tag)) {
    throw new MalformedFrameError(`Unknown object type: ${JSON.stringify(tag)}`);
  }
  return tag;
}

function decodeCount(cursor: ByteCursor, what: string): number {
  const count = cursor.readInt32();
  if (count < 0) {
    throw new MalformedFrameError(`Negative ${what} count: ${count}`);
  }
  return count;
}

/**
 * Read a 4-byte length followed by that many bytes; null for 0xFFFFFFFF
 */
function decodeLengthPrefixed(cursor: ByteCursor): Buffer | null {
  const length = cursor.readUInt32();
  if (length === NULL_LENGTH) {
    return null;
  }
  return cursor.readBytes(length);
}

/**
 * Read a 1-byte length followed by that many ASCII characters
 */
function decodeShortAscii(cursor: ByteCursor): string {
  const length = cursor.readUInt8();
  return cursor.readAscii(length);
}

function decodeDecimal(cursor: ByteCursor, what: string): string {
  const text = decodeShortAscii(cursor);
  if (!DECIMAL_PATTERN.test(text)) {
    throw new MalformedFrameError(`Invalid ${what} value: ${JSON.stringify(text)}`);
  }
  return text;
}

export function decodeString(cursor: ByteCursor): string | null {
  const bytes = decodeLengthPrefixed(cursor);
  return bytes === null ? null : bytes.toString("utf8");
}

export function decodePointer(cursor: ByteCursor): string {
  const hex = decodeShortAscii(cursor);
  if (hex.length === 0) {
    return NULL_POINTER;
  }
  if (!HEX_PATTERN.test(hex)) {
    throw new MalformedFrameError(`Invalid pointer: ${JSON.stringify(hex)}`);
  }
  return `0x${hex}`;
}

function decodeHashtable(cursor: ByteCursor): Hashtable {
  const keyType = decodeTypeTag(cursor);
  const valueType = decodeTypeTag(cursor);
  const count = decodeCount(cursor, "hashtable");
  const entries: Array<{ key: RelayObject; value: RelayObject }> = [];
  for (let i = 0; i < count; i++) {
    const key = decodeObject(cursor, keyType);
    const value = decodeObject(cursor, valueType);
    entries.push({ key, value });
  }
  return { keyType, valueType, entries };
}

/**
 * Parse the hdata key declaration, e.g. "number:int,full_name:str"
 */
export function parseHDataKeys(keys: string | null): HDataKey[] {
  if (!keys) return [];
  return keys.split(",").map((declaration) => {
    const separator = declaration.lastIndexOf(":");
    const name = declaration.slice(0, separator);
    const type = declaration.slice(separator + 1);
    if (separator <= 0 || !isTypeTag(type)) {
      throw new MalformedFrameError(
        `Invalid hdata key declaration: ${JSON.stringify(declaration)}`
      );
    }
    return { name, type };
  });
}

function decodeHData(cursor: ByteCursor): HData {
  const hpath = decodeString(cursor);
  const keys = parseHDataKeys(decodeString(cursor));
  const count = decodeCount(cursor, "hdata");
  const path = hpath ? hpath.split("/") : [];

  const rows: HDataRow[] = [];
  for (let i = 0; i < count; i++) {
    const pointers: string[] = [];
    for (let p = 0; p < path.length; p++) {
      pointers.push(decodePointer(cursor));
    }
    const values = new Map<string, RelayObject>();
    for (const key of keys) {
      values.set(key.name, decodeObject(cursor, key.type));
    }
    rows.push({ pointers, values });
  }

  return { path, keys, rows };
}

function decodeInfo(cursor: ByteCursor): Info {
  const name = decodeString(cursor);
  const value = decodeString(cursor);
  return { name, value };
}

function decodeInfolist(cursor: ByteCursor): Infolist {
  const name = decodeString(cursor);
  const count = decodeCount(cursor, "infolist item");
  const items: Array<Map<string, RelayObject>> = [];
  for (let i = 0; i < count; i++) {
    const variables = new Map<string, RelayObject>();
    const varCount = decodeCount(cursor, "infolist variable");
    for (let v = 0; v < varCount; v++) {
      const varName = decodeString(cursor) ?? "";
      const varType = decodeTypeTag(cursor);
      variables.set(varName, decodeObject(cursor, varType));
    }
    items.push(variables);
  }
  return { name, items };
}

function decodeArray(cursor: ByteCursor): RelayArray {
  const elementType = decodeTypeTag(cursor);
  const count = decodeCount(cursor, "array");
  const values: RelayObject[] = [];
  for (let i = 0; i < count; i++) {
    values.push(decodeObject(cursor, elementType));
  }
  return { elementType, values };
}

const decoders: ObjectDecoders = {
  chr: (cursor) => ({ type: "chr", value: cursor.readInt8() }),
  int: (cursor) => ({ type: "int", value: cursor.readInt32() }),
  lon: (cursor) => ({ type: "lon", value: BigInt(decodeDecimal(cursor, "long")) }),
  str: (cursor) => ({ type: "str", value: decodeString(cursor) }),
  buf: (cursor) => {
    const bytes = decodeLengthPrefixed(cursor);
    return { type: "buf", value: bytes === null ? null : Buffer.from(bytes) };
  },
  ptr: (cursor) => ({ type: "ptr", value: decodePointer(cursor) }),
  tim: (cursor) => ({ type: "tim", value: Number(decodeDecimal(cursor, "time")) }),
  htb: (cursor) => ({ type: "htb", value: decodeHashtable(cursor) }),
  hda: (cursor) => ({ type: "hda", value: decodeHData(cursor) }),
  inf: (cursor) => ({ type: "inf", value: decodeInfo(cursor) }),
  inl: (cursor) => ({ type: "inl", value: decodeInfolist(cursor) }),
  arr: (cursor) => ({ type: "arr", value: decodeArray(cursor) }),
};

/**
 * Decode one value of a type whose tag was already consumed
 */
export function decodeObject(cursor: ByteCursor, tag: TypeTag): RelayObject {
  return decoders[tag](cursor);
}

/**
 * Decode a type tag followed by its value
 */
export function decodeTypedObject(cursor: ByteCursor): RelayObject {
  return decodeObject(cursor, decodeTypeTag(cursor));
}
