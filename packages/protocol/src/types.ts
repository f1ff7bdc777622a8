/**
 * Protocol Type Definitions
 */

import type { TypeTag } from "./constants.js";

/**
 * Hashtable: typed keys and values, in wire order
 */
export type Hashtable = {
  keyType: TypeTag;
  valueType: TypeTag;
  entries: ReadonlyArray<{ key: RelayObject; value: RelayObject }>;
};

/**
 * One declared hdata key, e.g. "title:str"
 */
export type HDataKey = {
  name: string;
  type: TypeTag;
};

/**
 * One hdata row: a pointer per path element, then the declared keys' values
 */
export type HDataRow = {
  pointers: readonly string[];
  values: ReadonlyMap<string, RelayObject>;
};

/**
 * Structured record set. Keys are declared once and shared by every row.
 */
export type HData = {
  path: readonly string[];
  keys: readonly HDataKey[];
  rows: readonly HDataRow[];
};

export type Info = {
  name: string | null;
  value: string | null;
};

export type Infolist = {
  name: string | null;
  items: ReadonlyArray<ReadonlyMap<string, RelayObject>>;
};

export type RelayArray = {
  elementType: TypeTag;
  values: readonly RelayObject[];
};

/**
 * A decoded value, tagged with its wire type
 */
export type RelayObject =
  | { type: "chr"; value: number }
  | { type: "int"; value: number }
  | { type: "lon"; value: bigint }
  | { type: "str"; value: string | null }
  | { type: "buf"; value: Buffer | null }
  | { type: "ptr"; value: string }
  | { type: "tim"; value: number }
  | { type: "htb"; value: Hashtable }
  | { type: "hda"; value: HData }
  | { type: "inf"; value: Info }
  | { type: "inl"; value: Infolist }
  | { type: "arr"; value: RelayArray };

export type RelayObjectOf<T extends TypeTag> = Extract<RelayObject, { type: T }>;

export type RelayValueOf<T extends TypeTag> = RelayObjectOf<T>["value"];

/**
 * A complete frame as it appears on the wire, before the body is decoded
 */
export type Frame = {
  length: number; // Total frame length, including the length field
  compression: number; // Compression flag
  body: Buffer; // id + objects, possibly compressed
};

/**
 * Frame encoding result
 */
export type EncodedFrame = {
  buffer: Buffer; // Complete frame ready to send
};
