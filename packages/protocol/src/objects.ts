/**
 * Typed accessors over decoded objects
 *
 * Every accessor checks the wire type and throws TypeMismatchError when the
 * value is not what the caller expects.
 */

import type { TypeTag } from "./constants.js";
import { TypeMismatchError } from "./errors.js";
import type {
  HData,
  HDataRow,
  Hashtable,
  RelayArray,
  RelayObject,
  RelayObjectOf,
  RelayValueOf,
} from "./types.js";

export function isObjectOfType<T extends TypeTag>(
  object: RelayObject,
  type: T
): object is RelayObjectOf<T> {
  return object.type === type;
}

/**
 * Unwrap a value of the expected type
 */
export function expectValue<T extends TypeTag>(
  object: RelayObject | undefined,
  type: T,
  context: string
): RelayValueOf<T> {
  if (object === undefined) {
    throw new TypeMismatchError(type, "nothing", context);
  }
  if (!isObjectOfType(object, type)) {
    throw new TypeMismatchError(type, object.type, context);
  }
  return object.value;
}

/**
 * Name of the record an hdata describes: the last element of its path
 */
export function hdataRecordName(hdata: HData): string {
  return hdata.path[hdata.path.length - 1] ?? "";
}

function rowValue<T extends TypeTag>(row: HDataRow, key: string, type: T): RelayValueOf<T> {
  return expectValue(row.values.get(key), type, `hdata key "${key}"`);
}

export function hasKey(row: HDataRow, key: string): boolean {
  return row.values.has(key);
}

export function rowString(row: HDataRow, key: string): string | null {
  return rowValue(row, key, "str");
}

export function rowPointer(row: HDataRow, key: string): string {
  return rowValue(row, key, "ptr");
}

export function rowInteger(row: HDataRow, key: string): number {
  return rowValue(row, key, "int");
}

export function rowChar(row: HDataRow, key: string): number {
  return rowValue(row, key, "chr");
}

export function rowTime(row: HDataRow, key: string): number {
  return rowValue(row, key, "tim");
}

export function rowHashtable(row: HDataRow, key: string): Hashtable {
  return rowValue(row, key, "htb");
}

export function rowArray(row: HDataRow, key: string): RelayArray {
  return rowValue(row, key, "arr");
}

/**
 * Pointer of the object at a given path position (negative counts from the end)
 */
export function rowPathPointer(row: HDataRow, index: number): string {
  const pointer = row.pointers.at(index);
  if (pointer === undefined) {
    throw new TypeMismatchError(
      `path pointer ${index}`,
      `${row.pointers.length} pointers`,
      "hdata row"
    );
  }
  return pointer;
}

/**
 * Convert a string → string hashtable (e.g. buffer local variables)
 */
export function hashtableToRecord(hashtable: Hashtable, context: string): Record<string, string> {
  const record: Record<string, string> = {};
  for (const { key, value } of hashtable.entries) {
    const name = expectValue(key, "str", `${context} key`);
    record[name ?? ""] = expectValue(value, "str", `${context} value`) ?? "";
  }
  return record;
}

/**
 * Convert an array of strings, dropping nulls
 */
export function arrayToStrings(array: RelayArray, context: string): string[] {
  const strings: string[] = [];
  for (const value of array.values) {
    const text = expectValue(value, "str", context);
    if (text !== null) strings.push(text);
  }
  return strings;
}
