/**
 * RelayMessage - immutable snapshot of one decoded frame
 */

import type { TypeTag } from "./constants.js";
import { TypeMismatchError } from "./errors.js";
import { expectValue, hdataRecordName } from "./objects.js";
import type { HData, Hashtable, RelayObject, RelayValueOf } from "./types.js";

export type RelayMessageInit = {
  id: string;
  objects: readonly RelayObject[];
  size: number;
  uncompressedSize: number;
  compressed: boolean;
};

export class RelayMessage {
  public readonly id: string;
  public readonly objects: readonly RelayObject[];
  public readonly size: number;
  public readonly uncompressedSize: number;
  public readonly compressed: boolean;

  constructor(init: RelayMessageInit) {
    this.id = init.id;
    this.objects = Object.freeze([...init.objects]);
    this.size = init.size;
    this.uncompressedSize = init.uncompressedSize;
    this.compressed = init.compressed;
    Object.freeze(this);
  }

  /**
   * Push messages carry an empty id or a reserved "_"-prefixed one
   */
  isPush(): boolean {
    return this.id === "" || this.id.startsWith("_");
  }

  /**
   * Get the object at `index`, checking its type
   */
  expect<T extends TypeTag>(type: T, index: number = 0): RelayValueOf<T> {
    return expectValue(this.objects[index], type, `message "${this.id}" object ${index}`);
  }

  expectHashtable(index: number = 0): Hashtable {
    return this.expect("htb", index);
  }

  /**
   * Get the hdata at `index`, optionally checking its record name
   */
  expectHData(name?: string, index: number = 0): HData {
    const hdata = this.expect("hda", index);
    if (name !== undefined && hdataRecordName(hdata) !== name) {
      throw new TypeMismatchError(
        `hdata "${name}"`,
        `hdata "${hdataRecordName(hdata)}"`,
        `message "${this.id}"`
      );
    }
    return hdata;
  }

  /**
   * All hdata objects in the message, in order
   */
  hdataObjects(): HData[] {
    const result: HData[] = [];
    for (const object of this.objects) {
      if (object.type === "hda") result.push(object.value);
    }
    return result;
  }
}
