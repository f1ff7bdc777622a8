import type { HData, HDataRow } from "../../../../../packages/protocol/src/types.js";
import {
  hasKey,
  hashtableToRecord,
  rowHashtable,
  rowInteger,
  rowPathPointer,
  rowPointer,
  rowString,
} from "../../../../../packages/protocol/src/objects.js";
import type { BufferFields, MirrorOp } from "../model.js";

/**
 * Read the buffer fields present in a row. Absent keys stay absent so an
 * event carrying only a title does not reset the name.
 */
export function parseBufferFields(row: HDataRow): Partial<BufferFields> {
  const fields: Partial<BufferFields> = {};

  if (hasKey(row, "number")) fields.number = rowInteger(row, "number");
  if (hasKey(row, "full_name")) fields.fullName = rowString(row, "full_name") ?? "";
  if (hasKey(row, "short_name")) fields.shortName = rowString(row, "short_name") ?? "";
  if (hasKey(row, "title")) fields.title = rowString(row, "title") ?? "";
  if (hasKey(row, "type")) fields.type = rowInteger(row, "type");
  if (hasKey(row, "nicklist")) fields.nicklistVisible = rowInteger(row, "nicklist") !== 0;
  if (hasKey(row, "local_variables")) {
    fields.localVariables = hashtableToRecord(
      rowHashtable(row, "local_variables"),
      "local_variables"
    );
  }

  return fields;
}

function bufferPointer(row: HDataRow): string {
  return rowPathPointer(row, 0);
}

function upsertBuffer(row: HDataRow): MirrorOp {
  return {
    op: "upsert-buffer",
    pointer: bufferPointer(row),
    fields: parseBufferFields(row),
    nextBuffer: hasKey(row, "next_buffer") ? rowPointer(row, "next_buffer") : undefined,
  };
}

/**
 * Full buffer list: upsert every row, drop buffers the relay no longer has
 */
export function planBufferList(hdata: HData): MirrorOp[] {
  const ops: MirrorOp[] = hdata.rows.map(upsertBuffer);
  ops.push({ op: "retain-buffers", pointers: hdata.rows.map(bufferPointer) });
  return ops;
}

/**
 * Opened, renamed, retitled, moved, merged, local variables changed...
 */
export function planBufferUpdate(hdata: HData): MirrorOp[] {
  return hdata.rows.map(upsertBuffer);
}

export function planBufferClosed(hdata: HData): MirrorOp[] {
  return hdata.rows.map((row): MirrorOp => ({ op: "remove-buffer", pointer: bufferPointer(row) }));
}

export function planBufferCleared(hdata: HData): MirrorOp[] {
  return hdata.rows.map((row): MirrorOp => ({ op: "clear-lines", buffer: bufferPointer(row) }));
}
