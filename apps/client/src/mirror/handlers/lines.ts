import type { HData, HDataRow } from "../../../../../packages/protocol/src/types.js";
import {
  arrayToStrings,
  hasKey,
  rowArray,
  rowChar,
  rowPathPointer,
  rowPointer,
  rowString,
  rowTime,
} from "../../../../../packages/protocol/src/objects.js";
import type { Line, MirrorOp } from "../model.js";

/**
 * Build a line from a line_data row
 *
 * Pushed lines name their buffer in a "buffer" key; lines fetched through a
 * buffer path carry it as the first path pointer.
 */
export function parseLine(row: HDataRow): Line {
  const date = hasKey(row, "date") ? rowTime(row, "date") : 0;
  return {
    pointer: rowPathPointer(row, -1),
    buffer: hasKey(row, "buffer") ? rowPointer(row, "buffer") : rowPathPointer(row, 0),
    date,
    datePrinted: hasKey(row, "date_printed") ? rowTime(row, "date_printed") : date,
    displayed: hasKey(row, "displayed") ? rowChar(row, "displayed") !== 0 : true,
    highlight: hasKey(row, "highlight") ? rowChar(row, "highlight") !== 0 : false,
    prefix: hasKey(row, "prefix") ? rowString(row, "prefix") ?? "" : "",
    message: hasKey(row, "message") ? rowString(row, "message") ?? "" : "",
    tags: hasKey(row, "tags_array") ? arrayToStrings(rowArray(row, "tags_array"), "tags_array") : [],
  };
}

/**
 * Lines requested with last_line(-N) arrive newest first; return them
 * oldest first, grouped per buffer in order of first appearance.
 */
function chronologicalByBuffer(hdata: HData): Map<string, Line[]> {
  const byBuffer = new Map<string, Line[]>();
  for (const row of hdata.rows) {
    const line = parseLine(row);
    const lines = byBuffer.get(line.buffer) ?? [];
    lines.push(line);
    byBuffer.set(line.buffer, lines);
  }
  for (const lines of byBuffer.values()) {
    lines.reverse();
  }
  return byBuffer;
}

/**
 * Initial lines after sync: appended oldest → newest
 */
export function planLineList(hdata: HData): MirrorOp[] {
  const ops: MirrorOp[] = [];
  for (const lines of chronologicalByBuffer(hdata).values()) {
    for (const line of lines) {
      ops.push({ op: "append-line", line });
    }
  }
  return ops;
}

/**
 * Older lines fetched on demand: prepended as one batch per buffer
 */
export function planHistory(hdata: HData): MirrorOp[] {
  const ops: MirrorOp[] = [];
  for (const [buffer, lines] of chronologicalByBuffer(hdata)) {
    ops.push({ op: "prepend-lines", buffer, lines });
  }
  return ops;
}

/**
 * Pushed lines, in the order received
 */
export function planLineAdded(hdata: HData): MirrorOp[] {
  return hdata.rows.map((row): MirrorOp => ({ op: "append-line", line: parseLine(row) }));
}
