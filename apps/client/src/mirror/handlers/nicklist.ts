import type { HData, HDataRow } from "../../../../../packages/protocol/src/types.js";
import {
  hasKey,
  rowChar,
  rowInteger,
  rowPathPointer,
  rowString,
} from "../../../../../packages/protocol/src/objects.js";
import type { MirrorOp, Nick } from "../model.js";

// Markers in the "_diff" key of a nicklist diff row
export const NICKLIST_DIFF = {
  PARENT: "^",
  ADD: "+",
  REMOVE: "-",
  UPDATE: "*",
} as const;

function parseNick(row: HDataRow, parentGroup: string | null): Nick {
  return {
    pointer: rowPathPointer(row, -1),
    name: rowString(row, "name") ?? "",
    visible: hasKey(row, "visible") ? rowChar(row, "visible") !== 0 : true,
    group: hasKey(row, "group") ? rowChar(row, "group") !== 0 : false,
    level: hasKey(row, "level") ? rowInteger(row, "level") : 0,
    prefix: hasKey(row, "prefix") ? rowString(row, "prefix") ?? "" : "",
    parentGroup,
  };
}

/**
 * Full nicklist: groups are listed before their nicks, so the last group
 * seen in a buffer is the parent of the nicks that follow it.
 */
export function planNicklist(hdata: HData): MirrorOp[] {
  const ops: MirrorOp[] = [];
  const groups = new Map<string, string | null>();

  for (const row of hdata.rows) {
    const buffer = rowPathPointer(row, 0);
    const parent = groups.get(buffer) ?? null;
    const nick = parseNick(row, parent);
    if (nick.group) {
      groups.set(buffer, nick.name);
    }
    ops.push({ op: "upsert-nick", buffer, nick });
  }

  return ops;
}

/**
 * Nicklist diff: "^" sets the parent group for the rows after it,
 * "+" adds, "-" removes and "*" updates the nick or group named by the row.
 */
export function planNicklistDiff(hdata: HData): MirrorOp[] {
  const ops: MirrorOp[] = [];
  const groups = new Map<string, string | null>();

  for (const row of hdata.rows) {
    const buffer = rowPathPointer(row, 0);
    const diff = String.fromCharCode(rowChar(row, "_diff"));
    const parent = groups.get(buffer) ?? null;

    switch (diff) {
      case NICKLIST_DIFF.PARENT:
        groups.set(buffer, rowString(row, "name"));
        break;
      case NICKLIST_DIFF.ADD:
      case NICKLIST_DIFF.UPDATE:
        ops.push({ op: "upsert-nick", buffer, nick: parseNick(row, parent) });
        break;
      case NICKLIST_DIFF.REMOVE:
        ops.push({ op: "remove-nick", buffer, pointer: rowPathPointer(row, -1) });
        break;
      default:
        // Newer relays may add markers; skip rows we cannot interpret
        break;
    }
  }

  return ops;
}
