/**
 * Update dispatch
 *
 * Maps a message to the kind of update it carries, and each kind to the
 * hdata record it expects plus a pure planning function.
 *
 * Kind resolution, first match wins:
 * 1. the semantics recorded when the request was sent (responses)
 * 2. the reserved push id ("_buffer_opened", "_nicklist_diff", ...)
 * 3. the hdata record name (push messages without a known id)
 */

import type { HData } from "../../../../packages/protocol/src/types.js";
import type { MirrorOp } from "./model.js";
import {
  planBufferCleared,
  planBufferClosed,
  planBufferList,
  planBufferUpdate,
} from "./handlers/buffers.js";
import { planHistory, planLineAdded, planLineList } from "./handlers/lines.js";
import { planNicklist, planNicklistDiff } from "./handlers/nicklist.js";

export type UpdateKind =
  | "buffers"
  | "buffer"
  | "buffer-closed"
  | "buffer-cleared"
  | "lines"
  | "history"
  | "line"
  | "nicklist"
  | "nicklist-diff";

export type Handler = {
  record: string;
  plan: (hdata: HData) => MirrorOp[];
};

export const handlers: Record<UpdateKind, Handler> = {
  buffers: { record: "buffer", plan: planBufferList },
  buffer: { record: "buffer", plan: planBufferUpdate },
  "buffer-closed": { record: "buffer", plan: planBufferClosed },
  "buffer-cleared": { record: "buffer", plan: planBufferCleared },
  lines: { record: "line_data", plan: planLineList },
  history: { record: "line_data", plan: planHistory },
  line: { record: "line_data", plan: planLineAdded },
  nicklist: { record: "nicklist_item", plan: planNicklist },
  "nicklist-diff": { record: "nicklist_item", plan: planNicklistDiff },
};

const pushKinds: Record<string, UpdateKind> = {
  _buffer_opened: "buffer",
  _buffer_type_changed: "buffer",
  _buffer_moved: "buffer",
  _buffer_merged: "buffer",
  _buffer_unmerged: "buffer",
  _buffer_hidden: "buffer",
  _buffer_unhidden: "buffer",
  _buffer_renamed: "buffer",
  _buffer_title_changed: "buffer",
  _buffer_localvar_added: "buffer",
  _buffer_localvar_changed: "buffer",
  _buffer_localvar_removed: "buffer",
  _buffer_closing: "buffer-closed",
  _buffer_cleared: "buffer-cleared",
  _buffer_line_added: "line",
  _nicklist: "nicklist",
  _nicklist_diff: "nicklist-diff",
};

const recordKinds: Record<string, UpdateKind> = {
  buffer: "buffer",
  line_data: "line",
  nicklist_item: "nicklist",
};

export function kindForPushId(id: string): UpdateKind | undefined {
  return Object.hasOwn(pushKinds, id) ? pushKinds[id] : undefined;
}

export function kindForRecord(record: string): UpdateKind | undefined {
  return Object.hasOwn(recordKinds, record) ? recordKinds[record] : undefined;
}
