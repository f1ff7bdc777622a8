/**
 * Mirror entities: what the client knows about the relay's buffers.
 *
 * Every entity is identified by the relay's pointer. Pointers are only
 * meaningful until the relay closes the object; a later object may reuse one.
 */

export type Line = {
  pointer: string;
  buffer: string;
  date: number;
  datePrinted: number;
  displayed: boolean;
  highlight: boolean;
  prefix: string;
  message: string;
  tags: readonly string[];
};

export type Nick = {
  pointer: string;
  name: string;
  visible: boolean;
  group: boolean;
  level: number;
  prefix: string;
  /** Name of the group this nick was listed under */
  parentGroup: string | null;
};

export type BufferFields = {
  number: number;
  fullName: string;
  shortName: string;
  title: string;
  /** 0 = formatted, 1 = free content */
  type: number;
  nicklistVisible: boolean;
  localVariables: Readonly<Record<string, string>>;
};

/**
 * Read-only view handed to the presentation layer
 */
export type RelayBuffer = Readonly<BufferFields> & {
  readonly pointer: string;
  readonly lines: readonly Line[];
  readonly nicks: readonly Nick[];
};

export type NickChange = "added" | "updated" | "removed";

export type MirrorEvent =
  | { type: "buffer-added"; buffer: string }
  | {
      type: "buffer-updated";
      buffer: string;
      fields: ReadonlyArray<keyof BufferFields | "lines" | "position">;
    }
  | { type: "buffer-removed"; buffer: string }
  | { type: "line-appended"; buffer: string; line: string }
  | { type: "lines-prepended"; buffer: string; lines: readonly string[] }
  | { type: "nick-changed"; buffer: string; nick: string; change: NickChange };

export type MirrorOp =
  | { op: "upsert-buffer"; pointer: string; fields: Partial<BufferFields>; nextBuffer?: string }
  | { op: "remove-buffer"; pointer: string }
  | { op: "retain-buffers"; pointers: readonly string[] }
  | { op: "clear-lines"; buffer: string }
  | { op: "append-line"; line: Line }
  | { op: "prepend-lines"; buffer: string; lines: readonly Line[] }
  | { op: "upsert-nick"; buffer: string; nick: Nick }
  | { op: "remove-nick"; buffer: string; pointer: string };
