import { EventEmitter } from "events";
import { NULL_POINTER } from "../../../../packages/protocol/src/constants.js";
import type { RelayMessage } from "../../../../packages/protocol/src/message.js";
import { hdataRecordName } from "../../../../packages/protocol/src/objects.js";
import { handlers, kindForPushId, kindForRecord, type UpdateKind } from "./dispatch.js";
import type {
  BufferFields,
  Line,
  MirrorEvent,
  MirrorOp,
  Nick,
  RelayBuffer,
} from "./model.js";
import { Logger, logger as defaultLogger } from "../observability/logger.js";

type BufferEntry = BufferFields & {
  pointer: string;
  lines: Line[];
  nicks: Map<string, Nick>;
};

export interface MirrorEvents {
  change: (event: MirrorEvent) => void;
}

export declare interface DomainMirror {
  on<E extends keyof MirrorEvents>(event: E, listener: MirrorEvents[E]): this;
  once<E extends keyof MirrorEvents>(event: E, listener: MirrorEvents[E]): this;
  off<E extends keyof MirrorEvents>(event: E, listener: MirrorEvents[E]): this;
  emit<E extends keyof MirrorEvents>(event: E, ...args: Parameters<MirrorEvents[E]>): boolean;
}

const BUFFER_FIELD_KEYS: ReadonlyArray<keyof BufferFields> = [
  "number",
  "fullName",
  "shortName",
  "title",
  "type",
  "nicklistVisible",
  "localVariables",
];

function newBuffer(pointer: string): BufferEntry {
  return {
    pointer,
    number: 0,
    fullName: "",
    shortName: "",
    title: "",
    type: 0,
    nicklistVisible: false,
    localVariables: {},
    lines: [],
    nicks: new Map(),
  };
}

function sameValue(a: unknown, b: unknown): boolean {
  if (typeof a === "object" && a !== null && typeof b === "object" && b !== null) {
    return JSON.stringify(a) === JSON.stringify(b);
  }
  return a === b;
}

/**
 * DomainMirror is the client-side copy of the relay's buffers, lines and nicks.
 *
 * Responsibilities:
 * - Arena of buffers keyed by pointer, invalidated on close
 * - Applying one message at a time: plan every row first, then commit
 * - Emitting change events once the whole message is committed
 *
 * Does NOT:
 * - Talk to the transport
 * - Decide when to resync
 *
 * Only the session mutates the mirror; everything else reads.
 */
export class DomainMirror extends EventEmitter {
  private buffers: Map<string, BufferEntry> = new Map();
  // Buffer pointers in relay order
  private order: string[] = [];
  private readonly logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    super();
    this.logger = logger;
  }

  /**
   * Apply one message
   *
   * @param message - Decoded message
   * @param kind - Update kind the message was requested as (responses only)
   * @returns The change events, in the order they were emitted
   */
  apply(message: RelayMessage, kind?: UpdateKind): MirrorEvent[] {
    const ops: MirrorOp[] = [];

    // Plan: may throw TypeMismatchError, nothing is mutated yet
    for (const hdata of message.hdataObjects()) {
      const record = hdataRecordName(hdata);
      const resolved = kind ?? kindForPushId(message.id) ?? kindForRecord(record);
      const handler = resolved ? handlers[resolved] : undefined;

      if (!handler || handler.record !== record) {
        this.logger.debug(`Ignoring hdata record "${record}"`, { id: message.id, kind: resolved });
        continue;
      }

      ops.push(...handler.plan(hdata));
    }

    // Commit
    const events: MirrorEvent[] = [];
    for (const op of ops) {
      this.commit(op, events);
    }

    for (const event of events) {
      this.emit("change", event);
    }
    return events;
  }

  /**
   * Forget everything. Every held pointer becomes stale.
   */
  reset(): MirrorEvent[] {
    const events: MirrorEvent[] = [];
    for (const pointer of [...this.buffers.keys()]) {
      this.commit({ op: "remove-buffer", pointer }, events);
    }
    for (const event of events) {
      this.emit("change", event);
    }
    return events;
  }

  private commit(op: MirrorOp, events: MirrorEvent[]): void {
    switch (op.op) {
      case "upsert-buffer":
        this.upsertBuffer(op.pointer, op.fields, op.nextBuffer, events);
        break;

      case "remove-buffer":
        if (this.buffers.delete(op.pointer)) {
          this.order = this.order.filter((pointer) => pointer !== op.pointer);
          events.push({ type: "buffer-removed", buffer: op.pointer });
        }
        break;

      case "retain-buffers": {
        const keep = new Set(op.pointers);
        for (const pointer of [...this.buffers.keys()]) {
          if (!keep.has(pointer)) {
            this.buffers.delete(pointer);
            events.push({ type: "buffer-removed", buffer: pointer });
          }
        }
        // The full list comes in relay order
        this.order = [...keep].filter((pointer) => this.buffers.has(pointer));
        break;
      }

      case "clear-lines": {
        const buffer = this.buffers.get(op.buffer);
        if (buffer && buffer.lines.length > 0) {
          buffer.lines = [];
          events.push({ type: "buffer-updated", buffer: op.buffer, fields: ["lines"] });
        }
        break;
      }

      case "append-line": {
        const buffer = this.lookup(op.line.buffer, "line");
        if (!buffer) break;
        buffer.lines.push(op.line);
        events.push({ type: "line-appended", buffer: buffer.pointer, line: op.line.pointer });
        break;
      }

      case "prepend-lines": {
        const buffer = this.lookup(op.buffer, "history");
        if (!buffer) break;
        const present = new Set(buffer.lines.map((line) => line.pointer));
        const older = op.lines.filter((line) => !present.has(line.pointer));
        if (older.length === 0) break;
        buffer.lines = [...older, ...buffer.lines];
        events.push({
          type: "lines-prepended",
          buffer: buffer.pointer,
          lines: older.map((line) => line.pointer),
        });
        break;
      }

      case "upsert-nick": {
        const buffer = this.lookup(op.buffer, "nick");
        if (!buffer) break;
        const change = buffer.nicks.has(op.nick.pointer) ? "updated" : "added";
        buffer.nicks.set(op.nick.pointer, op.nick);
        events.push({ type: "nick-changed", buffer: buffer.pointer, nick: op.nick.pointer, change });
        break;
      }

      case "remove-nick": {
        const buffer = this.lookup(op.buffer, "nick");
        if (buffer?.nicks.delete(op.pointer)) {
          events.push({ type: "nick-changed", buffer: buffer.pointer, nick: op.pointer, change: "removed" });
        }
        break;
      }
    }
  }

  private upsertBuffer(
    pointer: string,
    fields: Partial<BufferFields>,
    nextBuffer: string | undefined,
    events: MirrorEvent[]
  ): void {
    const existing = this.buffers.get(pointer);
    if (!existing) {
      this.buffers.set(pointer, { ...newBuffer(pointer), ...fields });
      this.place(pointer, nextBuffer);
      events.push({ type: "buffer-added", buffer: pointer });
      return;
    }

    const changed: Array<keyof BufferFields | "position"> = [];
    for (const key of BUFFER_FIELD_KEYS) {
      if (fields[key] !== undefined && !sameValue(existing[key], fields[key])) {
        changed.push(key);
      }
    }
    Object.assign(existing, fields);

    // Moved, merged and unmerged buffers name the buffer they now precede
    if (nextBuffer !== undefined) {
      const before = this.order.indexOf(pointer);
      this.place(pointer, nextBuffer);
      if (this.order.indexOf(pointer) !== before) {
        changed.push("position");
      }
    }

    if (changed.length > 0) {
      events.push({ type: "buffer-updated", buffer: pointer, fields: changed });
    }
  }

  /**
   * Put a buffer before `nextBuffer` ("0x0" = last). Without a known
   * neighbour it goes after every buffer with a number not above its own.
   */
  private place(pointer: string, nextBuffer: string | undefined): void {
    this.order = this.order.filter((other) => other !== pointer);

    let index = -1;
    if (nextBuffer === NULL_POINTER) {
      index = this.order.length;
    } else if (nextBuffer !== undefined) {
      index = this.order.indexOf(nextBuffer);
    }
    if (index < 0) {
      const number = this.buffers.get(pointer)?.number ?? 0;
      index = this.order.findIndex((other) => (this.buffers.get(other)?.number ?? 0) > number);
      if (index < 0) index = this.order.length;
    }

    this.order.splice(index, 0, pointer);
  }

  private lookup(pointer: string, what: string): BufferEntry | undefined {
    const buffer = this.buffers.get(pointer);
    if (!buffer) {
      this.logger.debug(`Dropping ${what} for unknown buffer ${pointer}`);
    }
    return buffer;
  }

  /**
   * Snapshot of one buffer, or undefined if the pointer is not (or no longer) known
   */
  getBuffer(pointer: string): RelayBuffer | undefined {
    const buffer = this.buffers.get(pointer);
    return buffer ? this.view(buffer) : undefined;
  }

  /**
   * All buffers, in relay order
   */
  listBuffers(): RelayBuffer[] {
    const views: RelayBuffer[] = [];
    for (const pointer of this.order) {
      const buffer = this.buffers.get(pointer);
      if (buffer) views.push(this.view(buffer));
    }
    return views;
  }

  /**
   * Find a buffer by its full name (e.g. "irc.libera.#weechat")
   */
  findBuffer(fullName: string): RelayBuffer | undefined {
    for (const buffer of this.buffers.values()) {
      if (buffer.fullName === fullName) return this.view(buffer);
    }
    return undefined;
  }

  hasBuffer(pointer: string): boolean {
    return this.buffers.has(pointer);
  }

  get size(): number {
    return this.buffers.size;
  }

  private view(buffer: BufferEntry): RelayBuffer {
    return Object.freeze({
      pointer: buffer.pointer,
      number: buffer.number,
      fullName: buffer.fullName,
      shortName: buffer.shortName,
      title: buffer.title,
      type: buffer.type,
      nicklistVisible: buffer.nicklistVisible,
      localVariables: { ...buffer.localVariables },
      lines: Object.freeze([...buffer.lines]),
      nicks: Object.freeze([...buffer.nicks.values()]),
    });
  }
}
