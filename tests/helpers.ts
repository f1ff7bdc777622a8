import { Duplex } from "stream";
import { Compression, type TypeTag } from "../packages/protocol/src/constants.js";
import { encodeFrame } from "../packages/protocol/src/encoder.js";
import { RelayMessage } from "../packages/protocol/src/message.js";
import type { HDataKey, RelayObject } from "../packages/protocol/src/types.js";
import type { Dialer } from "../packages/transport/src/dial.js";
import type { DisconnectedEvent, RelaySession } from "../apps/client/src/session/session.js";

/**
 * In-process stand-in for the relay's end of the socket
 */
export class FakeRelaySocket extends Duplex {
  public readonly written: string[] = [];

  _read(): void {}

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(chunk.toString("utf8"));
    callback();
  }

  /**
   * Commands received from the client, one per line
   */
  commands(): string[] {
    return this.written
      .join("")
      .split("\n")
      .filter((line) => line.length > 0);
  }

  /**
   * Relay sends bytes
   */
  send(bytes: Buffer): void {
    this.push(bytes);
  }

  /**
   * Relay closes its side
   */
  hangUp(): void {
    this.push(null);
  }
}

export function fakeDialer(socket: FakeRelaySocket): Dialer {
  return async () => socket;
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function nextDisconnect(session: RelaySession): Promise<DisconnectedEvent> {
  return new Promise((resolve) => session.once("disconnected", resolve));
}

// Value builders
export const chr = (value: number): RelayObject => ({ type: "chr", value });
export const int = (value: number): RelayObject => ({ type: "int", value });
export const str = (value: string | null): RelayObject => ({ type: "str", value });
export const ptr = (value: string): RelayObject => ({ type: "ptr", value });
export const tim = (value: number): RelayObject => ({ type: "tim", value });

export function strings(values: string[]): RelayObject {
  return { type: "arr", value: { elementType: "str", values: values.map((value) => str(value)) } };
}

export function stringTable(record: Record<string, string>): RelayObject {
  return {
    type: "htb",
    value: {
      keyType: "str",
      valueType: "str",
      entries: Object.entries(record).map(([key, value]) => ({ key: str(key), value: str(value) })),
    },
  };
}

export type Row = {
  pointers: string[];
  values: Record<string, RelayObject>;
};

/**
 * hdata object; keys are taken from the first row unless given
 */
export function hdata(path: string, rows: Row[], keys?: HDataKey[]): RelayObject {
  const declared: HDataKey[] =
    keys ??
    Object.entries(rows[0]?.values ?? {}).map(([name, value]): HDataKey => ({
      name,
      type: value.type,
    }));
  return {
    type: "hda",
    value: {
      path: path.split("/"),
      keys: declared,
      rows: rows.map((row) => ({
        pointers: row.pointers,
        values: new Map(Object.entries(row.values)),
      })),
    },
  };
}

export function key(name: string, type: TypeTag): HDataKey {
  return { name, type };
}

export function frame(
  id: string,
  objects: RelayObject[],
  compression: Compression = Compression.OFF
): Buffer {
  return encodeFrame(id, objects, compression).buffer;
}

export function message(id: string, objects: RelayObject[]): RelayMessage {
  return new RelayMessage({ id, objects, size: 0, uncompressedSize: 0, compressed: false });
}

// Domain rows

export function bufferRow(
  pointer: string,
  number: number,
  fullName: string,
  title: string = ""
): Row {
  const shortName = fullName.split(".").pop() ?? fullName;
  return {
    pointers: [pointer],
    values: {
      number: int(number),
      full_name: str(fullName),
      short_name: str(shortName),
      type: int(0),
      nicklist: int(1),
      title: str(title),
      local_variables: stringTable({ name: shortName }),
    },
  };
}

function lineValues(text: string, date: number): Record<string, RelayObject> {
  return {
    date: tim(date),
    date_printed: tim(date),
    displayed: chr(1),
    highlight: chr(0),
    prefix: str("alice"),
    message: str(text),
    tags_array: strings(["irc_privmsg"]),
  };
}

/**
 * Row of a line fetched through buffer:.../own_lines/last_line(-N)/data
 */
export function historyRow(buffer: string, line: string, text: string, date: number = 1700000000): Row {
  return {
    pointers: [buffer, "0xaaa", `0xc${line.slice(2)}`, line],
    values: lineValues(text, date),
  };
}

/**
 * Row of a pushed line (_buffer_line_added)
 */
export function pushedLineRow(buffer: string, line: string, text: string, date: number = 1700000000): Row {
  return {
    pointers: [line],
    values: { buffer: ptr(buffer), ...lineValues(text, date) },
  };
}

export const HISTORY_PATH = "buffer/lines/line/line_data";

export function nickRow(
  buffer: string,
  pointer: string,
  name: string,
  options: { group?: boolean; prefix?: string; diff?: string } = {}
): Row {
  const values: Record<string, RelayObject> = {};
  if (options.diff !== undefined) {
    values._diff = chr(options.diff.charCodeAt(0));
  }
  values.group = chr(options.group ? 1 : 0);
  values.visible = chr(1);
  values.level = int(0);
  values.name = str(name);
  values.prefix = str(options.prefix ?? " ");
  return { pointers: [buffer, pointer], values };
}
