import { describe, it, expect } from "vitest";
import { Compression, MAX_FRAME_SIZE } from "../packages/protocol/src/constants.js";
import { MalformedFrameError } from "../packages/protocol/src/errors.js";
import { MessageFramer } from "../packages/protocol/src/framer.js";
import type { RelayMessage } from "../packages/protocol/src/message.js";
import { bufferRow, frame, hdata, int, str } from "./helpers.js";

const buffers = hdata("buffer", [
  bufferRow("0x1", 1, "core.weechat", "WeeChat"),
  bufferRow("0x2", 2, "irc.libera.#weechat", "Welcome"),
]);

function header(length: number, compression: number = 0): Buffer {
  const bytes = Buffer.alloc(5);
  bytes.writeUInt32BE(length, 0);
  bytes.writeUInt8(compression, 4);
  return bytes;
}

describe("MessageFramer", () => {
  it("yields the same messages byte by byte as all at once", () => {
    const stream = Buffer.concat([
      frame("buffers1", [buffers]),
      frame("", [str("push")]),
      frame("_pong", [str("ping4")], Compression.ZLIB),
    ]);

    const whole = new MessageFramer().push(stream);

    const framer = new MessageFramer();
    const incremental: RelayMessage[] = [];
    for (const byte of stream) {
      incremental.push(...framer.push(Buffer.from([byte])));
    }

    expect(whole.map((message) => message.id)).toEqual(["buffers1", "", "_pong"]);
    expect(incremental).toEqual(whole);
    expect(framer.bufferedBytes).toBe(0);
  });

  it("waits for the rest of a frame without consuming it", () => {
    const bytes = frame("id", [int(1)]);
    const framer = new MessageFramer();

    expect(framer.push(bytes.subarray(0, 3))).toEqual([]);
    expect(framer.next()).toEqual({ status: "incomplete", buffered: 3 });
    expect(framer.push(bytes.subarray(3, bytes.length - 1))).toEqual([]);
    expect(framer.bufferedBytes).toBe(bytes.length - 1);

    const [message] = framer.push(bytes.subarray(bytes.length - 1));
    expect(message?.expect("int")).toBe(1);
  });

  it("accepts an empty chunk", () => {
    const framer = new MessageFramer();
    expect(framer.push(Buffer.alloc(0))).toEqual([]);
    expect(framer.bufferedBytes).toBe(0);
  });

  it("keeps the start of the next frame after a complete one", () => {
    const first = frame("a", [int(1)]);
    const second = frame("b", [int(2)]);
    const framer = new MessageFramer();

    const messages = framer.push(Buffer.concat([first, second.subarray(0, 6)]));

    expect(messages.map((message) => message.id)).toEqual(["a"]);
    expect(framer.bufferedBytes).toBe(6);
    expect(framer.push(second.subarray(6)).map((message) => message.id)).toEqual(["b"]);
  });

  it("decodes compressed frames to the same objects", () => {
    const [plain] = new MessageFramer().push(frame("buffers1", [buffers]));
    const [compressed] = new MessageFramer().push(frame("buffers1", [buffers], Compression.ZLIB));

    expect(plain?.compressed).toBe(false);
    expect(compressed?.compressed).toBe(true);
    expect(compressed?.objects).toEqual(plain?.objects);
  });

  it("rejects a frame whose last object runs past the declared length", () => {
    // 20 bytes: header, empty id, an int, then a str tag with 1 byte of its length
    const bytes = Buffer.concat([
      header(20),
      Buffer.from([0, 0, 0, 0]),
      Buffer.from("int", "latin1"),
      Buffer.from([0, 0, 0, 7]),
      Buffer.from("str", "latin1"),
      Buffer.from([0]),
    ]);
    expect(bytes.length).toBe(20);

    const framer = new MessageFramer();
    expect(() => framer.push(bytes)).toThrow(MalformedFrameError);
    expect(() => framer.next()).toThrow(MalformedFrameError);
    expect(framer.bufferedBytes).toBe(0);
  });

  it("rejects a declared length shorter than the header", () => {
    expect(() => new MessageFramer().push(header(3))).toThrow(MalformedFrameError);
  });

  it("rejects a declared length over the limit before it arrives", () => {
    const bytes = Buffer.alloc(4);
    bytes.writeUInt32BE(MAX_FRAME_SIZE + 1, 0);
    expect(() => new MessageFramer().push(bytes)).toThrow(/Frame too large/);
  });

  it("rejects an unknown compression flag", () => {
    const bytes = Buffer.concat([header(9, 2), Buffer.from([0, 0, 0, 0])]);
    expect(() => new MessageFramer().push(bytes)).toThrow(/Unknown compression flag: 2/);
  });

  it("rejects a body that does not inflate", () => {
    const bytes = Buffer.concat([header(9, 1), Buffer.from([1, 2, 3, 4])]);
    expect(() => new MessageFramer().push(bytes)).toThrow(/Decompression failed/);
  });
});
