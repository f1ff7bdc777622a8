import { describe, it, expect } from "vitest";
import { ByteCursor } from "../packages/protocol/src/cursor.js";
import {
  decodeObject,
  decodePointer,
  decodeString,
  decodeTypedObject,
  parseHDataKeys,
} from "../packages/protocol/src/decoder.js";
import { encodeObject, encodePointer } from "../packages/protocol/src/encoder.js";
import { IncompleteFrameError, MalformedFrameError } from "../packages/protocol/src/errors.js";
import { MessageFramer } from "../packages/protocol/src/framer.js";
import type { RelayObject } from "../packages/protocol/src/types.js";
import { chr, frame, hdata, int, key, ptr, str, stringTable, strings, tim } from "./helpers.js";

function cursor(...bytes: Array<number | string>): ByteCursor {
  const parts = bytes.map((part) =>
    typeof part === "string" ? Buffer.from(part, "latin1") : Buffer.from([part])
  );
  return new ByteCursor(Buffer.concat(parts));
}

describe("strings", () => {
  it("decodes a 0xFFFFFFFF length as null", () => {
    expect(decodeString(cursor(0xff, 0xff, 0xff, 0xff))).toBeNull();
  });

  it("decodes a zero length as the empty string", () => {
    expect(decodeString(cursor(0, 0, 0, 0))).toBe("");
  });

  it("decodes UTF-8 content", () => {
    const bytes = Buffer.from("héllo", "utf8");
    const c = new ByteCursor(Buffer.concat([Buffer.from([0, 0, 0, bytes.length]), bytes]));
    expect(decodeString(c)).toBe("héllo");
    expect(c.remaining).toBe(0);
  });

  it("throws IncompleteFrameError when the content is cut short", () => {
    expect(() => decodeString(cursor(0, 0, 0, 5, "ab"))).toThrow(IncompleteFrameError);
  });
});

describe("pointers", () => {
  it("prefixes hex with 0x", () => {
    expect(decodePointer(cursor(4, "1a2b"))).toBe("0x1a2b");
  });

  it("decodes pointer 0 as the null pointer", () => {
    expect(decodePointer(cursor(1, "0"))).toBe("0x0");
  });

  it("decodes an empty pointer as the null pointer", () => {
    expect(decodePointer(cursor(0))).toBe("0x0");
  });

  it("rejects non-hex characters", () => {
    expect(() => decodePointer(cursor(2, "zz"))).toThrow(MalformedFrameError);
  });

  it("encodes the null pointer as 0", () => {
    expect(encodePointer("0x0")).toEqual(Buffer.from([1, 0x30]));
  });
});

describe("scalars", () => {
  it("decodes chr as a signed byte", () => {
    expect(decodeTypedObject(cursor("chr", 0x41))).toEqual({ type: "chr", value: 65 });
    expect(decodeTypedObject(cursor("chr", 0xff))).toEqual({ type: "chr", value: -1 });
  });

  it("decodes int as signed 32-bit big endian", () => {
    expect(decodeTypedObject(cursor("int", 0xff, 0xff, 0xff, 0xfb))).toEqual({
      type: "int",
      value: -5,
    });
  });

  it("decodes lon as a bigint", () => {
    expect(decodeTypedObject(cursor("lon", 3, "-42"))).toEqual({ type: "lon", value: -42n });
  });

  it("decodes tim as seconds", () => {
    expect(decodeTypedObject(cursor("tim", 10, "1700000000"))).toEqual({
      type: "tim",
      value: 1700000000,
    });
  });

  it("rejects a non-numeric time", () => {
    expect(() => decodeTypedObject(cursor("tim", 2, "1x"))).toThrow(MalformedFrameError);
  });

  it("rejects unknown type tags", () => {
    expect(() => decodeTypedObject(cursor("xyz", 0, 0, 0, 0))).toThrow(MalformedFrameError);
  });
});

describe("hdata", () => {
  it("parses key declarations", () => {
    expect(parseHDataKeys("number:int,full_name:str")).toEqual([
      { name: "number", type: "int" },
      { name: "full_name", type: "str" },
    ]);
    expect(parseHDataKeys(null)).toEqual([]);
  });

  it("rejects a key declaration without a type", () => {
    expect(() => parseHDataKeys("number")).toThrow(MalformedFrameError);
    expect(() => parseHDataKeys("number:nope")).toThrow(MalformedFrameError);
  });

  it("decodes an hdata with zero rows", () => {
    const object = hdata("buffer", [], [key("number", "int"), key("title", "str")]);
    const decoded = decodeObject(new ByteCursor(encodeObject(object)), "hda");

    expect(decoded).toEqual({
      type: "hda",
      value: {
        path: ["buffer"],
        keys: [
          { name: "number", type: "int" },
          { name: "title", type: "str" },
        ],
        rows: [],
      },
    });
  });

  it("reads one pointer per path element before the values", () => {
    const object = hdata("buffer/lines/line/line_data", [
      { pointers: ["0x1", "0x2", "0x3", "0x4"], values: { message: str("hi") } },
    ]);
    const decoded = decodeObject(new ByteCursor(encodeObject(object)), "hda");

    expect(decoded.type).toBe("hda");
    if (decoded.type !== "hda") return;
    expect(decoded.value.rows[0]?.pointers).toEqual(["0x1", "0x2", "0x3", "0x4"]);
    expect(decoded.value.rows[0]?.values.get("message")).toEqual(str("hi"));
  });

  it("rejects a negative row count", () => {
    const c = cursor(0, 0, 0, 6, "buffer", 0, 0, 0, 10, "number:int", 0xff, 0xff, 0xff, 0xff);
    expect(() => decodeObject(c, "hda")).toThrow(MalformedFrameError);
  });
});

describe("frames", () => {
  it("decodes every object type from one frame", () => {
    const objects: RelayObject[] = [
      chr(7),
      int(-123456),
      { type: "lon", value: 9007199254740993n },
      str(null),
      str(""),
      str("text"),
      { type: "buf", value: null },
      { type: "buf", value: Buffer.from([1, 2, 3]) },
      ptr("0x0"),
      ptr("0xdeadbeef"),
      tim(1700000000),
      stringTable({ away: "0", name: "weechat" }),
      hdata("buffer", [], [key("number", "int")]),
      { type: "inf", value: { name: "version", value: "4.1.0" } },
      {
        type: "inl",
        value: {
          name: "buffer",
          items: [new Map<string, RelayObject>([["name", str("core.weechat")], ["number", int(1)]])],
        },
      },
      strings(["irc_privmsg", "nick_alice"]),
    ];

    const [decoded] = new MessageFramer().push(frame("all", objects));

    expect(decoded?.id).toBe("all");
    expect(decoded?.objects).toEqual(objects);
  });

  it("keeps a null string distinct from an empty string", () => {
    const [decoded] = new MessageFramer().push(frame("s", [str(null), str("")]));

    expect(decoded?.objects[0]).toEqual({ type: "str", value: null });
    expect(decoded?.objects[1]).toEqual({ type: "str", value: "" });
  });
});
