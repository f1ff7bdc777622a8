import { describe, it, expect } from "vitest";
import { TypeMismatchError } from "../packages/protocol/src/errors.js";
import {
  arrayToStrings,
  hashtableToRecord,
  rowInteger,
  rowPathPointer,
} from "../packages/protocol/src/objects.js";
import { bufferRow, hdata, int, message, str, stringTable, strings } from "./helpers.js";

describe("RelayMessage", () => {
  it("treats empty and underscore ids as pushes", () => {
    expect(message("", []).isPush()).toBe(true);
    expect(message("_buffer_opened", []).isPush()).toBe(true);
    expect(message("buffers1", []).isPush()).toBe(false);
  });

  it("returns the value of the expected type", () => {
    expect(message("info", [str("x"), int(3)]).expect("int", 1)).toBe(3);
  });

  it("throws TypeMismatchError for another type", () => {
    const msg = message("req1", [str("x")]);
    expect(() => msg.expect("hda")).toThrow(TypeMismatchError);
    expect(() => msg.expect("hda")).toThrow('Type mismatch in message "req1" object 0: expected hda, got str');
  });

  it("throws TypeMismatchError for a missing object", () => {
    expect(() => message("req1", []).expect("inf")).toThrow(
      'Type mismatch in message "req1" object 0: expected inf, got nothing'
    );
  });

  it("checks the hdata record name", () => {
    const msg = message("req1", [hdata("buffer", [bufferRow("0x1", 1, "core.weechat")])]);
    expect(msg.expectHData("buffer").rows).toHaveLength(1);
    expect(() => msg.expectHData("line_data")).toThrow(TypeMismatchError);
  });

  it("lists only hdata objects", () => {
    const msg = message("", [str("a"), hdata("buffer", []), int(1), hdata("line_data", [])]);
    expect(msg.hdataObjects().map((object) => object.path)).toEqual([["buffer"], ["line_data"]]);
  });

  it("is immutable", () => {
    const msg = message("a", [int(1)]);
    expect(Object.isFrozen(msg)).toBe(true);
    expect(Object.isFrozen(msg.objects)).toBe(true);
  });
});

describe("row accessors", () => {
  const buffers = message("", [hdata("buffer", [bufferRow("0x1", 1, "core.weechat")])]).expectHData();
  const row = buffers.rows[0];

  it("reads typed values", () => {
    if (!row) throw new Error("row missing");
    expect(rowInteger(row, "number")).toBe(1);
    expect(() => rowInteger(row, "full_name")).toThrow(
      'Type mismatch in hdata key "full_name": expected int, got str'
    );
  });

  it("reads path pointers from either end", () => {
    if (!row) throw new Error("row missing");
    expect(rowPathPointer(row, 0)).toBe("0x1");
    expect(rowPathPointer(row, -1)).toBe("0x1");
    expect(() => rowPathPointer(row, 1)).toThrow(TypeMismatchError);
  });

  it("converts hashtables and arrays", () => {
    const table = stringTable({ plugin: "irc", name: "libera.#weechat" });
    const array = strings(["a", "b"]);
    if (table.type !== "htb" || array.type !== "arr") throw new Error("unexpected builder output");

    expect(hashtableToRecord(table.value, "local_variables")).toEqual({
      plugin: "irc",
      name: "libera.#weechat",
    });
    expect(arrayToStrings(array.value, "tags")).toEqual(["a", "b"]);
  });
});
