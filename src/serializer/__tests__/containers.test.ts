import { describe, it, expect, beforeEach } from "@jest/globals";
import { ErrorKind } from "../../errors";
import { ClassRegistry } from "../class-registry";
import { Serializer } from "../Serializer";
import type { Slot } from "../types";
import { t } from "../value-types";
import { recordOf } from "./helpers";

class Grid {
  cells: number[] = [0, 0, 0];
  tags = new Set<string>();
  labels = new Map<string, string>();
  rows: number[][] = [];
}

describe("containers", () => {
  let serializer: Serializer;

  beforeEach(() => {
    const registry = new ClassRegistry();
    registry
      .define("Grid", Grid)
      .field("cells", t.fixedArray(t.int(), 3))
      .field("tags", t.set(t.string()))
      .field("labels", t.map(t.string()))
      .field("rows", t.array(t.array(t.int())));
    serializer = new Serializer(registry, { onError: () => undefined });
  });

  it("writes arrays one element per line", () => {
    expect(serializer.stringify(t.array(t.int()), [1, 2])).toBe(
      "[\n  1,\n  2\n]\n",
    );
    expect(serializer.stringify(t.array(t.int()), [])).toBe("[]\n");
  });

  it("reads arrays at the root", () => {
    expect(serializer.parse(t.array(t.int()), "[1, 2, 3]")).toEqual([1, 2, 3]);
    expect(serializer.parse(t.array(t.string()), "[]")).toEqual([]);
  });

  it("replaces the contents of the array already in the slot", () => {
    const existing = [9, 9, 9];
    const slot: Slot<number[]> = { value: existing };
    expect(serializer.read(slot, t.array(t.int()), { text: "[1]" })).toBe(true);
    expect(slot.value).toBe(existing);
    expect(existing).toEqual([1]);
  });

  it("fills fixed arrays in place", () => {
    const existing = [7, 7, 7];
    const slot: Slot<number[]> = { value: existing };
    serializer.read(slot, t.fixedArray(t.int(), 3), { text: "[5]" });
    expect(existing).toEqual([5, 7, 7]);
  });

  it("rejects elements past the capacity of a fixed array", () => {
    expect(
      recordOf(() => serializer.parse(t.fixedArray(t.int(), 2), "[1, 2, 3]")),
    ).toMatchObject({
      kind: ErrorKind.CantAddToArray,
      arg: "(capacity 2) at '3'",
    });
  });

  it("reads sets without duplicates", () => {
    const tags = serializer.parse(t.set(t.string()), '["a", "b", "a"]');
    expect(Array.from(tags)).toEqual(["a", "b"]);
  });

  it("escapes map keys that start with @", () => {
    const labels = new Map([
      ["@home", "1"],
      ["work", "2"],
    ]);
    const text = serializer.stringify(t.map(t.string()), labels);
    expect(text).toBe('{\n  "@@home": "1",\n  "work": "2"\n}\n');
    expect(serializer.parse(t.map(t.string()), text)).toEqual(labels);
  });

  it("rejects unescaped marker keys in maps", () => {
    expect(
      recordOf(() => serializer.parse(t.map(t.int()), '{"@id": 1}')),
    ).toMatchObject({ kind: ErrorKind.WrongKeyword, arg: '"@id"' });
  });

  it("keeps __proto__ an ordinary record key", () => {
    const parsed = serializer.parse(t.record(t.int()), '{"__proto__": 1, "a": 2}');
    expect(Object.keys(parsed)).toEqual(["__proto__", "a"]);
    expect(Object.getPrototypeOf(parsed)).toBe(Object.prototype);
  });

  it("names the entry holding an invalid value", () => {
    expect(
      recordOf(() => serializer.parse(t.map(t.int()), '{"a": 1, "b": "x"}')).arg,
    ).toBe("\"x\" for member 'b'");
  });

  it("reports bracket mistakes", () => {
    expect(recordOf(() => serializer.parse(t.array(t.int()), "{}")).kind).toBe(
      ErrorKind.ExpectingBracket,
    );
    expect(recordOf(() => serializer.parse(t.array(t.int()), "[1}")).arg).toBe(
      "']' before '}'",
    );
    expect(recordOf(() => serializer.parse(t.array(t.int()), "[1,,2]")).kind).toBe(
      ErrorKind.ExpectingValueOrBracket,
    );
    expect(recordOf(() => serializer.parse(t.array(t.int()), "[1, 2")).kind).toBe(
      ErrorKind.PrematureEOF,
    );
  });

  it("round-trips containers inside a class", () => {
    const grid = new Grid();
    grid.cells = [1, 2, 3];
    grid.tags = new Set(["x"]);
    grid.labels = new Map([["k", "v"]]);
    grid.rows = [[1], []];

    const text = serializer.stringify(Grid, grid);
    expect(text).toBe(
      [
        "{",
        '  "cells": [',
        "    1,",
        "    2,",
        "    3",
        "  ],",
        '  "tags": [',
        '    "x"',
        "  ],",
        '  "labels": {',
        '    "k": "v"',
        "  },",
        '  "rows": [',
        "    [",
        "      1",
        "    ],",
        "    []",
        "  ]",
        "}",
        "",
      ].join("\n"),
    );
    expect(serializer.parse(Grid, text)).toEqual(grid);
  });
});
