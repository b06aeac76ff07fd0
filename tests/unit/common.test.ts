import { describe, expect, it } from "vitest";
import { patchKeys, renameKeys, updateNested } from "../../src/core/common.js";
import type { PropertyShape, PropertyTable } from "../../src/core/common.js";

describe("updateNested", () => {
  it("overlays nested objects and keeps keys missing from the update", () => {
    const current = { a: 1, b: { c: 2, d: 3 }, keep: "x" };
    const next = { b: { c: 5 }, e: [1, 2] };

    const result = updateNested(current, next);

    expect(result).toEqual({ a: 1, b: { c: 5, d: 3 }, keep: "x", e: [1, 2] });
    expect(result).toBe(current);
  });

  it("copies arrays instead of sharing them", () => {
    const next = { list: [1, 2] };
    const result = updateNested({}, next);

    expect(result.list).toEqual([1, 2]);
    expect(result.list).not.toBe(next.list);
  });

  it("merges the documented example", () => {
    expect(updateNested({ a: 1, b: { x: 1 } }, { b: { y: 2 }, c: 3 })).toEqual({ a: 1, b: { x: 1, y: 2 }, c: 3 });
  });

  it("leaves the result unchanged when the same update is applied again", () => {
    const next = { b: { y: 2, z: [1] }, c: 3 };
    const once = updateNested({ a: 1, b: { x: 1 } }, next);
    const snapshot = structuredClone(once);

    expect(updateNested(once, next)).toEqual(snapshot);
  });

  it("replaces a scalar with an object", () => {
    expect(updateNested({ a: 1 }, { a: { b: 2 } })).toEqual({ a: { b: 2 } });
  });
});

describe("renameKeys", () => {
  it("moves legacy keys whose new name is unset", () => {
    const source = { legacy: { curated: true }, other: 1 };

    expect(renameKeys(source, { legacy: "current" })).toEqual({ other: 1, current: { curated: true } });
    expect(source).toEqual({ legacy: { curated: true }, other: 1 });
  });

  it("leaves a legacy key in place when the new name is set", () => {
    expect(renameKeys({ legacy: 1, current: 2 }, { legacy: "current" })).toEqual({ legacy: 1, current: 2 });
  });
});

describe("patchKeys", () => {
  const table: PropertyTable = new Map<string, PropertyShape>([
    ["id", {}],
    ["name", {}],
    ["stats", { properties: new Map<string, PropertyShape>([["hp", {}]]) }],
    ["variants", { additionalProperties: new Map<string, PropertyShape>([["id", {}]]) }],
  ]);

  it("drops undeclared keys and orders by declaration", () => {
    const patched = patchKeys(
      {
        name: "N",
        extra: 1,
        id: 3,
        stats: { hp: 1, junk: 2 },
        variants: { a: { id: 1, junk: 1 }, b: 5 },
      },
      table,
    );

    expect(Object.keys(patched)).toEqual(["id", "name", "stats", "variants"]);
    expect(patched.stats).toEqual({ hp: 1 });
    expect(patched.variants).toEqual({ a: { id: 1 }, b: 5 });
  });

  it("moves a legacy key to its new name", () => {
    const properties: PropertyTable = new Map<string, PropertyShape>([["current", {}]]);

    expect(patchKeys({ legacy: 1 }, properties, { legacy: "current" })).toEqual({ current: 1 });
    expect(patchKeys({ legacy: 1, current: 2 }, properties, { legacy: "current" })).toEqual({ current: 2 });
  });
});
