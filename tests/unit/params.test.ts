import { beforeEach, describe, expect, it } from "vitest";
import { openGamedata } from "../../src/db/index.js";
import { ParamStore } from "../../src/db/params.js";
import { NotFoundError, ParamFieldError } from "../../src/errors.js";
import { seedStore } from "../helpers.js";

describe("ParamStore", () => {
  let store: ParamStore;

  beforeEach(() => {
    store = new ParamStore(openGamedata(":memory:"));
    seedStore(store, {
      params: {
        EquipParamGoods: [
          { id: 10, name: "Flask", fields: { count: "5", weight: "1.5", label: "abc" } },
          { id: 20, fields: { count: "0" } },
          { id: 30, fields: {} },
        ],
      },
      messages: { GoodsName: { 10: "Flask of Tears" } },
    });
  });

  it("reads rows ordered by id and within a range", () => {
    expect(store.rows("EquipParamGoods").map((row) => row.id)).toEqual([10, 20, 30]);
    expect(store.rows("EquipParamGoods", [15, 30]).map((row) => row.id)).toEqual([20]);
    expect(store.row("EquipParamGoods", 99)).toBeUndefined();
  });

  it("converts field values on access", () => {
    const row = store.row("EquipParamGoods", 10);

    expect(row?.name).toBe("Flask");
    expect(row?.has("label")).toBe(true);
    expect(row?.str("label")).toBe("abc");
    expect(row?.has("missing")).toBe(false);
    expect(row?.int("count")).toBe(5);
    expect(row?.float("weight")).toBe(1.5);
    expect(row?.int("missing", 7)).toBe(7);
    expect(row?.bool("count")).toBe(true);
    expect(store.row("EquipParamGoods", 20)?.bool("count")).toBe(false);
    expect(() => row?.int("weight")).toThrow(ParamFieldError);
    expect(() => row?.float("label")).toThrow("EquipParamGoods[10].label is not numeric: 'abc'");
  });

  it("looks up messages", () => {
    expect(store.message("GoodsName", 10)).toBe("Flask of Tears");
    expect(store.message("GoodsName", 20)).toBeUndefined();
  });

  it("reports missing tables", () => {
    expect(store.has("EquipParamWeapon")).toBe(false);
    expect(() => store.rows("EquipParamWeapon")).toThrow(NotFoundError);
    expect(() => store.rows("EquipParamWeapon")).toThrow("Param table 'EquipParamWeapon' not found");
  });

  it("extracts one field of every row", () => {
    expect(store.fieldValues("EquipParamGoods", "count")).toEqual([
      { id: 10, name: "Flask", value: "5" },
      { id: 20, name: "", value: "0" },
      { id: 30, name: "", value: null },
    ]);
  });

  it("replaces a table on reimport", () => {
    store.replaceParam("EquipParamGoods", [{ id: 40, name: "", fields: {} }]);

    expect(store.rows("EquipParamGoods").map((row) => row.id)).toEqual([40]);
  });
});
