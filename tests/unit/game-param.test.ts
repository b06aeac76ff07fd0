import { describe, expect, it } from "vitest";
import {
  effectiveParams,
  GameParam,
  idRange,
  outputFile,
  schemaFile,
  stem,
  title,
} from "../../src/core/game-param.js";

describe("game params", () => {
  it("derives names from the tag", () => {
    expect(title(GameParam.ASHES_OF_WAR)).toBe("Ashes Of War");
    expect(outputFile(GameParam.ARMOR)).toBe("armor.json");
    expect(schemaFile(GameParam.SPIRIT_ASHES)).toBe("spirit-ashes.schema.json");
  });

  it("lists every category except all, sorted", () => {
    const params = effectiveParams();

    expect(params).toHaveLength(16);
    expect(params[0]).toBe(GameParam.AMMO);
    expect(params).not.toContain(GameParam.ALL);
  });

  it("maps categories to their source tables", () => {
    expect(stem(GameParam.TALISMANS)).toBe("EquipParamAccessory");
    expect(stem(GameParam.SPELLS)).toBe("EquipParamGoods");
    expect(idRange(GameParam.SPIRIT_ASHES)).toEqual([200000, 300000]);
    expect(idRange(GameParam.TOOLS)).toBeUndefined();
  });
});
