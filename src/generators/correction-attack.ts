import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { GeneratorDataBase } from "./base.js";
import type { GeneratorContext } from "./base.js";

// AttackElementCorrectParam field infixes
const ATTRIBUTES: Record<string, string> = {
  strength: "Strength",
  dexterity: "Dexterity",
  intelligence: "Magic",
  faith: "Faith",
  arcane: "Luck",
};

const DAMAGE_TYPES: Record<string, string> = {
  physical: "Physics",
  magic: "Magic",
  fire: "Fire",
  lightning: "Thunder",
  holy: "Dark",
};

type AttributeReader = (row: ParamRow, attribute: string, damageType: string) => number | boolean | undefined;

function byDamageType(row: ParamRow, read: AttributeReader): JsonObject {
  const result: JsonObject = {};
  for (const [damage, damageField] of Object.entries(DAMAGE_TYPES)) {
    const entry: JsonObject = {};
    for (const [attribute, attributeField] of Object.entries(ATTRIBUTES)) {
      const value = read(row, attributeField, damageField);
      if (value !== undefined) entry[attribute] = value;
    }
    result[damage] = entry;
  }
  return result;
}

/**
 * Which attributes scale which damage types of a weapon, keyed by
 * `EquipParamWeapon.attackElementCorrectId`.
 *
 * `override` holds the fixed scaling some pairs use in place of the weapon's
 * own; `ratio` is the share of the scaling each pair receives.
 */
export class CorrectionAttackGeneratorData extends GeneratorDataBase {
  constructor(context: GeneratorContext) {
    super(GameParam.CORRECTION_ATTACK, context);
  }

  getKeyName(row: ParamRow): string {
    return String(row.id);
  }

  constructObject(row: ParamRow): JsonObject {
    return {
      id: row.id,
      correction: byDamageType(row, (r, attribute, damage) => r.bool(`is${attribute}Correct_by${damage}`)),
      override: byDamageType(row, (r, attribute, damage) => {
        // -1 leaves the weapon's scaling in effect
        const value = r.float(`overwrite${attribute}CorrectRate_by${damage}`, -1);
        return value < 0 ? undefined : value / 100;
      }),
      ratio: byDamageType(row, (r, attribute, damage) => r.float(`Influence${attribute}CorrectRate_by${damage}`, 100) / 100),
    };
  }
}
