import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { ItemGeneratorBase } from "./base.js";
import type { GeneratorContext } from "./base.js";

// EquipParamProtector.protectorCategory
const CATEGORIES = ["head", "body", "arms", "legs"] as const;

const ABSORPTION_FIELDS: Array<[string, string]> = [
  ["physical", "neutralDamageCutRate"],
  ["strike", "blowDamageCutRate"],
  ["slash", "slashDamageCutRate"],
  ["pierce", "thrustDamageCutRate"],
  ["magic", "magicDamageCutRate"],
  ["fire", "fireDamageCutRate"],
  ["lightning", "thunderDamageCutRate"],
  ["holy", "darkDamageCutRate"],
];

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export class ArmorGeneratorData extends ItemGeneratorBase {
  protected readonly kind = "Protector";

  constructor(context: GeneratorContext) {
    super(GameParam.ARMOR, context);
  }

  override keyRenames(): Readonly<Record<string, string>> {
    return { absorption: "absorptions", resistance: "resistances" };
  }

  protected override isMainRow(row: ParamRow): boolean {
    const category = row.int("protectorCategory", -1);
    return category >= 0 && category < CATEGORIES.length && super.isMainRow(row);
  }

  constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      category: CATEGORIES[row.int("protectorCategory")],
      weight: row.float("weight"),
      absorptions: this.absorptions(row),
      resistances: this.resistances(row),
    };
  }

  /** Cut rates are damage multipliers; absorption is the percentage removed. */
  private absorptions(row: ParamRow): JsonObject {
    const absorptions: JsonObject = {};
    for (const [name, field] of ABSORPTION_FIELDS) {
      absorptions[name] = round((1 - row.float(field, 1)) * 100, 1);
    }
    return absorptions;
  }

  private resistances(row: ParamRow): JsonObject {
    return {
      immunity: row.int("resistPoison"),
      robustness: row.int("resistBlood"),
      focus: row.int("resistSleep"),
      vitality: row.int("resistCurse"),
      poise: round(row.float("toughnessCorrectRate") * 1000, 1),
    };
  }
}
