import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { ItemGeneratorBase } from "./base.js";
import type { GeneratorContext } from "./base.js";
import { AMMO_TYPES, attackAttributes, weaponCategory, weaponDamage } from "./tables.js";

export class AmmoGeneratorData extends ItemGeneratorBase {
  protected readonly kind = "Weapon";

  constructor(context: GeneratorContext) {
    super(GameParam.AMMO, context);
  }

  protected override isMainRow(row: ParamRow): boolean {
    return AMMO_TYPES.has(row.int("wepType")) && super.isMainRow(row);
  }

  constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      category: weaponCategory(row.int("wepType")) ?? "Unknown",
      damage: weaponDamage(row),
      attack_attributes: attackAttributes(row),
    };
  }
}
