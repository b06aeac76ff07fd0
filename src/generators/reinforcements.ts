import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { GeneratorDataBase } from "./base.js";
import type { GeneratorContext } from "./base.js";

const MAX_LEVEL = 25;

/**
 * Upgrade multipliers per reinforcement type. A type's level `n` lives at row `type id + n`.
 */
export class ReinforcementGeneratorData extends GeneratorDataBase {
  constructor(context: GeneratorContext) {
    super(GameParam.REINFORCEMENTS, context);
  }

  override requirePatching(): boolean {
    return false;
  }

  protected override isMainRow(row: ParamRow): boolean {
    return row.id % 100 === 0;
  }

  getKeyName(row: ParamRow): string {
    return String(row.id);
  }

  constructObject(row: ParamRow): JsonObject {
    const levels: JsonObject = {};

    for (let level = 0; level <= MAX_LEVEL; ++level) {
      const levelRow = level === 0 ? row : this.params.row(this.mainParam, row.id + level);
      if (!levelRow) break;
      levels[String(level)] = this.level(levelRow);
    }

    return levels;
  }

  private level(row: ParamRow): JsonObject {
    return {
      damage: {
        physical: row.float("physicsAtkRate", 1),
        magic: row.float("magicAtkRate", 1),
        fire: row.float("fireAtkRate", 1),
        lightning: row.float("thunderAtkRate", 1),
        holy: row.float("darkAtkRate", 1),
        stamina: row.float("staminaAtkRate", 1),
      },
      scaling: {
        strength: row.float("correctStrengthRate", 1),
        dexterity: row.float("correctAgilityRate", 1),
        intelligence: row.float("correctMagicRate", 1),
        faith: row.float("correctFaithRate", 1),
        arcane: row.float("correctLuckRate", 1),
      },
      guard: {
        physical: row.float("physicsGuardCutRate", 1),
        magic: row.float("magicGuardCutRate", 1),
        fire: row.float("fireGuardCutRate", 1),
        lightning: row.float("thunderGuardCutRate", 1),
        holy: row.float("darkGuardCutRate", 1),
        guard_boost: row.float("staminaGuardDefRate", 1),
      },
    };
  }
}
