import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { ItemGeneratorBase } from "./base.js";
import type { GeneratorContext } from "./base.js";
import { AFFINITIES } from "./tables.js";

export class AshOfWarGeneratorData extends ItemGeneratorBase {
  protected readonly kind = "Gem";

  constructor(context: GeneratorContext) {
    super(GameParam.ASHES_OF_WAR, context);
  }

  constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      skill_id: row.int("swordArtsParamId"),
      default_affinity: AFFINITIES[row.int("defaultWepAttr")] ?? "Standard",
      possible_affinities: AFFINITIES.filter((_, index) => row.bool(`configurableWepAttr${String(index).padStart(2, "0")}`)),
    };
  }
}
