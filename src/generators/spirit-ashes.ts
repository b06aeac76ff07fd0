import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import type { GeneratorContext } from "./base.js";
import { GoodsGeneratorBase } from "./goods.js";
import { GoodsType } from "./tables.js";

export class SpiritAshGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.SPIRIT_ASHES, context, new Set([
      GoodsType.SPIRIT_SUMMON_LESSER,
      GoodsType.SPIRIT_SUMMON_GREATER,
    ]));
  }

  override constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      fp_cost: row.int("consumeMP"),
      hp_cost: row.int("consumeHP"),
      upgrade_material: row.int("goodsType") === GoodsType.SPIRIT_SUMMON_GREATER ? "Ghost Glovewort" : "Grave Glovewort",
    };
  }
}
