import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import type { GeneratorContext } from "./base.js";
import { GoodsGeneratorBase } from "./goods.js";
import { attributeRequirements, GoodsType } from "./tables.js";

const MAGIC_STEM = "Magic";

const SORCERIES: ReadonlySet<number> = new Set([GoodsType.SORCERY, GoodsType.SELF_BUFF_SORCERY]);
const BUFFS: ReadonlySet<number> = new Set([GoodsType.SELF_BUFF_SORCERY, GoodsType.SELF_BUFF_INCANTATION]);

export class SpellGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.SPELLS, context, new Set([
      GoodsType.SORCERY,
      GoodsType.INCANTATION,
      GoodsType.SELF_BUFF_SORCERY,
      GoodsType.SELF_BUFF_INCANTATION,
    ]));
  }

  override constructObject(row: ParamRow): JsonObject {
    const goodsType = row.int("goodsType");
    const magicId = row.int("refId_default", row.id);
    const magic = this.params.row(MAGIC_STEM, magicId);

    if (!magic) {
      this.log.warn({ id: row.id, magicId }, "Spell has no Magic row");
    }

    return {
      ...this.itemBase(row),
      category: SORCERIES.has(goodsType) ? "Sorcery" : "Incantation",
      fp_cost: magic?.int("mp") ?? 0,
      sp_cost: magic?.int("stamina") ?? 0,
      slots_used: magic?.int("slotLength", 1) ?? 1,
      requirements: magic
        ? attributeRequirements(magic, {
          intelligence: "requirementIntellect",
          faith: "requirementFaith",
          arcane: "requirementLuck",
        })
        : { intelligence: 0, faith: 0, arcane: 0 },
      is_buff: BUFFS.has(goodsType),
    };
  }
}
