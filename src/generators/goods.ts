import { GameParam } from "../core/game-param.js";
import type { EffectiveGameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { ItemGeneratorBase } from "./base.js";
import type { GeneratorContext } from "./base.js";
import { GoodsType, shopCategory } from "./tables.js";

/**
 * Generator over EquipParamGoods rows of a fixed set of goods types.
 */
export abstract class GoodsGeneratorBase extends ItemGeneratorBase {
  protected readonly kind = "Goods";

  protected constructor(
    param: EffectiveGameParam,
    context: GeneratorContext,
    private readonly goodsTypes: ReadonlySet<GoodsType>,
  ) {
    super(param, context);
  }

  protected override isMainRow(row: ParamRow): boolean {
    return this.goodsTypes.has(row.int("goodsType", -1)) && super.isMainRow(row);
  }

  constructObject(row: ParamRow): JsonObject {
    return this.itemBase(row);
  }
}

const TOOL_CATEGORIES: ReadonlyMap<number, string> = new Map([
  [GoodsType.NORMAL_ITEM, "Consumable"],
  [GoodsType.REMEMBRANCE, "Remembrance"],
  [GoodsType.WONDROUS_PHYSICK, "Physick"],
  [GoodsType.WONDROUS_PHYSICK_TEAR, "Crystal Tear"],
  [GoodsType.GREAT_RUNE, "Great Rune"],
]);

export class ToolGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.TOOLS, context, new Set([
      GoodsType.NORMAL_ITEM,
      GoodsType.REMEMBRANCE,
      GoodsType.WONDROUS_PHYSICK,
      GoodsType.WONDROUS_PHYSICK_TEAR,
      GoodsType.GREAT_RUNE,
    ]));
  }

  override constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      category: TOOL_CATEGORIES.get(row.int("goodsType")) ?? "Consumable",
      is_consumed: row.bool("isConsume"),
    };
  }
}

export class CraftingMaterialGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.CRAFTING_MATERIALS, context, new Set([GoodsType.CRAFTING_MATERIAL]));
  }
}

export class BolsteringMaterialGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.BOLSTERING_MATERIALS, context, new Set([
      GoodsType.REINFORCEMENT_MATERIAL,
      GoodsType.REGENERATIVE_MATERIAL,
    ]));
  }
}

export class KeyGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.KEYS, context, new Set([GoodsType.KEY_ITEM]));
  }

  protected override isMainRow(row: ParamRow): boolean {
    return super.isMainRow(row) && shopCategory(this.getKeyName(row)) === undefined;
  }
}

/**
 * Key items bought to unlock something: cookbooks, bell bearings, whetblades,
 * map fragments and spellbooks.
 */
export class ShopGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.SHOP, context, new Set([GoodsType.KEY_ITEM]));
  }

  protected override isMainRow(row: ParamRow): boolean {
    return super.isMainRow(row) && shopCategory(this.getKeyName(row)) !== undefined;
  }

  override constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      category: shopCategory(this.getKeyName(row)) ?? "Key",
    };
  }
}

export class InfoGeneratorData extends GoodsGeneratorBase {
  constructor(context: GeneratorContext) {
    super(GameParam.INFO, context, new Set([GoodsType.INFO_ITEM]));
  }
}
