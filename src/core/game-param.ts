import type { IdRange } from "../db/params.js";

/**
 * Entity categories the generators produce. `all` selects every other one.
 */
export enum GameParam {
  ALL = "all",
  AMMO = "ammo",
  ARMAMENTS = "armaments",
  ARMOR = "armor",
  ASHES_OF_WAR = "ashes-of-war",
  BOLSTERING_MATERIALS = "bolstering-materials",
  CORRECTION_ATTACK = "correction-attack",
  CORRECTION_GRAPH = "correction-graph",
  CRAFTING_MATERIALS = "crafting-materials",
  INFO = "info",
  KEYS = "keys",
  REINFORCEMENTS = "reinforcements",
  SHOP = "shop",
  SPELLS = "spells",
  SPIRIT_ASHES = "spirit-ashes",
  TALISMANS = "talismans",
  TOOLS = "tools",
}

export type EffectiveGameParam = Exclude<GameParam, GameParam.ALL>;

const STEMS: Record<EffectiveGameParam, string> = {
  [GameParam.AMMO]: "EquipParamWeapon",
  [GameParam.ARMAMENTS]: "EquipParamWeapon",
  [GameParam.ARMOR]: "EquipParamProtector",
  [GameParam.ASHES_OF_WAR]: "EquipParamGem",
  [GameParam.BOLSTERING_MATERIALS]: "EquipParamGoods",
  [GameParam.CORRECTION_ATTACK]: "AttackElementCorrectParam",
  [GameParam.CORRECTION_GRAPH]: "CalcCorrectGraph",
  [GameParam.CRAFTING_MATERIALS]: "EquipParamGoods",
  [GameParam.INFO]: "EquipParamGoods",
  [GameParam.KEYS]: "EquipParamGoods",
  [GameParam.REINFORCEMENTS]: "ReinforceParamWeapon",
  [GameParam.SHOP]: "EquipParamGoods",
  [GameParam.SPELLS]: "EquipParamGoods",
  [GameParam.SPIRIT_ASHES]: "EquipParamGoods",
  [GameParam.TALISMANS]: "EquipParamAccessory",
  [GameParam.TOOLS]: "EquipParamGoods",
};

const ID_RANGES: Partial<Record<EffectiveGameParam, IdRange>> = {
  [GameParam.SPIRIT_ASHES]: [200000, 300000],
};

/** Every category except `all`, sorted by tag. */
export function effectiveParams(): EffectiveGameParam[] {
  return Object.values(GameParam)
    .filter((param): param is EffectiveGameParam => param !== GameParam.ALL)
    .sort();
}

export function stem(param: EffectiveGameParam): string {
  return STEMS[param];
}

export function idRange(param: EffectiveGameParam): IdRange | undefined {
  return ID_RANGES[param];
}

/** `ashes-of-war` → `Ashes Of War`; also the element name of the output document. */
export function title(param: GameParam): string {
  return param
    .split("-")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function outputFile(param: EffectiveGameParam): string {
  return `${param}.json`;
}

export function schemaFile(param: EffectiveGameParam): string {
  return `${param}.schema.json`;
}
