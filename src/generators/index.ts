import { GameParam } from "../core/game-param.js";
import type { EffectiveGameParam } from "../core/game-param.js";
import { AmmoGeneratorData } from "./ammo.js";
import { ArmamentGeneratorData } from "./armaments.js";
import { ArmorGeneratorData } from "./armor.js";
import { AshOfWarGeneratorData } from "./ashes-of-war.js";
import type { GeneratorContext, GeneratorDataBase } from "./base.js";
import { CorrectionAttackGeneratorData } from "./correction-attack.js";
import { CorrectionGraphGeneratorData } from "./correction-graph.js";
import {
  BolsteringMaterialGeneratorData,
  CraftingMaterialGeneratorData,
  InfoGeneratorData,
  KeyGeneratorData,
  ShopGeneratorData,
  ToolGeneratorData,
} from "./goods.js";
import { ReinforcementGeneratorData } from "./reinforcements.js";
import { SpellGeneratorData } from "./spells.js";
import { SpiritAshGeneratorData } from "./spirit-ashes.js";
import { TalismanGeneratorData } from "./talismans.js";

export type { GeneratorContext } from "./base.js";
export { GeneratorDataBase } from "./base.js";

const GENERATORS: Record<EffectiveGameParam, new (context: GeneratorContext) => GeneratorDataBase> = {
  [GameParam.AMMO]: AmmoGeneratorData,
  [GameParam.ARMAMENTS]: ArmamentGeneratorData,
  [GameParam.ARMOR]: ArmorGeneratorData,
  [GameParam.ASHES_OF_WAR]: AshOfWarGeneratorData,
  [GameParam.BOLSTERING_MATERIALS]: BolsteringMaterialGeneratorData,
  [GameParam.CORRECTION_ATTACK]: CorrectionAttackGeneratorData,
  [GameParam.CORRECTION_GRAPH]: CorrectionGraphGeneratorData,
  [GameParam.CRAFTING_MATERIALS]: CraftingMaterialGeneratorData,
  [GameParam.INFO]: InfoGeneratorData,
  [GameParam.KEYS]: KeyGeneratorData,
  [GameParam.REINFORCEMENTS]: ReinforcementGeneratorData,
  [GameParam.SHOP]: ShopGeneratorData,
  [GameParam.SPELLS]: SpellGeneratorData,
  [GameParam.SPIRIT_ASHES]: SpiritAshGeneratorData,
  [GameParam.TALISMANS]: TalismanGeneratorData,
  [GameParam.TOOLS]: ToolGeneratorData,
};

export function createGenerator(param: EffectiveGameParam, context: GeneratorContext): GeneratorDataBase {
  return new GENERATORS[param](context);
}
