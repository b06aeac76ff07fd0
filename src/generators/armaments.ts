import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { fullHexId, ItemGeneratorBase } from "./base.js";
import type { GeneratorContext } from "./base.js";
import {
  AFFINITIES,
  AMMO_TYPES,
  attackAttributes,
  attributeRequirements,
  weaponCategory,
  weaponDamage,
  weaponGuard,
  weaponScaling,
} from "./tables.js";

const REINFORCE_STEM = "ReinforceParamWeapon";

// EquipParamWeapon.gemMountType: 0 and 1 take no ash of war
const GEM_MOUNTABLE = 2;

export class ArmamentGeneratorData extends ItemGeneratorBase {
  protected readonly kind = "Weapon";

  constructor(context: GeneratorContext) {
    super(GameParam.ARMAMENTS, context);
  }

  override keyRenames(): Readonly<Record<string, string>> {
    return { affinities: "affinity", behavior_variation_id: "behavior_id" };
  }

  protected override isMainRow(row: ParamRow): boolean {
    if (row.id % 10000 !== 0) return false;
    const wepType = row.int("wepType");
    if (AMMO_TYPES.has(wepType) || weaponCategory(wepType) === undefined) return false;
    return super.isMainRow(row);
  }

  constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      behavior_id: row.int("behaviorVariationId"),
      category: weaponCategory(row.int("wepType")) ?? "Unknown",
      weight: row.float("weight"),
      default_skill_id: row.int("swordArtsParamId"),
      allow_ash_of_war: row.int("gemMountType") === GEM_MOUNTABLE,
      is_buffable: row.bool("isEnhance"),
      is_l1_guard: row.bool("enableGuard"),
      upgrade_material: this.upgradeMaterial(row.int("reinforceTypeId")),
      attack_attributes: attackAttributes(row),
      requirements: attributeRequirements(row, {
        strength: "properStrength",
        dexterity: "properAgility",
        intelligence: "properMagic",
        faith: "properFaith",
        arcane: "properLuck",
      }),
      affinity: this.affinities(row),
    };
  }

  /** Every affinity variant that exists for the base weapon, keyed by affinity name. */
  private affinities(base: ParamRow): JsonObject {
    const affinities: JsonObject = {};

    AFFINITIES.forEach((affinity, index) => {
      const variant = index === 0 ? base : this.params.row(this.mainParam, base.id + index * 100);
      if (!variant) return;

      affinities[affinity] = {
        full_hex_id: fullHexId(this.kind, variant.id),
        id: variant.id,
        reinforcement_id: variant.int("reinforceTypeId"),
        correction_graph_id: variant.int("correctType_Physics"),
        damage: weaponDamage(variant),
        scaling: weaponScaling(variant),
        guard: weaponGuard(variant),
      };
    });

    return affinities;
  }

  /** Somber weapons upgrade to +10, regular ones to +25. */
  private upgradeMaterial(reinforceTypeId: number): string {
    if (this.params.row(REINFORCE_STEM, reinforceTypeId + 25)) return "Smithing Stone";
    if (this.params.row(REINFORCE_STEM, reinforceTypeId + 10)) return "Somber Smithing Stone";
    return "None";
  }
}
