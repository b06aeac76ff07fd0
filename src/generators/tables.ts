import fs from "fs";
import { z } from "zod";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";

/** Affinity names by index; a weapon's affinity variant lives at `base id + 100 * index`. */
export const AFFINITIES = [
  "Standard",
  "Heavy",
  "Keen",
  "Quality",
  "Fire",
  "Flame Art",
  "Lightning",
  "Sacred",
  "Magic",
  "Cold",
  "Poison",
  "Blood",
  "Occult",
] as const;

export type Affinity = (typeof AFFINITIES)[number];

/** EquipParamGoods.goodsType */
export enum GoodsType {
  NORMAL_ITEM = 0,
  KEY_ITEM = 1,
  CRAFTING_MATERIAL = 2,
  REMEMBRANCE = 3,
  SORCERY = 5,
  SPIRIT_SUMMON_LESSER = 7,
  SPIRIT_SUMMON_GREATER = 8,
  WONDROUS_PHYSICK = 9,
  WONDROUS_PHYSICK_TEAR = 10,
  REGENERATIVE_MATERIAL = 11,
  INFO_ITEM = 12,
  REINFORCEMENT_MATERIAL = 14,
  GREAT_RUNE = 15,
  INCANTATION = 16,
  SELF_BUFF_SORCERY = 17,
  SELF_BUFF_INCANTATION = 18,
}

// Key items merchants sell to unlock crafting, stock or map regions, by name
const SHOP_CATEGORIES: readonly (readonly [RegExp, string])[] = [
  [/Cookbook/, "Cookbook"],
  [/Bell Bearing/, "Bell Bearing"],
  [/Whetblade/, "Whetblade"],
  [/^Map: /, "Map"],
  [/(Scroll|Prayerbook|Codex)$/, "Spellbook"],
];

/** Shop category of a key item, or undefined for keys proper. */
export function shopCategory(name: string): string | undefined {
  return SHOP_CATEGORIES.find(([pattern]) => pattern.test(name))?.[1];
}

// EquipParamWeapon.atkAttribute
const ATTACK_ATTRIBUTES: Record<number, string> = {
  0: "Slash",
  1: "Strike",
  2: "Pierce",
  3: "Standard",
};

export const AMMO_TYPES: ReadonlySet<number> = new Set([81, 83, 85, 86]);

const weaponTypesSchema = z.record(z.string().regex(/^\d+$/), z.string());

let weaponTypes: ReadonlyMap<number, string> | undefined;

function loadWeaponTypes(): ReadonlyMap<number, string> {
  if (!weaponTypes) {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL("../../data/weapon-types.json", import.meta.url), "utf-8"));
    weaponTypes = new Map(Object.entries(weaponTypesSchema.parse(raw)).map(([id, name]) => [Number(id), name]));
  }
  return weaponTypes;
}

export function weaponCategory(wepType: number): string | undefined {
  return loadWeaponTypes().get(wepType);
}

export function attackAttributes(row: ParamRow): string[] {
  const attributes: string[] = [];
  for (const field of ["atkAttribute", "atkAttribute2"]) {
    const attribute = ATTACK_ATTRIBUTES[row.int(field, -1)];
    if (attribute && !attributes.includes(attribute)) attributes.push(attribute);
  }
  return attributes;
}

export function weaponDamage(row: ParamRow): JsonObject {
  return {
    physical: row.int("attackBasePhysics"),
    magic: row.int("attackBaseMagic"),
    fire: row.int("attackBaseFire"),
    lightning: row.int("attackBaseThunder"),
    holy: row.int("attackBaseDark"),
    stamina: row.int("attackBaseStamina"),
  };
}

/** Attribute scaling as fractions; attributes that do not scale are left out. */
export function weaponScaling(row: ParamRow): JsonObject {
  const fields: Array<[string, string]> = [
    ["strength", "correctStrength"],
    ["dexterity", "correctAgility"],
    ["intelligence", "correctMagic"],
    ["faith", "correctFaith"],
    ["arcane", "correctLuck"],
  ];

  const scaling: JsonObject = {};
  for (const [attribute, field] of fields) {
    const value = row.float(field);
    if (value > 0) scaling[attribute] = Math.round(value) / 100;
  }
  return scaling;
}

export function weaponGuard(row: ParamRow): JsonObject {
  return {
    physical: row.float("physGuardCutRate"),
    magic: row.float("magGuardCutRate"),
    fire: row.float("fireGuardCutRate"),
    lightning: row.float("thunGuardCutRate"),
    holy: row.float("darkGuardCutRate"),
    guard_boost: row.int("staminaGuardDef"),
  };
}

export function attributeRequirements(
  row: ParamRow,
  fields: { strength?: string; dexterity?: string; intelligence: string; faith: string; arcane: string },
): JsonObject {
  const requirements: JsonObject = {};
  for (const [attribute, field] of Object.entries(fields)) {
    if (field !== undefined) requirements[attribute] = row.int(field);
  }
  return requirements;
}
