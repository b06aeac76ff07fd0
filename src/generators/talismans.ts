import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { ItemGeneratorBase } from "./base.js";
import type { GeneratorContext } from "./base.js";

// EquipParamAccessory.accessoryGroup of talismans that stack with anything
const UNGROUPED = -1;

export class TalismanGeneratorData extends ItemGeneratorBase {
  protected readonly kind = "Accessory";
  private groups?: Map<number, string[]>;

  constructor(context: GeneratorContext) {
    super(GameParam.TALISMANS, context);
  }

  constructObject(row: ParamRow): JsonObject {
    return {
      ...this.itemBase(row),
      weight: row.float("weight"),
      effect_id: row.int("refId"),
      conflicts: this.conflicts(row),
    };
  }

  /** Other talismans of the same accessory group, which cannot be equipped together. */
  private conflicts(row: ParamRow): string[] {
    const group = row.int("accessoryGroup", UNGROUPED);
    if (group === UNGROUPED) return [];

    const name = this.getKeyName(row);
    return (this.accessoryGroups().get(group) ?? []).filter((other) => other !== name);
  }

  private accessoryGroups(): Map<number, string[]> {
    if (!this.groups) {
      const groups = new Map<number, string[]>();
      for (const row of this.mainParamIterator()) {
        const group = row.int("accessoryGroup", UNGROUPED);
        if (group === UNGROUPED) continue;

        const names = groups.get(group) ?? [];
        const name = this.getKeyName(row);
        if (!names.includes(name)) names.push(name);
        groups.set(group, names);
      }
      this.groups = groups;
    }
    return this.groups;
  }
}
