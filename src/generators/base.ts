import type { PropertyTable } from "../core/common.js";
import { idRange, outputFile, schemaFile, stem, title } from "../core/game-param.js";
import type { EffectiveGameParam } from "../core/game-param.js";
import type { GameVersion } from "../core/game-version.js";
import type { JsonObject } from "../core/json.js";
import { schemaProperties } from "../core/schema-store.js";
import type { SchemaStore } from "../core/schema-store.js";
import type { ParamRow, ParamStore } from "../db/params.js";
import { LoggerFactory } from "../logger.js";
import type { Logger } from "../logger.js";

export interface GeneratorContext {
  version: GameVersion;
  params: ParamStore;
  schemaStore: SchemaStore;
}

/** Message bank prefix and full hex id nibble of each equipment table. */
export type ItemKind = "Weapon" | "Protector" | "Accessory" | "Goods" | "Gem";

const HEX_TYPE: Record<ItemKind, number> = {
  Weapon: 0x0,
  Protector: 0x1,
  Accessory: 0x2,
  Goods: 0x4,
  Gem: 0x8,
};

const RARITIES = ["common", "uncommon", "rare", "legendary"] as const;

// Placeholder texts the game ships for unused rows
const MISSING_TEXT = new Set(["", "%null%", "[ERROR]"]);

export function fullHexId(kind: ItemKind, id: number): string {
  return (((HEX_TYPE[kind] << 28) | id) >>> 0).toString(16).toUpperCase().padStart(8, "0");
}

/**
 * Produces one category of elements from a param table.
 *
 * The driver iterates `mainParamIterator()`, keys each row with `getKeyName()`
 * and merges `constructObject()` into the existing element.
 */
export abstract class GeneratorDataBase {
  readonly schemaProperties: PropertyTable;
  protected readonly log: Logger;

  protected constructor(
    public readonly param: EffectiveGameParam,
    protected readonly context: GeneratorContext,
  ) {
    this.schemaProperties = schemaProperties(context.schemaStore, this.schemaFile(), this.elementName());
    this.log = LoggerFactory.createChild({ generator: param });
  }

  get schemaStore(): SchemaStore {
    return this.context.schemaStore;
  }

  protected get params(): ParamStore {
    return this.context.params;
  }

  get mainParam(): string {
    return stem(this.param);
  }

  elementName(): string {
    return title(this.param);
  }

  outputFile(): string {
    return outputFile(this.param);
  }

  schemaFile(): string {
    return schemaFile(this.param);
  }

  requirePatching(): boolean {
    return true;
  }

  /** Legacy key → current key, applied to existing elements before the merge. */
  keyRenames(): Readonly<Record<string, string>> {
    return {};
  }

  *mainParamIterator(): Generator<ParamRow> {
    for (const row of this.params.rows(this.mainParam, idRange(this.param))) {
      if (this.isMainRow(row)) yield row;
    }
  }

  protected isMainRow(_row: ParamRow): boolean {
    return true;
  }

  abstract getKeyName(row: ParamRow): string;

  abstract constructObject(row: ParamRow): JsonObject;

  protected text(bank: string, id: number): string | undefined {
    const text = this.params.message(bank, id)?.trim();
    return text === undefined || MISSING_TEXT.has(text) ? undefined : text;
  }
}

/**
 * Generator over an equipment table whose rows are named items.
 */
export abstract class ItemGeneratorBase extends GeneratorDataBase {
  protected abstract readonly kind: ItemKind;

  protected override isMainRow(row: ParamRow): boolean {
    return this.itemName(row) !== undefined;
  }

  getKeyName(row: ParamRow): string {
    return this.itemName(row) ?? String(row.id);
  }

  protected itemName(row: ParamRow): string | undefined {
    return this.text(`${this.kind}Name`, row.id);
  }

  /** Fields every item category shares. */
  protected itemBase(row: ParamRow): JsonObject {
    const rarity = Math.min(Math.max(row.int("rarity"), 0), RARITIES.length - 1);
    const goods = this.kind === "Goods";
    const caption = this.text(`${this.kind}Caption`, row.id);

    return {
      full_hex_id: fullHexId(this.kind, row.id),
      id: row.id,
      name: this.getKeyName(row),
      summary: this.text(`${this.kind}Info`, row.id) ?? "no summary",
      description: caption ? caption.split("\n").map((line) => line.trimEnd()) : [],
      is_tradable: !row.bool("disableMultiDropShare"),
      price_sold: Math.max(row.int("sellValue"), 0),
      rarity: RARITIES[rarity],
      icon: row.int(this.kind === "Protector" ? "iconIdM" : "iconId"),
      max_held: goods ? row.int("maxNum", 1) : 999,
      max_stored: goods ? row.int("maxRepositoryNum") : 999,
    };
  }
}
