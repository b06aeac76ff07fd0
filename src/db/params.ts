import type Database from "better-sqlite3";
import { z } from "zod";
import { NotFoundError, ParamFieldError } from "../errors.js";

/** Half-open id range `[from, to)`. */
export type IdRange = readonly [number, number];

const fieldsSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

interface ParamRecord {
  id: number;
  name: string | null;
  fields: string;
}

/**
 * One row of a param table. Values are kept as the raw strings of the dump
 * and converted by the accessors.
 */
export class ParamRow {
  constructor(
    public readonly stem: string,
    public readonly id: number,
    public readonly name: string,
    private readonly fields: ReadonlyMap<string, string>,
  ) {}

  static fromRecord(stem: string, record: ParamRecord): ParamRow {
    const parsed = fieldsSchema.parse(JSON.parse(record.fields));
    const fields = new Map<string, string>();
    for (const [key, value] of Object.entries(parsed)) {
      if (value === null || value === "") continue;
      fields.set(key, String(value));
    }
    return new ParamRow(stem, record.id, record.name ?? "", fields);
  }

  has(field: string): boolean {
    return this.fields.has(field);
  }

  str(field: string, fallback = ""): string {
    return this.fields.get(field) ?? fallback;
  }

  float(field: string, fallback = 0): number {
    const value = this.fields.get(field);
    if (value === undefined) return fallback;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ParamFieldError(this.stem, this.id, field, value);
    }
    return parsed;
  }

  int(field: string, fallback = 0): number {
    const parsed = this.float(field, fallback);
    if (!Number.isInteger(parsed)) {
      throw new ParamFieldError(this.stem, this.id, field, this.str(field));
    }
    return parsed;
  }

  bool(field: string, fallback = false): boolean {
    if (!this.fields.has(field)) return fallback;
    return this.int(field) !== 0;
  }
}

export interface FieldValue {
  id: number;
  name: string;
  value: string | null;
}

/**
 * Read and write access to a version's param and message tables.
 */
export class ParamStore {
  constructor(private readonly db: Database.Database) {}

  has(stem: string): boolean {
    const found = this.db.prepare<[string], { id: number }>("SELECT id FROM params WHERE stem = ? LIMIT 1").get(stem);
    return found !== undefined;
  }

  /** Rows of a table ordered by id, optionally restricted to `range`. */
  rows(stem: string, range?: IdRange): ParamRow[] {
    if (!this.has(stem)) {
      throw new NotFoundError("Param table", stem);
    }

    const records = range
      ? this.db.prepare<[string, number, number], ParamRecord>(
        "SELECT id, name, fields FROM params WHERE stem = ? AND id >= ? AND id < ? ORDER BY id",
      ).all(stem, range[0], range[1])
      : this.db.prepare<[string], ParamRecord>(
        "SELECT id, name, fields FROM params WHERE stem = ? ORDER BY id",
      ).all(stem);

    return records.map((record) => ParamRow.fromRecord(stem, record));
  }

  row(stem: string, id: number): ParamRow | undefined {
    const record = this.db.prepare<[string, number], ParamRecord>(
      "SELECT id, name, fields FROM params WHERE stem = ? AND id = ?",
    ).get(stem, id);
    return record ? ParamRow.fromRecord(stem, record) : undefined;
  }

  message(bank: string, id: number): string | undefined {
    const found = this.db.prepare<[string, number], { text: string }>(
      "SELECT text FROM messages WHERE bank = ? AND id = ?",
    ).get(bank, id);
    return found?.text;
  }

  /** Raw value of `field` for every row of `stem`; null where the row lacks the field. */
  fieldValues(stem: string, field: string): FieldValue[] {
    if (!this.has(stem)) {
      throw new NotFoundError("Param table", stem);
    }

    const path = `$."${field.replace(/"/g, "")}"`;
    return this.db.prepare<[string, string], { id: number; name: string | null; value: string | number | null }>(
      "SELECT id, name, json_extract(fields, ?) AS value FROM params WHERE stem = ? ORDER BY id",
    ).all(path, stem).map((record) => ({
      id: record.id,
      name: record.name ?? "",
      value: record.value === null || record.value === "" ? null : String(record.value),
    }));
  }

  /** Replace every row of `stem`. */
  replaceParam(stem: string, rows: ReadonlyArray<{ id: number; name: string; fields: Record<string, string> }>): void {
    const remove = this.db.prepare("DELETE FROM params WHERE stem = ?");
    const insert = this.db.prepare("INSERT INTO params (stem, id, name, fields) VALUES (?, ?, ?, ?)");

    this.db.transaction(() => {
      remove.run(stem);
      for (const row of rows) {
        insert.run(stem, row.id, row.name, JSON.stringify(row.fields));
      }
    })();
  }

  /** Replace every entry of a message bank. */
  replaceMessages(bank: string, entries: ReadonlyArray<{ id: number; text: string }>): void {
    const remove = this.db.prepare("DELETE FROM messages WHERE bank = ?");
    const insert = this.db.prepare("INSERT OR REPLACE INTO messages (bank, id, text) VALUES (?, ?, ?)");

    this.db.transaction(() => {
      remove.run(bank);
      for (const entry of entries) {
        insert.run(bank, entry.id, entry.text);
      }
    })();
  }

  recordImport(source: string, file: string, rowCount: number): void {
    this.db.prepare(
      "INSERT OR REPLACE INTO imports (source, file, row_count, imported_at) VALUES (?, ?, ?, ?)",
    ).run(source, file, rowCount, new Date().toISOString());
  }
}
