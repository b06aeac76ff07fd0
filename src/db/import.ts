import fs from "fs";
import path from "path";
import Papa from "papaparse";
import { z } from "zod";
import logger from "../logger.js";
import type { ParamStore } from "./params.js";

const idSchema = z.coerce.number().int().nonnegative();

const ID_COLUMNS = ["row id", "id"];
const NAME_COLUMNS = ["row name", "name"];
const TEXT_COLUMNS = ["text"];

export interface ParsedParam {
  rows: Array<{ id: number; name: string; fields: Record<string, string> }>;
  droppedRows: number;
}

export interface ParsedMessages {
  entries: Array<{ id: number; text: string }>;
  droppedRows: number;
}

export interface ImportReport {
  params: Record<string, number>;
  messages: Record<string, number>;
  droppedRows: number;
}

function findColumn(fields: readonly string[], candidates: readonly string[]): string | undefined {
  return fields.find((field) => candidates.includes(field.toLowerCase()));
}

function parseCsv(text: string): { rows: Record<string, string>[]; fields: string[] } {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: (header) => header.trim(),
  });
  return { rows: result.data, fields: result.meta.fields ?? [] };
}

/**
 * Parse a param dump: an id column, an optional name column, then one column per field.
 */
export function parseParamCsv(text: string): ParsedParam {
  const { rows, fields } = parseCsv(text);
  const idColumn = findColumn(fields, ID_COLUMNS);
  if (!idColumn) {
    throw new Error(`Param dump has no id column (expected one of: ${ID_COLUMNS.join(", ")})`);
  }
  const nameColumn = findColumn(fields, NAME_COLUMNS);
  const fieldColumns = fields.filter((field) => field !== idColumn && field !== nameColumn && field !== "");

  const parsed: ParsedParam = { rows: [], droppedRows: 0 };
  for (const row of rows) {
    const id = idSchema.safeParse(row[idColumn]);
    if (!id.success) {
      parsed.droppedRows += 1;
      continue;
    }

    const values: Record<string, string> = {};
    for (const column of fieldColumns) {
      const value = row[column];
      if (value !== undefined && value !== "") values[column] = value.trim();
    }
    parsed.rows.push({ id: id.data, name: nameColumn ? (row[nameColumn] ?? "").trim() : "", fields: values });
  }
  return parsed;
}

/**
 * Parse a message bank dump with `ID` and `Text` columns. Rows with empty text are skipped.
 */
export function parseMessageCsv(text: string): ParsedMessages {
  const { rows, fields } = parseCsv(text);
  const idColumn = findColumn(fields, ID_COLUMNS);
  const textColumn = findColumn(fields, TEXT_COLUMNS);
  if (!idColumn || !textColumn) {
    throw new Error("Message dump needs ID and Text columns");
  }

  const parsed: ParsedMessages = { entries: [], droppedRows: 0 };
  for (const row of rows) {
    const id = idSchema.safeParse(row[idColumn]);
    const message = row[textColumn] ?? "";
    if (!id.success) {
      parsed.droppedRows += 1;
      continue;
    }
    if (message.trim() === "") continue;
    parsed.entries.push({ id: id.data, text: message.replace(/\r\n/g, "\n") });
  }
  return parsed;
}

function csvFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(".csv"))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Import `<source>/<Stem>.csv` and `<source>/msg/<Bank>.csv` into the store,
 * replacing what each file covers.
 */
export function importDump(store: ParamStore, source: string): ImportReport {
  const report: ImportReport = { params: {}, messages: {}, droppedRows: 0 };

  const paramFiles = csvFiles(source);
  logger.info(`Found ${paramFiles.length} param files in ${source}`);
  for (const file of paramFiles) {
    const stem = path.basename(file, path.extname(file));
    const parsed = parseParamCsv(fs.readFileSync(file, "utf-8"));

    store.replaceParam(stem, parsed.rows);
    store.recordImport(`param:${stem}`, file, parsed.rows.length);
    report.params[stem] = parsed.rows.length;
    report.droppedRows += parsed.droppedRows;
    logger.info(`  ${stem}: ${parsed.rows.length} rows${parsed.droppedRows ? `, ${parsed.droppedRows} dropped` : ""}`);
  }

  const messageFiles = csvFiles(path.join(source, "msg"));
  logger.info(`Found ${messageFiles.length} message files`);
  for (const file of messageFiles) {
    const bank = path.basename(file, path.extname(file));
    const parsed = parseMessageCsv(fs.readFileSync(file, "utf-8"));

    store.replaceMessages(bank, parsed.entries);
    store.recordImport(`msg:${bank}`, file, parsed.entries.length);
    report.messages[bank] = parsed.entries.length;
    report.droppedRows += parsed.droppedRows;
    logger.info(`  ${bank}: ${parsed.entries.length} entries`);
  }

  return report;
}
