import { ArgumentError, NotFoundError } from "../errors.js";
import type { ParamStore } from "../db/params.js";
import logger from "../logger.js";

export interface ValueReport {
  value: string;
  count: number;
  examples: string[];
}

export interface FindValuesQuery {
  param: string;
  field: string;
}

/** `EquipParamGoods:goodsType` → `{ param, field }` */
export function parseFindValues(argument: string): FindValuesQuery {
  const parts = argument.split(":");
  if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
    throw new ArgumentError("Incorrect find-values format, expected ParamName:FieldName", { value: argument });
  }
  return { param: parts[0], field: parts[1] };
}

function compareValues(numeric: boolean) {
  return (a: ValueReport, b: ValueReport): number =>
    numeric ? Number(a.value) - Number(b.value) : a.value.localeCompare(b.value);
}

/**
 * Every distinct value `field` takes in `stem`, with its row count and up to
 * `limit` example rows (`-1` for all of them).
 */
export function findValues(params: ParamStore, stem: string, field: string, limit = -1): ValueReport[] {
  const rows = params.fieldValues(stem, field).filter((row) => row.value !== null);
  if (rows.length === 0) {
    throw new NotFoundError(`Field of ${stem}`, field);
  }

  const reports = new Map<string, ValueReport>();
  for (const row of rows) {
    const value = row.value ?? "";
    const report = reports.get(value) ?? { value, count: 0, examples: [] };
    report.count += 1;
    if (limit < 0 || report.examples.length < limit) {
      report.examples.push(row.name ? `${row.id} (${row.name})` : String(row.id));
    }
    reports.set(value, report);
  }

  const values = [...reports.values()];
  const numeric = values.every((report) => report.value.trim() !== "" && Number.isFinite(Number(report.value)));
  return values.sort(compareValues(numeric));
}

export function logValueReports(stem: string, field: string, reports: readonly ValueReport[]): void {
  logger.info(`Values of ${stem}.${field}: ${reports.length} distinct`);
  for (const report of reports) {
    const examples = report.examples.length > 0 ? `: ${report.examples.join(", ")}` : "";
    logger.info(`  ${report.value} (${report.count} rows)${examples}`);
  }
}
