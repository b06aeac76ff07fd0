import type Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { effectiveParams, outputFile, title } from "../core/game-param.js";
import type { EffectiveGameParam } from "../core/game-param.js";
import type { GameVersion } from "../core/game-version.js";
import { isJsonObject } from "../core/json.js";
import type { JsonValue } from "../core/json.js";
import logger from "../logger.js";

export interface CatalogSummary {
  category: EffectiveGameParam;
  count: number;
}

function text(value: JsonValue | undefined): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

/**
 * Load every generated output file of `version` into the catalog.
 * Categories without an output file are skipped.
 */
export function loadCatalog(db: Database.Database, root: string, version: GameVersion): CatalogSummary[] {
  const insertItem = db.prepare(
    "INSERT OR REPLACE INTO items (category, key, name, summary, data) VALUES (?, ?, ?, ?, ?)",
  );
  const insertSearch = db.prepare(
    "INSERT INTO search_index (category, item_id, name, content) VALUES (?, ?, ?, ?)",
  );

  const summaries: CatalogSummary[] = [];

  for (const category of effectiveParams()) {
    const file = path.join(root, version.toString(), outputFile(category));
    if (!fs.existsSync(file)) continue;

    const document: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    const elements = isJsonObject(document) ? document[title(category)] : undefined;
    if (!isJsonObject(elements)) {
      logger.warn(`${file} has no '${title(category)}' element map, skipping`);
      continue;
    }

    const load = db.transaction(() => {
      for (const [key, element] of Object.entries(elements)) {
        const fields = isJsonObject(element) ? element : {};
        const name = text(fields.name) ?? key;
        const summary = text(fields.summary);
        const description = Array.isArray(fields.description)
          ? fields.description.filter((line): line is string => typeof line === "string").join(" ")
          : "";

        const result = insertItem.run(category, key, name, summary, JSON.stringify(element));
        insertSearch.run(category, Number(result.lastInsertRowid), name, [summary ?? "", description].join(" ").trim());
      }
    });
    load();

    summaries.push({ category, count: Object.keys(elements).length });
  }

  return summaries;
}
