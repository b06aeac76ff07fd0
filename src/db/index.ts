import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { GameVersion } from "../core/game-version.js";
import logger from "../logger.js";
import { initializeCatalogSchema, initializeGamedataSchema } from "./schema.js";

export const GAMEDATA_FILE = "gamedata.db";

/**
 * Path of the param database of one game version: `<gamedataDir>/<version>/gamedata.db`.
 */
export function resolveGamedataPath(gamedataDir: string, version: GameVersion): string {
  return path.join(gamedataDir, version.toString(), GAMEDATA_FILE);
}

/**
 * Versions with an imported param database, newest first.
 */
export function listVersions(gamedataDir: string): GameVersion[] {
  if (!fs.existsSync(gamedataDir)) return [];

  const versions: GameVersion[] = [];
  for (const entry of fs.readdirSync(gamedataDir, { withFileTypes: true })) {
    if (!entry.isDirectory() || !GameVersion.matchPath(entry.name)) continue;
    if (!fs.existsSync(path.join(gamedataDir, entry.name, GAMEDATA_FILE))) continue;

    const version = GameVersion.fromPath(entry.name);
    if (!version) {
      logger.warn({ directory: entry.name, expected: GameVersion.fromString(entry.name).toString() },
        "Skipping game data directory not named in version form");
      continue;
    }
    versions.push(version);
  }
  return versions.sort((a, b) => GameVersion.compare(b, a));
}

/**
 * Open (or create) a param database. Pass ":memory:" for a throwaway one.
 */
export function openGamedata(dbPath: string, options: { readonly?: boolean } = {}): Database.Database {
  if (dbPath !== ":memory:" && !options.readonly) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath, { readonly: options.readonly ?? false });
  if (!options.readonly) {
    if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
    initializeGamedataSchema(db);
  }
  return db;
}

/**
 * In-memory catalog the MCP server searches.
 */
export function openCatalog(): Database.Database {
  const db = new Database(":memory:");
  initializeCatalogSchema(db);
  return db;
}
