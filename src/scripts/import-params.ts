#!/usr/bin/env node
/**
 * Import a param and message dump into the game data database of one version.
 *
 * Usage: npm run import -- --source "/path/to/dump" --version 1.02.3
 *
 * Expects:
 * - <source>/<Stem>.csv for each param table (Row ID, Row Name, then the fields)
 * - <source>/msg/<Bank>.csv for each text bank (ID, Text)
 */

import fs from "fs";
import config from "../config/env.js";
import { GameVersion } from "../core/game-version.js";
import { openGamedata, resolveGamedataPath } from "../db/index.js";
import { importDump } from "../db/import.js";
import { ParamStore } from "../db/params.js";
import logger from "../logger.js";

const args = process.argv.slice(2);
const sourceIdx = args.indexOf("--source");
const versionIdx = args.indexOf("--version");
const source = sourceIdx === -1 ? undefined : args[sourceIdx + 1];
const version = versionIdx === -1 ? undefined : args[versionIdx + 1];

if (!source || !version || !GameVersion.matchPath(version) || !fs.existsSync(source)) {
  console.error("Usage: npm run import -- --source <dir> --version <x.yy.z>");
  console.error("  <dir> should hold the <Stem>.csv param dumps and a msg/ directory of <Bank>.csv files");
  process.exit(1);
}

const dbPath = resolveGamedataPath(config.ERDB_GAMEDATA_DIR, GameVersion.fromString(version));
logger.info(`Importing ${source} into ${dbPath}`);

const db = openGamedata(dbPath);
try {
  const report = importDump(new ParamStore(db), source);
  logger.info(
    `Imported ${Object.keys(report.params).length} param tables and ${Object.keys(report.messages).length} message banks`
      + (report.droppedRows ? ` (${report.droppedRows} malformed rows skipped)` : ""),
  );
} catch (error) {
  logger.fatal({ err: error }, "Import failed");
  process.exitCode = 1;
} finally {
  db.close();
}
