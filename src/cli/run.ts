import fs from "fs";
import path from "path";
import type { EnvConfig } from "../config/env.js";
import { findValues, logValueReports, parseFindValues } from "../core/find-values.js";
import { generate } from "../core/generate.js";
import type { GenerateSummary } from "../core/generate.js";
import { GameVersion } from "../core/game-version.js";
import { loadSchemaStore } from "../core/schema-store.js";
import { listVersions, openGamedata, resolveGamedataPath } from "../db/index.js";
import { ParamStore } from "../db/params.js";
import { ArgumentError, NotFoundError } from "../errors.js";
import { createGenerator } from "../generators/index.js";
import logger from "../logger.js";
import { parseCliArgs, selectGenerators } from "./args.js";

export const LATEST_VERSION_FILE = "latest_version.txt";

function selectVersion(versions: readonly GameVersion[], requested: string | undefined): GameVersion {
  if (requested === undefined) return versions[0];

  const wanted = GameVersion.fromString(requested);
  const found = versions.find((version) => version.equals(wanted));
  if (!found) {
    throw new ArgumentError(`Game data version ${requested} is not available`, {
      value: requested,
      choices: versions.map(String),
    });
  }
  return found;
}

/**
 * Run the generators and the find-values diagnostic the arguments select.
 */
export function run(argv: readonly string[], config: Pick<EnvConfig, "ERDB_ROOT" | "ERDB_GAMEDATA_DIR" | "ERDB_SCHEMA_DIR">): GenerateSummary[] {
  const options = parseCliArgs(argv);
  const generators = selectGenerators(options.generate);
  const query = options.findValues !== undefined ? parseFindValues(options.findValues) : undefined;

  const versions = listVersions(config.ERDB_GAMEDATA_DIR);
  if (versions.length === 0) {
    throw new NotFoundError("Imported game data under", config.ERDB_GAMEDATA_DIR);
  }
  const version = selectVersion(versions, options.gamedataVersion);

  fs.writeFileSync(path.join(config.ERDB_ROOT, LATEST_VERSION_FILE), versions[0].toString());
  fs.mkdirSync(path.join(config.ERDB_ROOT, version.toString()), { recursive: true });

  const db = openGamedata(resolveGamedataPath(config.ERDB_GAMEDATA_DIR, version), { readonly: true });
  const summaries: GenerateSummary[] = [];

  try {
    const params = new ParamStore(db);

    if (generators.length > 0) {
      const schemaStore = loadSchemaStore(config.ERDB_SCHEMA_DIR);
      for (const param of generators) {
        logger.info(`>>> Generating "${param}" from version ${version}`);
        const gendata = createGenerator(param, { version, params, schemaStore });
        summaries.push(generate(gendata, version, { root: config.ERDB_ROOT }));
      }
    }

    if (query) {
      const reports = findValues(params, query.param, query.field, options.findValuesLimit);
      logValueReports(query.param, query.field, reports);
    }
  } finally {
    db.close();
  }

  return summaries;
}
