import fs from "fs";
import path from "path";
import { OutputDocumentError, SchemaValidationError } from "../errors.js";
import type { GeneratorDataBase } from "../generators/base.js";
import logger from "../logger.js";
import { patchKeys, renameKeys, updateNested } from "./common.js";
import type { GameVersion } from "./game-version.js";
import { isJsonObject } from "./json.js";
import type { JsonObject } from "./json.js";
import { validateAndWrite } from "./validate.js";

export interface GenerateOptions {
  /** Directory holding `schema/` and the per-version output directories. */
  root: string;
}

export interface GenerateSummary {
  outputFile: string;
  elementCount: number;
  created: boolean;
}

function loadOutputDocument(filePath: string, elementName: string): { document: JsonObject; created: boolean } {
  if (!fs.existsSync(filePath)) {
    return { document: { [elementName]: {} }, created: true };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new OutputDocumentError(filePath, error instanceof Error ? error.message : String(error));
  }

  if (!isJsonObject(parsed)) {
    throw new OutputDocumentError(filePath, "top level is not an object");
  }
  return { document: parsed, created: false };
}

/**
 * Merge every row of a generator into its output document for `version`,
 * validate the document and write it back.
 */
export function generate(gendata: GeneratorDataBase, version: GameVersion, options: GenerateOptions): GenerateSummary {
  const outputFile = path.join(options.root, version.toString(), gendata.outputFile());
  const elementName = gendata.elementName();
  logger.info(`Output file: ${outputFile}`);

  const { document, created } = loadOutputDocument(outputFile, elementName);
  logger.info(created ? "Output file does not exist and will be created" : "Loaded output file");

  document.$schema = `../schema/${gendata.schemaFile()}`;
  const existing = document[elementName];
  const itemData: JsonObject = isJsonObject(existing) ? existing : {};
  logger.info(`Collected existing data with ${Object.keys(itemData).length} elements`);

  const patching = gendata.requirePatching();
  const renames = patching ? gendata.keyRenames() : {};
  for (const row of gendata.mainParamIterator()) {
    const keyName = gendata.getKeyName(row);
    const newObj = gendata.constructObject(row);
    const current = itemData[keyName];

    // legacy keys move before the merge so their curated content meets the new data
    let curObj = updateNested(isJsonObject(current) ? renameKeys(current, renames) : {}, newObj);
    if (patching) {
      curObj = patchKeys(curObj, gendata.schemaProperties);
    }

    itemData[keyName] = curObj;
  }

  const elementCount = Object.keys(itemData).length;
  logger.info(`Generated ${elementCount} elements`);

  document[elementName] = itemData;
  const result = validateAndWrite(outputFile, gendata.schemaFile(), document, gendata.schemaStore);
  if (!result.ok) {
    throw new SchemaValidationError("Generated schema failed to validate", {
      field: result.path,
      constraint: result.message,
      outputFile,
    });
  }

  logger.info(`Validated ${elementCount} elements`);
  return { outputFile, elementCount, created };
}
