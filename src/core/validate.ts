import fs from "fs";
import path from "path";
import AjvModule from "ajv";
import type { ErrorObject } from "ajv";
import logger from "../logger.js";
import type { JsonObject } from "./json.js";
import { getSchema } from "./schema-store.js";
import type { SchemaStore } from "./schema-store.js";

const Ajv = AjvModule.default;
type AjvInstance = InstanceType<typeof Ajv>;

export type ValidationResult =
  | { ok: true }
  | { ok: false; path: string; message: string };

const validators = new WeakMap<SchemaStore, AjvInstance>();

/**
 * One Ajv instance per store, with every schema registered under its file name
 * so cross-file `$ref`s resolve against the store.
 */
function validatorFor(store: SchemaStore): AjvInstance {
  let ajv = validators.get(store);
  if (!ajv) {
    ajv = new Ajv({ allErrors: false, strict: false });
    for (const [file, schema] of store) {
      ajv.addSchema(schema, file);
    }
    validators.set(store, ajv);
  }
  return ajv;
}

/** `/Armaments/Dagger/weight` → `Armaments/Dagger/weight` */
export function readablePath(error: ErrorObject): string {
  return error.instancePath
    .split("/")
    .slice(1)
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"))
    .join("/");
}

/**
 * Validate `data` against `store[schemaFile]`, then write it to `filePath` whatever the outcome.
 * A write failure propagates.
 */
export function validateAndWrite(
  filePath: string,
  schemaFile: string,
  data: JsonObject,
  store: SchemaStore,
): ValidationResult {
  let result: ValidationResult = { ok: true };

  try {
    getSchema(store, schemaFile);
    const validate = validatorFor(store).getSchema(schemaFile);
    if (!validate) {
      throw new Error(`Schema ${schemaFile} failed to compile`);
    }

    if (!validate(data)) {
      const first = validate.errors?.[0];
      const failure = {
        path: first ? readablePath(first) : "",
        message: first?.message ?? "unknown validation error",
      };
      logger.error(`Failed to validate "${failure.path}": ${failure.message}`);
      result = { ok: false, ...failure };
    }
  } finally {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(data, null, 4)}\n`);
  }

  return result;
}
