import fs from "fs";
import path from "path";
import { SchemaError } from "../errors.js";
import type { PropertyShape, PropertyTable } from "./common.js";
import { isJsonObject } from "./json.js";
import type { JsonObject, JsonValue } from "./json.js";

/** Parsed JSON Schema documents keyed by file name, e.g. `armaments.schema.json`. */
export type SchemaStore = ReadonlyMap<string, JsonObject>;

const SCHEMA_SUFFIX = ".schema.json";
const MAX_REF_DEPTH = 32;

export function loadSchemaStore(dir: string): SchemaStore {
  if (!fs.existsSync(dir)) {
    throw new SchemaError(`Schema directory does not exist: ${dir}`);
  }

  const store = new Map<string, JsonObject>();
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile() || !entry.name.endsWith(SCHEMA_SUFFIX)) continue;

    const parsed: unknown = JSON.parse(fs.readFileSync(path.join(dir, entry.name), "utf-8"));
    if (!isJsonObject(parsed)) {
      throw new SchemaError(`Schema ${entry.name} is not a JSON object`);
    }
    store.set(entry.name, parsed);
  }
  return store;
}

export function getSchema(store: SchemaStore, file: string): JsonObject {
  const schema = store.get(file);
  if (!schema) {
    throw new SchemaError(`Schema ${file} is not in the schema store`, { file });
  }
  return schema;
}

interface Resolved {
  schema: JsonObject;
  file: string;
}

/**
 * Resolve `other.schema.json#/definitions/X` or `#/definitions/X` relative to `file`.
 */
export function resolveRef(store: SchemaStore, ref: string, file: string): Resolved {
  const hashIndex = ref.indexOf("#");
  const target = hashIndex === -1 ? ref : ref.slice(0, hashIndex);
  const pointer = hashIndex === -1 ? "" : ref.slice(hashIndex + 1);
  const targetFile = target === "" ? file : path.posix.basename(target);

  let node: JsonValue = getSchema(store, targetFile);
  const segments = pointer.split("/").filter((segment) => segment !== "");
  for (const raw of segments) {
    const segment = raw.replace(/~1/g, "/").replace(/~0/g, "~");
    if (!isJsonObject(node) || !(segment in node)) {
      throw new SchemaError(`Unresolvable $ref '${ref}' from ${file}`, { ref, file });
    }
    node = node[segment];
  }

  if (!isJsonObject(node)) {
    throw new SchemaError(`$ref '${ref}' from ${file} does not point at a schema`, { ref, file });
  }
  return { schema: node, file: targetFile };
}

function deref(store: SchemaStore, schema: JsonObject, file: string, depth = 0): Resolved {
  const ref = schema.$ref;
  if (typeof ref !== "string") return { schema, file };
  if (depth > MAX_REF_DEPTH) {
    throw new SchemaError(`$ref chain too deep at '${ref}' in ${file}`, { ref, file });
  }
  const resolved = resolveRef(store, ref, file);
  return deref(store, resolved.schema, resolved.file, depth + 1);
}

function collectProperties(
  store: SchemaStore,
  schema: JsonObject,
  file: string,
  depth: number,
): Map<string, PropertyShape> {
  if (depth > MAX_REF_DEPTH) {
    throw new SchemaError(`Schema nesting too deep in ${file}`, { file });
  }

  const resolved = deref(store, schema, file);
  const table = new Map<string, PropertyShape>();

  const allOf = resolved.schema.allOf;
  if (Array.isArray(allOf)) {
    for (const branch of allOf) {
      if (!isJsonObject(branch)) continue;
      for (const [key, shape] of collectProperties(store, branch, resolved.file, depth + 1)) {
        table.set(key, shape);
      }
    }
  }

  const properties = resolved.schema.properties;
  if (isJsonObject(properties)) {
    for (const [key, property] of Object.entries(properties)) {
      if (!isJsonObject(property)) continue;
      table.set(key, describeProperty(store, property, resolved.file, depth + 1));
    }
  }
  return table;
}

function describeProperty(store: SchemaStore, property: JsonObject, file: string, depth: number): PropertyShape {
  const resolved = deref(store, property, file);
  const shape: PropertyShape = {};

  if (isJsonObject(resolved.schema.properties) || Array.isArray(resolved.schema.allOf)) {
    shape.properties = collectProperties(store, resolved.schema, resolved.file, depth + 1);
  }

  const additional = resolved.schema.additionalProperties;
  if (isJsonObject(additional)) {
    const entries = collectProperties(store, additional, resolved.file, depth + 1);
    if (entries.size > 0) shape.additionalProperties = entries;
  }
  return shape;
}

/**
 * The ordered property table of one element of a category document:
 * the schema behind `properties[elementName].additionalProperties`.
 */
export function schemaProperties(store: SchemaStore, schemaFile: string, elementName: string): PropertyTable {
  const root = getSchema(store, schemaFile);
  const properties = root.properties;
  const element = isJsonObject(properties) ? properties[elementName] : undefined;
  if (!isJsonObject(element)) {
    throw new SchemaError(`Schema ${schemaFile} declares no '${elementName}' property`, { schemaFile, elementName });
  }

  const elementMap = deref(store, element, schemaFile);
  const items = elementMap.schema.additionalProperties;
  if (!isJsonObject(items)) {
    throw new SchemaError(`'${elementName}' in ${schemaFile} is not a map of elements`, { schemaFile, elementName });
  }
  return collectProperties(store, items, elementMap.file, 0);
}
