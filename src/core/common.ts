import { isJsonObject } from "./json.js";
import type { JsonObject } from "./json.js";

/**
 * Declared properties of an object schema, in declaration order.
 * Nested object schemas carry their own table under `properties`;
 * maps of objects (`additionalProperties` with declared properties) under `additionalProperties`.
 */
export type PropertyTable = ReadonlyMap<string, PropertyShape>;

export interface PropertyShape {
  properties?: PropertyTable;
  additionalProperties?: PropertyTable;
}

/**
 * Overlay `next` onto `current`, recursing into nested objects.
 * Arrays and scalars replace; keys missing from `next` are kept.
 * Mutates and returns `current`.
 */
export function updateNested(current: JsonObject, next: JsonObject): JsonObject {
  for (const [key, value] of Object.entries(next)) {
    if (isJsonObject(value)) {
      const existing = current[key];
      current[key] = updateNested(isJsonObject(existing) ? existing : {}, value);
    } else {
      current[key] = Array.isArray(value) ? structuredClone(value) : value;
    }
  }
  return current;
}

/**
 * Copy of `obj` with each legacy key in `renames` moved to its new name.
 * A legacy key whose new name is already set is left for patching to drop.
 */
export function renameKeys(obj: JsonObject, renames: Readonly<Record<string, string>>): JsonObject {
  const renamed: JsonObject = { ...obj };
  for (const [legacy, current] of Object.entries(renames)) {
    if (legacy in renamed && !(current in renamed)) {
      renamed[current] = renamed[legacy];
      delete renamed[legacy];
    }
  }
  return renamed;
}

/**
 * Rebuild `obj` with only the keys the schema declares, in declaration order.
 * Legacy keys listed in `renames` move to their new name unless it is already set.
 */
export function patchKeys(
  obj: JsonObject,
  properties: PropertyTable,
  renames: Readonly<Record<string, string>> = {},
): JsonObject {
  const source = renameKeys(obj, renames);
  const patched: JsonObject = {};
  for (const [key, shape] of properties) {
    if (!(key in source)) continue;
    const value = source[key];

    if (shape.properties && isJsonObject(value)) {
      patched[key] = patchKeys(value, shape.properties);
    } else if (shape.additionalProperties && isJsonObject(value)) {
      const table = shape.additionalProperties;
      patched[key] = Object.fromEntries(
        Object.entries(value).map(([entryKey, entry]) => [
          entryKey,
          isJsonObject(entry) ? patchKeys(entry, table) : entry,
        ]),
      );
    } else {
      patched[key] = value;
    }
  }
  return patched;
}
