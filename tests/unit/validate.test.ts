import fs from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import type { JsonObject } from "../../src/core/json.js";
import type { SchemaStore } from "../../src/core/schema-store.js";
import { validateAndWrite } from "../../src/core/validate.js";
import { makeTempDir } from "../helpers.js";

const store: SchemaStore = new Map<string, JsonObject>([
  ["things.schema.json", {
    type: "object",
    properties: {
      Things: {
        type: "object",
        additionalProperties: { type: "object", required: ["x"] },
      },
    },
    required: ["Things"],
  }],
]);

describe("validateAndWrite", () => {
  it("writes a valid document with four-space indent and a trailing newline", () => {
    const file = path.join(makeTempDir(), "1.02.3", "things.json");
    const data = { Things: { a: { x: 1 } } };

    expect(validateAndWrite(file, "things.schema.json", data, store)).toEqual({ ok: true });
    expect(fs.readFileSync(file, "utf-8")).toBe(`${JSON.stringify(data, null, 4)}\n`);
  });

  it("reports the first failure and still writes the document", () => {
    const file = path.join(makeTempDir(), "things.json");

    const result = validateAndWrite(file, "things.schema.json", { Things: { "a/b": {} } }, store);

    expect(result).toEqual({ ok: false, path: "Things/a/b", message: "must have required property 'x'" });
    expect(JSON.parse(fs.readFileSync(file, "utf-8"))).toEqual({ Things: { "a/b": {} } });
  });

  it("fails for a schema the store does not hold, after writing", () => {
    const file = path.join(makeTempDir(), "things.json");

    expect(() => validateAndWrite(file, "missing.schema.json", { Things: {} }, store)).toThrow(
      "Schema missing.schema.json is not in the schema store",
    );
    expect(fs.existsSync(file)).toBe(true);
  });
});
