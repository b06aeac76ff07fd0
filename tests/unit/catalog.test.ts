import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { GameParam } from "../../src/core/game-param.js";
import { loadCatalog } from "../../src/db/catalog.js";
import { openCatalog } from "../../src/db/index.js";
import { ArgumentError, NotFoundError } from "../../src/errors.js";
import { createServer, resolveOutputVersion } from "../../src/server.js";
import { lookupItem } from "../../src/tools/lookup.js";
import { describeCategorySchema, listCategories } from "../../src/tools/schema.js";
import { searchItems, searchItemsInput, toMatchExpression } from "../../src/tools/search.js";
import { makeTempDir, TEST_VERSION, testSchemaStore } from "../helpers.js";

function writeOutput(root: string, file: string, document: object): void {
  const target = path.join(root, TEST_VERSION.toString(), file);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, JSON.stringify(document));
}

describe("catalog tools", () => {
  let db: Database.Database;

  beforeEach(() => {
    const root = makeTempDir();
    writeOutput(root, "talismans.json", {
      $schema: "../schema/talismans.schema.json",
      Talismans: {
        "Lone Charm": { name: "Lone Charm", summary: "Raises vigor", description: ["A golden talisman."], weight: 1 },
      },
    });
    writeOutput(root, "armaments.json", {
      Armaments: { "Test Dagger": { name: "Test Dagger", summary: "A small blade" } },
    });

    db = openCatalog();
    expect(loadCatalog(db, root, TEST_VERSION)).toEqual([
      { category: GameParam.ARMAMENTS, count: 1 },
      { category: GameParam.TALISMANS, count: 1 },
    ]);
  });

  it("quotes search words for the full-text index", () => {
    expect(toMatchExpression("frost katana")).toBe("\"frost\"* \"katana\"*");
    expect(toMatchExpression("!!!")).toBeUndefined();
  });

  it("searches names, summaries and descriptions", () => {
    expect(searchItems(db, { query: "golden", category: GameParam.ALL, limit: 10 })).toBe(
      "Found 1 items for \"golden\":\n\n1. [talismans] **Lone Charm**\n   Raises vigor",
    );
    expect(searchItems(db, { query: "blade", category: GameParam.TALISMANS, limit: 10 })).toBe(
      "No items found for \"blade\". Try broader terms or check spelling.",
    );
    expect(searchItems(db, { query: "!!!", category: GameParam.ALL, limit: 10 })).toBe(
      "No searchable words in \"!!!\".",
    );
  });

  it("looks items up by exact or partial key", () => {
    const expected = "### Test Dagger (armaments)\n```json\n{\n  \"name\": \"Test Dagger\",\n  \"summary\": \"A small blade\"\n}\n```";

    expect(lookupItem(db, "Test Dagger", GameParam.ALL)).toBe(expected);
    expect(lookupItem(db, "Dagger", GameParam.ARMAMENTS)).toBe(expected);
    expect(lookupItem(db, "Nope", GameParam.TALISMANS)).toBe("No item named \"Nope\" in talismans.");
  });

  it("lists categories with their item counts", () => {
    const text = listCategories(db);

    expect(text.split("\n")).toContain("- **talismans** (Talismans, from `EquipParamAccessory`): 1 items");
    expect(text.split("\n")).toContain("- **ammo** (Ammo, from `EquipParamWeapon`): *not generated*");
  });

  it("describes the fields of a category schema", () => {
    const lines = describeCategorySchema(testSchemaStore(), GameParam.TALISMANS).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "## Talismans",
      "**Schema:** talismans.schema.json",
      "**Source table:** EquipParamAccessory",
      "",
      "- `full_hex_id`",
    ]);
    expect(lines.at(-1)).toBe("- `conflicts`");
  });
});

describe("search_items input", () => {
  const input = z.object(searchItemsInput);

  it("defaults the category and limit", () => {
    expect(input.parse({ query: "katana" })).toEqual({ query: "katana", category: GameParam.ALL, limit: 10 });
  });

  it("takes whole limits from 1 to 50 only", () => {
    expect(input.safeParse({ query: "katana", limit: 50 }).success).toBe(true);
    expect(input.safeParse({ query: "katana", limit: 2.5 }).success).toBe(false);
    expect(input.safeParse({ query: "katana", limit: 0 }).success).toBe(false);
    expect(input.safeParse({ query: "katana", limit: 51 }).success).toBe(false);
  });
});

describe("resolveOutputVersion", () => {
  it("prefers the requested version, then latest_version.txt, then the newest directory", () => {
    const root = makeTempDir();
    fs.mkdirSync(path.join(root, "1.02.3"));
    fs.mkdirSync(path.join(root, "1.10.0"));
    fs.mkdirSync(path.join(root, "9.9.9"));

    expect(resolveOutputVersion(root).toString()).toBe("1.10.0");
    expect(resolveOutputVersion(root, "1.02.3").toString()).toBe("1.02.3");

    fs.writeFileSync(path.join(root, "latest_version.txt"), "1.02.3\n");
    expect(resolveOutputVersion(root).toString()).toBe("1.02.3");

    expect(() => resolveOutputVersion(root, "2.00.0")).toThrow(NotFoundError);
    expect(() => resolveOutputVersion(makeTempDir())).toThrow(NotFoundError);
    expect(() => resolveOutputVersion(root, "latest")).toThrow(ArgumentError);
  });
});

describe("createServer", () => {
  it("registers the tools over a loaded catalog", () => {
    const root = makeTempDir();
    writeOutput(root, "keys.json", { Keys: {} });

    const server = createServer({ root, version: TEST_VERSION, schemaStore: testSchemaStore() });

    expect(server).toBeInstanceOf(McpServer);
  });
});
