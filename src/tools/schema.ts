import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type Database from "better-sqlite3";
import { z } from "zod";
import type { PropertyTable } from "../core/common.js";
import { effectiveParams, GameParam, schemaFile, stem, title } from "../core/game-param.js";
import type { EffectiveGameParam } from "../core/game-param.js";
import { schemaProperties } from "../core/schema-store.js";
import type { SchemaStore } from "../core/schema-store.js";

const effectiveParamSchema = z
  .nativeEnum(GameParam)
  .refine((param): param is EffectiveGameParam => param !== GameParam.ALL, "Pick a single category");

function formatProperties(table: PropertyTable, depth = 0): string[] {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];
  for (const [name, shape] of table) {
    lines.push(`${indent}- \`${name}\``);
    if (shape.properties) lines.push(...formatProperties(shape.properties, depth + 1));
    if (shape.additionalProperties) {
      lines.push(`${indent}  - *(each entry)*`);
      lines.push(...formatProperties(shape.additionalProperties, depth + 2));
    }
  }
  return lines;
}

export function describeCategorySchema(store: SchemaStore, category: EffectiveGameParam): string {
  const table = schemaProperties(store, schemaFile(category), title(category));
  return [
    `## ${title(category)}`,
    `**Schema:** ${schemaFile(category)}`,
    `**Source table:** ${stem(category)}`,
    "",
    ...formatProperties(table),
  ].join("\n");
}

export function listCategories(db: Database.Database): string {
  const counts = new Map(
    db.prepare<[], { category: string; count: number }>(
      "SELECT category, COUNT(*) AS count FROM items GROUP BY category",
    ).all().map((row) => [row.category, row.count]),
  );

  const formatted = effectiveParams().map((category) => {
    const count = counts.get(category);
    const status = count === undefined ? "*not generated*" : `${count} items`;
    return `- **${category}** (${title(category)}, from \`${stem(category)}\`): ${status}`;
  }).join("\n");

  return `## Item Categories\n\n${formatted}`;
}

export function registerSchemaTools(server: McpServer, db: Database.Database, store: SchemaStore): void {
  server.tool(
    "get_category_schema",
    "Get the fields an item category declares in its JSON Schema. Use this to learn which fields a record of that category carries.",
    {
      category: effectiveParamSchema.describe("Item category, e.g. 'armaments', 'talismans', 'spells'"),
    },
    async ({ category }) => ({
      content: [{ type: "text" as const, text: describeCategorySchema(store, category) }],
    }),
  );

  server.tool(
    "list_categories",
    "List every item category with its source param table and how many generated items it holds.",
    {},
    async () => ({
      content: [{ type: "text" as const, text: listCategories(db) }],
    }),
  );
}
