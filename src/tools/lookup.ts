import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type Database from "better-sqlite3";
import { z } from "zod";
import { GameParam } from "../core/game-param.js";

interface ItemRecord {
  category: string;
  key: string;
  data: string;
}

const MAX_MATCHES = 10;

function formatItem(item: ItemRecord): string {
  const pretty = JSON.stringify(JSON.parse(item.data), null, 2);
  return `### ${item.key} (${item.category})\n\`\`\`json\n${pretty}\n\`\`\``;
}

/**
 * Exact key match first; otherwise every key containing `name`, up to ten.
 */
export function lookupItem(db: Database.Database, name: string, category: GameParam): string {
  const filter = category === GameParam.ALL ? "" : " AND category = ?";
  const filterParams = category === GameParam.ALL ? [] : [category];

  const exact = db.prepare<string[], ItemRecord>(
    `SELECT category, key, data FROM items WHERE key = ?${filter} ORDER BY category`,
  ).all(name, ...filterParams);
  if (exact.length > 0) {
    return exact.map(formatItem).join("\n\n---\n\n");
  }

  const partial = db.prepare<(string | number)[], ItemRecord>(
    `SELECT category, key, data FROM items WHERE key LIKE ?${filter} ORDER BY key LIMIT ?`,
  ).all(`%${name}%`, ...filterParams, MAX_MATCHES);

  if (partial.length === 0) {
    return `No item named "${name}"${category !== GameParam.ALL ? ` in ${category}` : ""}.`;
  }
  return partial.map(formatItem).join("\n\n---\n\n");
}

export function registerLookupTools(server: McpServer, db: Database.Database): void {
  server.tool(
    "lookup_item",
    "Look up the full generated record of an item by its name. Use this when you need exact stats like weight, damage, scaling or requirements.",
    {
      name: z.string().describe("Item name (the element key in the generated database)"),
      category: z.nativeEnum(GameParam).default(GameParam.ALL).describe("Item category to look in"),
    },
    async ({ name, category }) => ({
      content: [{ type: "text" as const, text: lookupItem(db, name, category) }],
    }),
  );
}
