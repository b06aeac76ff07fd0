import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type Database from "better-sqlite3";
import { z } from "zod";
import { GameParam } from "../core/game-param.js";

export interface SearchOptions {
  query: string;
  category: GameParam;
  limit: number;
}

/** Quote each word so user input never reaches FTS5 as query syntax. */
export function toMatchExpression(query: string): string | undefined {
  const words = query.match(/[\p{L}\p{N}]+/gu);
  if (!words) return undefined;
  return words.map((word) => `"${word}"*`).join(" ");
}

export function searchItems(db: Database.Database, { query, category, limit }: SearchOptions): string {
  const match = toMatchExpression(query);
  if (!match) {
    return `No searchable words in "${query}".`;
  }

  let sql = `
    SELECT s.category, s.name, i.key, i.summary
    FROM search_index s
    JOIN items i ON i.id = s.item_id
    WHERE search_index MATCH ?
  `;
  const params: (string | number)[] = [match];

  if (category !== GameParam.ALL) {
    sql += ` AND s.category = ?`;
    params.push(category);
  }

  sql += ` ORDER BY rank LIMIT ?`;
  params.push(limit);

  const results = db.prepare<(string | number)[], {
    category: string;
    name: string;
    key: string;
    summary: string | null;
  }>(sql).all(...params);

  if (results.length === 0) {
    return `No items found for "${query}". Try broader terms or check spelling.`;
  }

  const formatted = results.map((r, i) =>
    `${i + 1}. [${r.category}] **${r.name}**${r.key !== r.name ? ` (key: ${r.key})` : ""}\n   ${r.summary ?? "(no summary)"}`,
  ).join("\n\n");

  return `Found ${results.length} items for "${query}":\n\n${formatted}`;
}

export const searchItemsInput = {
  query: z.string().describe("Search words"),
  category: z.nativeEnum(GameParam).default(GameParam.ALL).describe("Restrict to one item category"),
  limit: z.number().int().min(1).max(50).default(10).describe("Max results to return"),
};

export function registerSearchTools(server: McpServer, db: Database.Database): void {
  server.tool(
    "search_items",
    "Full-text search over the generated item databases (names, summaries and descriptions). Use this for broad queries like 'frost katana' or 'talisman that boosts poise'.",
    searchItemsInput,
    async ({ query, category, limit }) => ({
      content: [{ type: "text" as const, text: searchItems(db, { query, category, limit }) }],
    }),
  );
}
