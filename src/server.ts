import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import fs from "fs";
import path from "path";
import { GameVersion } from "./core/game-version.js";
import type { SchemaStore } from "./core/schema-store.js";
import { LATEST_VERSION_FILE } from "./cli/run.js";
import { loadCatalog } from "./db/catalog.js";
import { openCatalog } from "./db/index.js";
import { NotFoundError } from "./errors.js";
import logger from "./logger.js";
import { registerLookupTools } from "./tools/lookup.js";
import { registerSchemaTools } from "./tools/schema.js";
import { registerSearchTools } from "./tools/search.js";

export interface ServerOptions {
  root: string;
  version: GameVersion;
  schemaStore: SchemaStore;
}

/**
 * Pick the output version to serve: the requested one, else the one named in
 * latest_version.txt, else the newest version directory under `root`.
 */
export function resolveOutputVersion(root: string, requested?: string): GameVersion {
  if (requested !== undefined) {
    const version = GameVersion.fromString(requested);
    if (!fs.existsSync(path.join(root, version.toString()))) {
      throw new NotFoundError("Output version", version.toString());
    }
    return version;
  }

  const latestFile = path.join(root, LATEST_VERSION_FILE);
  if (fs.existsSync(latestFile)) {
    const latest = fs.readFileSync(latestFile, "utf-8").trim();
    if (GameVersion.matchPath(latest) && fs.existsSync(path.join(root, GameVersion.fromString(latest).toString()))) {
      return GameVersion.fromString(latest);
    }
  }

  const versions = fs.existsSync(root)
    ? fs.readdirSync(root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => GameVersion.fromPath(entry.name))
      .filter((version): version is GameVersion => version !== undefined)
      .sort((a, b) => GameVersion.compare(b, a))
    : [];
  if (versions.length === 0) {
    throw new NotFoundError("Generated output under", root);
  }
  return versions[0];
}

export function createServer({ root, version, schemaStore }: ServerOptions): McpServer {
  const server = new McpServer({
    name: "erdb-mcp",
    version: "0.1.0",
  });

  const db = openCatalog();
  const summaries = loadCatalog(db, root, version);
  logger.info(`Catalog for ${version}: ${summaries.map((s) => `${s.category}=${s.count}`).join(", ") || "empty"}`);

  registerSearchTools(server, db);
  registerLookupTools(server, db);
  registerSchemaTools(server, db, schemaStore);

  return server;
}
