#!/usr/bin/env node
/**
 * MCP server over the generated item databases, on stdio.
 *
 * Usage: npm start -- [--version 1.02.3]
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import config from "./config/env.js";
import { loadSchemaStore } from "./core/schema-store.js";
import { createServer, resolveOutputVersion } from "./server.js";
import logger from "./logger.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const versionIdx = args.indexOf("--version");
  const requested = versionIdx === -1 ? undefined : args[versionIdx + 1];

  const version = resolveOutputVersion(config.ERDB_ROOT, requested);
  const server = createServer({
    root: config.ERDB_ROOT,
    version,
    schemaStore: loadSchemaStore(config.ERDB_SCHEMA_DIR),
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`erdb-mcp serving ${version} on stdio`);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "MCP server failed to start");
  process.exitCode = 1;
});
