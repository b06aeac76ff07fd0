import path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config/env.js";
import { ConfigError } from "../../src/errors.js";

describe("loadConfig", () => {
  it("resolves data directories under the root", () => {
    const root = path.resolve("/tmp/erdb");

    expect(loadConfig({ NODE_ENV: "test", ERDB_ROOT: root })).toEqual({
      NODE_ENV: "test",
      LOG_LEVEL: "info",
      ERDB_ROOT: root,
      ERDB_GAMEDATA_DIR: path.join(root, "gamedata"),
      ERDB_SCHEMA_DIR: path.join(root, "schema"),
    });
  });

  it("honours explicit directories", () => {
    const config = loadConfig({ ERDB_ROOT: "/tmp/erdb", ERDB_GAMEDATA_DIR: "/srv/dumps", LOG_LEVEL: "debug" });

    expect(config.ERDB_GAMEDATA_DIR).toBe(path.resolve("/srv/dumps"));
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("development");
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});
