import { describe, expect, it } from "vitest";
import { GameVersion } from "../../src/core/game-version.js";
import { ArgumentError } from "../../src/errors.js";

describe("GameVersion", () => {
  it("parses and renders the directory form", () => {
    expect(GameVersion.fromString("1.02.3").toString()).toBe("1.02.3");
    expect(GameVersion.fromString("1.2").toString()).toBe("1.02.0");
  });

  it("rejects other strings", () => {
    expect(() => GameVersion.fromString("1.x")).toThrow("Invalid game version: '1.x'");
    expect(() => GameVersion.fromString("")).toThrow(ArgumentError);
    expect(GameVersion.matchPath("1.02.3")).toBe(true);
    expect(GameVersion.matchPath("latest")).toBe(false);
  });

  it("reads only directory names in the rendered form", () => {
    expect(GameVersion.fromPath("1.02.3")?.toString()).toBe("1.02.3");
    expect(GameVersion.fromPath("1.2.3")).toBeUndefined();
    expect(GameVersion.fromPath("1.02")).toBeUndefined();
    expect(GameVersion.fromPath("latest")).toBeUndefined();
  });

  it("orders by major, minor, then patch", () => {
    const versions = ["1.10.0", "1.02.3", "2.00.0", "1.02.1"].map((v) => GameVersion.fromString(v));
    versions.sort(GameVersion.compare);

    expect(versions.map(String)).toEqual(["1.02.1", "1.02.3", "1.10.0", "2.00.0"]);
    expect(new GameVersion(1, 2).equals(GameVersion.fromString("1.02.0"))).toBe(true);
  });
});
