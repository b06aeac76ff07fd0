import { ArgumentError } from "../errors.js";

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?$/;

/**
 * A game data snapshot identifier, e.g. `1.02.3`.
 * Selects the input directory and names the output directory.
 */
export class GameVersion {
  constructor(
    public readonly major: number,
    public readonly minor: number,
    public readonly patch: number = 0,
  ) {}

  static fromString(value: string): GameVersion {
    const match = VERSION_PATTERN.exec(value.trim());
    if (!match) {
      throw new ArgumentError(`Invalid game version: '${value}'`, { value });
    }
    return new GameVersion(Number(match[1]), Number(match[2]), Number(match[3] ?? 0));
  }

  /**
   * The version a directory is named after, if the name is in the directory
   * form `toString` renders. `1.2.3` is not: its files live under `1.02.3`.
   */
  static fromPath(name: string): GameVersion | undefined {
    if (!VERSION_PATTERN.test(name)) return undefined;
    const version = GameVersion.fromString(name);
    return version.toString() === name ? version : undefined;
  }

  /** Whether a directory name names a game version. */
  static matchPath(name: string): boolean {
    return VERSION_PATTERN.test(name);
  }

  static compare(a: GameVersion, b: GameVersion): number {
    return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
  }

  equals(other: GameVersion): boolean {
    return GameVersion.compare(this, other) === 0;
  }

  toString(): string {
    return `${this.major}.${String(this.minor).padStart(2, "0")}.${this.patch}`;
  }
}
