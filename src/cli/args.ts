import { z } from "zod";
import { effectiveParams, GameParam } from "../core/game-param.js";
import type { EffectiveGameParam } from "../core/game-param.js";
import { ArgumentError } from "../errors.js";

export interface CliOptions {
  generate: GameParam[];
  findValues?: string;
  findValuesLimit: number;
  gamedataVersion?: string;
}

const cliSchema = z.object({
  generate: z.array(z.nativeEnum(GameParam)),
  findValues: z.string().min(1).optional(),
  findValuesLimit: z.coerce.number().int().min(-1),
  gamedataVersion: z.string().min(1).optional(),
});

const FLAGS: Record<string, keyof CliOptions> = {
  "--generate": "generate",
  "-g": "generate",
  "--find-values": "findValues",
  "-f": "findValues",
  "--find-values-limit": "findValuesLimit",
  "--gamedata-version": "gamedataVersion",
  "-s": "gamedataVersion",
};

export const USAGE = [
  "Usage: erdb [--generate|-g <category...>] [--find-values|-f ParamName:FieldName]",
  "            [--find-values-limit N] [--gamedata-version|-s x.yy.z]",
  `  categories: ${Object.values(GameParam).join(", ")}`,
].join("\n");

/**
 * `--generate` takes every following token up to the next flag; the other flags take one value.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const raw: { generate: string[]; findValues?: string; findValuesLimit: string; gamedataVersion?: string } = {
    generate: [],
    findValuesLimit: "-1",
  };

  for (let i = 0; i < argv.length; ++i) {
    const option = FLAGS[argv[i]];
    if (!option) {
      throw new ArgumentError(`Unknown argument '${argv[i]}'`, { value: argv[i] });
    }

    if (option === "generate") {
      while (i + 1 < argv.length && !argv[i + 1].startsWith("-")) {
        raw.generate.push(argv[++i]);
      }
      continue;
    }

    const value = argv[i + 1];
    if (value === undefined || (value.startsWith("-") && option !== "findValuesLimit")) {
      throw new ArgumentError(`Missing value for ${argv[i]}`, { field: option });
    }
    raw[option] = value;
    ++i;
  }

  const parsed = cliSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ArgumentError(`Invalid ${issue.path.join(".")}: ${issue.message}`, {
      field: issue.path.join("."),
      constraint: issue.message,
    });
  }
  return parsed.data;
}

/** Deduplicated selection with `all` expanded, sorted by tag. */
export function selectGenerators(selected: readonly GameParam[]): EffectiveGameParam[] {
  if (selected.includes(GameParam.ALL)) {
    return effectiveParams();
  }
  const unique = new Set(selected.filter((param): param is EffectiveGameParam => param !== GameParam.ALL));
  return [...unique].sort();
}
