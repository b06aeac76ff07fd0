import { GameParam } from "../core/game-param.js";
import type { JsonObject } from "../core/json.js";
import type { ParamRow } from "../db/params.js";
import { GeneratorDataBase } from "./base.js";
import type { GeneratorContext } from "./base.js";

export const MAX_ATTRIBUTE_LEVEL = 150;

export interface CorrectionStages {
  /** Attribute levels at the stage breakpoints, ascending. */
  levels: readonly number[];
  /** Growth percentage reached at each breakpoint. */
  growth: readonly number[];
  /** Curve exponent of each stage. */
  exponents: readonly number[];
}

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Scaling ratio at an attribute level, interpolated over the stage the level falls in.
 * A positive exponent eases in, a negative one eases out.
 */
export function correctionRatio(stages: CorrectionStages, level: number): number {
  const { levels, growth, exponents } = stages;
  const last = levels.length - 1;

  if (level <= levels[0]) return round(growth[0] / 100);
  if (level > levels[last]) return round(growth[last] / 100);

  for (let stage = 0; stage < last; ++stage) {
    const from = levels[stage];
    const to = levels[stage + 1];
    if (level <= from || level > to) continue;

    const ratio = (level - from) / (to - from);
    const exponent = exponents[stage] ?? 0;
    let curve = ratio;
    if (exponent > 0) curve = ratio ** exponent;
    else if (exponent < 0) curve = 1 - (1 - ratio) ** -exponent;

    return round((growth[stage] + (growth[stage + 1] - growth[stage]) * curve) / 100);
  }

  return round(growth[last] / 100);
}

export class CorrectionGraphGeneratorData extends GeneratorDataBase {
  constructor(context: GeneratorContext) {
    super(GameParam.CORRECTION_GRAPH, context);
  }

  override requirePatching(): boolean {
    return false;
  }

  getKeyName(row: ParamRow): string {
    return String(row.id);
  }

  constructObject(row: ParamRow): JsonObject {
    const stages = CorrectionGraphGeneratorData.stages(row);
    const ratios: number[] = [];
    for (let level = 1; level <= MAX_ATTRIBUTE_LEVEL; ++level) {
      ratios.push(correctionRatio(stages, level));
    }

    return {
      id: row.id,
      stages: stages.levels.map((level, index) => ({
        level,
        growth: stages.growth[index],
        exponent: stages.exponents[index] ?? 0,
      })),
      ratios,
    };
  }

  static stages(row: ParamRow): CorrectionStages {
    const breakpoints = [0, 1, 2, 3, 4];
    return {
      levels: breakpoints.map((index) => row.float(`stageMaxVal${index}`)),
      growth: breakpoints.map((index) => row.float(`stageMaxGrowVal${index}`)),
      exponents: breakpoints.slice(0, 4).map((index) => row.float(`adjPt_maxGrowVal${index}`)),
    };
  }
}
