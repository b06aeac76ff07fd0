import { describe, expect, it } from "vitest";
import {
  CorrectionGraphGeneratorData,
  correctionRatio,
  MAX_ATTRIBUTE_LEVEL,
} from "../../src/generators/correction-graph.js";
import type { CorrectionStages } from "../../src/generators/correction-graph.js";
import { createContext } from "../helpers.js";

const stages: CorrectionStages = {
  levels: [1, 20, 60, 80, 150],
  growth: [0, 35, 75, 90, 110],
  exponents: [1.2, -1.2, 1, 1],
};

describe("correctionRatio", () => {
  it("clamps outside the breakpoints", () => {
    expect(correctionRatio(stages, 1)).toBe(0);
    expect(correctionRatio(stages, 150)).toBe(1.1);
    expect(correctionRatio(stages, 200)).toBe(1.1);
  });

  it("interpolates linearly with exponent 1", () => {
    expect(correctionRatio(stages, 70)).toBe(0.825);
    expect(correctionRatio(stages, 20)).toBe(0.35);
  });

  it("eases in with a positive exponent and out with a negative one", () => {
    expect(correctionRatio(stages, 10.5)).toBeCloseTo(0.152346, 5);
    expect(correctionRatio(stages, 40)).toBeCloseTo(0.575890, 5);
  });
});

describe("CorrectionGraphGeneratorData", () => {
  it("stores the stages and a ratio per attribute level", () => {
    const { context } = createContext({
      params: {
        CalcCorrectGraph: [{
          id: 0,
          fields: {
            stageMaxVal0: "1",
            stageMaxVal1: "20",
            stageMaxVal2: "60",
            stageMaxVal3: "80",
            stageMaxVal4: "150",
            stageMaxGrowVal0: "0",
            stageMaxGrowVal1: "35",
            stageMaxGrowVal2: "75",
            stageMaxGrowVal3: "90",
            stageMaxGrowVal4: "110",
            adjPt_maxGrowVal0: "1.2",
            adjPt_maxGrowVal1: "-1.2",
            adjPt_maxGrowVal2: "1",
            adjPt_maxGrowVal3: "1",
          },
        }],
      },
    });
    const generator = new CorrectionGraphGeneratorData(context);
    const [row] = [...generator.mainParamIterator()];

    expect(CorrectionGraphGeneratorData.stages(row)).toEqual(stages);

    const graph = generator.constructObject(row);
    expect(graph.id).toBe(0);
    expect(graph.stages).toEqual([
      { level: 1, growth: 0, exponent: 1.2 },
      { level: 20, growth: 35, exponent: -1.2 },
      { level: 60, growth: 75, exponent: 1 },
      { level: 80, growth: 90, exponent: 1 },
      { level: 150, growth: 110, exponent: 0 },
    ]);

    const ratios = Array.isArray(graph.ratios) ? graph.ratios : [];
    expect(ratios).toHaveLength(MAX_ATTRIBUTE_LEVEL);
    expect(ratios[0]).toBe(0);
    expect(ratios[69]).toBe(0.825);
    expect(ratios[149]).toBe(1.1);
  });
});
