import { describe, it, expect } from "vitest";

import { defaultInputValues } from "@shared/input-parameters";
import { DEFAULT_MODEL_ASSUMPTIONS, mergeAssumptions } from "@shared/thermo-library";
import { computeAll, runAnalysis } from "../analysis";
import { InvalidInputError, parseInputSet } from "../../validation";

describe("computeAll", () => {
  it("feeds the HTC process heat into the steam cycle in kW", () => {
    const { htc, rankine } = computeAll(parseInputSet(defaultInputValues()));

    expect(htc.processEnergy).toBeCloseTo(486.275, 9);
    expect(rankine.heatAvailable).toBeCloseTo(135.076389, 5);
  });

  it("uses the ambient temperature as the compressor inlet", () => {
    const { brayton } = computeAll(parseInputSet({ ...defaultInputValues(), ambientTemperature: 288.15 }));
    expect(brayton.statePoints[0].temperature).toBe(288.15);
  });
});

describe("runAnalysis", () => {
  it("produces the full report for the dashboard defaults", () => {
    const report = runAnalysis(defaultInputValues());

    expect(report.combined.airMassFlow).toBeCloseTo(0.550352, 5);
    expect(report.combined.totalNetPower).toBeCloseTo(205.9068, 3);
    expect(report.combined.overallEfficiency).toBeCloseTo(0.340674, 5);
    expect(report.brayton.thermalEfficiency).toBeCloseTo(0.368474, 5);
    expect(report.rankine.thermalEfficiency).toBeCloseTo(0.244083, 5);
    expect(report.ad.biogasVolume).toBeCloseTo(76.8, 9);
    expect(report.htc.hydrocharMass).toBeCloseTo(240, 9);
    expect(report.degenerate).toEqual([]);
    expect(report.warnings).toEqual([]);
  });

  it("freezes the parsed inputs on the report", () => {
    const report = runAnalysis(defaultInputValues());

    expect(report.inputs).not.toBeNull();
    expect(Object.isFrozen(report.inputs)).toBe(true);
    expect(report.inputs?.reactorPressure).toBe(20);
  });

  it("includes feed rates in the process summary", () => {
    const report = runAnalysis(defaultInputValues());

    expect(report.processSummary).toHaveLength(9);
    expect(report.processSummary[0]).toMatchObject({ label: "Tank A Feed Rate", display: "500.00 kg/h" });
    expect(report.processSummary[4]).toMatchObject({ label: "Tank B Feed Rate", display: "800.00 kg/h" });
  });

  it("lists every model assumption with its source", () => {
    const report = runAnalysis(defaultInputValues());

    expect(report.assumptions).toHaveLength(20);
    expect(report.assumptions[0]).toEqual({
      parameter: "Gas Turbine Cycle: Air specific heat ratio (γ)",
      value: "1.40",
      source: "Ideal-gas air",
    });
  });

  it("applies assumption overrides", () => {
    const assumptions = mergeAssumptions(DEFAULT_MODEL_ASSUMPTIONS, { ad: { methaneFraction: 0.5 } });
    const report = runAnalysis(defaultInputValues(), assumptions);

    expect(report.ad.methaneVolume).toBeCloseTo(38.4, 9);
    expect(report.ad.biogasVolume).toBeCloseTo(76.8, 9);
  });

  it("refuses steam overrides that would invert the cycle", () => {
    const assumptions = mergeAssumptions(DEFAULT_MODEL_ASSUMPTIONS, { steam: { condenserTemperature: 1000 } });
    expect(() => runAnalysis(defaultInputValues(), assumptions)).toThrow(InvalidInputError);
  });

  it("tags an idle plant instead of failing", () => {
    const report = runAnalysis({ ...defaultInputValues(), tankAMass: 0, tankBMass: 0 });

    expect(report.degenerate.map(f => f.reason)).toEqual(["zero_heat_available", "zero_energy_input"]);
    expect(report.combined.totalNetPower).toBe(0);
    expect(report.summaryCards.find(c => c.key === "overallEfficiency")?.display).toBe("N/A");
    expect(report.summaryCards.find(c => c.key === "htcEfficiency")?.display).toBe("N/A");
    expect(report.warnings.map(w => w.field)).toEqual(["tankAMass", "tankBMass"]);
  });

  it("rejects an incomplete payload before any model runs", () => {
    const { pressureRatio: _omitted, ...rest } = defaultInputValues();

    try {
      runAnalysis(rest);
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.issues).toEqual([{ field: "pressureRatio", message: "pressureRatio is required" }]);
      }
    }
  });

  it("is deterministic", () => {
    expect(runAnalysis(defaultInputValues())).toEqual(runAnalysis(defaultInputValues()));
  });
});
