import { describe, it, expect } from "vitest";

import { computeBraytonCycle, type BraytonCycleInputs } from "../braytonCycle";
import { InvalidInputError } from "../../validation";

const base: BraytonCycleInputs = {
  pressureRatio: 8,
  compressorInletTemperature: 300,
  turbineInletTemperature: 1400,
  compressorEfficiency: 0.85,
  turbineEfficiency: 0.88,
};

describe("computeBraytonCycle", () => {
  it("resolves the four state temperatures for PR 8, 300 K to 1400 K", () => {
    const r = computeBraytonCycle(base);

    expect(r.isentropicCompressorExitTemperature).toBeCloseTo(543.434, 2);
    expect(r.statePoints.map(sp => sp.temperature)).toEqual([
      300,
      expect.closeTo(586.393, 2),
      1400,
      expect.closeTo(848.119, 2),
    ]);
    expect(r.isentropicTurbineExitTemperature).toBeCloseTo(772.863, 2);
  });

  it("computes works, heats and efficiency per kg of air", () => {
    const r = computeBraytonCycle(base);

    expect(r.compressionWork).toBeCloseTo(287.825, 2);
    expect(r.turbineWork).toBeCloseTo(554.640, 2);
    expect(r.netWork).toBeCloseTo(266.815, 2);
    expect(r.heatInput).toBeCloseTo(817.675, 2);
    expect(r.heatRejected).toBeCloseTo(550.860, 2);
    expect(r.thermalEfficiency).toBeCloseTo(0.32631, 4);
    expect(r.thermalEfficiency).toBeGreaterThanOrEqual(0.3);
    expect(r.thermalEfficiency).toBeLessThanOrEqual(0.45);
    expect(r.backWorkRatio).toBeCloseTo(0.51894, 4);
    expect(r.degenerate).toEqual([]);
  });

  it("closes the energy balance: q_in - q_out = w_net", () => {
    const r = computeBraytonCycle(base);
    expect(r.heatInput - r.heatRejected).toBeCloseTo(r.netWork, 9);
  });

  it("labels states in cycle order with pressures and reference properties", () => {
    const r = computeBraytonCycle(base);

    expect(r.statePoints.map(sp => sp.index)).toEqual([1, 2, 3, 4]);
    expect(r.statePoints.map(sp => sp.label)).toEqual([
      "Compressor Inlet",
      "Compressor Outlet",
      "Turbine Inlet",
      "Turbine Outlet",
    ]);
    expect(r.statePoints.map(sp => sp.pressure)).toEqual([101.325, 810.6, 810.6, 101.325]);
    expect(r.statePoints[0].enthalpy).toBe(0);
    expect(r.statePoints[0].entropy).toBe(0);
    expect(r.statePoints[1].enthalpy).toBeCloseTo(r.compressionWork, 9);
    expect(r.statePoints[1].entropy).toBeCloseTo(0.076759, 5);
  });

  it("keeps works non-negative and efficiency inside [0, 1)", () => {
    for (const pressureRatio of [2, 5, 12, 20, 30]) {
      const r = computeBraytonCycle({ ...base, pressureRatio });
      expect(r.compressionWork).toBeGreaterThanOrEqual(0);
      expect(r.turbineWork).toBeGreaterThanOrEqual(0);
      expect(r.thermalEfficiency).toBeGreaterThanOrEqual(0);
      expect(r.thermalEfficiency).toBeLessThan(1);
      if (r.thermalEfficiency > 0) {
        expect(r.backWorkRatio).toBeGreaterThanOrEqual(0);
        expect(r.backWorkRatio).toBeLessThanOrEqual(1);
      }
    }
  });

  it("loses efficiency as either component efficiency drops", () => {
    const ref = computeBraytonCycle(base).thermalEfficiency;
    const worseCompressor = computeBraytonCycle({ ...base, compressorEfficiency: 0.8 }).thermalEfficiency;
    const worseTurbine = computeBraytonCycle({ ...base, turbineEfficiency: 0.8 }).thermalEfficiency;

    expect(worseCompressor).toBeLessThan(ref);
    expect(worseTurbine).toBeLessThan(ref);
  });

  it("returns identical results for identical inputs", () => {
    expect(computeBraytonCycle(base)).toEqual(computeBraytonCycle(base));
  });

  it("tags zero efficiency when compressor work exceeds turbine work", () => {
    const r = computeBraytonCycle({
      ...base,
      turbineInletTemperature: 800,
      compressorEfficiency: 0.5,
      turbineEfficiency: 0.5,
    });

    expect(r.heatInput).toBeGreaterThan(0);
    expect(r.netWork).toBeLessThanOrEqual(0);
    expect(r.thermalEfficiency).toBe(0);
    expect(r.degenerate).toEqual([
      expect.objectContaining({ metric: "brayton.thermalEfficiency", reason: "non_positive_net_work" }),
    ]);
  });

  it("tags non-positive heat input when TIT does not exceed the compressor exit", () => {
    const r = computeBraytonCycle({ ...base, pressureRatio: 30, turbineInletTemperature: 600 });

    expect(r.heatInput).toBeLessThanOrEqual(0);
    expect(r.thermalEfficiency).toBe(0);
    expect(r.degenerate[0]).toMatchObject({
      metric: "brayton.thermalEfficiency",
      reason: "non_positive_heat_input",
    });
  });

  it("rejects a pressure ratio of 1 or less", () => {
    expect(() => computeBraytonCycle({ ...base, pressureRatio: 1 })).toThrow(InvalidInputError);
  });

  it("reports every offending field at once", () => {
    try {
      computeBraytonCycle({ ...base, compressorEfficiency: 0, turbineEfficiency: 1.2 });
      expect.unreachable("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidInputError);
      if (error instanceof InvalidInputError) {
        expect(error.issues.map(i => i.field)).toEqual(["compressorEfficiency", "turbineEfficiency"]);
        expect(error.issues[0].message).toBe("compressorEfficiency must be > 0 and <= 1 (got 0)");
      }
    }
  });

  it("rejects a turbine inlet at or below the compressor inlet", () => {
    expect(() => computeBraytonCycle({ ...base, turbineInletTemperature: 300 })).toThrow(
      "turbineInletTemperature must be > 300 (got 300)",
    );
  });

  it("rejects non-finite temperatures", () => {
    expect(() => computeBraytonCycle({ ...base, compressorInletTemperature: Number.NaN })).toThrow(
      "compressorInletTemperature must be a finite number",
    );
  });
});
