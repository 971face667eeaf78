import { describe, it, expect } from "vitest";

import { computeHtcProcess } from "../htcProcess";
import { InvalidInputError } from "../../validation";

describe("computeHtcProcess", () => {
  it("turns 100 kg at 20% moisture into 48 kg of hydrochar", () => {
    const r = computeHtcProcess({ mass: 100, moisture: 0.2, reactorTemperature: 473.15 });

    expect(r.kind).toBe("htc");
    expect(r.dryMass).toBe(80);
    expect(r.hydrocharMass).toBe(48);
    expect(r.processWater).toBe(52);
    expect(r.hydrocharEnergy).toBe(1200);
  });

  it("sums sensible and reaction heat into the process energy", () => {
    const r = computeHtcProcess({ mass: 500, moisture: 0.2, reactorTemperature: 473.15 });

    expect(r.sensibleHeat).toBeCloseTo(366.275, 9);
    expect(r.reactionHeat).toBeCloseTo(120, 9);
    expect(r.processEnergy).toBeCloseTo(486.275, 9);
  });

  it("needs more energy for a hotter reactor or a larger charge", () => {
    const ref = computeHtcProcess({ mass: 500, moisture: 0.2, reactorTemperature: 473.15 }).processEnergy;
    const hotter = computeHtcProcess({ mass: 500, moisture: 0.2, reactorTemperature: 503.15 }).processEnergy;
    const heavier = computeHtcProcess({ mass: 600, moisture: 0.2, reactorTemperature: 473.15 }).processEnergy;

    expect(hotter).toBeGreaterThan(ref);
    expect(heavier).toBeGreaterThan(ref);
  });

  it("returns zeros for an empty tank", () => {
    const r = computeHtcProcess({ mass: 0, moisture: 0.2, reactorTemperature: 473.15 });
    expect(r.hydrocharMass).toBe(0);
    expect(r.processEnergy).toBe(0);
  });

  it("rejects a reactor no hotter than the feed", () => {
    expect(() => computeHtcProcess({ mass: 100, moisture: 0.2, reactorTemperature: 298.15 })).toThrow(
      "reactorTemperature must be > 298.15 (got 298.15)",
    );
  });

  it("rejects negative mass", () => {
    expect(() => computeHtcProcess({ mass: -5, moisture: 0.2, reactorTemperature: 473.15 })).toThrow(InvalidInputError);
  });
});
