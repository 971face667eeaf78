import type { AdAssumptions, AdYieldResult } from "@shared/schema";
import { DEFAULT_MODEL_ASSUMPTIONS } from "@shared/thermo-library";
import { assertInputs, checkRange, FRACTION, NON_NEGATIVE } from "../validation";

export interface AdYieldInputs {
  // kg of Tank B feed per hour
  mass: number;
  moisture: number;
  volatileSolidsFraction?: number;
}

export const DEFAULT_VOLATILE_SOLIDS_FRACTION = 0.8;

/**
 * Biogas from anaerobic digestion of the moisture-rich feed. Linear in every
 * input: dry solids → volatile solids → biogas → methane and energy.
 */
export function computeAdYield(
  inputs: AdYieldInputs,
  assumptions: AdAssumptions = DEFAULT_MODEL_ASSUMPTIONS.ad,
): AdYieldResult {
  const { mass, moisture, volatileSolidsFraction = DEFAULT_VOLATILE_SOLIDS_FRACTION } = inputs;
  const { specificYield, methaneFraction, biogasLhv } = assumptions;

  assertInputs([
    checkRange("tankBMass", mass, NON_NEGATIVE),
    checkRange("tankBMoisture", moisture, FRACTION),
    checkRange("tankBVolatileSolids", volatileSolidsFraction, FRACTION),
    checkRange("specificYield", specificYield, NON_NEGATIVE),
    checkRange("methaneFraction", methaneFraction, FRACTION),
    checkRange("biogasLhv", biogasLhv, NON_NEGATIVE),
  ]);

  const dryMass = mass * (1 - moisture);
  const volatileSolids = dryMass * volatileSolidsFraction;
  const biogasVolume = volatileSolids * specificYield;

  return {
    kind: "ad",
    dryMass,
    volatileSolids,
    biogasVolume,
    methaneVolume: biogasVolume * methaneFraction,
    biogasEnergy: biogasVolume * biogasLhv,
  };
}
