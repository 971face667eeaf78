import type { HtcAssumptions, HtcProcessResult } from "@shared/schema";
import { DEFAULT_MODEL_ASSUMPTIONS } from "@shared/thermo-library";
import { assertInputs, checkRange, FRACTION, NON_NEGATIVE, POSITIVE } from "../validation";

export interface HtcProcessInputs {
  // kg of Tank A feed per hour
  mass: number;
  moisture: number;
  // K
  reactorTemperature: number;
}

/**
 * Hydrothermal carbonization of the moisture-lean feed.
 *
 * Process energy (MJ) = sensible heat to bring the whole wet charge from the
 * feed temperature to reactor temperature + reaction heat per kg of dry feed.
 */
export function computeHtcProcess(
  inputs: HtcProcessInputs,
  assumptions: HtcAssumptions = DEFAULT_MODEL_ASSUMPTIONS.htc,
): HtcProcessResult {
  const { mass, moisture, reactorTemperature } = inputs;
  const { massYieldFraction, hydrocharHhv, cpFeed, feedTemperature, reactionHeat } = assumptions;

  assertInputs([
    checkRange("tankAMass", mass, NON_NEGATIVE),
    checkRange("tankAMoisture", moisture, FRACTION),
    checkRange("reactorTemperature", reactorTemperature, { min: feedTemperature, minExclusive: true }),
    checkRange("massYieldFraction", massYieldFraction, FRACTION),
    checkRange("hydrocharHhv", hydrocharHhv, NON_NEGATIVE),
    checkRange("cpFeed", cpFeed, POSITIVE),
    checkRange("reactionHeat", reactionHeat, NON_NEGATIVE),
  ]);

  const dryMass = mass * (1 - moisture);
  const hydrocharMass = dryMass * massYieldFraction;
  const sensibleHeat = (mass * cpFeed * (reactorTemperature - feedTemperature)) / 1000;
  const reactionHeatDemand = dryMass * reactionHeat;

  return {
    kind: "htc",
    dryMass,
    hydrocharMass,
    processWater: mass - hydrocharMass,
    hydrocharEnergy: hydrocharMass * hydrocharHhv,
    sensibleHeat,
    reactionHeat: reactionHeatDemand,
    processEnergy: sensibleHeat + reactionHeatDemand,
  };
}
