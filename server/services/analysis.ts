import type {
  AdYieldResult,
  BraytonCycleResult,
  HtcProcessResult,
  HtcRankineResult,
  InputSet,
  ModelAssumptions,
  Report,
} from "@shared/schema";
import { DEFAULT_MODEL_ASSUMPTIONS, describeAssumptions, mjPerHourToKw } from "@shared/thermo-library";
import { collectInputWarnings, parseInputSet } from "../validation";
import { computeAdYield } from "./adYield";
import { computeBraytonCycle } from "./braytonCycle";
import { computeHtcProcess } from "./htcProcess";
import { computeHtcRankineCycle } from "./htcRankineCycle";
import { assembleReport } from "./reportAssembler";

export interface AnalysisComponents {
  brayton: BraytonCycleResult;
  rankine: HtcRankineResult;
  ad: AdYieldResult;
  htc: HtcProcessResult;
}

/**
 * Runs the four models. The only coupling is the HTC process energy demand,
 * converted from MJ/h to kW, which becomes the steam cycle's heat input.
 */
export function computeAll(
  inputs: InputSet,
  assumptions: ModelAssumptions = DEFAULT_MODEL_ASSUMPTIONS,
): AnalysisComponents {
  const brayton = computeBraytonCycle({
    pressureRatio: inputs.pressureRatio,
    compressorInletTemperature: inputs.ambientTemperature,
    turbineInletTemperature: inputs.turbineInletTemperature,
    compressorEfficiency: inputs.compressorEfficiency,
    turbineEfficiency: inputs.turbineEfficiency,
  }, assumptions.brayton);

  const ad = computeAdYield({
    mass: inputs.tankBMass,
    moisture: inputs.tankBMoisture,
    volatileSolidsFraction: inputs.tankBVolatileSolids,
  }, assumptions.ad);

  const htc = computeHtcProcess({
    mass: inputs.tankAMass,
    moisture: inputs.tankAMoisture,
    reactorTemperature: inputs.reactorTemperature,
  }, assumptions.htc);

  const rankine = computeHtcRankineCycle({
    reactorTemperature: inputs.reactorTemperature,
    heatAvailable: mjPerHourToKw(htc.processEnergy),
    pumpEfficiency: inputs.steamPumpEfficiency,
    turbineEfficiency: inputs.steamTurbineEfficiency,
    reactorPressure: inputs.reactorPressure,
  }, assumptions.steam);

  return { brayton, rankine, ad, htc };
}

/**
 * One analysis request: parse and freeze the inputs, run the models, assemble
 * the report. Throws InvalidInputError before any model runs when the payload
 * is outside the input domain.
 */
export function runAnalysis(
  raw: unknown,
  assumptions: ModelAssumptions = DEFAULT_MODEL_ASSUMPTIONS,
): Report {
  const inputs = parseInputSet(raw);
  const { brayton, rankine, ad, htc } = computeAll(inputs, assumptions);
  return assembleReport(brayton, rankine, ad, htc, {
    inputs,
    assumptions: describeAssumptions(assumptions),
    warnings: collectInputWarnings(inputs),
  });
}
