import type {
  BraytonAssumptions,
  BraytonCycleResult,
  DegenerateFlag,
  StatePoint,
} from "@shared/schema";
import { DEFAULT_MODEL_ASSUMPTIONS } from "@shared/thermo-library";
import { assertInputs, checkRange, EFFICIENCY, POSITIVE } from "../validation";

export interface BraytonCycleInputs {
  pressureRatio: number;
  // K
  compressorInletTemperature: number;
  turbineInletTemperature: number;
  compressorEfficiency: number;
  turbineEfficiency: number;
}

const STATE_LABELS = ["Compressor Inlet", "Compressor Outlet", "Turbine Inlet", "Turbine Outlet"];

function roundTo(val: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(val * factor) / factor;
}

/**
 * Air-standard Brayton cycle with isentropic efficiencies on the compressor
 * and turbine. Works and heats are per kg of air (kJ/kg); enthalpy and entropy
 * of each state are referenced to the compressor inlet.
 */
export function computeBraytonCycle(
  inputs: BraytonCycleInputs,
  assumptions: BraytonAssumptions = DEFAULT_MODEL_ASSUMPTIONS.brayton,
): BraytonCycleResult {
  const {
    pressureRatio: rp,
    compressorInletTemperature: T1,
    turbineInletTemperature: T3,
    compressorEfficiency: etaC,
    turbineEfficiency: etaT,
  } = inputs;
  const { gamma, cp, gasConstant: R, ambientPressure } = assumptions;

  assertInputs([
    checkRange("pressureRatio", rp, { min: 1, minExclusive: true }),
    checkRange("compressorInletTemperature", T1, POSITIVE),
    checkRange("turbineInletTemperature", T3, POSITIVE),
    Number.isFinite(T1) && Number.isFinite(T3)
      ? checkRange("turbineInletTemperature", T3, { min: T1, minExclusive: true })
      : null,
    checkRange("compressorEfficiency", etaC, EFFICIENCY),
    checkRange("turbineEfficiency", etaT, EFFICIENCY),
    checkRange("gamma", gamma, { min: 1, minExclusive: true }),
    checkRange("cp", cp, POSITIVE),
    checkRange("gasConstant", R, POSITIVE),
    checkRange("ambientPressure", ambientPressure, POSITIVE),
  ]);

  const tempRatio = Math.pow(rp, (gamma - 1) / gamma);

  // Compression
  const T2s = T1 * tempRatio;
  const T2 = T1 + (T2s - T1) / etaC;

  // Expansion
  const T4s = T3 / tempRatio;
  const T4 = T3 - etaT * (T3 - T4s);

  const compressionWork = cp * (T2 - T1);
  const turbineWork = cp * (T3 - T4);
  const netWork = turbineWork - compressionWork;
  const heatInput = cp * (T3 - T2);
  const heatRejected = cp * (T4 - T1);

  const degenerate: DegenerateFlag[] = [];
  let thermalEfficiency = 0;
  if (heatInput <= 0) {
    degenerate.push({
      metric: "brayton.thermalEfficiency",
      reason: "non_positive_heat_input",
      message: `Turbine inlet temperature (${roundTo(T3)} K) does not exceed compressor exit temperature (${roundTo(T2)} K); no heat can be added in the combustor`,
    });
  } else if (netWork <= 0) {
    degenerate.push({
      metric: "brayton.thermalEfficiency",
      reason: "non_positive_net_work",
      message: `Compressor work (${roundTo(compressionWork)} kJ/kg) consumes all turbine work (${roundTo(turbineWork)} kJ/kg)`,
    });
  } else {
    thermalEfficiency = netWork / heatInput;
  }

  let backWorkRatio = 0;
  if (turbineWork > 0) {
    backWorkRatio = compressionWork / turbineWork;
  } else {
    degenerate.push({
      metric: "brayton.backWorkRatio",
      reason: "non_positive_turbine_work",
      message: "The turbine produces no work; back work ratio is undefined",
    });
  }

  const lnRp = Math.log(rp);
  const s2 = cp * Math.log(T2 / T1) - R * lnRp;
  const s3 = s2 + cp * Math.log(T3 / T2);
  const s4 = s3 + cp * Math.log(T4 / T3) + R * lnRp;

  const lowPressure = ambientPressure;
  const highPressure = ambientPressure * rp;
  const temperatures = [T1, T2, T3, T4];
  const pressures = [lowPressure, highPressure, highPressure, lowPressure];
  const entropies = [0, s2, s3, s4];

  const statePoints: StatePoint[] = temperatures.map((T, i) => ({
    index: i + 1,
    label: STATE_LABELS[i],
    pressure: pressures[i],
    temperature: T,
    enthalpy: cp * (T - T1),
    entropy: entropies[i],
  }));

  return {
    cycle: "brayton",
    statePoints,
    compressionWork,
    turbineWork,
    netWork,
    heatInput,
    heatRejected,
    thermalEfficiency,
    backWorkRatio,
    degenerate,
    isentropicCompressorExitTemperature: T2s,
    isentropicTurbineExitTemperature: T4s,
  };
}
