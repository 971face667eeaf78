import type {
  DegenerateFlag,
  HtcRankineResult,
  StatePoint,
  SteamAssumptions,
} from "@shared/schema";
import {
  DEFAULT_MODEL_ASSUMPTIONS,
  KELVIN_OFFSET,
  KPA_PER_BAR,
  WATER_BOILING_POINT_K,
} from "@shared/thermo-library";
import { assertInputs, checkRange, EFFICIENCY, FRACTION, NON_NEGATIVE, POSITIVE } from "../validation";

export interface HtcRankineInputs {
  // K
  reactorTemperature: number;
  // kW delivered by the HTC reactor to the boiler
  heatAvailable: number;
  pumpEfficiency: number;
  turbineEfficiency: number;
  // bar
  reactorPressure: number;
}

const STATE_LABELS = ["Pump Inlet", "Pump Outlet", "Boiler Outlet", "Turbine Outlet"];

/**
 * Rankine-like steam cycle raised by HTC reactor heat.
 *
 * Water properties use a constant-cp approximation rather than steam tables:
 * liquid enthalpy is cp_w·T(°C), the boiler exit adds the latent heat at
 * 100 °C and superheat at cp_steam, and the isentropic turbine exhaust is a
 * wet mixture of fixed quality at condenser conditions. Entropy changes are
 * estimated as heat (or dissipated work) over the absolute temperature at
 * which it is transferred.
 *
 * Per-kg values are kJ/kg; the steam mass flow is whatever the available heat
 * can raise, so cycle efficiency is net power over heat available.
 */
export function computeHtcRankineCycle(
  inputs: HtcRankineInputs,
  assumptions: SteamAssumptions = DEFAULT_MODEL_ASSUMPTIONS.steam,
): HtcRankineResult {
  const { reactorTemperature, heatAvailable, pumpEfficiency: etaP, turbineEfficiency: etaT, reactorPressure } = inputs;
  const {
    condenserTemperature: T1,
    condenserPressure,
    superheat,
    cpWater,
    cpSteam,
    latentHeat: hfg,
    specificVolume,
    exhaustQuality,
  } = assumptions;

  const T3 = reactorTemperature + superheat;
  assertInputs([
    checkRange("reactorTemperature", reactorTemperature, POSITIVE),
    checkRange("heatAvailable", heatAvailable, NON_NEGATIVE),
    checkRange("pumpEfficiency", etaP, EFFICIENCY),
    checkRange("turbineEfficiency", etaT, EFFICIENCY),
    checkRange("reactorPressure", reactorPressure, { min: condenserPressure, minExclusive: true }),
    checkRange("condenserTemperature", T1, POSITIVE),
    checkRange("exhaustQuality", exhaustQuality, FRACTION),
    Number.isFinite(T3)
      ? checkRange("reactorTemperature", T3, { min: WATER_BOILING_POINT_K, minExclusive: true })
      : null,
    Number.isFinite(T3)
      ? checkRange("condenserTemperature", T1, { max: T3, maxExclusive: true })
      : null,
  ]);

  const T1C = T1 - KELVIN_OFFSET;
  const T3C = T3 - KELVIN_OFFSET;
  const boilingC = WATER_BOILING_POINT_K - KELVIN_OFFSET;

  // State 1: saturated liquid leaving the condenser
  const h1 = cpWater * T1C;
  const s1 = cpWater * Math.log(T1 / KELVIN_OFFSET);

  // State 2: feed pump, v·ΔP corrected by pump efficiency
  const idealPumpWork = specificVolume * (reactorPressure - condenserPressure) * KPA_PER_BAR;
  const pumpWork = idealPumpWork / etaP;
  const h2 = h1 + pumpWork;
  const T2 = T1 + pumpWork / cpWater;
  const s2 = s1 + (pumpWork - idealPumpWork) / T1;

  // State 3: superheated steam leaving the HTC-heated boiler
  const h3 = cpWater * boilingC + hfg + cpSteam * (T3C - boilingC);
  const s3 = s1 + (h3 - h2) / T3;

  // State 4: turbine exhaust at condenser conditions
  const h4s = h1 + exhaustQuality * hfg;
  const idealTurbineWork = h3 - h4s;
  const turbineWork = etaT * idealTurbineWork;
  const h4 = h3 - turbineWork;
  const T4 = T1;
  const s4 = s3 + (h4 - h4s) / T4;

  const netWork = turbineWork - pumpWork;
  const heatInput = h3 - h2;
  const heatRejected = h4 - h1;

  // Overridden steam properties can still invert the cycle
  assertInputs([
    checkRange("heatInput", heatInput, POSITIVE),
    checkRange("idealTurbineWork", idealTurbineWork, POSITIVE),
  ]);

  const degenerate: DegenerateFlag[] = [];
  let backWorkRatio = 0;
  if (turbineWork > 0) {
    backWorkRatio = pumpWork / turbineWork;
  } else {
    degenerate.push({
      metric: "htcRankine.backWorkRatio",
      reason: "non_positive_turbine_work",
      message: "The steam turbine produces no work; back work ratio is undefined",
    });
  }
  let steamMassFlow = 0;
  let netPower = 0;
  let thermalEfficiency = 0;
  if (heatAvailable === 0) {
    degenerate.push({
      metric: "htcRankine.thermalEfficiency",
      reason: "zero_heat_available",
      message: "The HTC reactor delivers no heat to the steam cycle; efficiency is undefined",
    });
  } else {
    steamMassFlow = heatAvailable / heatInput;
    netPower = steamMassFlow * netWork;
    if (netWork <= 0) {
      degenerate.push({
        metric: "htcRankine.thermalEfficiency",
        reason: "non_positive_net_work",
        message: "Feed pump work consumes all steam turbine work",
      });
    } else {
      thermalEfficiency = netPower / heatAvailable;
    }
  }

  const lowPressure = condenserPressure * KPA_PER_BAR;
  const highPressure = reactorPressure * KPA_PER_BAR;
  const states: Array<[number, number, number, number]> = [
    [lowPressure, T1, h1, s1],
    [highPressure, T2, h2, s2],
    [highPressure, T3, h3, s3],
    [lowPressure, T4, h4, s4],
  ];
  const statePoints: StatePoint[] = states.map(([pressure, temperature, enthalpy, entropy], i) => ({
    index: i + 1,
    label: STATE_LABELS[i],
    pressure,
    temperature,
    enthalpy,
    entropy,
  }));

  return {
    cycle: "htc-rankine",
    statePoints,
    compressionWork: pumpWork,
    turbineWork,
    netWork,
    heatInput,
    heatRejected,
    thermalEfficiency,
    backWorkRatio,
    degenerate,
    heatAvailable,
    steamMassFlow,
    netPower,
  };
}
