import type {
  AssumptionEntry,
  AssumptionOverrides,
  ModelAssumptions,
} from "./schema";

export const KELVIN_OFFSET = 273.15;
export const WATER_BOILING_POINT_K = 373.15;
export const KPA_PER_BAR = 100;

/** MJ/h → kW */
export function mjPerHourToKw(mjPerHour: number): number {
  return (mjPerHour * 1000) / 3600;
}

export function kelvinToCelsius(kelvin: number): number {
  return kelvin - KELVIN_OFFSET;
}

export const DEFAULT_MODEL_ASSUMPTIONS: ModelAssumptions = {
  brayton: {
    gamma: 1.4,
    cp: 1.005,
    gasConstant: 0.287,
    ambientPressure: 101.325,
  },
  steam: {
    condenserTemperature: 318.15,
    condenserPressure: 0.1,
    superheat: 50,
    cpWater: 4.186,
    cpSteam: 2.01,
    latentHeat: 2257,
    specificVolume: 0.001,
    exhaustQuality: 0.88,
  },
  ad: {
    specificYield: 0.4,
    methaneFraction: 0.6,
    biogasLhv: 22,
  },
  htc: {
    massYieldFraction: 0.6,
    hydrocharHhv: 25,
    cpFeed: 4.186,
    feedTemperature: 298.15,
    reactionHeat: 0.3,
  },
};

type AssumptionDetail = { displayName: string; unit: string; source: string; decimals: number };

type AssumptionDetails = {
  [G in keyof ModelAssumptions]: Record<keyof ModelAssumptions[G], AssumptionDetail>;
};

export const ASSUMPTION_DETAILS: AssumptionDetails = {
  brayton: {
    gamma: { displayName: "Air specific heat ratio (γ)", unit: "", source: "Ideal-gas air", decimals: 2 },
    cp: { displayName: "Air specific heat (cp)", unit: "kJ/(kg·K)", source: "Ideal-gas air at 300 K", decimals: 3 },
    gasConstant: { displayName: "Air gas constant (R)", unit: "kJ/(kg·K)", source: "Ideal-gas air", decimals: 3 },
    ambientPressure: { displayName: "Compressor inlet pressure", unit: "kPa", source: "Standard atmosphere", decimals: 3 },
  },
  steam: {
    condenserTemperature: { displayName: "Condenser temperature", unit: "K", source: "Engineering practice", decimals: 2 },
    condenserPressure: { displayName: "Condenser pressure", unit: "bar", source: "Engineering practice", decimals: 2 },
    superheat: { displayName: "Boiler superheat above reactor temperature", unit: "K", source: "Engineering practice", decimals: 0 },
    cpWater: { displayName: "Liquid water specific heat", unit: "kJ/(kg·K)", source: "Constant-property approximation", decimals: 3 },
    cpSteam: { displayName: "Superheated steam specific heat", unit: "kJ/(kg·K)", source: "Constant-property approximation", decimals: 3 },
    latentHeat: { displayName: "Latent heat of vaporization", unit: "kJ/kg", source: "Water at 1 atm", decimals: 0 },
    specificVolume: { displayName: "Feed water specific volume", unit: "m³/kg", source: "Incompressible liquid", decimals: 4 },
    exhaustQuality: { displayName: "Isentropic turbine exhaust quality", unit: "", source: "Engineering practice", decimals: 2 },
  },
  ad: {
    specificYield: { displayName: "Specific biogas yield", unit: "m³/kg VS", source: "Typical AD biogas", decimals: 2 },
    methaneFraction: { displayName: "Methane fraction of biogas", unit: "", source: "Typical AD biogas", decimals: 2 },
    biogasLhv: { displayName: "Biogas lower heating value", unit: "MJ/m³", source: "Typical AD biogas", decimals: 1 },
  },
  htc: {
    massYieldFraction: { displayName: "Hydrochar mass yield", unit: "kg/kg dry feed", source: "Typical HTC at 180-250 °C", decimals: 2 },
    hydrocharHhv: { displayName: "Hydrochar higher heating value", unit: "MJ/kg", source: "Typical HTC hydrochar", decimals: 1 },
    cpFeed: { displayName: "Wet feed specific heat", unit: "kJ/(kg·K)", source: "Water-dominated slurry", decimals: 3 },
    feedTemperature: { displayName: "Feed reference temperature", unit: "K", source: "Ambient feed", decimals: 2 },
    reactionHeat: { displayName: "Reaction heat demand", unit: "MJ/kg dry feed", source: "Engineering estimate", decimals: 2 },
  },
};

export const assumptionGroupLabels: Record<keyof ModelAssumptions, string> = {
  brayton: "Gas Turbine Cycle",
  steam: "HTC Steam Cycle",
  ad: "Anaerobic Digestion",
  htc: "Hydrothermal Carbonization",
};

/**
 * Layers partial overrides on top of a complete assumption set.
 */
export function mergeAssumptions(
  base: ModelAssumptions,
  overrides: AssumptionOverrides | undefined,
): ModelAssumptions {
  if (!overrides) return base;
  return {
    brayton: { ...base.brayton, ...overrides.brayton },
    steam: { ...base.steam, ...overrides.steam },
    ad: { ...base.ad, ...overrides.ad },
    htc: { ...base.htc, ...overrides.htc },
  };
}

function describeGroup(
  groupLabel: string,
  values: Record<string, number>,
  details: Record<string, AssumptionDetail>,
): AssumptionEntry[] {
  return Object.entries(details).map(([key, detail]) => {
    const value = values[key].toFixed(detail.decimals);
    return {
      parameter: `${groupLabel}: ${detail.displayName}`,
      value: detail.unit ? `${value} ${detail.unit}` : value,
      source: detail.source,
    };
  });
}

export function describeAssumptions(assumptions: ModelAssumptions): AssumptionEntry[] {
  return [
    ...describeGroup(assumptionGroupLabels.brayton, assumptions.brayton, ASSUMPTION_DETAILS.brayton),
    ...describeGroup(assumptionGroupLabels.steam, assumptions.steam, ASSUMPTION_DETAILS.steam),
    ...describeGroup(assumptionGroupLabels.ad, assumptions.ad, ASSUMPTION_DETAILS.ad),
    ...describeGroup(assumptionGroupLabels.htc, assumptions.htc, ASSUMPTION_DETAILS.htc),
  ];
}
