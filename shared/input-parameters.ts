import type { InputSet } from "./schema";

export interface InputParameter {
  key: keyof InputSet;
  group: "tankA" | "tankB" | "gasTurbine" | "steamCycle";
  displayName: string;
  unit: string;
  min: number;
  max: number;
  step: number;
  defaultValue: number;
  sortOrder: number;
}

export const inputGroupLabels: Record<InputParameter["group"], string> = {
  tankA: "Tank A: Moisture-Lean Biomass",
  tankB: "Tank B: Moisture-Rich Biomass",
  gasTurbine: "Gas Turbine Cycle",
  steamCycle: "HTC Steam Cycle",
};

export const inputGroupOrder: InputParameter["group"][] = [
  "tankA",
  "tankB",
  "gasTurbine",
  "steamCycle",
];

/**
 * Slider ranges offered to the dashboard. These bound what the UI lets a user
 * pick; the models accept anything inside the physical domain of the input
 * schema.
 */
export const INPUT_PARAMETERS: InputParameter[] = [
  { key: "tankAMass", group: "tankA", displayName: "Feed Rate", unit: "kg/h", min: 100, max: 2000, step: 50, defaultValue: 500, sortOrder: 1 },
  { key: "tankAMoisture", group: "tankA", displayName: "Moisture Content", unit: "fraction", min: 0.05, max: 0.5, step: 0.01, defaultValue: 0.2, sortOrder: 2 },
  { key: "reactorTemperature", group: "tankA", displayName: "HTC Reactor Temperature", unit: "K", min: 423.15, max: 573.15, step: 5, defaultValue: 473.15, sortOrder: 3 },
  { key: "tankBMass", group: "tankB", displayName: "Feed Rate", unit: "kg/h", min: 100, max: 2000, step: 50, defaultValue: 800, sortOrder: 1 },
  { key: "tankBMoisture", group: "tankB", displayName: "Moisture Content", unit: "fraction", min: 0.5, max: 0.95, step: 0.01, defaultValue: 0.7, sortOrder: 2 },
  { key: "tankBVolatileSolids", group: "tankB", displayName: "Volatile Solids Fraction", unit: "fraction", min: 0.5, max: 0.95, step: 0.05, defaultValue: 0.8, sortOrder: 3 },
  { key: "pressureRatio", group: "gasTurbine", displayName: "Pressure Ratio", unit: "", min: 4, max: 25, step: 1, defaultValue: 10, sortOrder: 1 },
  { key: "turbineInletTemperature", group: "gasTurbine", displayName: "Turbine Inlet Temperature", unit: "K", min: 1073.15, max: 1773.15, step: 25, defaultValue: 1473.15, sortOrder: 2 },
  { key: "ambientTemperature", group: "gasTurbine", displayName: "Ambient Temperature", unit: "K", min: 283.15, max: 318.15, step: 1, defaultValue: 298.15, sortOrder: 3 },
  { key: "compressorEfficiency", group: "gasTurbine", displayName: "Compressor η_is", unit: "fraction", min: 0.7, max: 0.95, step: 0.01, defaultValue: 0.85, sortOrder: 4 },
  { key: "turbineEfficiency", group: "gasTurbine", displayName: "Turbine η_is", unit: "fraction", min: 0.7, max: 0.95, step: 0.01, defaultValue: 0.9, sortOrder: 5 },
  { key: "reactorPressure", group: "steamCycle", displayName: "Boiler Pressure", unit: "bar", min: 10, max: 60, step: 1, defaultValue: 20, sortOrder: 1 },
  { key: "steamPumpEfficiency", group: "steamCycle", displayName: "Feed Pump η_is", unit: "fraction", min: 0.5, max: 1, step: 0.01, defaultValue: 1, sortOrder: 2 },
  { key: "steamTurbineEfficiency", group: "steamCycle", displayName: "Steam Turbine η_is", unit: "fraction", min: 0.6, max: 0.95, step: 0.01, defaultValue: 0.85, sortOrder: 3 },
];

/** The slider defaults keyed by input field, ready to be parsed as an input set. */
export function defaultInputValues(): Record<string, number> {
  return Object.fromEntries(INPUT_PARAMETERS.map(param => [param.key, param.defaultValue]));
}
