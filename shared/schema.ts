/**
 * Shared data model for the AD-HTC cycle analyzer.
 * Input and assumption schemas are defined with zod so that the HTTP layer and
 * the calculation services validate against the same source of truth; the
 * result and report types are plain value objects produced by pure functions.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Input set
// ---------------------------------------------------------------------------

const finiteNumber = (field: string) =>
  z.number({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a number`,
  }).finite(`${field} must be a finite number`);

const efficiency = (field: string) =>
  finiteNumber(field)
    .gt(0, `${field} must be greater than 0`)
    .lte(1, `${field} must not exceed 1`);

const fraction = (field: string) =>
  finiteNumber(field)
    .gte(0, `${field} must be between 0 and 1`)
    .lte(1, `${field} must be between 0 and 1`);

const nonNegative = (field: string) => finiteNumber(field).gte(0, `${field} must not be negative`);

const positive = (field: string) => finiteNumber(field).gt(0, `${field} must be greater than 0`);

/**
 * InputSet schema: the scalar parameters behind one analysis request.
 * Temperatures are kelvin, pressures bar, masses kg fed per hour of operation.
 * Fields with defaults mirror dashboard sliders that callers may omit.
 */
export const inputSetSchema = z.object({
  pressureRatio: finiteNumber("pressureRatio").gt(1, "pressureRatio must be greater than 1"),
  turbineInletTemperature: positive("turbineInletTemperature"),
  ambientTemperature: positive("ambientTemperature").default(298.15),
  compressorEfficiency: efficiency("compressorEfficiency"),
  turbineEfficiency: efficiency("turbineEfficiency"),
  tankAMass: nonNegative("tankAMass"),
  tankBMass: nonNegative("tankBMass"),
  tankAMoisture: fraction("tankAMoisture"),
  tankBMoisture: fraction("tankBMoisture"),
  tankBVolatileSolids: fraction("tankBVolatileSolids").default(0.8),
  reactorTemperature: positive("reactorTemperature"),
  reactorPressure: positive("reactorPressure").default(20),
  steamPumpEfficiency: efficiency("steamPumpEfficiency").default(1),
  steamTurbineEfficiency: efficiency("steamTurbineEfficiency").default(0.85),
}).superRefine((value, ctx) => {
  if (value.turbineInletTemperature <= value.ambientTemperature) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["turbineInletTemperature"],
      message: "turbineInletTemperature must exceed ambientTemperature",
    });
  }
});

// Parsed, defaulted and frozen input set handed to the models
export type InputSet = Readonly<z.infer<typeof inputSetSchema>>;

// ---------------------------------------------------------------------------
// Model assumptions
// ---------------------------------------------------------------------------

export const braytonAssumptionsSchema = z.object({
  gamma: finiteNumber("gamma").gt(1, "gamma must be greater than 1"),
  cp: positive("cp"),
  gasConstant: positive("gasConstant"),
  ambientPressure: positive("ambientPressure"),
});

export const steamAssumptionsSchema = z.object({
  condenserTemperature: positive("condenserTemperature"),
  condenserPressure: positive("condenserPressure"),
  superheat: nonNegative("superheat"),
  cpWater: positive("cpWater"),
  cpSteam: positive("cpSteam"),
  latentHeat: positive("latentHeat"),
  specificVolume: positive("specificVolume"),
  exhaustQuality: fraction("exhaustQuality"),
});

export const adAssumptionsSchema = z.object({
  specificYield: nonNegative("specificYield"),
  methaneFraction: fraction("methaneFraction"),
  biogasLhv: nonNegative("biogasLhv"),
});

export const htcAssumptionsSchema = z.object({
  massYieldFraction: fraction("massYieldFraction"),
  hydrocharHhv: nonNegative("hydrocharHhv"),
  cpFeed: positive("cpFeed"),
  feedTemperature: positive("feedTemperature"),
  reactionHeat: nonNegative("reactionHeat"),
});

export const modelAssumptionsSchema = z.object({
  brayton: braytonAssumptionsSchema,
  steam: steamAssumptionsSchema,
  ad: adAssumptionsSchema,
  htc: htcAssumptionsSchema,
});

// Partial overrides accepted from configuration and request bodies
export const assumptionOverridesSchema = z.object({
  brayton: braytonAssumptionsSchema.partial().optional(),
  steam: steamAssumptionsSchema.partial().optional(),
  ad: adAssumptionsSchema.partial().optional(),
  htc: htcAssumptionsSchema.partial().optional(),
}).strict();

export type BraytonAssumptions = z.infer<typeof braytonAssumptionsSchema>;
export type SteamAssumptions = z.infer<typeof steamAssumptionsSchema>;
export type AdAssumptions = z.infer<typeof adAssumptionsSchema>;
export type HtcAssumptions = z.infer<typeof htcAssumptionsSchema>;
export type ModelAssumptions = z.infer<typeof modelAssumptionsSchema>;
export type AssumptionOverrides = z.infer<typeof assumptionOverridesSchema>;

/**
 * Analysis request body: the input set fields plus optional per-request
 * assumption overrides.
 */
export const analysisRequestSchema = z.object({
  assumptions: assumptionOverridesSchema.optional(),
}).passthrough();

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

/** A labeled point of a cycle. Pressure kPa, temperature K, h kJ/kg, s kJ/(kg·K). */
export interface StatePoint {
  index: number;
  label: string;
  pressure: number;
  temperature: number;
  enthalpy: number;
  entropy: number;
}

export type DegenerateReason =
  | "non_positive_heat_input"
  | "non_positive_net_work"
  | "non_positive_turbine_work"
  | "zero_heat_available"
  | "zero_energy_input";

/**
 * Tag attached whenever a metric is numerically undefined or physically
 * meaningless and has been replaced by the zero sentinel.
 */
export interface DegenerateFlag {
  metric: string;
  reason: DegenerateReason;
  message: string;
}

export interface CycleResult {
  cycle: "brayton" | "htc-rankine";
  statePoints: StatePoint[];
  // compressor work (Brayton) or feed pump work (Rankine-like), kJ/kg
  compressionWork: number;
  turbineWork: number;
  netWork: number;
  heatInput: number;
  heatRejected: number;
  thermalEfficiency: number;
  backWorkRatio: number;
  degenerate: DegenerateFlag[];
}

export interface BraytonCycleResult extends CycleResult {
  cycle: "brayton";
  isentropicCompressorExitTemperature: number;
  isentropicTurbineExitTemperature: number;
}

export interface HtcRankineResult extends CycleResult {
  cycle: "htc-rankine";
  // kW
  heatAvailable: number;
  // kg/s
  steamMassFlow: number;
  // kW
  netPower: number;
}

export interface AdYieldResult {
  kind: "ad";
  dryMass: number;
  volatileSolids: number;
  // m³
  biogasVolume: number;
  methaneVolume: number;
  // MJ
  biogasEnergy: number;
}

export interface HtcProcessResult {
  kind: "htc";
  dryMass: number;
  hydrocharMass: number;
  processWater: number;
  // MJ
  hydrocharEnergy: number;
  sensibleHeat: number;
  reactionHeat: number;
  processEnergy: number;
}

export type YieldResult = AdYieldResult | HtcProcessResult;

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface ValidationWarning {
  field: string;
  section: string;
  message: string;
  severity: "error" | "warning" | "info";
}

export interface AssumptionEntry {
  parameter: string;
  value: string;
  source: string;
}

export interface SummaryCard {
  key: string;
  label: string;
  value: number;
  unit: string;
  display: string;
  available: boolean;
}

export interface StatePointRow {
  state: string;
  temperatureC: string;
  temperatureK: string;
  pressure: string;
  enthalpy: string;
  entropy: string;
}

export interface StatePointTable {
  title: string;
  rows: StatePointRow[];
}

export interface ReportRow {
  label: string;
  value: number;
  unit: string;
  display: string;
}

export interface ChartPoint {
  x: number;
  y: number;
  label: string;
}

export interface ChartSeries {
  title: string;
  xLabel: string;
  yLabel: string;
  points: ChartPoint[];
}

export interface CombinedMetrics {
  // kg/s
  airMassFlow: number;
  // kW
  biogasHeatRate: number;
  htcHeatRate: number;
  gasTurbinePower: number;
  steamCyclePower: number;
  totalNetPower: number;
  overallEfficiency: number;
}

export interface Report {
  inputs: InputSet | null;
  brayton: BraytonCycleResult;
  rankine: HtcRankineResult;
  ad: AdYieldResult;
  htc: HtcProcessResult;
  combined: CombinedMetrics;
  summaryCards: SummaryCard[];
  stateTables: {
    gasTurbine: StatePointTable;
    steamCycle: StatePointTable;
  };
  energyBalance: ReportRow[];
  processSummary: ReportRow[];
  charts: {
    hs: ChartSeries;
    tHdot: ChartSeries;
  };
  assumptions: AssumptionEntry[];
  warnings: ValidationWarning[];
  degenerate: DegenerateFlag[];
}
