import type {
  AdYieldResult,
  AssumptionEntry,
  BraytonCycleResult,
  ChartSeries,
  CombinedMetrics,
  DegenerateFlag,
  HtcProcessResult,
  HtcRankineResult,
  InputSet,
  Report,
  ReportRow,
  StatePoint,
  StatePointTable,
  SummaryCard,
  ValidationWarning,
} from "@shared/schema";
import { kelvinToCelsius, mjPerHourToKw } from "@shared/thermo-library";

export interface ReportContext {
  inputs?: InputSet;
  assumptions?: AssumptionEntry[];
  warnings?: ValidationWarning[];
}

export function fmtNum(val: number, decimals: number = 1): string {
  return val.toLocaleString("en-US", { minimumFractionDigits: decimals, maximumFractionDigits: decimals });
}

/**
 * Combined plant metrics.
 *
 * The gas turbine burns the AD biogas, so the air flow is the one whose heat
 * input absorbs the biogas heat rate. Overall efficiency is total net power
 * over the heat entering both cycles (biogas + HTC reactor heat), which is the
 * heat-input-weighted mean of the two cycle efficiencies.
 */
export function computeCombinedMetrics(
  brayton: BraytonCycleResult,
  rankine: HtcRankineResult,
  ad: AdYieldResult,
): { combined: CombinedMetrics; degenerate: DegenerateFlag[] } {
  const degenerate: DegenerateFlag[] = [];
  const biogasHeatRate = mjPerHourToKw(ad.biogasEnergy);
  const htcHeatRate = rankine.heatAvailable;

  let airMassFlow = 0;
  if (brayton.heatInput > 0) {
    airMassFlow = biogasHeatRate / brayton.heatInput;
  } else {
    degenerate.push({
      metric: "combined.airMassFlow",
      reason: "non_positive_heat_input",
      message: "The gas turbine cycle accepts no heat, so no air flow can absorb the biogas heat rate",
    });
  }

  const gasTurbinePower = airMassFlow > 0 ? brayton.netWork * airMassFlow : 0;
  const steamCyclePower = rankine.netPower;
  const totalNetPower = gasTurbinePower + steamCyclePower;
  const totalHeatRate = biogasHeatRate + htcHeatRate;

  let overallEfficiency = 0;
  if (totalHeatRate <= 0) {
    degenerate.push({
      metric: "combined.overallEfficiency",
      reason: "zero_energy_input",
      message: "Neither tank supplies energy to the plant; overall efficiency is undefined",
    });
  } else if (totalNetPower <= 0) {
    degenerate.push({
      metric: "combined.overallEfficiency",
      reason: "non_positive_net_work",
      message: "The plant produces no net power",
    });
  } else {
    overallEfficiency = totalNetPower / totalHeatRate;
  }

  return {
    combined: {
      airMassFlow,
      biogasHeatRate,
      htcHeatRate,
      gasTurbinePower,
      steamCyclePower,
      totalNetPower,
      overallEfficiency,
    },
    degenerate,
  };
}

function buildStateTable(title: string, statePoints: StatePoint[]): StatePointTable {
  return {
    title,
    rows: statePoints.map(sp => ({
      state: `${sp.index} – ${sp.label}`,
      temperatureC: fmtNum(kelvinToCelsius(sp.temperature), 1),
      temperatureK: fmtNum(sp.temperature, 1),
      pressure: fmtNum(sp.pressure, 1),
      enthalpy: fmtNum(sp.enthalpy, 1),
      entropy: fmtNum(sp.entropy, 4),
    })),
  };
}

type CardSpec = {
  key: string;
  label: string;
  value: number;
  unit: string;
  decimals: number;
  dependsOn: string[];
};

function buildSummaryCards(specs: CardSpec[], degenerate: DegenerateFlag[]): SummaryCard[] {
  const flagged = new Set(degenerate.map(f => f.metric));
  return specs.map(spec => {
    const available = !spec.dependsOn.some(metric => flagged.has(metric));
    return {
      key: spec.key,
      label: spec.label,
      value: spec.value,
      unit: spec.unit,
      display: available ? fmtNum(spec.value, spec.decimals) : "N/A",
      available,
    };
  });
}

function row(label: string, value: number, unit: string, decimals: number = 2): ReportRow {
  return { label, value, unit, display: `${fmtNum(value, decimals)} ${unit}`.trim() };
}

function closedSeries(
  title: string,
  xLabel: string,
  yLabel: string,
  statePoints: StatePoint[],
  toPoint: (sp: StatePoint) => { x: number; y: number },
): ChartSeries {
  const points = statePoints.map(sp => ({ ...toPoint(sp), label: String(sp.index) }));
  return {
    title,
    xLabel,
    yLabel,
    points: points.length > 0 ? [...points, points[0]] : [],
  };
}

/**
 * Composes the four model outputs into a display-ready report. No new physics
 * beyond the combined metrics documented on computeCombinedMetrics.
 */
export function assembleReport(
  brayton: BraytonCycleResult,
  rankine: HtcRankineResult,
  ad: AdYieldResult,
  htc: HtcProcessResult,
  context: ReportContext = {},
): Report {
  const { combined, degenerate: combinedFlags } = computeCombinedMetrics(brayton, rankine, ad);
  const degenerate = [...brayton.degenerate, ...rankine.degenerate, ...combinedFlags];

  const summaryCards = buildSummaryCards([
    { key: "netPower", label: "Net Power", value: combined.totalNetPower, unit: "kW", decimals: 2, dependsOn: ["combined.airMassFlow"] },
    { key: "gtEfficiency", label: "GT Efficiency", value: brayton.thermalEfficiency * 100, unit: "%", decimals: 2, dependsOn: ["brayton.thermalEfficiency"] },
    { key: "htcEfficiency", label: "HTC Efficiency", value: rankine.thermalEfficiency * 100, unit: "%", decimals: 2, dependsOn: ["htcRankine.thermalEfficiency"] },
    { key: "overallEfficiency", label: "Overall Efficiency", value: combined.overallEfficiency * 100, unit: "%", decimals: 2, dependsOn: ["combined.overallEfficiency", "combined.airMassFlow"] },
    { key: "biogasYield", label: "Biogas Yield", value: ad.biogasVolume, unit: "m³/h", decimals: 2, dependsOn: [] },
    { key: "gtNetWork", label: "GT Net Work", value: brayton.netWork, unit: "kJ/kg", decimals: 2, dependsOn: [] },
    { key: "hydrochar", label: "Hydrochar", value: htc.hydrocharMass, unit: "kg/h", decimals: 2, dependsOn: [] },
    { key: "airMassFlow", label: "Air Mass Flow", value: combined.airMassFlow, unit: "kg/s", decimals: 3, dependsOn: ["combined.airMassFlow"] },
    { key: "backWorkRatio", label: "Back Work Ratio", value: brayton.backWorkRatio * 100, unit: "%", decimals: 2, dependsOn: ["brayton.backWorkRatio"] },
  ], degenerate);

  const energyBalance: ReportRow[] = [
    row("Compressor Work", brayton.compressionWork, "kJ/kg"),
    row("Turbine Work", brayton.turbineWork, "kJ/kg"),
    row("GT Net Work", brayton.netWork, "kJ/kg"),
    row("GT Heat Input (Q_in)", brayton.heatInput, "kJ/kg"),
    row("GT Heat Rejected (Q_out)", brayton.heatRejected, "kJ/kg"),
    row("HTC Steam Pump Work", rankine.compressionWork, "kJ/kg"),
    row("HTC Steam Turbine Work", rankine.turbineWork, "kJ/kg"),
    row("HTC Net Work", rankine.netWork, "kJ/kg"),
    row("HTC Boiler Heat", rankine.heatInput, "kJ/kg"),
    row("Steam Mass Flow", rankine.steamMassFlow, "kg/s", 4),
    row("Gas Turbine Power", combined.gasTurbinePower, "kW"),
    row("Steam Cycle Power", combined.steamCyclePower, "kW"),
    row("Biogas Energy Output", ad.biogasEnergy, "MJ/h"),
    row("Hydrochar Energy", htc.hydrocharEnergy, "MJ/h"),
    row("HTC Energy Required", htc.processEnergy, "MJ/h"),
  ];

  const processSummary: ReportRow[] = [];
  if (context.inputs) {
    processSummary.push(row("Tank A Feed Rate", context.inputs.tankAMass, "kg/h"));
  }
  processSummary.push(
    row("Tank A Dry Mass", htc.dryMass, "kg/h"),
    row("Hydrochar Yield", htc.hydrocharMass, "kg/h"),
    row("Process Water", htc.processWater, "kg/h"),
  );
  if (context.inputs) {
    processSummary.push(row("Tank B Feed Rate", context.inputs.tankBMass, "kg/h"));
  }
  processSummary.push(
    row("Tank B Dry Mass", ad.dryMass, "kg/h"),
    row("Volatile Solids", ad.volatileSolids, "kg/h"),
    row("Biogas Yield", ad.biogasVolume, "m³/h"),
    row("Methane Yield", ad.methaneVolume, "m³/h"),
  );

  const charts = {
    hs: closedSeries(
      "h – s Diagram · HTC Steam Cycle",
      "Entropy s [kJ/(kg·K)]",
      "Enthalpy h [kJ/kg]",
      rankine.statePoints,
      sp => ({ x: sp.entropy, y: sp.enthalpy }),
    ),
    tHdot: closedSeries(
      "T – Ḣ Diagram · Gas Turbine Cycle",
      "Enthalpy Rate Ḣ [kW]",
      "Temperature T [°C]",
      brayton.statePoints,
      sp => ({ x: sp.enthalpy * combined.airMassFlow, y: kelvinToCelsius(sp.temperature) }),
    ),
  };

  return {
    inputs: context.inputs ?? null,
    brayton,
    rankine,
    ad,
    htc,
    combined,
    summaryCards,
    stateTables: {
      gasTurbine: buildStateTable("Gas Turbine Cycle — State Points", brayton.statePoints),
      steamCycle: buildStateTable("HTC Steam Cycle — State Points", rankine.statePoints),
    },
    energyBalance,
    processSummary,
    charts,
    assumptions: context.assumptions ?? [],
    warnings: context.warnings ?? [],
    degenerate,
  };
}
