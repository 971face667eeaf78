import { z } from "zod";
import {
  analysisRequestSchema,
  assumptionOverridesSchema,
  inputSetSchema,
  type AssumptionOverrides,
  type InputSet,
  type ValidationWarning,
} from "@shared/schema";

export type { ValidationWarning };

export interface InputIssue {
  field: string;
  message: string;
}

/**
 * Raised when any input lies outside its documented domain. Carries every
 * offending field so the caller can show all of them at once.
 */
export class InvalidInputError extends Error {
  readonly issues: InputIssue[];

  constructor(issues: InputIssue[]) {
    super(`Invalid input: ${issues.map(i => `${i.field}: ${i.message}`).join("; ")}`);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

export interface RangeRule {
  min?: number;
  max?: number;
  minExclusive?: boolean;
  maxExclusive?: boolean;
}

export const EFFICIENCY: RangeRule = { min: 0, minExclusive: true, max: 1 };
export const FRACTION: RangeRule = { min: 0, max: 1 };
export const NON_NEGATIVE: RangeRule = { min: 0 };
export const POSITIVE: RangeRule = { min: 0, minExclusive: true };

function describeRule(rule: RangeRule): string {
  const lower = rule.min === undefined ? null : `${rule.minExclusive ? ">" : ">="} ${rule.min}`;
  const upper = rule.max === undefined ? null : `${rule.maxExclusive ? "<" : "<="} ${rule.max}`;
  return [lower, upper].filter(Boolean).join(" and ");
}

/** Returns an issue when the value is not finite or falls outside the rule, else null. */
export function checkRange(field: string, value: number, rule: RangeRule): InputIssue | null {
  if (!Number.isFinite(value)) {
    return { field, message: `${field} must be a finite number` };
  }
  const belowMin = rule.min !== undefined && (rule.minExclusive ? value <= rule.min : value < rule.min);
  const aboveMax = rule.max !== undefined && (rule.maxExclusive ? value >= rule.max : value > rule.max);
  if (belowMin || aboveMax) {
    return { field, message: `${field} must be ${describeRule(rule)} (got ${value})` };
  }
  return null;
}

export function assertInputs(checks: Array<InputIssue | null>): void {
  const issues = checks.filter((c): c is InputIssue => c !== null);
  if (issues.length > 0) {
    throw new InvalidInputError(issues);
  }
}

function zodIssuesToInputIssues(error: z.ZodError): InputIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "body",
    message: issue.message,
  }));
}

/** Parses a raw request payload into a frozen input set. */
export function parseInputSet(raw: unknown): InputSet {
  const result = inputSetSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(zodIssuesToInputIssues(result.error));
  }
  return Object.freeze(result.data);
}

export function parseAssumptionOverrides(raw: unknown): AssumptionOverrides {
  const result = assumptionOverridesSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidInputError(
      zodIssuesToInputIssues(result.error).map(i => ({ ...i, field: `assumptions.${i.field}` })),
    );
  }
  return result.data;
}

export interface AnalysisRequest {
  // Input set fields, still unparsed
  payload: Record<string, unknown>;
  overrides: AssumptionOverrides;
}

/** Splits a request body into the input set payload and its assumption overrides. */
export function parseAnalysisRequest(raw: unknown): AnalysisRequest {
  const result = analysisRequestSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidInputError(zodIssuesToInputIssues(result.error));
  }
  const { assumptions, ...payload } = result.data;
  return { payload, overrides: assumptions ?? {} };
}

const TANK_A_MOISTURE_CEILING = 0.5;
const TANK_B_MOISTURE_FLOOR = 0.5;
const TURBINE_INLET_MATERIAL_LIMIT_K = 1773.15;
const PRESSURE_RATIO_PRACTICAL_LIMIT = 40;

/**
 * Advisory checks on inputs that are inside the physical domain but outside
 * the regime the correlations were written for. They never block an analysis.
 */
export function collectInputWarnings(inputs: InputSet): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];

  if (inputs.tankAMoisture > TANK_A_MOISTURE_CEILING) {
    warnings.push({
      field: "tankAMoisture",
      section: "Tank A",
      message: `Tank A holds moisture-lean feed for HTC; moisture of ${inputs.tankAMoisture} exceeds ${TANK_A_MOISTURE_CEILING}`,
      severity: "warning",
    });
  }
  if (inputs.tankBMoisture < TANK_B_MOISTURE_FLOOR) {
    warnings.push({
      field: "tankBMoisture",
      section: "Tank B",
      message: `Tank B holds moisture-rich feed for AD; moisture of ${inputs.tankBMoisture} is below ${TANK_B_MOISTURE_FLOOR}`,
      severity: "warning",
    });
  }
  if (inputs.turbineInletTemperature > TURBINE_INLET_MATERIAL_LIMIT_K) {
    warnings.push({
      field: "turbineInletTemperature",
      section: "Gas Turbine",
      message: `Turbine inlet temperature of ${inputs.turbineInletTemperature} K is above the ${TURBINE_INLET_MATERIAL_LIMIT_K} K blade material limit`,
      severity: "warning",
    });
  }
  if (inputs.pressureRatio > PRESSURE_RATIO_PRACTICAL_LIMIT) {
    warnings.push({
      field: "pressureRatio",
      section: "Gas Turbine",
      message: `Pressure ratio of ${inputs.pressureRatio} is beyond single-shaft industrial practice (${PRESSURE_RATIO_PRACTICAL_LIMIT})`,
      severity: "info",
    });
  }
  if (inputs.tankAMass === 0) {
    warnings.push({
      field: "tankAMass",
      section: "Tank A",
      message: "No Tank A feed: the HTC reactor delivers no heat to the steam cycle",
      severity: "info",
    });
  }
  if (inputs.tankBMass === 0) {
    warnings.push({
      field: "tankBMass",
      section: "Tank B",
      message: "No Tank B feed: no biogas is available to fire the gas turbine",
      severity: "info",
    });
  }

  return warnings;
}
