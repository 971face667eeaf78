import { z } from "zod";
import type { AssumptionOverrides, ModelAssumptions } from "@shared/schema";
import { DEFAULT_MODEL_ASSUMPTIONS, mergeAssumptions } from "@shared/thermo-library";
import { parseAssumptionOverrides } from "./validation";

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().min(1).default("0.0.0.0"),
  ANALYSIS_ASSUMPTIONS: z.string().optional(),
});

export interface ServerConfig {
  port: number;
  host: string;
  // Defaults with ANALYSIS_ASSUMPTIONS layered on top
  assumptions: ModelAssumptions;
}

/**
 * Bad JSON or out-of-range values in ANALYSIS_ASSUMPTIONS are logged and
 * ignored so the server still starts on the default assumptions.
 */
export function loadAssumptionOverrides(raw: string | undefined): AssumptionOverrides {
  if (!raw || raw.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    console.error("Failed to parse ANALYSIS_ASSUMPTIONS as JSON, using defaults:", err);
    return {};
  }

  try {
    return parseAssumptionOverrides(parsed);
  } catch (err) {
    console.error("Invalid ANALYSIS_ASSUMPTIONS, using defaults:", err);
    return {};
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid server configuration: ${details}`);
  }

  return {
    port: result.data.PORT,
    host: result.data.HOST,
    assumptions: mergeAssumptions(DEFAULT_MODEL_ASSUMPTIONS, loadAssumptionOverrides(result.data.ANALYSIS_ASSUMPTIONS)),
  };
}
