/**
 * @swapline/settlement — Configuration.
 *
 * Loads and validates settlement configuration from environment variables
 * using Zod. The arithmetic switches are pinned here so a deployment
 * states explicitly which rounding mode and clamp it settles with.
 */

import { z } from "zod";
import type { ArithmeticOptions } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const SettlementConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Arithmetic
  SETTLEMENT_ROUNDING: z
    .enum(["half-even", "half-away-from-zero"])
    .default("half-even"),
  SETTLEMENT_CLAMP: z.enum(["literal", "bounded"]).default("literal"),
});

export type SettlementConfig = z.infer<typeof SettlementConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): SettlementConfig {
  return SettlementConfigSchema.parse(env);
}

export function arithmeticOptionsFromConfig(config: SettlementConfig): ArithmeticOptions {
  return {
    rounding: config.SETTLEMENT_ROUNDING,
    clamp: config.SETTLEMENT_CLAMP,
  };
}
