/**
 * @rxsettle/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

/** Unsigned integer carried as a decimal string, parsed to bigint. */
const UintString = z
  .string()
  .regex(/^\d+$/, "must be an unsigned integer")
  .transform((v) => BigInt(v));

const Flag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Settlement deployment
  SETTLEMENT_ASSET: z.string().min(1).default("USDC"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  SETTLEMENT_APP_ID: z.string().min(1).default("settlement"),
  ESCROW_ADDRESS: z.string().min(1).default("escrow"),
  ADMIN_FEE_BPS: UintString.default("300").refine((bps) => bps <= 300n, {
    message: "must not exceed 300 (3%)",
  }),

  // Authorization policy
  MIN_ORACLE_STAKE: UintString.default("1000"),
  ORACLE_ADDRESS: z.string().min(1).optional(),
  STAKE_RECIPIENT: z.string().min(1).optional(),

  // Development
  ENABLE_FAUCET: Flag.default("false"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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
): AppConfig {
  return ConfigSchema.parse(env);
}
