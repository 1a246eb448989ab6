/**
 * @wtoken/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress } from "viem";
import { z } from "zod";
import { isHolderAddress } from "@wtoken/types";
import type { WrapperServiceConfig } from "./services/wrapper-service.js";

// =============================================================================
// Schema
// =============================================================================

const AddressEnv = z
  .string()
  .refine(isHolderAddress, { message: "Expected a 20-byte hex address" })
  .transform((value) => getAddress(value));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Token
  TOKEN_NAME: z.string().min(1).default("Wrapped Rebasing USD"),
  TOKEN_SYMBOL: z.string().min(1).default("wRUSD"),
  CHAIN_ID: z.coerce.number().int().min(1).default(1),
  TOKEN_ADDRESS: AddressEnv.default("0x7777777777777777777777777777777777777777"),

  // Wrapped asset (in-memory on the devnet)
  ASSET_ADDRESS: AddressEnv.default("0x8888888888888888888888888888888888888888"),
  ASSET_NAME: z.string().min(1).default("Rebasing USD"),
  ASSET_SYMBOL: z.string().min(1).default("RUSD"),

  // Receives DEFAULT_ADMIN_ROLE, PAUSE_ROLE and UPGRADE_ROLE at startup
  ADMIN_ADDRESS: AddressEnv.default("0x9999999999999999999999999999999999999999"),
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

/**
 * Map validated configuration onto the service's construction options.
 */
export function serviceConfigFrom(config: AppConfig): WrapperServiceConfig {
  return {
    token: {
      name: config.TOKEN_NAME,
      symbol: config.TOKEN_SYMBOL,
      chainId: config.CHAIN_ID,
      address: config.TOKEN_ADDRESS,
    },
    asset: {
      address: config.ASSET_ADDRESS,
      name: config.ASSET_NAME,
      symbol: config.ASSET_SYMBOL,
    },
    admin: config.ADMIN_ADDRESS,
  };
}
