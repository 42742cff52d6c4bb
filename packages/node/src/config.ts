/**
 * @levyield/node — Configuration.
 *
 * Two sources, both validated with Zod:
 * - process environment (server, logging, devnet roles)
 * - a JSON file with the risk parameters of each devnet vault
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { validateParameters } from "@levyield/vault";
import type { VaultParameters } from "@levyield/vault";
import { AmountSchema, SignedAmountSchema } from "./types/dto.js";

// =============================================================================
// Environment
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Devnet roles
  OWNER_ADDRESS: z.string().min(1).default("owner"),
  KEEPER_ADDRESS: z.string().min(1).default("keeper"),
  TREASURY_ADDRESS: z.string().min(1).default("treasury"),

  // Vault parameters file; defaults to config/devnet.json in this package
  VAULT_CONFIG_PATH: z.string().optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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

// =============================================================================
// Vault parameters
// =============================================================================

export const VaultParametersSchema = z
  .object({
    leverage: AmountSchema,
    delta: z.enum(["Neutral", "Long", "Short"]),
    debtRatioStepThreshold: AmountSchema,
    debtRatioUpperLimit: AmountSchema,
    debtRatioLowerLimit: AmountSchema,
    deltaUpperLimit: SignedAmountSchema,
    deltaLowerLimit: SignedAmountSchema,
    minVaultSlippage: AmountSchema,
    swapSlippage: AmountSchema,
    minAssetValue: AmountSchema,
    maxAssetValue: AmountSchema,
    feePerSecond: AmountSchema,
    swapDeadlineSeconds: z.number().int().min(0),
  })
  .refine((p) => p.debtRatioUpperLimit >= p.debtRatioLowerLimit, {
    message: "debtRatioUpperLimit must be >= debtRatioLowerLimit",
    path: ["debtRatioUpperLimit"],
  })
  .refine((p) => p.deltaUpperLimit >= p.deltaLowerLimit, {
    message: "deltaUpperLimit must be >= deltaLowerLimit",
    path: ["deltaUpperLimit"],
  });

export const VaultConfigSchema = z.object({
  lp: VaultParametersSchema,
  lrt: VaultParametersSchema,
});

export interface VaultConfig {
  readonly lp: VaultParameters;
  readonly lrt: VaultParameters;
}

export const DEFAULT_VAULT_CONFIG_PATH = fileURLToPath(
  new URL("../config/devnet.json", import.meta.url),
);

/**
 * Parse vault parameters from already-decoded JSON. The same bounds the
 * vaults enforce at construction are checked here, so a bad file fails
 * at startup with the offending vault named.
 *
 * @throws {z.ZodError} on shape errors
 */
export function parseVaultConfig(raw: unknown): VaultConfig {
  const parsed = VaultConfigSchema.parse(raw);
  validateParameters(parsed.lp, ["Neutral", "Long"]);
  validateParameters(parsed.lrt, ["Long"]);
  return parsed;
}

export function loadVaultConfig(path: string = DEFAULT_VAULT_CONFIG_PATH): VaultConfig {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parseVaultConfig(raw);
}
