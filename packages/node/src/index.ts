/**
 * @levyield/node — HTTP surface over a devnet of simulated vaults.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { Devnet, LP_VAULT_ID, LRT_VAULT_ID } from "./services/devnet.js";
export type { DevnetConfig, DevnetVault } from "./services/devnet.js";
export { logVaultEvent, isWarningEvent } from "./services/event-logger.js";
export {
  loadConfig,
  loadVaultConfig,
  parseVaultConfig,
  ConfigSchema,
  VaultConfigSchema,
  VaultParametersSchema,
  DEFAULT_VAULT_CONFIG_PATH,
} from "./config.js";
export type { AppConfig, VaultConfig } from "./config.js";
export * from "./types/index.js";
