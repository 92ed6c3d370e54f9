/**
 * @custody-bank/node — Package public API.
 */

export { BankService } from "./services/bank-service.js";
export type { BankServiceConfig } from "./services/bank-service.js";
export { createSettlement } from "./services/settlement.js";
export type { Settlement } from "./services/settlement.js";
export { loadConfig, parseApiKeys, ConfigSchema, DEFAULT_ORACLE_ADDRESS } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./routes/index.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
