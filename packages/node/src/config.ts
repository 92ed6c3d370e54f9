/**
 * @custody-bank/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress, isAddress, type Address, type Hex } from "viem";
import { z } from "zod";
import { AddressSchema } from "./types/dto.js";

// =============================================================================
// Field Schemas
// =============================================================================

const WEI_PATTERN = /^(0|[1-9]\d*)$/;

const WeiSchema = z
  .string()
  .regex(WEI_PATTERN, "Must be a non-negative integer amount in wei")
  .transform((v) => BigInt(v));

const PrivateKeySchema = z.custom<Hex>(
  (v) => typeof v === "string" && /^0x[0-9a-fA-F]{64}$/.test(v),
  "Must be a 32-byte hex private key",
);

/** Chainlink ETH/USD aggregator on Ethereum mainnet. */
export const DEFAULT_ORACLE_ADDRESS: Address = "0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Ledger limits (fixed for the life of the process)
    WITHDRAW_LIMIT_WEI: WeiSchema.default("1000000000000000000"),
    BANK_CAP_WEI: WeiSchema.default("100000000000000000000"),

    // Administration
    OWNER_ADDRESS: AddressSchema,
    ORACLE_ADDRESS: AddressSchema.default(DEFAULT_ORACLE_ADDRESS),

    // Settlement
    CHAIN_ID: z.string().regex(/^eip155:\d+$/, "Must be a CAIP-2 EVM chain ID").default("eip155:1"),
    RPC_URL: z.string().url().optional(),
    OPERATOR_PRIVATE_KEY: PrivateKeySchema.optional(),
    TRANSFER_TIMEOUT_MS: z.coerce.number().int().min(1000).default(60_000),
    /** Fixed price (8 decimals) used when no RPC endpoint is configured */
    STATIC_PRICE: z.string().regex(/^-?\d+$/).transform((v) => BigInt(v)).optional(),

    // Auth
    API_KEYS: z.string().default(""),
  })
  .superRefine((config, ctx) => {
    if (config.OPERATOR_PRIVATE_KEY !== undefined && config.RPC_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RPC_URL"],
        message: "RPC_URL is required when OPERATOR_PRIVATE_KEY is set",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  /** Address the key acts as */
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xAddress1,key2:0xAddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const [key, address, ...rest] = entry.trim().split(":");
    if (key === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }
    if (seen.has(key)) {
      throw new Error("Duplicate API key in API_KEYS");
    }

    seen.add(key);
    keys.push({ key, address: getAddress(address) });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
