/**
 * Shared fixtures for bank tests.
 */

import type { Address } from "@custody-bank/types";

export const ALICE: Address = "0x00000000000000000000000000000000000000a1";
export const BOB: Address = "0x00000000000000000000000000000000000000b2";
export const CAROL: Address = "0x00000000000000000000000000000000000000c3";
export const OWNER: Address = "0x0000000000000000000000000000000000000001";
export const ORACLE: Address = "0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419";
export const ORACLE_2: Address = "0x0000000000000000000000000000000000000fee";

export const TS = "2024-01-15T10:00:00.000Z";

export const fixedClock = (): string => TS;
