/**
 * Type barrel — re-exports all public types from @custody-bank/node.
 */

// DTOs
export {
  WeiAmountSchema,
  AddressSchema,
  DepositSchema,
  WithdrawalSchema,
  ChangeOwnerSchema,
  UpdateOracleSchema,
  ValueQuerySchema,
  ListEventsQuerySchema,
  toDepositDto,
  toWithdrawalDto,
  toBankStatsDto,
  toHistoryDto,
  toPriceDto,
  toValuationDto,
  toEventDto,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawalDto,
  ChangeOwnerDto,
  UpdateOracleDto,
  ValueQuery,
  ListEventsQuery,
  DepositResponseDto,
  WithdrawalResponseDto,
  BankStatsDto,
  HistoryRecordDto,
  PriceDto,
  ValuationDto,
  EventDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export type { CallerSource, CallerContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
