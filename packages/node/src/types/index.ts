/**
 * Type barrel — re-exports all public types from @wtoken/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  HexSchema,
  SignatureSchema,
  DepositSchema,
  MintSchema,
  WithdrawSchema,
  RedeemSchema,
  TransferSchema,
  ApproveSchema,
  PermitSchema,
  AssetMintSchema,
  AssetApproveSchema,
  MultiplierSchema,
  BanSchema,
  QuoteKindSchema,
  QuoteQuerySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  MintDto,
  WithdrawDto,
  RedeemDto,
  TransferDto,
  ApproveDto,
  PermitDto,
  AssetMintDto,
  AssetApproveDto,
  MultiplierDto,
  BanDto,
  QuoteKind,
  ListEventsQuery,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Wire
export { toWire, toEventDto } from "./wire.js";
export type { RecordedEventDto, WireValue } from "./wire.js";

// App env
export type { AppEnv } from "./api-contract.js";
