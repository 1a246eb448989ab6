/**
 * @wtoken/ledger — Share accounting for the wrapper token.
 *
 * A pure TypeScript engine with no runtime dependencies beyond
 * @wtoken/types. Provides:
 * - Share/asset conversion with vault-favoring rounding
 * - Share balances, total supply and allowances
 * - An undo journal for all-or-nothing operations
 *
 * Design rules:
 * - All arithmetic is bigint in the uint256 range
 * - Fail-closed: overflow and shortfall throw, never saturate
 */

// Conversion math
export {
  ConversionEngine,
  assertUint256,
  checkedAdd,
  mulDiv,
  convertToShares,
  convertToAssets,
  previewDeposit,
  previewMint,
  previewWithdraw,
  previewRedeem,
} from "./share-math.js";

// Balances and allowances
export { ShareLedger } from "./share-ledger.js";

// Unit of work
export { Journal } from "./journal.js";

// Decimal strings
export { DECIMALS, parseUnits, formatUnits } from "./fixed-point.js";

// Types
export type {
  Rounding,
  VaultTotals,
  LedgerErrorCode,
  ShareLedgerSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
