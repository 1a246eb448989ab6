/**
 * @wtoken/ledger — Fixed-point decimal strings.
 *
 * Converts between human decimal strings and 18-decimal base units.
 *
 * Rules:
 * - No floating-point operations
 * - Unsigned only; shares and assets are never negative
 */

import { assertUint256 } from "./share-math.js";
import { LedgerError } from "./types.js";

/** Decimals of both the share token and the wrapped asset. */
export const DECIMALS = 18;

/**
 * Parse a decimal string into base units.
 *
 * "1337" → 1337000000000000000000n
 * "1.0001" → 1000100000000000000n
 */
export function parseUnits(amount: string, decimals: number = DECIMALS): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  return assertUint256(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Render base units as a decimal string with exactly `decimals` places.
 *
 * 1337133700000000000000n → "1337.133700000000000000"
 */
export function formatUnits(value: bigint, decimals: number = DECIMALS): string {
  assertUint256(value);
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}
