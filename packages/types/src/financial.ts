/**
 * Financial Types
 *
 * Exact numeric primitives for swap settlement.
 *
 * Rules:
 * - All amounts are bigint in the smallest denomination
 * - Rates are exact rationals, never binary floating point
 * - Multi-asset values are explicit about which asset they carry
 */

/**
 * An exact rational number.
 *
 * Always normalized: denominator > 0 and gcd(|numerator|, denominator) = 1.
 * Construct through `@swapline/rational` rather than by hand.
 */
export interface Rational {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/**
 * Asset identifier inside a multi-asset value (e.g. "lovelace").
 */
export type AssetId = string;

/**
 * The base-currency asset. Settlement amounts are always measured in it.
 */
export const BASE_ASSET: AssetId = "lovelace";

/**
 * A multi-asset bundle, amount per asset in the smallest denomination.
 * Missing assets count as zero.
 */
export type Value = Readonly<Record<AssetId, bigint>>;
