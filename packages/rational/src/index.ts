/**
 * @swapline/rational — Exact rational arithmetic for settlement math.
 *
 * Rates and interest are carried as bigint fractions end to end;
 * conversion to integer currency units happens only through `round`
 * with an explicit rounding mode.
 */

export {
  rational,
  fromInteger,
  add,
  subtract,
  multiply,
  negate,
  absRational,
  compare,
  equals,
  isInteger,
  floor,
  properFraction,
  round,
  parseRational,
  formatRational,
} from "./rational.js";

export type { RoundingMode, ProperFraction, RationalErrorCode } from "./types.js";
export { RationalError, DEFAULT_ROUNDING_MODE } from "./types.js";
