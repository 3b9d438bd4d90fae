/**
 * Settlement Validator
 *
 * Decides whether a transaction legally closes out an interest-rate swap.
 *
 * Evaluation steps:
 * 1. Authenticate the oracle observation and check its slot
 * 2. Compute both leg payments from the observed rate
 * 3. Clamp the payouts
 * 4. Check the inputs are both parties' margins
 * 5. Check the outputs pay each party no more than its remainder
 * 6. Accept iff both checks hold
 *
 * Steps 1 and the cardinality parts of 4–5 are hard failures and throw
 * `SettlementError`; a well-formed transaction that fails the pairing
 * checks is rejected with `false`.
 *
 * The validator keeps no state between calls. The host runs it once per
 * spent margin input, and both runs must reach the same verdict.
 *
 * Usage:
 *   const validator = new SettlementValidator({ rounding: "half-even" });
 *   const ok = validator.evaluate(terms, parties, signedObservation, txView);
 */

import type { Logger } from "pino";
import type {
  Observation,
  PartyIdentities,
  Rational,
  SignatureVerifier,
  SignedObservation,
  SwapTerms,
  TransactionView,
} from "@swapline/types";
import { DEFAULT_ROUNDING_MODE, formatRational } from "@swapline/rational";
import { Ed25519SignatureVerifier } from "@swapline/oracle";
import { silentLogger } from "./logger.js";
import { checkInputs, checkOutputs, requirePair } from "./matching.js";
import { verifyObservation } from "./observation.js";
import { computeSettlement } from "./payments.js";
import {
  DEFAULT_CLAMP_MODE,
  SettlementError,
  type ArithmeticOptions,
  type SettlementReport,
  type SettlementValidatorOptions,
} from "./types.js";

export class SettlementValidator {
  private readonly verifier: SignatureVerifier<Observation<Rational>>;
  private readonly logger: Logger;
  readonly arithmetic: ArithmeticOptions;

  constructor(options: SettlementValidatorOptions = {}) {
    this.verifier = options.verifier ?? new Ed25519SignatureVerifier();
    this.logger = options.logger ?? silentLogger();
    this.arithmetic = {
      rounding: options.rounding ?? DEFAULT_ROUNDING_MODE,
      clamp: options.clamp ?? DEFAULT_CLAMP_MODE,
    };
  }

  /**
   * Accept or reject a settlement transaction.
   *
   * @throws {SettlementError} on a bad observation or a transaction
   *   without exactly two inputs and two outputs
   */
  evaluate(
    terms: SwapTerms,
    parties: PartyIdentities,
    signed: SignedObservation,
    tx: TransactionView,
  ): boolean {
    return this.explain(terms, parties, signed, tx).accepted;
  }

  /**
   * Evaluate and return every figure behind the verdict.
   *
   * @throws {SettlementError} as for `evaluate`
   */
  explain(
    terms: SwapTerms,
    parties: PartyIdentities,
    signed: SignedObservation,
    tx: TransactionView,
  ): SettlementReport {
    try {
      const rate = verifyObservation(this.verifier, terms, signed);
      const figures = computeSettlement(terms, rate, this.arithmetic);

      this.logger.debug(
        {
          rate: formatRational(figures.rate),
          fixedPayment: figures.fixedPayment.toString(),
          floatPayment: figures.floatPayment.toString(),
          fixedRemainder: figures.fixedRemainder.toString(),
          floatRemainder: figures.floatRemainder.toString(),
          rounding: this.arithmetic.rounding,
          clamp: this.arithmetic.clamp,
        },
        "Settlement figures computed",
      );

      const inputs = requirePair(tx.inputs, "INPUT_CARDINALITY");
      const outputs = requirePair(tx.outputs, "OUTPUT_CARDINALITY");

      const inputsMatched = checkInputs(parties, terms.margin, inputs);
      const outputsMatched = checkOutputs(parties, figures, outputs);
      const accepted = inputsMatched && outputsMatched;

      this.logger.debug({ inputsMatched, outputsMatched, accepted }, "Settlement evaluated");

      return { ...figures, inputsMatched, outputsMatched, accepted };
    } catch (error) {
      if (error instanceof SettlementError) {
        this.logger.warn({ code: error.code }, error.message);
      }
      throw error;
    }
  }
}

/**
 * Evaluate with a default validator (ed25519 oracle, half-even rounding,
 * literal clamp, no logging).
 *
 * @throws {SettlementError} as for `SettlementValidator.evaluate`
 */
export function evaluateSettlement(
  terms: SwapTerms,
  parties: PartyIdentities,
  signed: SignedObservation,
  tx: TransactionView,
): boolean {
  return new SettlementValidator().evaluate(terms, parties, signed, tx);
}
