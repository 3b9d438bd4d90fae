/**
 * Observation Encoding
 *
 * Canonical byte representation of a rate observation.
 * The encoding is RFC 8785 (JCS) JSON with bigints as decimal strings,
 * so the same observation always produces the same bytes and the
 * same SHA-256 message hash.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { Observation, Rational } from "@swapline/types";
import { equals, rational } from "@swapline/rational";
import { OracleError } from "./types.js";

const ObservationWireSchema = z
  .object({
    slot: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
    value: z
      .object({
        numerator: z.string().regex(/^-?\d+$/),
        denominator: z.string().regex(/^[1-9]\d*$/),
      })
      .strict(),
  })
  .strict();

/**
 * Encode an observation as canonical JSON.
 */
export function encodeObservation(observation: Observation<Rational>): string {
  return canonicalize({
    slot: observation.slot,
    value: {
      numerator: observation.value.numerator.toString(),
      denominator: observation.value.denominator.toString(),
    },
  });
}

/**
 * Decode canonical JSON back into an observation.
 *
 * Rejects anything that is not exactly the canonical encoding of a
 * normalized observation, so each observation has one valid byte form.
 *
 * @throws {OracleError} DECODING_FAILED
 */
export function decodeObservation(data: string): Observation<Rational> {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (error) {
    throw new OracleError(
      "DECODING_FAILED",
      `Observation data is not JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const parsed = ObservationWireSchema.safeParse(json);
  if (!parsed.success) {
    throw new OracleError(
      "DECODING_FAILED",
      `Observation data has the wrong shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
    );
  }

  const numerator = BigInt(parsed.data.value.numerator);
  const denominator = BigInt(parsed.data.value.denominator);
  const value = rational(numerator, denominator);
  if (!equals(value, { numerator, denominator })) {
    throw new OracleError(
      "DECODING_FAILED",
      `Observed rate ${numerator.toString()}/${denominator.toString()} is not in lowest terms`,
    );
  }

  const observation: Observation<Rational> = { value, slot: parsed.data.slot };
  if (encodeObservation(observation) !== data) {
    throw new OracleError("DECODING_FAILED", "Observation data is not in canonical form");
  }

  return observation;
}

/**
 * SHA-256 hex digest of encoded observation data.
 */
export function hashObservationData(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}
