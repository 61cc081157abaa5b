/**
 * Boundary normalization for addresses, ids and operations.
 */

import { getAddress, isAddress, zeroAddress } from "viem";
import { isHex } from "@quorumsafe/types";
import type { Address, Hex, Operation } from "@quorumsafe/types";
import { ValidationError } from "./errors.js";

/**
 * Validate and checksum an address. Accepts any letter case.
 */
export function normalizeAddress(value: string, field: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ValidationError("INVALID_ADDRESS", `${field} is not a valid address: '${value}'`);
  }
  return getAddress(value);
}

export function isZeroAddress(address: Address): boolean {
  return address.toLowerCase() === zeroAddress;
}

export function requireProposalId(id: number | bigint): number {
  const n = typeof id === "bigint" ? Number(id) : id;
  if (!Number.isSafeInteger(n) || n < 0 || (typeof id === "bigint" && BigInt(n) !== id)) {
    throw new ValidationError("INVALID_PROPOSAL_ID", `Invalid proposal id: ${String(id)}`);
  }
  return n;
}

export function requireSignature(signature: string): Hex {
  if (!isHex(signature) || signature === "0x") {
    throw new ValidationError(
      "INVALID_SIGNATURE_FORMAT",
      "Signature must be non-empty, even-length 0x-prefixed hex",
    );
  }
  return signature;
}

/**
 * Validate a batch and return it with checksummed targets.
 */
export function normalizeOperations(operations: readonly Operation[]): readonly Operation[] {
  if (operations.length === 0) {
    throw new ValidationError("EMPTY_BATCH", "A proposal needs at least one operation");
  }

  return operations.map((op, i) => {
    if (typeof op.value !== "bigint" || op.value < 0n) {
      throw new ValidationError(
        "INVALID_OPERATION",
        `Operation ${i}: value must be a non-negative bigint`,
      );
    }
    if (!isHex(op.data)) {
      throw new ValidationError(
        "INVALID_OPERATION",
        `Operation ${i}: data must be even-length 0x-prefixed hex`,
      );
    }
    return {
      target: normalizeAddress(op.target, `Operation ${i} target`),
      value: op.value,
      data: op.data,
    };
  });
}

/**
 * Build a batch from parallel arrays, as the ABI-level `propose` receives it.
 */
export function zipOperations(
  targets: readonly string[],
  values: readonly bigint[],
  payloads: readonly Hex[],
): readonly Operation[] {
  if (targets.length !== values.length || targets.length !== payloads.length) {
    throw new ValidationError(
      "LENGTH_MISMATCH",
      `Batch arrays differ in length: ${targets.length} targets, ` +
        `${values.length} values, ${payloads.length} payloads`,
    );
  }

  return targets.map((target, i) => ({
    target: normalizeAddress(target, `Operation ${i} target`),
    value: values[i] ?? 0n,
    data: payloads[i] ?? "0x",
  }));
}
