// SPDX-License-Identifier: Apache-2.0
import { z } from "zod";
import { HilbertError } from "./errors";

// Coordinates live in a Uint32Array.
export const COORD_WORD_BITS = 32;
export const DEFAULT_CODE_BITS = 64;

export const HilbertParamsSchema = z.object({
  bits: z.number().int().min(1).max(COORD_WORD_BITS),
  dims: z.number().int().min(1),
  codeBits: z.number().int().min(1).default(DEFAULT_CODE_BITS),
});

export type HilbertParamsInput = z.input<typeof HilbertParamsSchema>;
export type HilbertParams = z.infer<typeof HilbertParamsSchema>;

const ShapeSchema = HilbertParamsSchema.pick({ bits: true, dims: true });

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate curve parameters, filling in the default code width.
 * Rejects shapes whose `bits * dims` does not fit the code.
 */
export function parseParams(input: HilbertParamsInput): HilbertParams {
  const result = HilbertParamsSchema.safeParse(input);
  if (!result.success) {
    throw new HilbertError("invalid-params", `Invalid curve parameters: ${describeIssues(result.error)}`);
  }
  const params = result.data;
  checkCodeWidth(params.bits, params.dims, params.codeBits);
  return params;
}

export function checkShape(bits: number, dims: number): void {
  const result = ShapeSchema.safeParse({ bits, dims });
  if (!result.success) {
    throw new HilbertError("invalid-params", `Invalid curve parameters: ${describeIssues(result.error)}`);
  }
}

export function checkCodeWidth(bits: number, dims: number, codeBits: number): void {
  if (!Number.isInteger(codeBits) || codeBits < 1) {
    throw new HilbertError("invalid-params", `Invalid curve parameters: codeBits must be a positive integer, got ${codeBits}`);
  }
  if (bits * dims > codeBits) {
    throw new HilbertError(
      "code-width",
      `${dims} dimensions of ${bits} bits need ${bits * dims} bits, more than the ${codeBits}-bit code`,
    );
  }
}

export function checkVector(values: Uint32Array, bits: number, dims: number): void {
  if (values.length !== dims) {
    throw new HilbertError("length-mismatch", `Expected ${dims} coordinates, got ${values.length}`);
  }
  const limit = 2 ** bits;
  for (let i = 0; i < values.length; i++) {
    if (values[i] >= limit) {
      throw new HilbertError("coordinate-range", `Coordinate ${i} (${values[i]}) does not fit in ${bits} bits`);
    }
  }
}

export function checkCode(code: bigint, bits: number, dims: number): void {
  if (code < 0n || code >= 1n << BigInt(bits * dims)) {
    throw new HilbertError("code-range", `Index ${code} is outside a curve of ${dims} dimensions and ${bits} bits`);
  }
}
