// SPDX-License-Identifier: Apache-2.0
import { TransposeCoords } from "./coords";
import { DEFAULT_CODE_BITS, checkCode, checkCodeWidth, checkShape, checkVector } from "./params";

// Bit `i` of coordinate `j` sits at position `dims * i + (dims - 1 - j)` of
// the code: bit-planes MSB first, dimension 0 leading each group.

/**
 * Pack a transpose into its scalar Hilbert index. Throws when
 * `bits * dims` exceeds `codeBits` rather than truncating.
 */
export function interleaveBits(
  coords: TransposeCoords,
  bits: number,
  dims: number,
  codeBits: number = DEFAULT_CODE_BITS,
): bigint {
  checkShape(bits, dims);
  checkCodeWidth(bits, dims, codeBits);
  const x = coords.values;
  checkVector(x, bits, dims);

  let code = 0n;
  for (let plane = bits - 1; plane >= 0; plane--) {
    for (let j = 0; j < dims; j++) {
      code = (code << 1n) | BigInt((x[j] >>> plane) & 1);
    }
  }
  return code;
}

/** Inverse of {@link interleaveBits}. Returns a fresh transpose. */
export function uninterleaveBits(
  code: bigint,
  bits: number,
  dims: number,
  codeBits: number = DEFAULT_CODE_BITS,
): TransposeCoords {
  checkShape(bits, dims);
  checkCodeWidth(bits, dims, codeBits);
  checkCode(code, bits, dims);

  const x = new Uint32Array(dims);
  for (let i = 0; i < bits; i++) {
    for (let j = 0; j < dims; j++) {
      const bit = Number((code >> BigInt(dims * i + j)) & 1n);
      x[dims - 1 - j] |= bit << i;
    }
  }
  return TransposeCoords.wrap(x);
}
