// SPDX-License-Identifier: Apache-2.0
// Hilbert transpose after John Skilling, "Programming the Hilbert curve"
// (AIP Conf. Proc. 707, 2004). The two transforms are mirror images: loop
// directions differ per phase and must not be unified.
import { AxesCoords, TransposeCoords } from "./coords";
import { checkShape, checkVector } from "./params";

/**
 * Convert a point to its Hilbert transpose, in place. The input wrapper is
 * consumed; the returned wrapper owns the same buffer.
 */
export function axesToTranspose(coords: AxesCoords, bits: number, dims: number): TransposeCoords {
  checkShape(bits, dims);
  checkVector(coords.values, bits, dims);
  const x = coords.take();
  const m = 2 ** (bits - 1);

  // Inverse undo, coarsest bit-plane first
  for (let q = m; q > 1; q /= 2) {
    const p = q - 1;
    for (let i = 0; i < dims; i++) {
      if (x[i] & q) {
        x[0] ^= p; // invert
      } else {
        const t = (x[0] ^ x[i]) & p; // exchange
        x[0] ^= t;
        x[i] ^= t;
      }
    }
  }

  // Gray encode
  for (let i = 1; i < dims; i++) {
    x[i] ^= x[i - 1];
  }
  let t = 0;
  for (let q = m; q > 1; q /= 2) {
    if (x[dims - 1] & q) {
      t ^= q - 1;
    }
  }
  for (let i = 0; i < dims; i++) {
    x[i] ^= t;
  }

  return TransposeCoords.wrap(x);
}

/** Inverse of {@link axesToTranspose}, in place. */
export function transposeToAxes(coords: TransposeCoords, bits: number, dims: number): AxesCoords {
  checkShape(bits, dims);
  checkVector(coords.values, bits, dims);
  const x = coords.take();
  const n = 2 ** bits;

  // Gray decode. Index 0 is handled through t, so the loop stops at 1.
  let t = x[dims - 1] >>> 1;
  for (let i = dims - 1; i > 0; i--) {
    x[i] ^= x[i - 1];
  }
  x[0] ^= t;

  // Undo excess work, finest bit-plane first
  for (let q = 2; q !== n; q *= 2) {
    const p = q - 1;
    for (let i = dims - 1; i >= 0; i--) {
      if (x[i] & q) {
        x[0] ^= p;
      } else {
        t = (x[0] ^ x[i]) & p;
        x[0] ^= t;
        x[i] ^= t;
      }
    }
  }

  return AxesCoords.wrap(x);
}
