// SPDX-License-Identifier: Apache-2.0
import { HilbertError, type HilbertErrorCode } from "./errors";

/** Every point of a `2^bits`-sided grid in `dims` dimensions. */
export function allPoints(bits: number, dims: number): number[][] {
  const side = 2 ** bits;
  const total = side ** dims;
  const points: number[][] = [];
  for (let k = 0; k < total; k++) {
    const point: number[] = [];
    let rest = k;
    for (let d = 0; d < dims; d++) {
      point.push(rest % side);
      rest = Math.floor(rest / side);
    }
    points.push(point);
  }
  return points;
}

/** The HilbertError code `fn` throws, or undefined if it throws nothing. */
export function thrownCode(fn: () => unknown): HilbertErrorCode | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof HilbertError) return e.code;
    throw e;
  }
  return undefined;
}
