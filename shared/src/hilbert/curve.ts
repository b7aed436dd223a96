// SPDX-License-Identifier: Apache-2.0
import { AxesCoords } from "./coords";
import { interleaveBits, uninterleaveBits } from "./interleave";
import { parseParams, type HilbertParamsInput } from "./params";
import { axesToTranspose, transposeToAxes } from "./transpose";

export interface CurvePoint {
  index: bigint;
  point: number[];
}

/**
 * A Hilbert curve of fixed shape. Parameters are validated once here;
 * each call still goes through the checked operations.
 */
export class HilbertCurve {
  readonly bits: number;
  readonly dims: number;
  readonly codeBits: number;

  constructor(params: HilbertParamsInput) {
    const { bits, dims, codeBits } = parseParams(params);
    this.bits = bits;
    this.dims = dims;
    this.codeBits = codeBits;
  }

  /** Cells along one axis. */
  get side(): number {
    return 2 ** this.bits;
  }

  /** Cells on the whole curve. */
  get size(): bigint {
    return 1n << BigInt(this.bits * this.dims);
  }

  indexOf(point: ArrayLike<number>): bigint {
    const transpose = axesToTranspose(AxesCoords.from(point), this.bits, this.dims);
    return interleaveBits(transpose, this.bits, this.dims, this.codeBits);
  }

  pointAt(index: bigint): number[] {
    const transpose = uninterleaveBits(index, this.bits, this.dims, this.codeBits);
    return transposeToAxes(transpose, this.bits, this.dims).toArray();
  }

  /** Every cell in curve order. */
  *points(): Generator<CurvePoint> {
    const size = this.size;
    for (let index = 0n; index < size; index++) {
      yield { index, point: this.pointAt(index) };
    }
  }

  compare(a: ArrayLike<number>, b: ArrayLike<number>): number {
    const ia = this.indexOf(a);
    const ib = this.indexOf(b);
    if (ia < ib) return -1;
    if (ia > ib) return 1;
    return 0;
  }

  /**
   * Sort items by the Hilbert index of their point. Sorts in place and
   * returns the same array; ties keep their input order.
   */
  sortByIndex<T>(items: T[], getPoint: (item: T) => ArrayLike<number>): T[] {
    const keyed = items.map(item => ({ item, index: this.indexOf(getPoint(item)) }));
    keyed.sort((a, b) => (a.index < b.index ? -1 : a.index > b.index ? 1 : 0));
    for (let i = 0; i < keyed.length; i++) {
      items[i] = keyed[i].item;
    }
    return items;
  }
}
