// SPDX-License-Identifier: Apache-2.0
import { HilbertError } from "./errors";

const UINT32_MAX = 0xffffffff;

function toWords(values: ArrayLike<number>): Uint32Array {
  const words = new Uint32Array(values.length);
  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    if (!Number.isInteger(v) || v < 0 || v > UINT32_MAX) {
      throw new HilbertError("coordinate-range", `Coordinate ${i} (${v}) is not an unsigned 32-bit integer`);
    }
    words[i] = v;
  }
  return words;
}

/**
 * One word per dimension. The same buffer holds axes or transpose data
 * depending on which wrapper currently owns it; a transform takes the
 * buffer from its input wrapper and hands it to the one it returns.
 */
abstract class CoordVector {
  private buffer: Uint32Array | null;

  protected constructor(buffer: Uint32Array) {
    this.buffer = buffer;
  }

  protected abstract get label(): string;

  get consumed(): boolean {
    return this.buffer === null;
  }

  get values(): Uint32Array {
    if (this.buffer === null) {
      throw new HilbertError("consumed", `These ${this.label} coordinates were consumed by a transform`);
    }
    return this.buffer;
  }

  get length(): number {
    return this.values.length;
  }

  toArray(): number[] {
    return Array.from(this.values);
  }

  /** Release the storage. Any later read through this wrapper throws. */
  take(): Uint32Array {
    const buffer = this.values;
    this.buffer = null;
    return buffer;
  }
}

/** A point in ordinary n-dimensional space. */
export class AxesCoords extends CoordVector {
  readonly kind = "axes";

  private constructor(buffer: Uint32Array) {
    super(buffer);
  }

  protected get label(): string {
    return "axes";
  }

  static from(values: ArrayLike<number>): AxesCoords {
    return new AxesCoords(toWords(values));
  }

  /** Adopt caller-owned storage without copying. */
  static wrap(buffer: Uint32Array): AxesCoords {
    return new AxesCoords(buffer);
  }
}

/** The bit-rotated, Gray-coded form that interleaves into a Hilbert index. */
export class TransposeCoords extends CoordVector {
  readonly kind = "transpose";

  private constructor(buffer: Uint32Array) {
    super(buffer);
  }

  protected get label(): string {
    return "transpose";
  }

  static from(values: ArrayLike<number>): TransposeCoords {
    return new TransposeCoords(toWords(values));
  }

  static wrap(buffer: Uint32Array): TransposeCoords {
    return new TransposeCoords(buffer);
  }
}
