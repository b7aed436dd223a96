// SPDX-License-Identifier: Apache-2.0
import {
  AxesCoords,
  HilbertCurve,
  axesToTranspose,
  formatCoords,
  formatGroups,
  interleaveBits,
  transposeToAxes,
  uninterleaveBits,
} from "@hilbert-transpose/shared";
import type { DecodeOptions, EncodeOptions, WalkOptions } from "./options";

// Each command produces its stdout lines; index.ts does the printing.

export function encodeLines(coords: number[], options: Omit<EncodeOptions, "verbose">): string[] {
  const { bits, codeBits } = options;
  const dims = coords.length;
  const transpose = axesToTranspose(AxesCoords.from(coords), bits, dims);
  const index = interleaveBits(transpose, bits, dims, codeBits);
  if (!options.transpose) return [String(index)];

  return [
    String(index),
    `transpose ${formatCoords(transpose.values)}`,
    `groups ${formatGroups(index, bits, dims)}`,
  ];
}

export function decodeLines(index: bigint, options: Omit<DecodeOptions, "verbose">): string[] {
  const curve = new HilbertCurve(options);
  return [formatCoords(curve.pointAt(index))];
}

/** Lazy: a curve of 2^(bits*dims) cells is never held in memory. */
export function* walkLines(options: Omit<WalkOptions, "verbose">): Generator<string> {
  const curve = new HilbertCurve({ bits: options.bits, dims: options.dims, codeBits: options.codeBits });
  let emitted = 0;
  for (const { index, point } of curve.points()) {
    if (options.limit !== undefined && emitted >= options.limit) break;
    yield `${index}\t${formatCoords(point)}`;
    emitted++;
  }
}

const DEMO_AXES = [5, 10, 20];
const DEMO_BITS = 5;
const DEMO_CHECK = 7865n;

/** A point of the 32x32x32 cube taken through all four operations and back. */
export function demoLines(): string[] {
  const dims = DEMO_AXES.length;
  const lines = [`Input coords = ${formatCoords(DEMO_AXES)}`];

  const transpose = axesToTranspose(AxesCoords.from(DEMO_AXES), DEMO_BITS, dims);
  lines.push(`Hilbert coords = ${formatCoords(transpose.values)}`);

  const code = interleaveBits(transpose, DEMO_BITS, dims);
  lines.push(`Hilbert integer = ${code} = ${formatGroups(code, DEMO_BITS, dims)} = ${DEMO_CHECK} check`);

  const reconstructed = uninterleaveBits(code, DEMO_BITS, dims);
  lines.push(`Reconstructed Hilbert coords = ${formatCoords(reconstructed.values)}`);

  const axes = transposeToAxes(reconstructed, DEMO_BITS, dims);
  lines.push(`Orig coords = ${formatCoords(axes.values)}`);
  return lines;
}
