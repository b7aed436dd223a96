// SPDX-License-Identifier: Apache-2.0
export { axesToTranspose, transposeToAxes } from "./hilbert/transpose";
export { interleaveBits, uninterleaveBits } from "./hilbert/interleave";
export { AxesCoords, TransposeCoords } from "./hilbert/coords";
export { HilbertCurve } from "./hilbert/curve";
export type { CurvePoint } from "./hilbert/curve";
export { HilbertError } from "./hilbert/errors";
export type { HilbertErrorCode } from "./hilbert/errors";
export {
  COORD_WORD_BITS,
  DEFAULT_CODE_BITS,
  HilbertParamsSchema,
  parseParams,
} from "./hilbert/params";
export type { HilbertParams, HilbertParamsInput } from "./hilbert/params";
export { formatGroups, formatCoords } from "./hilbert/format";
