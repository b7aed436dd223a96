// SPDX-License-Identifier: Apache-2.0
import { checkCode, checkShape } from "./params";

/**
 * Binary digits of a Hilbert index in one group per bit-plane, most
 * significant first: `formatGroups(7865n, 5, 3)` is `"001 111 010 111 001"`.
 */
export function formatGroups(code: bigint, bits: number, dims: number): string {
  checkShape(bits, dims);
  checkCode(code, bits, dims);
  const digits = code.toString(2).padStart(bits * dims, "0");
  const groups: string[] = [];
  for (let i = 0; i < bits; i++) {
    groups.push(digits.slice(i * dims, (i + 1) * dims));
  }
  return groups.join(" ");
}

export function formatCoords(values: ArrayLike<number>): string {
  return Array.from(values).join(",");
}
