// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { formatCoords, formatGroups } from "./format";
import { thrownCode } from "./hilbert.test-fixtures";

describe("formatGroups", () => {
  test("groups the reference index by bit-plane", () => {
    expect(formatGroups(7865n, 5, 3)).toBe("001 111 010 111 001");
  });

  test("pads leading zero planes", () => {
    expect(formatGroups(0n, 3, 2)).toBe("00 00 00");
    expect(formatGroups(5n, 2, 2)).toBe("01 01");
  });

  test("one dimension gives one digit per group", () => {
    expect(formatGroups(6n, 3, 1)).toBe("1 1 0");
  });

  test("rejects an index that does not fit the shape", () => {
    expect(thrownCode(() => formatGroups(64n, 3, 2))).toBe("code-range");
  });
});

describe("formatCoords", () => {
  test("joins with commas", () => {
    expect(formatCoords([5, 10, 20])).toBe("5,10,20");
    expect(formatCoords(Uint32Array.of(10, 14, 27))).toBe("10,14,27");
  });
});
