// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { HilbertError } from "@hilbert-transpose/shared/src/hilbert/errors";
import { thrownCode } from "@hilbert-transpose/shared/src/hilbert/hilbert.test-fixtures";
import { decodeLines, demoLines, encodeLines, walkLines } from "./commands";

describe("encodeLines", () => {
  test("prints the index", () => {
    expect(encodeLines([5, 10, 20], { bits: 5, codeBits: 64, transpose: false })).toEqual(["7865"]);
  });

  test("optionally shows the transpose and bit-plane groups", () => {
    expect(encodeLines([5, 10, 20], { bits: 5, codeBits: 64, transpose: true })).toEqual([
      "7865",
      "transpose 10,14,27",
      "groups 001 111 010 111 001",
    ]);
  });

  test("takes the dimension count from the point", () => {
    expect(encodeLines([3, 5], { bits: 3, codeBits: 64, transpose: false })).toEqual(["28"]);
  });

  test("shows the same index with and without the transpose", () => {
    const plain = encodeLines([9, 0, 6, 15], { bits: 4, codeBits: 64, transpose: false });
    const shown = encodeLines([9, 0, 6, 15], { bits: 4, codeBits: 64, transpose: true });
    expect(plain).toEqual(["59054"]);
    expect(shown.slice(0, 2)).toEqual(["59054", "transpose 11,13,15,0"]);
  });

  test("rejects a coordinate wider than --bits", () => {
    expect(() => encodeLines([5, 32, 20], { bits: 5, codeBits: 64, transpose: false })).toThrow(HilbertError);
  });
});

describe("decodeLines", () => {
  test("prints the point", () => {
    expect(decodeLines(7865n, { bits: 5, dims: 3, codeBits: 64 })).toEqual(["5,10,20"]);
  });

  test("rejects an index past the end of the curve", () => {
    expect(() => decodeLines(64n, { bits: 2, dims: 3, codeBits: 64 })).toThrow(
      "Index 64 is outside a curve of 3 dimensions and 2 bits",
    );
  });
});

describe("walkLines", () => {
  test("lists the whole curve", () => {
    expect(Array.from(walkLines({ bits: 1, dims: 2, codeBits: 64 }))).toEqual(["0\t0,0", "1\t0,1", "2\t1,1", "3\t1,0"]);
  });

  test("stops at the limit", () => {
    expect(Array.from(walkLines({ bits: 2, dims: 2, codeBits: 64, limit: 3 }))).toEqual(["0\t0,0", "1\t1,0", "2\t1,1"]);
  });

  test("yields cells one at a time", () => {
    // 2^33 cells: only the first few are ever computed
    const lines = walkLines({ bits: 11, dims: 3, codeBits: 64 });
    expect(lines.next().value).toBe("0\t0,0,0");
    expect(lines.next().value).toBe("1\t0,1,0");
    expect(lines.next().value).toBe("2\t1,1,0");
  });

  test("walks a curve wider than 64 bits given --code-bits", () => {
    expect(Array.from(walkLines({ bits: 32, dims: 3, codeBits: 96, limit: 3 }))).toEqual([
      "0\t0,0,0",
      "1\t0,1,0",
      "2\t1,1,0",
    ]);
  });

  test("rejects a curve wider than the code", () => {
    expect(thrownCode(() => walkLines({ bits: 32, dims: 3, codeBits: 64, limit: 3 }).next())).toBe("code-width");
  });
});

describe("demoLines", () => {
  test("round-trips the reference point", () => {
    expect(demoLines()).toEqual([
      "Input coords = 5,10,20",
      "Hilbert coords = 10,14,27",
      "Hilbert integer = 7865 = 001 111 010 111 001 = 7865 check",
      "Reconstructed Hilbert coords = 10,14,27",
      "Orig coords = 5,10,20",
    ]);
  });
});
