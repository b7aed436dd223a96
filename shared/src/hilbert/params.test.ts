// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { HilbertError } from "./errors";
import { parseParams } from "./params";

describe("parseParams", () => {
  test("fills in the default code width", () => {
    expect(parseParams({ bits: 5, dims: 3 })).toEqual({ bits: 5, dims: 3, codeBits: 64 });
  });

  test("keeps an explicit code width", () => {
    expect(parseParams({ bits: 32, dims: 3, codeBits: 96 })).toEqual({ bits: 32, dims: 3, codeBits: 96 });
  });

  test("names the offending field", () => {
    let error: unknown;
    try {
      parseParams({ bits: 0, dims: 3 });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(HilbertError);
    expect(error).toMatchObject({ code: "invalid-params", name: "HilbertError" });
    expect(String(error)).toContain("bits:");
  });

  test("explains a code overflow", () => {
    expect(() => parseParams({ bits: 5, dims: 3, codeBits: 14 })).toThrow(
      "3 dimensions of 5 bits need 15 bits, more than the 14-bit code",
    );
  });
});
