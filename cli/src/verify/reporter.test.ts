// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect, vi, beforeEach, afterEach } from "vitest";
import type { TestResult } from "./check";
import { reportResults } from "./reporter";

const ok: TestResult = { name: "origin", shape: "2 bits × 2 dims", passed: true, failures: [] };
const wrong: TestResult = {
  name: "off by one",
  shape: "2 bits × 2 dims",
  passed: false,
  failures: [{ assertion: "index", expected: "2", actual: "1" }],
};
const broken: TestResult = {
  name: "too wide",
  shape: "2 bits × 2 dims",
  passed: false,
  failures: [],
  error: "Coordinate 0 (4) does not fit in 2 bits",
};

describe("reportResults", () => {
  let written: string[];

  beforeEach(() => {
    written = [];
    vi.spyOn(process.stderr, "write").mockImplementation(chunk => {
      written.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("passes when every case passed", () => {
    expect(reportResults([{ file: "a.yaml", results: [ok, ok] }])).toBe(true);
    expect(written.at(-1)).toBe("\x1b[32m2 passed\x1b[0m\n");
  });

  test("fails on a failed assertion", () => {
    expect(reportResults([{ file: "a.yaml", results: [ok] }, { file: "b.yaml", results: [wrong] }])).toBe(false);
    expect(written).toContain("    \x1b[31mindex: expected 2, got 1\x1b[0m\n");
    expect(written.at(-1)).toBe("\x1b[32m1 passed\x1b[0m, \x1b[31m1 failed\x1b[0m\n");
  });

  test("fails on an errored case", () => {
    expect(reportResults([{ file: "a.yaml", results: [ok, broken] }])).toBe(false);
    expect(written.at(-1)).toBe("\x1b[32m1 passed\x1b[0m, \x1b[31m1 errors\x1b[0m\n");
  });

  test("passes an empty run", () => {
    expect(reportResults([])).toBe(true);
  });
});
