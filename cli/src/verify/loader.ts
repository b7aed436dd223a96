// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";

export interface TestCase {
  name: string;
  bits: number;
  codeBits?: number;
  axes: number[];
  index: bigint;
  transpose?: number[];
}

export interface Suite {
  file: string;
  cases: TestCase[];
}

function isIntegerList(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every(v => Number.isInteger(v));
}

// YAML numbers lose precision past 2^53, so wide indices are written as strings.
function parseIndex(value: unknown): bigint | null {
  if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
  return null;
}

function validateTestCase(raw: unknown, file: string, idx: number): TestCase {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`${file}: test case ${idx} is not an object`);
  }
  const obj = raw as Record<string, unknown>;

  if (typeof obj.name !== "string" || obj.name.length === 0) {
    throw new Error(`${file}: test case ${idx} is missing required field "name"`);
  }
  const name = obj.name;
  if (typeof obj.bits !== "number" || !Number.isInteger(obj.bits)) {
    throw new Error(`${file}: test case ${idx} ("${name}") is missing required field "bits"`);
  }
  if (obj.code_bits !== undefined && (typeof obj.code_bits !== "number" || !Number.isInteger(obj.code_bits))) {
    throw new Error(`${file}: test case ${idx} ("${name}") has a non-integer "code_bits"`);
  }
  if (!isIntegerList(obj.axes)) {
    throw new Error(`${file}: test case ${idx} ("${name}") is missing required field "axes"`);
  }
  const index = parseIndex(obj.index);
  if (index === null) {
    throw new Error(`${file}: test case ${idx} ("${name}") needs "index" as a non-negative integer or digit string`);
  }
  if (obj.transpose !== undefined) {
    if (!isIntegerList(obj.transpose)) {
      throw new Error(`${file}: test case ${idx} ("${name}") has a malformed "transpose"`);
    }
    if (obj.transpose.length !== obj.axes.length) {
      throw new Error(`${file}: test case ${idx} ("${name}") has ${obj.transpose.length} transpose values for ${obj.axes.length} axes`);
    }
  }

  return {
    name,
    bits: obj.bits,
    codeBits: typeof obj.code_bits === "number" ? obj.code_bits : undefined,
    axes: obj.axes,
    index,
    transpose: isIntegerList(obj.transpose) ? obj.transpose : undefined,
  };
}

export function parseSuite(raw: string, file: string): Suite {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${file}: YAML parse error: ${msg}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`${file}: expected a YAML array of test cases`);
  }

  const cases: TestCase[] = [];
  for (let i = 0; i < parsed.length; i++) {
    cases.push(validateTestCase(parsed[i], file, i));
  }
  return { file, cases };
}

export function loadSuite(filePath: string): Suite {
  return parseSuite(fs.readFileSync(filePath, "utf-8"), path.basename(filePath));
}

export function loadAllSuites(suitesDir: string): Suite[] {
  if (!fs.existsSync(suitesDir)) {
    throw new Error(`Suites directory not found: ${suitesDir}`);
  }
  const files = fs.readdirSync(suitesDir)
    .filter(f => f.endsWith(".yaml") || f.endsWith(".yml"))
    .sort();
  if (files.length === 0) {
    throw new Error(`No suite files found in ${suitesDir}`);
  }
  return files.map(f => loadSuite(path.join(suitesDir, f)));
}
