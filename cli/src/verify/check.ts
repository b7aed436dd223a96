// SPDX-License-Identifier: Apache-2.0
import { AxesCoords } from "@hilbert-transpose/shared/src/hilbert/coords";
import { HilbertCurve } from "@hilbert-transpose/shared/src/hilbert/curve";
import { HilbertError } from "@hilbert-transpose/shared/src/hilbert/errors";
import { formatCoords } from "@hilbert-transpose/shared/src/hilbert/format";
import { axesToTranspose } from "@hilbert-transpose/shared/src/hilbert/transpose";
import type { TestCase } from "./loader";

export interface AssertionFailure {
  assertion: string;
  expected: string;
  actual: string;
}

export interface TestResult {
  name: string;
  shape: string;
  passed: boolean;
  failures: AssertionFailure[];
  error?: string;
}

function sameValues(a: ArrayLike<number>, b: ArrayLike<number>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function checkCase(tc: TestCase, curve: HilbertCurve): AssertionFailure[] {
  const failures: AssertionFailure[] = [];

  const index = curve.indexOf(tc.axes);
  if (index !== tc.index) {
    failures.push({ assertion: "index", expected: String(tc.index), actual: String(index) });
  }

  const point = curve.pointAt(tc.index);
  if (!sameValues(point, tc.axes)) {
    failures.push({ assertion: "point", expected: formatCoords(tc.axes), actual: formatCoords(point) });
  }

  if (tc.transpose) {
    const transpose = axesToTranspose(AxesCoords.from(tc.axes), curve.bits, curve.dims).toArray();
    if (!sameValues(transpose, tc.transpose)) {
      failures.push({ assertion: "transpose", expected: formatCoords(tc.transpose), actual: formatCoords(transpose) });
    }
  }

  return failures;
}

/**
 * Check one reference case both ways: point to index and index to point.
 * A case the library rejects is reported as an error, not a failure.
 */
export function runCase(tc: TestCase): TestResult {
  const dims = tc.axes.length;
  const shape = `${tc.bits} bits × ${dims} dims`;
  try {
    const curve = new HilbertCurve({ bits: tc.bits, dims, codeBits: tc.codeBits });
    const failures = checkCase(tc, curve);
    return { name: tc.name, shape, passed: failures.length === 0, failures };
  } catch (e) {
    if (!(e instanceof HilbertError)) throw e;
    return { name: tc.name, shape, passed: false, failures: [], error: e.message };
  }
}
