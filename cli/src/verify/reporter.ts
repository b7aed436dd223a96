// SPDX-License-Identifier: Apache-2.0
import type { TestResult } from "./check";

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

function statusIcon(passed: boolean): string {
  return passed ? `${GREEN}✓${RESET}` : `${RED}✗${RESET}`;
}

export interface SuiteSummary {
  file: string;
  results: TestResult[];
}

/** Write the report to stderr. Returns true when every case passed. */
export function reportResults(suites: SuiteSummary[]): boolean {
  let totalPassed = 0;
  let totalFailed = 0;
  let totalErrors = 0;

  for (const suite of suites) {
    process.stderr.write(`\n${DIM}── ${suite.file} ──${RESET}\n`);

    for (const r of suite.results) {
      if (r.error) {
        process.stderr.write(`  ${RED}⚠ ${r.name}${RESET} ${DIM}(${r.shape})${RESET}\n`);
        process.stderr.write(`    ${RED}error: ${r.error}${RESET}\n`);
        totalErrors++;
        continue;
      }

      process.stderr.write(`  ${statusIcon(r.passed)} ${r.name} ${DIM}(${r.shape})${RESET}\n`);
      for (const f of r.failures) {
        process.stderr.write(`    ${RED}${f.assertion}: expected ${f.expected}, got ${f.actual}${RESET}\n`);
      }

      if (r.passed) totalPassed++;
      else totalFailed++;
    }
  }

  process.stderr.write("\n");

  const parts: string[] = [];
  parts.push(`${GREEN}${totalPassed} passed${RESET}`);
  if (totalFailed > 0) parts.push(`${RED}${totalFailed} failed${RESET}`);
  if (totalErrors > 0) parts.push(`${RED}${totalErrors} errors${RESET}`);
  process.stderr.write(`${parts.join(", ")}\n`);

  return totalFailed === 0 && totalErrors === 0;
}
