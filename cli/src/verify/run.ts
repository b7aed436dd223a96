// SPDX-License-Identifier: Apache-2.0
import path from "node:path";
import { fileURLToPath } from "node:url";
import { log } from "../log";
import { runCase } from "./check";
import { loadAllSuites } from "./loader";
import { reportResults, type SuiteSummary } from "./reporter";

export const SUITES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "suites");

export function runVerify(options: { suites: string; verbose: boolean }): boolean {
  const suites = loadAllSuites(options.suites);
  log(`Loaded ${suites.length} suites from ${options.suites}`, options.verbose);

  const summaries: SuiteSummary[] = [];
  for (const suite of suites) {
    log(`Checking ${suite.cases.length} cases in ${suite.file}…`, options.verbose);
    summaries.push({ file: suite.file, results: suite.cases.map(runCase) });
  }

  return reportResults(summaries);
}
