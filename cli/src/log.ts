// SPDX-License-Identifier: Apache-2.0

/**
 * Progress and diagnostics go to stderr so command output on stdout can be
 * piped. Prints only when `condition` holds (usually `--verbose`).
 */
export function log(message: string, condition: boolean): void {
  if (condition) {
    process.stderr.write(`${message}\n`);
  }
}
