// SPDX-License-Identifier: Apache-2.0

export type HilbertErrorCode =
  | "invalid-params"
  | "length-mismatch"
  | "coordinate-range"
  | "code-width"
  | "code-range"
  | "consumed";

/**
 * A precondition violation. Every operation checks its inputs and throws
 * this before touching any bits, so a caught error leaves the caller's
 * storage unchanged.
 */
export class HilbertError extends Error {
  readonly code: HilbertErrorCode;

  constructor(code: HilbertErrorCode, message: string) {
    super(message);
    this.name = "HilbertError";
    this.code = code;
  }
}
