// SPDX-License-Identifier: Apache-2.0
import { z } from "zod";

const count = z.coerce.number().int().positive();
const flag = z.boolean().default(false);

export const EncodeOptionsSchema = z.object({
  bits: count,
  codeBits: count,
  transpose: flag,
  verbose: flag,
});

export const DecodeOptionsSchema = z.object({
  bits: count,
  dims: count,
  codeBits: count,
  verbose: flag,
});

export const WalkOptionsSchema = z.object({
  bits: count,
  dims: count,
  codeBits: count,
  limit: count.optional(),
  verbose: flag,
});

export const VerifyOptionsSchema = z.object({
  suites: z.string().min(1),
  verbose: flag,
});

export type EncodeOptions = z.infer<typeof EncodeOptionsSchema>;
export type DecodeOptions = z.infer<typeof DecodeOptionsSchema>;
export type WalkOptions = z.infer<typeof WalkOptionsSchema>;

// cac hands positional arguments over as strings; a number only sneaks in
// from programmatic callers, and then it has to be exact.
const digits = z.string().regex(/^\d+$/, "must be a non-negative integer");

export const CoordsSchema = z
  .array(
    z
      .union([digits, z.number().int().nonnegative()])
      .transform(v => Number(v))
      .refine(Number.isSafeInteger, "is too large"),
  )
  .min(1);

export const IndexSchema = z
  .union([
    digits,
    z.number().int().nonnegative().refine(Number.isSafeInteger, "is too large to be exact; quote it"),
  ])
  .transform(v => BigInt(v));

export class OptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OptionsError";
  }
}

// codeBits -> --code-bits, array positions -> "item 2"
function describePath(path: (string | number)[]): string {
  if (path.length === 0) return "value";
  const [head, ...rest] = path;
  if (typeof head === "number") return `item ${head}`;
  const name = `--${head.replace(/[A-Z]/g, c => `-${c.toLowerCase()}`)}`;
  return rest.length > 0 ? `${name}.${rest.join(".")}` : name;
}

/**
 * Parse command-line input against a schema. `what` names the input in
 * the error ("options", "coordinates", …).
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map(issue => `${describePath(issue.path)} ${issue.message}`).join("; ");
    throw new OptionsError(`Invalid ${what}: ${detail}`);
  }
  return result.data;
}
