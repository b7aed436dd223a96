// SPDX-License-Identifier: Apache-2.0
import cac from "cac";
import { HilbertError } from "@hilbert-transpose/shared/src/hilbert/errors";
import { decodeLines, demoLines, encodeLines, walkLines } from "./commands";
import { log } from "./log";
import {
  CoordsSchema,
  DecodeOptionsSchema,
  EncodeOptionsSchema,
  IndexSchema,
  OptionsError,
  VerifyOptionsSchema,
  WalkOptionsSchema,
  parseOptions,
} from "./options";
import { SUITES_DIR, runVerify } from "./verify/run";

process.stdout.on("error", (err: NodeJS.ErrnoException) => {
  if (err.code === "EPIPE") process.exit(0);
  throw err;
});

function fail(e: unknown): never {
  if (e instanceof HilbertError || e instanceof OptionsError) {
    process.stderr.write(`Error: ${e.message}\n`);
    process.exit(1);
  }
  throw e;
}

// Lines are written as they are produced; a lazy source may throw midway.
function print(lines: () => Iterable<string>): void {
  try {
    for (const line of lines()) {
      process.stdout.write(line + "\n");
    }
  } catch (e) {
    fail(e);
  }
}

const cli = cac("hilbert-transpose");

cli.option("--verbose", "Print progress to stderr", { default: false });

cli
  .command("encode <...coords>", "Print the Hilbert index of a point")
  .option("--bits <n>", "Bits per coordinate", { default: 5 })
  .option("--code-bits <n>", "Width of the index in bits", { default: 64 })
  .option("--transpose", "Also print the transpose and the index grouped by bit-plane")
  .action((coords: string[], options: Record<string, unknown>) => {
    print(() => {
      const point = parseOptions(CoordsSchema, coords, "coordinates");
      const opts = parseOptions(EncodeOptionsSchema, options, "options");
      log(`Encoding ${point.length} coordinates at ${opts.bits} bits each`, opts.verbose);
      return encodeLines(point, opts);
    });
  });

cli
  .command("decode <index>", "Print the point at a Hilbert index")
  .option("--bits <n>", "Bits per coordinate", { default: 5 })
  .option("--dims <n>", "Number of dimensions", { default: 3 })
  .option("--code-bits <n>", "Width of the index in bits", { default: 64 })
  .action((index: string, options: Record<string, unknown>) => {
    print(() => {
      const code = parseOptions(IndexSchema, index, "index");
      const opts = parseOptions(DecodeOptionsSchema, options, "options");
      log(`Decoding index ${code} on a ${opts.dims}-dimensional curve of ${opts.bits} bits`, opts.verbose);
      return decodeLines(code, opts);
    });
  });

cli
  .command("walk", "Print every cell of a curve in order, as index<TAB>point")
  .option("--bits <n>", "Bits per coordinate", { default: 2 })
  .option("--dims <n>", "Number of dimensions", { default: 2 })
  .option("--code-bits <n>", "Width of the index in bits", { default: 64 })
  .option("--limit <n>", "Stop after this many cells")
  .action((options: Record<string, unknown>) => {
    print(() => walkLines(parseOptions(WalkOptionsSchema, options, "options")));
  });

cli
  .command("demo", "Take the point (5, 10, 20) through every operation and back")
  .action(() => {
    print(demoLines);
  });

cli
  .command("verify", "Check the library against the reference suites")
  .option("--suites <dir>", "Directory of YAML suites", { default: SUITES_DIR })
  .action((options: Record<string, unknown>) => {
    let passed: boolean;
    try {
      passed = runVerify(parseOptions(VerifyOptionsSchema, options, "options"));
    } catch (e) {
      fail(e);
    }
    process.exit(passed ? 0 : 1);
  });

cli.help();
cli.parse();
