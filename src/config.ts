import * as E from "fp-ts/lib/Either";
import * as RNEA from "fp-ts/lib/ReadonlyNonEmptyArray";
import { pipe } from "fp-ts/lib/function";
import { z } from "zod";

import { parseSyntaxes } from "./syntax";
import { Syntax } from "./types";

export const DEFAULT_SYNTAX = "Makefile,Dot";
export const STDOUT = "stdout";

// Read when --syntax is not given.
export const SYNTAX_ENV = "DEPTREE_SYNTAX";

const optionsSchema = z.object({
  syntax: z.string().min(1).optional(),
  outfile: z.string().min(1).optional(),
  node: z.string().min(1).optional(),
  columns: z.coerce.number().int().positive().optional(),
  verbose: z.boolean().default(false),
  files: z.array(z.string().min(1)).default([]),
});

// As handed over by the command line, before validation.
export interface RawOptions {
  syntax?: string;
  outfile?: string;
  node?: string;
  columns?: string | number;
  verbose?: boolean;
  files?: string[];
}

export type Output =
  | { kind: "tree"; columns?: number }
  | { kind: "dot"; target: typeof STDOUT | { path: string } };

export interface Config {
  syntaxes: RNEA.ReadonlyNonEmptyArray<Syntax>;
  output: Output;
  /** Only the dependency graph of this node is printed. */
  node?: string;
  verbose: boolean;
  /** Read from stdin when empty. */
  files: string[];
}

const toOutput = (outfile: string | undefined, columns: number | undefined): Output => {
  if (typeof outfile === "undefined") {
    return { kind: "tree", columns };
  }
  return { kind: "dot", target: outfile === STDOUT ? STDOUT : { path: outfile } };
}

export const resolveConfig = (raw: RawOptions, env: NodeJS.ProcessEnv = process.env): E.Either<string, Config> => {
  const result = optionsSchema.safeParse(raw);
  if (!result.success) {
    return E.left(
      "Invalid options:\n" + result.error.issues.map(i => `  - ${i.path.join(".")}: ${i.message}`).join("\n"),
    );
  }
  const options = result.data;
  return pipe(
    parseSyntaxes(options.syntax ?? env[SYNTAX_ENV] ?? DEFAULT_SYNTAX),
    E.map(syntaxes => ({
      syntaxes,
      output: toOutput(options.outfile, options.columns),
      node: options.node,
      verbose: options.verbose,
      files: options.files,
    })),
  );
}
