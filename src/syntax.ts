import * as E from "fp-ts/lib/Either";
import * as RNEA from "fp-ts/lib/ReadonlyNonEmptyArray";
import { pipe } from "fp-ts/lib/function";

import {
  invalidStripFlag,
  invalidSyntaxName,
  singleQuotesUnsupported,
  unexpectedBeforeBrace,
  unexpectedCharacter,
  unterminatedBrace,
  unterminatedField,
  wrongFieldCount,
} from "./errors";
import { Syntax } from "./types";

export { Syntax };

// Marks a field that the syntax does not use.
export const IGNORE_FIELD = "";

export const makefile: Syntax = Object.freeze({
  graphPrefix: IGNORE_FIELD,
  edgePrefix: IGNORE_FIELD,
  sourceDelimiter: " ",
  edgeInfix: ":",
  targetDelimiter: " ",
  edgeSuffix: IGNORE_FIELD,
  graphSuffix: IGNORE_FIELD,
  stripWhitespace: true,
});

export const makeCall: RNEA.ReadonlyNonEmptyArray<Syntax> = [
  Object.freeze({
    graphPrefix: IGNORE_FIELD,
    edgePrefix: "$(call DEPEND_ALL,",
    sourceDelimiter: IGNORE_FIELD,
    edgeInfix: ",",
    targetDelimiter: ",",
    edgeSuffix: ")",
    graphSuffix: IGNORE_FIELD,
    stripWhitespace: true,
  }),
  Object.freeze({
    graphPrefix: IGNORE_FIELD,
    edgePrefix: "$(call ALL_SPECS,",
    sourceDelimiter: ",",
    edgeInfix: "):",
    targetDelimiter: " ",
    edgeSuffix: IGNORE_FIELD,
    graphSuffix: IGNORE_FIELD,
    stripWhitespace: true,
  }),
];

export const dot: Syntax = Object.freeze({
  graphPrefix: "digraph{",
  edgePrefix: IGNORE_FIELD,
  sourceDelimiter: IGNORE_FIELD,
  edgeInfix: "->",
  targetDelimiter: IGNORE_FIELD,
  edgeSuffix: ";",
  graphSuffix: "}",
  stripWhitespace: true,
});

const presets: ReadonlyMap<string, RNEA.ReadonlyNonEmptyArray<Syntax>> = new Map<string, RNEA.ReadonlyNonEmptyArray<Syntax>>([
  ["makefile", [makefile]],
  ["make", [makefile]],
  ["m", [makefile]],
  ["makecall", makeCall],
  ["c", makeCall],
  ["dot", [dot]],
  ["d", [dot]],
]);

export const preset = (name: string): E.Either<string, RNEA.ReadonlyNonEmptyArray<Syntax>> =>
  pipe(
    presets.get(name.toLowerCase()),
    E.fromNullable(invalidSyntaxName(name)),
  );

const fromFields = (fields: string[], stripWhitespace: boolean): Syntax => {
  const [graphPrefix, edgePrefix, sourceDelimiter, edgeInfix, targetDelimiter, edgeSuffix, graphSuffix] = fields;
  return Object.freeze({
    graphPrefix,
    edgePrefix,
    sourceDelimiter,
    edgeInfix,
    targetDelimiter,
    edgeSuffix,
    graphSuffix,
    stripWhitespace,
  });
}

const SPLIT_CHARS = /[,{}"']/g;

const nextSplit = (input: string, from: number): number => {
  SPLIT_CHARS.lastIndex = from;
  const match = SPLIT_CHARS.exec(input);
  return match === null ? -1 : match.index;
}

interface Brace {
  syntax: Syntax;
  end: number;
}

// Reads `{"f1",...,"f7",bool}` starting right after the opening brace.
const parseBrace = (input: string, start: number): E.Either<string, Brace> => {
  const fields: string[] = [];
  let position = start;
  for (;;) {
    const index = nextSplit(input, position);
    if (index < 0) {
      return E.left(unterminatedBrace(input.slice(start - 1)));
    }
    const char = input[index];
    if (char === "'") {
      return E.left(singleQuotesUnsupported());
    }
    if (char === "\"") {
      if (input.slice(position, index).trim() !== "") {
        return E.left(unexpectedCharacter(input[position], position));
      }
      const close = input.indexOf("\"", index + 1);
      if (close < 0) {
        return E.left(unterminatedField(input.slice(index)));
      }
      fields.push(input.slice(index + 1, close));
      position = close + 1;
      continue;
    }
    if (char === "{") {
      return E.left(unexpectedCharacter(char, index));
    }
    const between = input.slice(position, index).trim();
    if (char === ",") {
      if (between !== "") {
        return E.left(unexpectedCharacter(between[0], position));
      }
      position = index + 1;
      continue;
    }
    // closing brace: the text before it is the strip flag
    if (fields.length !== 7) {
      return E.left(wrongFieldCount(fields.length));
    }
    const flag = between.toLowerCase();
    if (flag !== "true" && flag !== "false") {
      return E.left(invalidStripFlag(between));
    }
    return E.right({ syntax: fromFields(fields, flag === "true"), end: index + 1 });
  }
}

/**
 * Parses a comma separated list of preset names and inline definitions, e.g.
 * `Makefile,{"","","",":"," ","","",true},dot`.
 */
export const parseSyntaxes = (config: string): E.Either<string, RNEA.ReadonlyNonEmptyArray<Syntax>> => {
  const result: Syntax[] = [];
  let position = 0;
  // set after an inline definition, where an empty name before the next comma is expected
  let afterBrace = false;
  for (;;) {
    const index = nextSplit(config, position);
    const end = index < 0 ? config.length : index;
    const token = config.slice(position, end);
    const char = index < 0 ? undefined : config[index];

    if (char === "{") {
      if (token !== "") {
        return E.left(unexpectedBeforeBrace(token));
      }
      const brace = parseBrace(config, index + 1);
      if (E.isLeft(brace)) {
        return brace;
      }
      result.push(brace.right.syntax);
      position = brace.right.end;
      afterBrace = true;
      continue;
    }
    if (char === "\"") {
      return E.left(unexpectedCharacter(char, index));
    }
    if (char === "'") {
      return E.left(singleQuotesUnsupported());
    }
    if (char === "}") {
      return E.left(unexpectedCharacter(char, index));
    }
    if (afterBrace && token.trim() !== "") {
      const offset = token.search(/\S/);
      return E.left(unexpectedCharacter(token[offset], position + offset));
    }
    if (!(afterBrace && token === "")) {
      const named = preset(token);
      if (E.isLeft(named)) {
        return named;
      }
      result.push(...named.right);
    }
    if (typeof char === "undefined") {
      break;
    }
    position = index + 1;
    afterBrace = false;
  }
  return pipe(
    RNEA.fromArray(result),
    E.fromOption(() => invalidSyntaxName(config)),
  );
}

const quote = (field: string) => `"${field}"`;

export const showSyntax = (syntax: Syntax): string =>
  `{${[
    syntax.graphPrefix,
    syntax.edgePrefix,
    syntax.sourceDelimiter,
    syntax.edgeInfix,
    syntax.targetDelimiter,
    syntax.edgeSuffix,
    syntax.graphSuffix,
  ].map(quote).join(",")},${syntax.stripWhitespace}}`;
