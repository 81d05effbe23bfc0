import { availableParallelism } from "node:os";
import * as RNEA from "fp-ts/lib/ReadonlyNonEmptyArray";
import * as TH from "fp-ts/lib/These";
import pLimit from "p-limit";

import { addEdgeAndNodes, node } from "./graph";
import { Logger, silentLogger } from "./logger";
import { Graph, IdType, Syntax } from "./types";

export interface Declaration {
  body: string;
  syntax: Syntax;
}

export interface IngestOptions {
  /** Number of tasks splitting declarations at the same time. */
  concurrency?: number;
  logger?: Logger;
}

/**
 * Tracks which syntaxes apply to the lines being read and cuts the
 * declaration body out of each line.
 */
export const createScanner = (syntaxes: RNEA.ReadonlyNonEmptyArray<Syntax>) => {
  const active = new Set<Syntax>();
  return (line: string): Declaration | undefined => {
    for (const syntax of syntaxes) {
      if (syntax.graphPrefix === "" || line.includes(syntax.graphPrefix)) {
        active.add(syntax);
      } else if (!active.has(syntax)) {
        continue;
      }
      if (syntax.graphSuffix !== "" && line.includes(syntax.graphSuffix)) {
        active.delete(syntax);
      }
      const prefixIndex = line.indexOf(syntax.edgePrefix);
      const infixIndex = line.indexOf(syntax.edgeInfix);
      const suffixIndex = line.lastIndexOf(syntax.edgeSuffix);
      if (prefixIndex >= 0 && infixIndex >= 0 && suffixIndex >= 0) {
        return { body: line.slice(prefixIndex + syntax.edgePrefix.length, suffixIndex), syntax };
      }
    }
    return undefined;
  };
}

const unquote = (token: string): string =>
  token.length >= 2 && token.startsWith("\"") && token.endsWith("\"") ? token.slice(1, -1) : token;

const tokens = (text: string, delimiter: string, strip: boolean): IdType[] =>
  (delimiter === "" ? [text] : text.split(delimiter))
    .map(token => unquote(strip ? token.trim() : token))
    .filter(token => token !== "");

/**
 * Splits a declaration body into sources and targets and calls `addEdge` for
 * every pair of them.
 */
export const splitDeclaration = ({ body, syntax }: Declaration, addEdge: (source: IdType, target: IdType) => void): void => {
  const infixIndex = body.indexOf(syntax.edgeInfix);
  if (infixIndex < 0) {
    return;
  }
  const sources = tokens(body.slice(0, infixIndex), syntax.sourceDelimiter, syntax.stripWhitespace);
  const targets = tokens(body.slice(infixIndex + syntax.edgeInfix.length), syntax.targetDelimiter, syntax.stripWhitespace);
  sources.forEach(source => targets.forEach(target => addEdge(source, target)));
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * Reads every line and adds the declared edges to `graph`. When reading
 * fails, the edges read so far stay in the graph and are returned together
 * with the error.
 */
export const ingest = (lines: AsyncIterable<string>, syntaxes: RNEA.ReadonlyNonEmptyArray<Syntax>, options: IngestOptions = {}) =>
  async (graph: Graph): Promise<TH.These<Error, Graph>> => {
    const { concurrency = availableParallelism(), logger = silentLogger } = options;
    const limit = pLimit(concurrency);
    const inFlight = new Set<Promise<void>>();
    const addEdge = (source: IdType, target: IdType) => {
      addEdgeAndNodes(node(source), node(target))(graph);
    };
    const scan = createScanner(syntaxes);

    const dispatch = async (declaration: Declaration) => {
      // the queue holds at most `concurrency` waiting tasks
      while (limit.pendingCount >= concurrency && inFlight.size > 0) {
        await Promise.race(inFlight);
      }
      const task: Promise<void> = limit(() => splitDeclaration(declaration, addEdge))
        .finally(() => {
          inFlight.delete(task);
        });
      inFlight.add(task);
    };

    let lineCount = 0;
    let declarationCount = 0;
    let failure: Error | undefined;
    try {
      for await (const line of lines) {
        lineCount++;
        const declaration = scan(line);
        if (typeof declaration !== "undefined") {
          declarationCount++;
          await dispatch(declaration);
        }
      }
    } catch (error) {
      failure = toError(error);
    }
    await Promise.all(inFlight);

    logger.debug(`Read ${lineCount} lines, ${declarationCount} declarations, ${graph.nodes.size} nodes`);
    if (typeof failure !== "undefined") {
      return TH.both(failure, graph);
    }
    return TH.right(graph);
  };
