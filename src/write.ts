import { getDependencies, getNodes } from "./graph";
import { dot } from "./syntax";
import { Graph, Id, Syntax } from "./types";

const quote = (id: string) => `"${id}"`;

/**
 * Serializes the edges of the graph in the given syntax, one declaration per
 * node with dependencies. Nodes without any edge are not written.
 *
 * Ids are quoted but not escaped: an id holding the edge infix, a double quote
 * or the graph suffix (`->`, `"` or `}` in dot) does not read back as the same
 * node.
 */
export const writeGraph = (syntax: Syntax) => <T extends Id>(graph: Graph<T>): string => {
  const header = (n: T) => syntax.edgePrefix + quote(n.id) + syntax.edgeInfix;
  // one statement per target when the syntax has no target delimiter
  const separator = (n: T) =>
    syntax.targetDelimiter === "" ? syntax.edgeSuffix + "\n" + header(n) : syntax.targetDelimiter;

  const declarations = getNodes(graph).flatMap(n => {
    const dependencies = getDependencies<T>(n.id)(graph);
    if (dependencies.length === 0) {
      return [];
    }
    return [header(n) + dependencies.map(dep => quote(dep.id)).join(separator(n)) + syntax.edgeSuffix + "\n"];
  });
  return syntax.graphPrefix + "\n" + declarations.join("") + syntax.graphSuffix;
}

export const writeDot = writeGraph(dot);
