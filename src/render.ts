import * as O from "fp-ts/lib/Option";
import { pipe } from "fp-ts/lib/function";

import { missingRoot } from "./errors";
import { get, getDependants, getDependencies, getNodes, size } from "./graph";
import { Graph, Id, IdType } from "./types";

export interface RenderOptions {
  /**
   * Width to wrap the tree at. Defaults to the width of stdout when it is a
   * terminal; nothing is wrapped otherwise.
   */
  columns?: number;
}

// Every row of a block has exactly `width` characters.
type Block = {
  readonly rows: readonly string[];
  readonly width: number;
}

const blank = (width: number) => " ".repeat(width);

const leaf = (field: string): Block => ({ rows: [field], width: field.length });

const besideEachOther = (blocks: readonly Block[]): Block => {
  const height = blocks.reduce((max, block) => Math.max(max, block.rows.length), 0);
  const rows = Array.from({ length: height }, (_, row) =>
    blocks.map(block => block.rows[row] ?? blank(block.width)).join(""));
  return { rows, width: blocks.reduce((width, block) => width + block.width, 0) };
}

const pad = (block: Block, left: number, right: number): Block => ({
  rows: block.rows.map(row => blank(left) + row + blank(right)),
  width: left + block.width + right,
});

const setChar = (row: string[], index: number, char: string) => {
  if (index >= 0 && index < row.length) {
    row[index] = char;
  }
}

// Draws one `/`, `|` or `\` and a `V` per child midpoint, depending on where it
// lies relative to the parent's field.
const arrows = (width: number, fieldStart: number, fieldLength: number, midpoints: readonly number[]): string[] => {
  const upper = Array.from(blank(width));
  const lower = Array.from(blank(width));
  midpoints.forEach(midpoint => {
    if (midpoint < fieldStart) {
      setChar(upper, midpoint + 1, "/");
      setChar(lower, midpoint, "V");
    } else if (midpoint < fieldStart + fieldLength) {
      setChar(upper, midpoint, "|");
      setChar(lower, midpoint, "V");
    } else {
      setChar(upper, midpoint - 1, "\\");
      setChar(lower, midpoint, "V");
    }
  });
  return [upper.join(""), lower.join("")];
}

const midpoints = (blocks: readonly Block[], offset: number): number[] => {
  let start = offset;
  return blocks.map(block => {
    const midpoint = start + Math.floor(block.width / 2);
    start += block.width;
    return midpoint;
  });
}

const withParent = (field: string, children: readonly Block[]): Block => {
  const below = besideEachOther(children);
  if (field.length > below.width) {
    const left = Math.floor((field.length - below.width) / 2);
    const shifted = pad(below, left, field.length - below.width - left);
    return {
      rows: [field, ...arrows(field.length, 0, field.length, midpoints(children, left)), ...shifted.rows],
      width: field.length,
    };
  }
  const fieldStart = Math.floor((below.width - field.length) / 2);
  const centered = blank(fieldStart) + field + blank(below.width - field.length - fieldStart);
  return {
    rows: [centered, ...arrows(below.width, fieldStart, field.length, midpoints(children, 0)), ...below.rows],
    width: below.width,
  };
}

// A node whose dependencies are still being laid out.
interface Frame {
  readonly field: string;
  readonly pending: Iterator<IdType>;
  readonly children: Block[];
}

const noDependencies: readonly IdType[] = [];

const open = <T extends Id>(graph: Graph<T>, rendered: Set<IdType>, current: IdType): Frame => {
  if (rendered.has(current)) {
    return { field: ` &${current} `, pending: noDependencies[Symbol.iterator](), children: [] };
  }
  rendered.add(current);
  const dependencies = getDependencies<T>(current)(graph).map(dep => dep.id);
  return { field: ` ${current} `, pending: dependencies[Symbol.iterator](), children: [] };
}

const close = (frame: Frame): Block =>
  frame.children.length === 0 ? leaf(frame.field) : withParent(frame.field, frame.children);

/**
 * Lays out the tree below `rootId` depth first, keeping open nodes on `stack`
 * rather than the call stack. A node met for the second time in one session is
 * drawn as `&name` without its dependencies.
 */
const layout = <T extends Id>(graph: Graph<T>, rendered: Set<IdType>, rootId: IdType): Block => {
  const stack: Frame[] = [];
  let frame = open(graph, rendered, rootId);
  for (;;) {
    const next = frame.pending.next();
    if (next.done !== true) {
      stack.push(frame);
      frame = open(graph, rendered, next.value);
      continue;
    }
    const block = close(frame);
    const parent = stack.pop();
    if (typeof parent === "undefined") {
      return block;
    }
    parent.children.push(block);
    frame = parent;
  }
}

/**
 * Cuts rows wider than `columns` into bands stacked below each other,
 * separated by an empty row.
 */
export const wrap = (rows: readonly string[], width: number, columns?: number): string[] => {
  if (typeof columns === "undefined" || columns <= 0 || width <= columns) {
    return [...rows];
  }
  const bands = Math.ceil(width / columns);
  return Array.from({ length: bands }, (_, band) => [
    ...(band > 0 ? [""] : []),
    ...rows.map(row => row.slice(band * columns, (band + 1) * columns)),
  ]).flat();
}

const finish = (block: Block, options: RenderOptions): string[] =>
  wrap(block.rows, block.width, options.columns ?? process.stdout.columns)
    .map(row => row.trimEnd());

/**
 * Draws the dependency tree of `rootId`, top row first. Throws if the node is
 * not in the graph.
 */
export const renderTree = (rootId: IdType, options: RenderOptions = {}) => <T extends Id>(graph: Graph<T>): string[] =>
  pipe(
    get<T>(rootId)(graph),
    O.fold<T, string[]>(
      () => {
        throw new Error(missingRoot(rootId));
      },
      root => finish(layout(graph, new Set(), root.id), options),
    ),
  );

/**
 * Draws every tree of the graph side by side, starting at the nodes nothing
 * depends on. Nodes that are only reachable through a cycle start trees of
 * their own.
 */
export const renderFullTree = (options: RenderOptions = {}) => <T extends Id>(graph: Graph<T>): string[] => {
  if (size(graph) === 0) {
    return ["{empty graph}"];
  }
  const rendered = new Set<IdType>();
  const roots = getNodes(graph).filter(n => getDependants<T>(n.id)(graph).length === 0);
  const trees = roots.map(root => layout(graph, rendered, root.id));
  getNodes(graph).forEach(n => {
    if (!rendered.has(n.id)) {
      trees.push(layout(graph, rendered, n.id));
    }
  });
  return finish(besideEachOther(trees), options);
}
