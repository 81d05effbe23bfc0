import * as A from "fp-ts/lib/Array";
import * as O from "fp-ts/lib/Option";
import { pipe } from "fp-ts/lib/function";
import { Show } from "fp-ts/lib/Show";

import { missingEndpoint, missingTarget } from "./errors";
import { Id, Edge, Graph, IdType } from "./types";

export { Graph };

// Every operation takes the graph last and mutates it in place. Calls are
// synchronous, so tasks scheduled on the event loop never interleave inside
// one of them.

export const empty = <T extends Id = Id>(): Graph<T> => ({
  nodes: new Map(),
  dependencies: new Map(),
  dependants: new Map(),
});

export const node = (id: IdType): Id => ({ id });

const register = <T extends Id>(graph: Graph<T>, n: T): void => {
  graph.nodes.set(n.id, n);
  if (!graph.dependencies.has(n.id)) {
    graph.dependencies.set(n.id, new Set());
    graph.dependants.set(n.id, new Set());
  }
}

// Both endpoints must already be registered.
const link = <T extends Id>(graph: Graph<T>, source: IdType, target: IdType): void => {
  graph.dependencies.get(source)?.add(target);
  graph.dependants.get(target)?.add(source);
}

const lookup = <T extends Id>(graph: Graph<T>) => (ids: Iterable<IdType>): T[] =>
  pipe(
    Array.from(ids),
    A.filterMap(id => O.fromNullable(graph.nodes.get(id))),
  );

/**
 * Registers `n` and adds an edge from it to every id in `targetIds`.
 * Throws when a target is not in the graph yet.
 */
export const addNode = <T extends Id>(n: T, targetIds: IdType[] = []) => (graph: Graph<T>): Graph<T> => {
  const missing = targetIds.find(targetId => targetId !== n.id && !graph.nodes.has(targetId));
  if (typeof missing !== "undefined") {
    throw new Error(missingTarget(n.id, missing));
  }
  register(graph, n);
  targetIds.forEach(targetId => link(graph, n.id, targetId));
  return graph;
}

export const addNodes = <T extends Id>(...nodes: T[]) => (graph: Graph<T>): Graph<T> => {
  nodes.forEach(n => register(graph, n));
  return graph;
}

/**
 * Adds the edge `source => target`. Throws when either endpoint is missing;
 * use `addEdgeAndNodes` when the endpoints may be new.
 */
export const addEdge = <T extends Id>(source: IdType, target: IdType) => (graph: Graph<T>): Graph<T> => {
  if (!graph.nodes.has(source) || !graph.nodes.has(target)) {
    throw new Error(missingEndpoint(source, target));
  }
  link(graph, source, target);
  return graph;
}

export const addEdgeAndNodes = <T extends Id>(source: T, target: T) => (graph: Graph<T>): Graph<T> => {
  if (!graph.nodes.has(source.id)) {
    register(graph, source);
  }
  if (!graph.nodes.has(target.id)) {
    register(graph, target);
  }
  link(graph, source.id, target.id);
  return graph;
}

export const contains = <T extends Id>(queryNode: T) => (graph: Graph<T>): boolean =>
  graph.nodes.has(queryNode.id);

export const get = <T extends Id>(queryId: IdType) => (graph: Graph<T>): O.Option<T> =>
  O.fromNullable(graph.nodes.get(queryId));

export const getNodes = <T extends Id>(graph: Graph<T>): T[] =>
  Array.from(graph.nodes.values());

export const size = <T extends Id>(graph: Graph<T>): number =>
  graph.nodes.size;

export const removeNode = <T extends Id>(queryId: IdType) => (graph: Graph<T>): boolean => {
  if (!graph.nodes.delete(queryId)) {
    return false;
  }
  graph.dependencies.get(queryId)?.forEach(target => graph.dependants.get(target)?.delete(queryId));
  graph.dependants.get(queryId)?.forEach(source => graph.dependencies.get(source)?.delete(queryId));
  graph.dependencies.delete(queryId);
  graph.dependants.delete(queryId);
  return true;
}

export const hasEdge = <T extends Id>(source: IdType, target: IdType) => (graph: Graph<T>): boolean =>
  graph.dependencies.get(source)?.has(target) ?? false;

export const removeEdge = <T extends Id>(source: IdType, target: IdType) => (graph: Graph<T>): boolean => {
  const removed = graph.dependencies.get(source)?.delete(target) ?? false;
  if (removed) {
    graph.dependants.get(target)?.delete(source);
  }
  return removed;
}

export const getDependencies = <T extends Id>(queryId: IdType) => (graph: Graph<T>): T[] =>
  lookup(graph)(graph.dependencies.get(queryId) ?? []);

export const getDependants = <T extends Id>(queryId: IdType) => (graph: Graph<T>): T[] =>
  lookup(graph)(graph.dependants.get(queryId) ?? []);

export const getEdges = <T extends Id>(graph: Graph<T>): Edge[] =>
  Array.from(graph.dependencies.entries()).flatMap(([source, targets]) =>
    Array.from(targets, target => ({ source, target })));

export const edgeCount = <T extends Id>(graph: Graph<T>): number =>
  Array.from(graph.dependencies.values()).reduce((count, targets) => count + targets.size, 0);

const copySets = (index: Map<IdType, Set<IdType>>): Map<IdType, Set<IdType>> =>
  new Map(Array.from(index.entries(), ([id, ids]) => [id, new Set(ids)]));

/**
 * Copies the containers of the graph. Node values are shared with the
 * original.
 */
export const copy = <T extends Id>(graph: Graph<T>): Graph<T> => ({
  nodes: new Map(graph.nodes),
  dependencies: copySets(graph.dependencies),
  dependants: copySets(graph.dependants),
});

/**
 * Collects everything reachable from `rootId` over outgoing edges, breadth
 * first. A node already collected is linked to but not walked again, so cycles
 * terminate.
 */
export const getDependencyGraph = <T extends Id>(rootId: IdType) => (graph: Graph<T>): O.Option<Graph<T>> =>
  pipe(
    get<T>(rootId)(graph),
    O.map(root => {
      const result = empty<T>();
      register(result, root);
      const queue: IdType[] = [root.id];
      for (let head = 0; head < queue.length; head++) {
        const source = queue[head];
        getDependencies<T>(source)(graph).forEach(dep => {
          if (!result.nodes.has(dep.id)) {
            register(result, dep);
            queue.push(dep.id);
          }
          link(result, source, dep.id);
        });
      }
      return result;
    }),
  );

export const showGraph: Show<Graph> = {
  show: graph =>
    size(graph) === 0
      ? "{empty graph}"
      : getEdges(graph).map(edge => `${edge.source} => ${edge.target}; `).join(""),
};
