export * from "./graph";
export * from "./syntax";
export { ingest, createScanner, splitDeclaration, Declaration, IngestOptions } from "./ingest";
export { readLines, concatLines, LineSource } from "./lines";
export { renderTree, renderFullTree, wrap, RenderOptions } from "./render";
export { writeGraph, writeDot } from "./write";
export { createLogger, silentLogger, Logger, LoggerOptions } from "./logger";
export { Id, IdType, Edge } from "./types";
