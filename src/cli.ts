import { createReadStream, readFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { Command, CommanderError } from "commander";
import * as E from "fp-ts/lib/Either";
import * as O from "fp-ts/lib/Option";
import * as TH from "fp-ts/lib/These";
import { pipe } from "fp-ts/lib/function";
import { z } from "zod";

import { Config, DEFAULT_SYNTAX, resolveConfig, STDOUT, SYNTAX_ENV } from "./config";
import { empty, getDependants, getDependencies, getDependencyGraph, getNodes, showGraph } from "./graph";
import { ingest } from "./ingest";
import { concatLines, LineSource } from "./lines";
import { createLogger, Logger } from "./logger";
import { renderFullTree, renderTree } from "./render";
import { showSyntax } from "./syntax";
import { Graph } from "./types";
import { writeDot } from "./write";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  stdin: LineSource;
  openFile: (path: string) => LineSource;
  writeFile: (path: string, data: string) => Promise<void>;
}

const processIO: CliIO = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
  stdin: process.stdin,
  openFile: path => createReadStream(path),
  writeFile: (path, data) => writeFile(path, data),
};

const packageSchema = z.object({ version: z.string() });

// src/ and dist/ both sit next to package.json
const readVersion = (): string =>
  packageSchema.parse(JSON.parse(readFileSync(join(__dirname, "..", "package.json"), "utf8"))).version;

interface CliOptions {
  syntax?: string;
  outfile?: string;
  node?: string;
  columns?: string;
  verbose?: boolean;
}

function* openAll(files: string[], io: CliIO, logger: Logger): Generator<LineSource> {
  if (files.length === 0) {
    logger.debug("Reading from stdin");
    yield io.stdin;
    return;
  }
  for (const file of files) {
    logger.debug(`Reading ${file}`);
    yield io.openFile(file);
  }
}

const select = (config: Config) => (graph: Graph): O.Option<Graph> =>
  typeof config.node === "undefined" ? O.some(graph) : getDependencyGraph(config.node)(graph);

const print = async (config: Config, graph: Graph, io: CliIO, logger: Logger): Promise<void> => {
  const { output } = config;
  if (output.kind === "tree") {
    const rows = typeof config.node === "undefined"
      ? renderFullTree({ columns: output.columns })(graph)
      : renderTree(config.node, { columns: output.columns })(graph);
    io.stdout(rows.join("\n") + "\n");
    return;
  }
  const isolated = getNodes(graph)
    .filter(n => getDependencies(n.id)(graph).length === 0 && getDependants(n.id)(graph).length === 0);
  if (isolated.length > 0) {
    logger.warn(`Nodes without edges are not written: ${isolated.map(n => n.id).join(", ")}`);
  }
  const text = writeDot(graph);
  if (output.target === STDOUT) {
    io.stdout(text + "\n");
    return;
  }
  await io.writeFile(output.target.path, text);
  logger.debug(`Wrote ${output.target.path}`);
}

const execute = async (config: Config, io: CliIO, logger: Logger): Promise<number> => {
  logger.debug(`Syntaxes: ${config.syntaxes.map(showSyntax).join(",")}`);
  const result = await ingest(concatLines(openAll(config.files, io, logger)), config.syntaxes, { logger })(empty());
  const graph = pipe(result, TH.fold(
    (): Graph => empty(),
    g => g,
    (_, g) => g,
  ));
  logger.debug(`Graph: ${showGraph.show(graph)}`);

  const selected = select(config)(graph);
  if (O.isNone(selected)) {
    logger.error(`Node '${config.node}' not found in graph`);
    return 1;
  }
  await print(config, selected.value, io, logger);

  return pipe(
    TH.getLeft(result),
    O.fold(
      () => 0,
      error => {
        logger.error(`Input could not be read completely: ${error.message}`);
        return 1;
      },
    ),
  );
}

export const createProgram = (io: CliIO, onExit: (code: number) => void): Command => {
  const program = new Command();
  program
    .name("deptree")
    .description("Print the dependency tree of Makefiles, Dot files and similar dependency lists")
    .version(readVersion())
    .argument("[files...]", "Files to read, stdin when none are given")
    .option("-s, --syntax <syntaxes>", `Syntaxes to parse the input with (default: ${SYNTAX_ENV} or "${DEFAULT_SYNTAX}")`)
    .option("-o, --outfile <path>", `Write the graph in dot syntax to a file, or to stdout with "${STDOUT}"`)
    .option("-n, --node <name>", "Only print the dependencies of this node")
    .option("-c, --columns <n>", "Wrap the tree at this width (default: terminal width)")
    .option("-v, --verbose", "Show debug output")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(async (files: string[], options: CliOptions) => {
      const logger = createLogger({ verbose: options.verbose, write: io.stderr });
      const code = await pipe(
        resolveConfig({ ...options, files }),
        E.fold(
          async message => {
            logger.error(message);
            return 1;
          },
          config => execute(config, io, logger),
        ),
      );
      onExit(code);
    });
  return program;
}

/**
 * Runs the command line with the given arguments (without node and script
 * path) and resolves to the exit code.
 */
export const run = async (argv: string[], io: CliIO = processIO): Promise<number> => {
  let exitCode = 0;
  const program = createProgram(io, code => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
