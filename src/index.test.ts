import { Readable } from "node:stream";
import * as E from "fp-ts/lib/Either";
import * as TH from "fp-ts/lib/These";
import { pipe } from "fp-ts/lib/function";

import { empty, ingest, parseSyntaxes, readLines, renderFullTree, showGraph, writeDot } from ".";

describe("deptree-fp", () => {
  it("reads, draws and writes a graph through the package entry", async () => {
    const syntaxes = parseSyntaxes("Makefile,Dot");
    if (E.isLeft(syntaxes)) {
      throw new Error(syntaxes.left);
    }
    const result = await ingest(readLines(Readable.from(["top: mid\nmid: low\n"])), syntaxes.right)(empty());
    const graph = pipe(result, TH.getRight);

    expect(graph._tag).toBe("Some");
    if (graph._tag === "Some") {
      expect(showGraph.show(graph.value)).toBe("top => mid; mid => low; ");
      expect(renderFullTree({ columns: 0 })(graph.value)).toEqual([
        " top",
        "  |",
        "  V",
        " mid",
        "  |",
        "  V",
        " low",
      ]);
      expect(writeDot(graph.value)).toBe("digraph{\n\"top\"->\"mid\";\n\"mid\"->\"low\";\n}");
    }
  });
});
