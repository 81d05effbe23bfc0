import * as E from "fp-ts/lib/Either";

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
import { dot, makeCall, makefile, parseSyntaxes, preset, showSyntax } from "./syntax";

describe("Syntax", () => {
  describe("preset(name)", () => {
    it("accepts names and abbreviations in any case", () => {
      expect(preset("Makefile")).toEqual(E.right([makefile]));
      expect(preset("MAKE")).toEqual(E.right([makefile]));
      expect(preset("m")).toEqual(E.right([makefile]));
      expect(preset("Dot")).toEqual(E.right([dot]));
      expect(preset("d")).toEqual(E.right([dot]));
      expect(preset("MakeCall")).toEqual(E.right(makeCall));
      expect(preset("c")).toEqual(E.right(makeCall));
    });

    it("rejects unknown names", () => {
      expect(preset("ninja")).toEqual(E.left(invalidSyntaxName("ninja")));
    });
  });

  describe("parseSyntaxes(config)", () => {
    it("parses named presets in order", () => {
      const result = parseSyntaxes("Makefile,Dot");

      expect(result).toEqual(E.right([makefile, dot]));
      if (E.isRight(result)) {
        expect(result.right[0]).toBe(makefile);
        expect(result.right[1]).toBe(dot);
      }
    });

    it("expands composite presets", () => {
      expect(parseSyntaxes("dot,makecall")).toEqual(E.right([dot, makeCall[0], makeCall[1]]));
    });

    it("parses inline definitions", () => {
      expect(parseSyntaxes("{\"graph{\",\"edge \",\"|\",\"<-\",\"|\",\".\",\"}\",false}")).toEqual(E.right([{
        graphPrefix: "graph{",
        edgePrefix: "edge ",
        sourceDelimiter: "|",
        edgeInfix: "<-",
        targetDelimiter: "|",
        edgeSuffix: ".",
        graphSuffix: "}",
        stripWhitespace: false,
      }]));
    });

    it("mixes inline definitions and presets", () => {
      const inline = "{\"\",\"\",\",\",\"=>\",\",\",\"\",\"\",true}";

      expect(parseSyntaxes(`m,${inline},d`)).toEqual(E.right([
        makefile,
        { ...makefile, sourceDelimiter: ",", edgeInfix: "=>", targetDelimiter: "," },
        dot,
      ]));
    });

    it("reads back what showSyntax writes", () => {
      expect(parseSyntaxes(showSyntax(dot))).toEqual(E.right([dot]));
      expect(parseSyntaxes(makeCall.map(showSyntax).join(","))).toEqual(E.right([...makeCall]));
    });

    it("fails on unknown names", () => {
      expect(parseSyntaxes("Makefile,Ninja")).toEqual(E.left(invalidSyntaxName("Ninja")));
      expect(parseSyntaxes("")).toEqual(E.left(invalidSyntaxName("")));
      expect(parseSyntaxes("Dot,")).toEqual(E.left(invalidSyntaxName("")));
    });

    it("fails on text before an opening bracket", () => {
      expect(parseSyntaxes("Dot{\"\",\"\",\"\",\"\",\"\",\"\",\"\",true}")).toEqual(E.left(unexpectedBeforeBrace("Dot")));
    });

    it("fails on a name right after a closing bracket", () => {
      const inline = "{\"\",\"\",\"\",\" :\",\" \",\"\",\"\",true}";

      expect(parseSyntaxes(`${inline}dot`)).toEqual(E.left(unexpectedCharacter("d", 30)));
      expect(parseSyntaxes(`${inline} dot,make`)).toEqual(E.left(unexpectedCharacter("d", 31)));
    });

    it("fails when a bracket does not hold seven fields", () => {
      expect(parseSyntaxes("{\"\",\"\",\"\",\"\",\"\",\"\",true}")).toEqual(E.left(wrongFieldCount(6)));
    });

    it("fails on a strip flag that is not a boolean", () => {
      expect(parseSyntaxes("{\"\",\"\",\"\",\"\",\"\",\"\",\"\",yes}")).toEqual(E.left(invalidStripFlag("yes")));
    });

    it("fails on unterminated fields and brackets", () => {
      expect(parseSyntaxes("{\"abc")).toEqual(E.left(unterminatedField("\"abc")));
      expect(parseSyntaxes("{\"a\",\"b\"")).toEqual(E.left(unterminatedBrace("{\"a\",\"b\"")));
    });

    it("does not support single quotes", () => {
      expect(parseSyntaxes("{'a'}")).toEqual(E.left(singleQuotesUnsupported()));
    });
  });

  describe("showSyntax(syntax)", () => {
    it("writes the inline form", () => {
      expect(showSyntax(makefile)).toBe("{\"\",\"\",\" \",\":\",\" \",\"\",\"\",true}");
    });
  });
});
