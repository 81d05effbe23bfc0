import { Readable } from "node:stream";

import { concatLines, readLines } from "./lines";

const collect = async (lines: AsyncIterable<string>): Promise<string[]> => {
  const result: string[] = [];
  for await (const line of lines) {
    result.push(line);
  }
  return result;
};

describe("readLines(source)", () => {
  it("yields nothing for empty input", async () => {
    expect(await collect(readLines(Readable.from([])))).toEqual([]);
  });

  it("splits on newlines and keeps a last unterminated line", async () => {
    expect(await collect(readLines(Readable.from(["a: b\r\nc: d\n", "e: f"])))).toEqual(["a: b", "c: d", "e: f"]);
  });

  it("joins lines split across chunks", async () => {
    expect(await collect(readLines(Readable.from(["a: ", "b c", "\nd"])))).toEqual(["a: b c", "d"]);
  });

  it("decodes buffers", async () => {
    expect(await collect(readLines(Readable.from([Buffer.from("x: y\n")])))).toEqual(["x: y"]);
  });

  it("joins lines ending in a backslash with the next line", async () => {
    const input = "all: one \\\n two \\\n three\nclean:\n";

    expect(await collect(readLines(Readable.from([input])))).toEqual(["all: one  two  three", "clean:"]);
  });

  it("keeps a continuation pending at the end of input", async () => {
    expect(await collect(readLines(Readable.from(["a: b \\\n"])))).toEqual(["a: b "]);
    expect(await collect(readLines(Readable.from(["a: b \\"])))).toEqual(["a: b "]);
  });

  it("passes errors of the source on", async () => {
    async function* failing() {
      yield "a: b\n";
      throw new Error("read failed");
    }
    const seen: string[] = [];

    await expect((async () => {
      for await (const line of readLines(failing())) {
        seen.push(line);
      }
    })()).rejects.toThrow("read failed");
    expect(seen).toEqual(["a: b"]);
  });
});

describe("concatLines(sources)", () => {
  it("reads the sources one after another", async () => {
    const lines = concatLines([Readable.from(["a: b\n"]), Readable.from(["c: d \\"]), Readable.from(["e: f\n"])]);

    expect(await collect(lines)).toEqual(["a: b", "c: d ", "e: f"]);
  });
});
