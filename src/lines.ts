import { StringDecoder } from "node:string_decoder";

export type LineSource = AsyncIterable<string | Uint8Array>;

const CONTINUATION = "\\";

/**
 * Splits a text stream into lines. A line ending in a backslash is joined
 * with the line after it, without the backslash.
 */
export async function* readLines(source: LineSource): AsyncGenerator<string> {
  const decoder = new StringDecoder("utf8");
  let buffered = "";
  let joined = "";

  // returns undefined while the line continues on the next one
  const complete = (raw: string): string | undefined => {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    if (line.endsWith(CONTINUATION)) {
      joined += line.slice(0, -CONTINUATION.length);
      return undefined;
    }
    const result = joined + line;
    joined = "";
    return result;
  };

  for await (const chunk of source) {
    buffered += typeof chunk === "string" ? chunk : decoder.write(Buffer.from(chunk));
    for (let newline = buffered.indexOf("\n"); newline >= 0; newline = buffered.indexOf("\n")) {
      const line = complete(buffered.slice(0, newline));
      buffered = buffered.slice(newline + 1);
      if (typeof line !== "undefined") {
        yield line;
      }
    }
  }
  buffered += decoder.end();
  if (buffered.length > 0) {
    const line = complete(buffered);
    if (typeof line !== "undefined") {
      yield line;
      return;
    }
  }
  if (joined.length > 0) {
    yield joined;
  }
}

// Continuations never reach into the next source.
export async function* concatLines(sources: Iterable<LineSource>): AsyncGenerator<string> {
  for (const source of sources) {
    yield* readLines(source);
  }
}
