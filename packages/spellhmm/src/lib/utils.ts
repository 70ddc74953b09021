// Reassemble lines from arbitrary text chunks; accepts \n, \r\n and \r endings.
export async function* linesFromChunks(
  source: AsyncIterable<string>
): AsyncGenerator<string, void, unknown> {
  let buffer = "";
  let pendingCR = false;

  for await (const chunk of source) {
    buffer += chunk;

    // a \r that ended the previous chunk may be the first half of \r\n
    if (pendingCR && buffer.length > 0) {
      if (buffer.startsWith("\n")) buffer = buffer.slice(1);
      pendingCR = false;
    }

    while (true) {
      const match = buffer.match(/\r\n|\n|\r/);
      if (!match || match.index === undefined) break;

      const line = buffer.slice(0, match.index);
      buffer = buffer.slice(match.index + match[0].length);
      if (match[0] === "\r" && buffer.length === 0) pendingCR = true;
      yield line;
    }
  }

  if (buffer.length > 0) {
    yield buffer;
  }
}

export function tokenizeWords(text: string): string[] {
  return text.split(/\s+/).filter(w => w.length > 0);
}
