// The subset of a node:readline/promises Interface the prompt loop needs.
export interface LinePrompt {
  question(query: string): Promise<string>;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Ask `query` repeatedly, yielding each trimmed answer until a blank answer
 * or until the interface closes (e.g. Ctrl-D) while a question is pending.
 */
export async function* promptLines(rl: LinePrompt, query: string): AsyncGenerator<string, void, unknown> {
  let closed = false;
  const closedSignal = new Promise<null>(resolve => {
    rl.once('close', () => {
      closed = true;
      resolve(null);
    });
  });

  while (!closed) {
    const pending = rl.question(query).catch((err: unknown) => {
      if (closed) return null;
      throw err;
    });
    const answer = await Promise.race([pending, closedSignal]);
    if (answer === null) return;

    const text = answer.trim();
    if (!text) return;
    yield text;
  }
}
