import type { DecodeOptions, SpellingModel } from '../types.js'
import { correctText } from '../corrector.js'
import { linesFromChunks } from '../utils.js'

/**
 * Correct text arriving in arbitrary chunks (e.g. a Readable in utf8 mode),
 * yielding one corrected line per input line. Blank lines come through as ''.
 */
export async function* correctLinesFromAsyncIterable(
  source: AsyncIterable<string>,
  model: SpellingModel,
  opts?: DecodeOptions
): AsyncGenerator<string, void, unknown> {
  for await (const line of linesFromChunks(source)) {
    yield correctText(line, model, opts)
  }
}
