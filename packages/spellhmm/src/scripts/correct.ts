import process from 'node:process'
import readline from 'node:readline/promises'
import { loadCorpusFile } from '../lib/corpus.js'
import { trainModel } from '../lib/viterbi/trainer.js'
import { correctText } from '../lib/corrector.js'
import { correctLinesFromAsyncIterable } from '../lib/viterbi/streaming.js'
import { promptLines } from '../lib/prompt.js'
import type { DecodeOptions, SpellingModel } from '../lib/types.js'

async function interactive(model: SpellingModel, opts: DecodeOptions) {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  try {
    for await (const text of promptLines(rl, '\nEnter text: ')) {
      console.log('Corrected:', correctText(text, model, opts))
    }
  } finally {
    rl.close()
  }
}

async function batch(model: SpellingModel, opts: DecodeOptions) {
  process.stdin.setEncoding('utf8')
  for await (const line of correctLinesFromAsyncIterable(process.stdin, model, opts)) {
    console.log(line)
  }
}

async function main() {
  const args = process.argv.slice(2)
  const debug = args.includes('--debug')
  const corpusPath = args.find(a => !a.startsWith('--')) ?? 'aspell.txt'
  const opts: DecodeOptions = { debug }

  console.info(`Loading data from ${corpusPath} and training model...`)
  const pairs = await loadCorpusFile(corpusPath)
  if (pairs.length === 0) console.warn(`No training pairs found in ${corpusPath}; corrections will echo their input`)

  const model = trainModel(pairs)
  console.info(`Model ready: ${model.pairCount} pairs, ${model.vocabulary.size} known words.`)

  if (process.stdin.isTTY) {
    console.info('Type something (blank line to quit).')
    await interactive(model, opts)
  } else {
    await batch(model, opts)
  }
}

main().catch(err => {
  console.error('Spelling correction failed:', err)
  process.exitCode = 1
})
