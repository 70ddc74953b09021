import process from 'node:process'
import { loadCorpusFile } from '../lib/corpus.js'
import { trainModel } from '../lib/viterbi/trainer.js'
import { evaluateCorrections } from '../lib/evaluate.js'

function hrMs(n: bigint) { return Number(n) / 1e6 }

async function run() {
  const [trainPath, testArg] = process.argv.slice(2)
  if (!trainPath) throw new Error('Usage: evaluate <trainCorpus> [testCorpus]')
  const testPath = testArg ?? trainPath

  const t0 = process.hrtime.bigint()
  const trainPairs = await loadCorpusFile(trainPath)
  const model = trainModel(trainPairs)
  const t1 = process.hrtime.bigint()
  console.log(`trained on ${trainPath}: ${model.pairCount} pairs, ${model.vocabulary.size} words in ${hrMs(t1 - t0).toFixed(2)}ms`)

  const testPairs = testPath === trainPath ? trainPairs : await loadCorpusFile(testPath)
  const t2 = process.hrtime.bigint()
  const report = evaluateCorrections(model, testPairs)
  const t3 = process.hrtime.bigint()

  console.log(`evaluated ${report.total} pairs from ${testPath} in ${hrMs(t3 - t2).toFixed(2)}ms`)
  console.log(`accuracy: ${(report.accuracy * 100).toFixed(2)}% (${report.correct}/${report.total})`)

  const shown = report.misses.slice(0, 20)
  if (shown.length) console.log('\nfirst misses (typed -> actual, expected):')
  for (const m of shown) console.log(`  ${m.typed} -> ${m.actual}, expected ${m.expected}`)
}

run().catch(err => { console.error(err); process.exitCode = 1 })
