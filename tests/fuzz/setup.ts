/**
 * Vitest setup file for property tests.
 * Configures fast-check global defaults.
 */
import * as fc from 'fast-check'

// FUZZ_ITERATIONS=1000 for a deeper run; the default keeps `npm test` quick
const fuzzIterations = process.env.FUZZ_ITERATIONS ?? ''
const parsed = fuzzIterations ? parseInt(fuzzIterations, 10) : NaN
const numRuns = isNaN(parsed) ? 100 : parsed

const fuzzVerbose = (process.env.FUZZ_VERBOSE ?? 'false') === 'true'

fc.configureGlobal({
  numRuns,
  verbose: fuzzVerbose,
})

if (fuzzVerbose) {
  console.log(`\nfast-check configured: ${numRuns} runs per property`)
}
