#!/usr/bin/env node
/**
 * kelvin-stardate binary.
 */

import { createInterface } from 'node:readline/promises'
import { consoleOutput } from './output'
import { type PromptSession, run } from './program'
import { createReadlineAsk } from './prompts'

function openPrompt(): PromptSession {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  return { ask: createReadlineAsk(rl), close: () => rl.close() }
}

run(process.argv.slice(2), {
  out: consoleOutput,
  env: process.env,
  isTTY: process.stdout.isTTY === true,
  openPrompt,
}).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(err)
    process.exitCode = 1
  }
)
