/**
 * In-process stand-ins for the terminal: a recording Output and a scripted Ask.
 */

import { createPalette } from '../../src/cli/colors'
import type { Output } from '../../src/cli/output'
import type { Ask, HelpExit, PromptContext } from '../../src/cli/prompts'

export type RecordedOutput = Output & {
  logs: string[]
  errors: string[]
}

export function recordOutput(): RecordedOutput {
  const logs: string[] = []
  const errors: string[] = []
  return {
    logs,
    errors,
    log: (line) => logs.push(line),
    error: (line) => errors.push(line),
  }
}

export type ScriptedAsk = {
  ask: Ask
  /** Every prompt shown, in order */
  prompts: string[]
}

/** Answers in order; once the script runs out every answer is 'q' */
export function scriptedAsk(answers: readonly string[]): ScriptedAsk {
  const queue = [...answers]
  const prompts: string[] = []
  return {
    prompts,
    ask: (prompt) => {
      prompts.push(prompt)
      return Promise.resolve(queue.shift() ?? 'q')
    },
  }
}

export function plainContext(
  ask: Ask,
  out: Output,
  help: () => Promise<HelpExit> = () => Promise.resolve<HelpExit>('back')
): PromptContext {
  return { ask, out, palette: createPalette(false), help }
}
