/**
 * Interactive prompt helpers.
 *
 * Help and quit requests are returned as values (PromptSignal / PromptOutcome)
 * rather than thrown; only validation failures are StardateErrors, and those
 * are printed here before re-asking.
 */

import type { Interface } from 'node:readline/promises'
import { StardateError, StardateErrorCode, ValidationError, formatErrorForCli } from '../errors'
import { requireInput } from '../validators'
import type { Palette } from './colors'
import type { Output } from './output'

// ============================================================================
// Types
// ============================================================================

/** Reads one line after showing `prompt` */
export type Ask = (prompt: string) => Promise<string>

export type PromptSignal =
  | { kind: 'quit' }
  | { kind: 'help' }
  | { kind: 'input'; value: string }

export type PromptOutcome<T> = { kind: 'value'; value: T } | { kind: 'quit' }

export type HelpExit = 'back' | 'quit'

export type PromptContext = {
  ask: Ask
  out: Output
  palette: Palette
  help: () => Promise<HelpExit>
}

export const REPROMPT = ' > '

const QUIT_WORDS: ReadonlySet<string> = new Set(['q', '-q', '/q', 'quit', 'exit'])
const HELP_WORDS: ReadonlySet<string> = new Set(['h', '/h', '-h', '--help', '-help', 'help', '/help'])

// ============================================================================
// Input Classification
// ============================================================================

/** Quit and help words win over validation; blank input is EMPTY_INPUT */
export function checkUserInput(raw: string | null | undefined): PromptSignal {
  const word = (raw ?? '').trim().toLowerCase()
  if (QUIT_WORDS.has(word)) return { kind: 'quit' }
  if (HELP_WORDS.has(word)) return { kind: 'help' }
  return { kind: 'input', value: requireInput(raw) }
}

export function isQuitWord(raw: string): boolean {
  return QUIT_WORDS.has(raw.trim().toLowerCase())
}

export function printCliError(ctx: Pick<PromptContext, 'out' | 'palette'>, err: StardateError): void {
  ctx.out.error(ctx.palette.paint('error', formatErrorForCli(err)))
}

// ============================================================================
// Prompt Loops
// ============================================================================

/**
 * Ask until `parse` accepts the answer. The full prompt is shown once;
 * retries after an error or a help visit use the short reprompt. With
 * `whenEmpty`, a blank answer selects that value instead of failing.
 */
export async function promptUntilValid<T>(
  ctx: PromptContext,
  prompt: string,
  parse: (value: string) => T,
  options: { whenEmpty?: T } = {}
): Promise<PromptOutcome<T>> {
  let first = true
  for (;;) {
    const raw = await ctx.ask(first ? prompt : REPROMPT)
    first = false

    if (options.whenEmpty !== undefined && raw.trim() === '') {
      return { kind: 'value', value: options.whenEmpty }
    }

    try {
      const signal = checkUserInput(raw)
      if (signal.kind === 'quit') return { kind: 'quit' }
      if (signal.kind === 'help') {
        if ((await ctx.help()) === 'quit') return { kind: 'quit' }
        continue
      }
      return { kind: 'value', value: parse(signal.value) }
    } catch (err) {
      if (!(err instanceof StardateError)) throw err
      printCliError(ctx, err)
    }
  }
}

export function promptMenuChoice<T extends string>(
  ctx: PromptContext,
  prompt: string,
  valid: readonly T[]
): Promise<PromptOutcome<T>> {
  return promptUntilValid(ctx, prompt, (value) => {
    const choice = valid.find((v) => v === value.trim())
    if (choice === undefined) {
      throw new ValidationError(
        StardateErrorCode.INVALID_MENU_CHOICE,
        `Invalid selection. Please select ${valid.join(' or ')}.`
      )
    }
    return choice
  })
}

export function promptYesNo(ctx: PromptContext, prompt: string): Promise<PromptOutcome<boolean>> {
  return promptUntilValid(ctx, prompt, (value) => {
    const answer = value.trim().toLowerCase()
    if (answer === 'y' || answer === 'yes') return true
    if (answer === 'n' || answer === 'no') return false
    throw new ValidationError(StardateErrorCode.INVALID_YES_NO, 'Please enter y/n (or yes/no).')
  })
}

// ============================================================================
// Readline Binding
// ============================================================================

/** Once the input stream closes (Ctrl-D, end of piped input) every ask reads as quit */
export function createReadlineAsk(rl: Interface): Ask {
  let closed = false
  const onClose = new Promise<string>((resolve) => {
    rl.once('close', () => {
      closed = true
      resolve('q')
    })
  })
  return (prompt) => (closed ? Promise.resolve('q') : Promise.race([rl.question(prompt), onClose]))
}
