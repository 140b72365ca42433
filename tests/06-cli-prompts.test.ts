/**
 * Segment 06: Interactive Prompt Tests
 *
 * Quit/help classification, the reprompt loop and the menu and yes/no
 * prompts, driven by a scripted Ask.
 */

import { describe, it, expect } from 'vitest'
import {
  REPROMPT,
  checkUserInput,
  isQuitWord,
  promptMenuChoice,
  promptUntilValid,
  promptYesNo,
  type HelpExit,
} from '../src/cli/prompts'
import { StardateError } from '../src/errors'
import { parseYearYYYY } from '../src/validators'
import { plainContext, recordOutput, scriptedAsk } from './helpers/cli'

// ============================================================================
// 1. CLASSIFICATION
// ============================================================================

describe('checkUserInput', () => {
  it('recognizes quit words in any case', () => {
    for (const word of ['q', 'Q', '-q', '/q', 'quit', ' EXIT ']) {
      expect(checkUserInput(word)).toEqual({ kind: 'quit' })
    }
  })

  it('recognizes help words', () => {
    for (const word of ['h', '/h', '-h', '--help', '-help', 'help', '/help']) {
      expect(checkUserInput(word)).toEqual({ kind: 'help' })
    }
  })

  it('passes other input through trimmed', () => {
    expect(checkUserInput(' 2258 ')).toEqual({ kind: 'input', value: '2258' })
  })

  it('rejects blank input', () => {
    try {
      checkUserInput('  ')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(StardateError)
      if (err instanceof StardateError) expect(err.code).toBe('EMPTY_INPUT')
    }
  })

  it('isQuitWord matches only quit words', () => {
    expect(isQuitWord(' Quit ')).toBe(true)
    expect(isQuitWord('help')).toBe(false)
  })
})

// ============================================================================
// 2. REPROMPT LOOP
// ============================================================================

describe('promptUntilValid', () => {
  it('returns the first valid answer', async () => {
    const script = scriptedAsk(['2258'])
    const out = recordOutput()
    const outcome = await promptUntilValid(plainContext(script.ask, out), 'Year: ', parseYearYYYY)
    expect(outcome).toEqual({ kind: 'value', value: 2258 })
    expect(script.prompts).toEqual(['Year: '])
    expect(out.errors).toEqual([])
  })

  it('prints each error and reprompts', async () => {
    const script = scriptedAsk(['', 'abc', '2258'])
    const out = recordOutput()
    const outcome = await promptUntilValid(plainContext(script.ask, out), 'Year: ', parseYearYYYY)
    expect(outcome).toEqual({ kind: 'value', value: 2258 })
    expect(script.prompts).toEqual(['Year: ', REPROMPT, REPROMPT])
    expect(out.errors).toEqual([
      'Error [EMPTY_INPUT]: Input cannot be empty.',
      "Error [INVALID_YEAR]: Invalid year 'abc' (numeric only).",
    ])
  })

  it('returns the default for a blank answer', async () => {
    const script = scriptedAsk(['  '])
    const outcome = await promptUntilValid(
      plainContext(script.ask, recordOutput()),
      'Mode: ',
      (value) => value,
      { whenEmpty: 'no_leap' }
    )
    expect(outcome).toEqual({ kind: 'value', value: 'no_leap' })
  })

  it('returns quit for a quit word', async () => {
    const script = scriptedAsk(['quit'])
    const outcome = await promptUntilValid(plainContext(script.ask, recordOutput()), 'Year: ', parseYearYYYY)
    expect(outcome).toEqual({ kind: 'quit' })
  })

  it('opens help and then reprompts', async () => {
    const script = scriptedAsk(['h', '2258'])
    let helpVisits = 0
    const ctx = plainContext(script.ask, recordOutput(), () => {
      helpVisits++
      return Promise.resolve<HelpExit>('back')
    })
    const outcome = await promptUntilValid(ctx, 'Year: ', parseYearYYYY)
    expect(outcome).toEqual({ kind: 'value', value: 2258 })
    expect(helpVisits).toBe(1)
    expect(script.prompts).toEqual(['Year: ', REPROMPT])
  })

  it('quits when help quits', async () => {
    const script = scriptedAsk(['help', '2258'])
    const ctx = plainContext(script.ask, recordOutput(), () => Promise.resolve<HelpExit>('quit'))
    expect(await promptUntilValid(ctx, 'Year: ', parseYearYYYY)).toEqual({ kind: 'quit' })
  })

  it('rethrows errors that are not StardateErrors', async () => {
    const script = scriptedAsk(['2258'])
    const parse = (): number => {
      throw new Error('boom')
    }
    await expect(promptUntilValid(plainContext(script.ask, recordOutput()), 'Year: ', parse)).rejects.toThrow(
      'boom'
    )
  })
})

// ============================================================================
// 3. MENU AND YES/NO
// ============================================================================

describe('promptMenuChoice', () => {
  it('accepts only the listed options', async () => {
    const script = scriptedAsk(['3', ' 2 '])
    const out = recordOutput()
    const outcome = await promptMenuChoice(plainContext(script.ask, out), 'Select: ', ['1', '2'] as const)
    expect(outcome).toEqual({ kind: 'value', value: '2' })
    expect(out.errors).toEqual(['Error [INVALID_MENU_CHOICE]: Invalid selection. Please select 1 or 2.'])
  })
})

describe('promptYesNo', () => {
  it('accepts y, yes, n and no', async () => {
    for (const [answer, expected] of [['y', true], ['YES', true], ['n', false], ['No', false]] as const) {
      const script = scriptedAsk([answer])
      const outcome = await promptYesNo(plainContext(script.ask, recordOutput()), 'Again? ')
      expect(outcome).toEqual({ kind: 'value', value: expected })
    }
  })

  it('reprompts on anything else', async () => {
    const script = scriptedAsk(['maybe', 'y'])
    const out = recordOutput()
    const outcome = await promptYesNo(plainContext(script.ask, out), 'Again? ')
    expect(outcome).toEqual({ kind: 'value', value: true })
    expect(out.errors).toEqual(['Error [INVALID_YES_NO]: Please enter y/n (or yes/no).'])
  })
})
