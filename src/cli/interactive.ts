/**
 * Interactive converter menu.
 */

import { StardateError } from '../errors'
import type { LeapMode } from '../domain-types'
import { convertEarthDate, convertStardate, normalizeMode } from '../modes'
import { makeCalendarDate } from '../time-date'
import {
  parseDay,
  parseMonth,
  parseYearYYYY,
  validateKelvinStardateString,
  validateStardateString,
} from '../validators'
import { renderEarthResults, renderStardateResults } from './render'
import {
  type PromptContext,
  printCliError,
  promptMenuChoice,
  promptUntilValid,
  promptYesNo,
} from './prompts'

export type InteractiveOptions = {
  defaultMode: LeapMode
  resultWidth: number
}

const RULE = '------------------------------------------------------------'

function banner(ctx: PromptContext): void {
  const lines = [
    '',
    '╔══════════════════════════════════════════════════════════╗',
    '║           KELVIN TIMELINE STARDATE CONVERTER             ║',
    '║           Year + ordinal day stardates                   ║',
    "║           Type 'h' for help – 'q' to quit                ║",
    '╚══════════════════════════════════════════════════════════╝',
  ]
  for (const line of lines) ctx.out.log(line)
}

function printLines(ctx: PromptContext, lines: string[]): void {
  for (const line of lines) ctx.out.log(line)
}

type Step = 'done' | 'quit'

async function earthToStardateStep(ctx: PromptContext, mode: LeapMode, width: number): Promise<Step> {
  ctx.out.log(' Enter Earth date components:')
  const year = await promptUntilValid(ctx, '   Year  (YYYY): ', parseYearYYYY)
  if (year.kind === 'quit') return 'quit'
  const month = await promptUntilValid(ctx, '   Month (1-12 or name): ', parseMonth)
  if (month.kind === 'quit') return 'quit'
  const day = await promptUntilValid(ctx, '   Day   (1-31): ', parseDay)
  if (day.kind === 'quit') return 'quit'

  const date = makeCalendarDate(year.value, month.value, day.value)
  printLines(ctx, renderEarthResults(date, convertEarthDate(date, mode), width, ctx.palette))
  return 'done'
}

async function stardateToEarthStep(ctx: PromptContext, mode: LeapMode, width: number): Promise<Step> {
  // Kelvin modes want the strict YYYY.DDD form; fractional input needs the looser check
  const validator =
    mode === 'astronomical' || mode === 'all' ? validateStardateString : validateKelvinStardateString
  const stardate = await promptUntilValid(ctx, ' Enter stardate (e.g., 2258.042): ', validator)
  if (stardate.kind === 'quit') return 'quit'

  const rows = convertStardate(stardate.value, mode)
  printLines(ctx, renderStardateResults(stardate.value, rows, width, ctx.palette))
  return 'done'
}

/** Runs until the user quits or declines another conversion */
export async function runInteractive(ctx: PromptContext, options: InteractiveOptions): Promise<void> {
  const { palette } = ctx
  const goodbye = () => ctx.out.log(`\n${palette.paint('info', 'Goodbye!')}\n`)

  banner(ctx)

  for (;;) {
    printLines(ctx, [
      '',
      ' Conversion Modes:',
      '   1) Earth → Stardate',
      '   2) Stardate → Earth',
      RULE,
    ])
    const direction = await promptMenuChoice(ctx, ' Select an option: ', ['1', '2'] as const)
    if (direction.kind === 'quit') return goodbye()

    printLines(ctx, [
      '',
      ' Leap Year / Fractional Mode:',
      `   1) ${palette.paint('no_leap', 'no_leap')}       (1..365, leap day compressed)`,
      `   2) ${palette.paint('gregorian', 'gregorian')}     (true leap-year handling)`,
      `   3) ${palette.paint('astronomical', 'astronomical')}  (365.2425 day year)`,
      `   4) ${palette.paint('all', 'all')}           (display all modes)`,
      RULE,
    ])
    const mode = await promptUntilValid(
      ctx,
      ` Choose mode [default=${options.defaultMode}]: `,
      normalizeMode,
      { whenEmpty: options.defaultMode }
    )
    if (mode.kind === 'quit') return goodbye()
    ctx.out.log(`\n Using mode: ${palette.paint(mode.value, mode.value)}\n`)

    try {
      const step =
        direction.value === '1'
          ? await earthToStardateStep(ctx, mode.value, options.resultWidth)
          : await stardateToEarthStep(ctx, mode.value, options.resultWidth)
      if (step === 'quit') return goodbye()
    } catch (err) {
      if (!(err instanceof StardateError)) throw err
      printCliError(ctx, err)
      continue
    }

    const again = await promptYesNo(ctx, ' Convert another? (y/n): ')
    if (again.kind === 'quit' || !again.value) return goodbye()
  }
}
