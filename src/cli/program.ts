/**
 * Command-line surface.
 *
 * Usage:
 *   kelvin-stardate                                   interactive menu
 *   kelvin-stardate --from-earth 2258-02-11 [--mode m]
 *   kelvin-stardate --from-sd 2258.42 [--mode m]
 *   kelvin-stardate earth-to <year> <month> <day> [--mode m]
 *   kelvin-stardate sd-to <stardate> [--mode m]
 *   kelvin-stardate errors [code] [--dev]
 */

import { Command, CommanderError } from 'commander'
import { StardateError, formatErrorForHelp, isErrorCode, listErrorCodesOrdered } from '../errors'
import type { LeapMode } from '../domain-types'
import { convertEarthDate, convertStardate, normalizeMode } from '../modes'
import { isLeapYear, makeCalendarDate } from '../time-date'
import { parseEarthDate } from '../validators'
import { type Palette, createPalette } from './colors'
import { type CliConfig, loadConfig } from './config'
import { helpLoop } from './help'
import { runInteractive } from './interactive'
import type { Output } from './output'
import { type Ask, printCliError } from './prompts'
import { renderEarthResults, renderStardateResults } from './render'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
/** Any StardateError reaching the process boundary */
export const EXIT_STARDATE_ERROR = 2

export type PromptSession = {
  ask: Ask
  close(): void
}

export type RunDeps = {
  out: Output
  env: Record<string, string | undefined>
  isTTY: boolean
  openPrompt: () => PromptSession
}

type GlobalOptions = {
  fromEarth?: string
  fromSd?: string
  mode?: string
  color: boolean
}

type ModeOptions = { mode?: string }

type Runtime = {
  config: CliConfig
  palette: Palette
  out: Output
}

function resolveMode(raw: string | undefined, config: CliConfig): LeapMode {
  return raw === undefined ? config.defaultMode : normalizeMode(raw)
}

function printLines(out: Output, lines: string[]): void {
  for (const line of lines) out.log(line)
}

function earthCommand(rt: Runtime, dateText: string, mode: LeapMode): void {
  const { year, month, day } = parseEarthDate(dateText, isLeapYear)
  const date = makeCalendarDate(year, month, day)
  const rows = convertEarthDate(date, mode)
  printLines(rt.out, renderEarthResults(date, rows, rt.config.resultWidth, rt.palette))
}

function stardateCommand(rt: Runtime, stardate: string, mode: LeapMode): void {
  const rows = convertStardate(stardate, mode)
  printLines(rt.out, renderStardateResults(stardate.trim(), rows, rt.config.resultWidth, rt.palette))
}

function errorsCommand(rt: Runtime, code: string | undefined, dev: boolean): number {
  if (code === undefined) {
    for (const info of listErrorCodesOrdered()) {
      rt.out.log(formatErrorForHelp(info.code, dev))
      rt.out.log('')
    }
    return EXIT_OK
  }

  const key = code.trim().toUpperCase()
  if (!isErrorCode(key)) {
    rt.out.error(formatErrorForHelp(key, dev))
    return EXIT_FAILURE
  }
  rt.out.log(formatErrorForHelp(key, dev))
  return EXIT_OK
}

export function buildProgram(deps: RunDeps, setExitCode: (code: number) => void): Command {
  const { out } = deps

  // Config is read lazily so that a bad KELVIN_STARDATE_MODE surfaces as a coded error
  const runtime = (color: boolean): Runtime => {
    const config = loadConfig(deps.env, deps.isTTY)
    return { config, palette: createPalette(color && config.color), out }
  }

  const program = new Command()
  program
    .name('kelvin-stardate')
    .description('Kelvin timeline stardate converter (flags, subcommands or interactive menu).')
    .version('1.0.0')
    .option('--from-earth <date>', 'convert an Earth date YYYY-MM-DD to a stardate')
    .option('--from-sd <stardate>', 'convert a stardate to an Earth date')
    .option('-m, --mode <mode>', 'no_leap, gregorian, astronomical or all')
    .option('--no-color', 'disable ANSI colors')
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (s) => out.log(s.trimEnd()),
      writeErr: (s) => out.error(s.trimEnd()),
    })
    .action(async () => {
      const opts = program.opts<GlobalOptions>()
      const rt = runtime(opts.color)
      const mode = resolveMode(opts.mode, rt.config)

      if (opts.fromEarth !== undefined) return earthCommand(rt, opts.fromEarth, mode)
      if (opts.fromSd !== undefined) return stardateCommand(rt, opts.fromSd, mode)

      const session = deps.openPrompt()
      try {
        await runInteractive(
          {
            ask: session.ask,
            out,
            palette: rt.palette,
            help: () => helpLoop(session.ask, out, rt.palette),
          },
          { defaultMode: mode, resultWidth: rt.config.resultWidth }
        )
      } finally {
        session.close()
      }
    })

  program
    .command('earth-to')
    .description('Convert an Earth date to a stardate.')
    .argument('<year>', 'year, e.g. 2258')
    .argument('<month>', 'month number (1-12) or name/abbreviation')
    .argument('<day>', 'day of the month (1-31)')
    .option('-m, --mode <mode>', 'no_leap, gregorian, astronomical or all')
    .action((year: string, month: string, day: string, opts: ModeOptions) => {
      const rt = runtime(program.opts<GlobalOptions>().color)
      earthCommand(rt, `${year}-${month}-${day}`, resolveMode(opts.mode, rt.config))
    })

  program
    .command('sd-to')
    .description('Convert a stardate to an Earth date.')
    .argument('<stardate>', 'e.g. 2258.42 or 2258.11499')
    .option('-m, --mode <mode>', 'no_leap, gregorian, astronomical or all')
    .action((stardate: string, opts: ModeOptions) => {
      const rt = runtime(program.opts<GlobalOptions>().color)
      stardateCommand(rt, stardate, resolveMode(opts.mode, rt.config))
    })

  program
    .command('errors')
    .description('Describe the error codes.')
    .argument('[code]', 'a single code, e.g. LEAP_DAY')
    .option('--dev', 'include developer notes')
    .action((code: string | undefined, opts: { dev?: boolean }) => {
      setExitCode(errorsCommand(runtime(false), code, opts.dev === true))
    })

  return program
}

/** Parses `argv` (without node and script), runs, and returns the exit code */
export async function run(argv: string[], deps: RunDeps): Promise<number> {
  let exitCode = EXIT_OK
  const program = buildProgram(deps, (code) => {
    exitCode = code
  })

  try {
    await program.parseAsync(argv, { from: 'user' })
    return exitCode
  } catch (err) {
    if (err instanceof StardateError) {
      printCliError({ out: deps.out, palette: createPalette(false) }, err)
      return EXIT_STARDATE_ERROR
    }
    if (err instanceof CommanderError) return err.exitCode
    throw err
  }
}
