/**
 * Help screens for the interactive converter and the `errors` subcommand.
 */

import { StardateErrorCode, ValidationError, formatErrorForHelp, listErrorCodesOrdered } from '../errors'
import type { Palette } from './colors'
import type { Output } from './output'
import { type Ask, type HelpExit, isQuitWord, printCliError } from './prompts'

type Section = {
  key: string
  title: string
  render: (palette: Palette, devMode: boolean) => string[]
}

function sectionTitle(palette: Palette, title: string): string[] {
  return ['', palette.paint('info', `== ${title} ==`), '']
}

function overview(): string[] {
  return [
    'Converts between Earth dates and the Kelvin timeline stardates, where a',
    'stardate is the year plus a decimal giving the day of that year.',
    '',
    '  2258.42  is the 42nd day of 2258 (February 11).',
    '  2263.02  is January 2, 2263.',
    '',
    'Earth dates are written YYYY-MM-DD and also shown as "Month DD, YYYY".',
    '',
    'When converting FROM a stardate, short fractions (2258.42) are read as',
    'Kelvin day numbers and fractions of four or more digits (2258.11499) as',
    'astronomical values.',
  ]
}

function modes(palette: Palette): string[] {
  return [
    `${palette.paint('no_leap', 'no_leap')}  (aliases: noleap, nl, canon, ordinal, 1)`,
    '  Every year has days 1..365. February 29 shares day 59 with February 28,',
    '  so later dates keep the same number as in a common year.',
    '',
    `${palette.paint('gregorian', 'gregorian')}  (aliases: greg, gr, 2)`,
    '  The real calendar day of the year, 1..365 or 1..366 in leap years.',
    '',
    `${palette.paint('astronomical', 'astronomical')}  (aliases: astro, astr, 3)`,
    '  year + day / 365.2425, rounded to five decimals.',
    '',
    `${palette.paint('all', 'all')}  (aliases: a, 4)`,
    '  Shows the result of all three modes side by side.',
  ]
}

function formats(): string[] {
  return [
    'Earth dates:',
    '  2258-02-11, 2258-feb-11, 2258-February-11',
    '  Month names and abbreviations are case-insensitive (jan, sept, december).',
    '',
    'Stardates:',
    '  Kelvin (interactive):  YYYY.DDD with a 3-digit day, e.g. 2258.042',
    '  Kelvin (flags):        2258.42 and 2258.042 are both accepted',
    '  Astronomical:          up to 8 fractional digits, e.g. 2258.11499',
  ]
}

function errorCodes(palette: Palette, devMode: boolean): string[] {
  return [
    'Errors are reported as:  Error [CODE]: message',
    '',
    ...listErrorCodesOrdered().flatMap((info) => [
      palette.paint('label', formatErrorForHelp(info.code, devMode)),
      '',
    ]),
  ]
}

function usage(palette: Palette): string[] {
  return [
    palette.paint('success', 'Interactive'),
    '  kelvin-stardate',
    '  At any prompt: h or help opens this menu, q or quit exits.',
    '',
    palette.paint('success', 'Flags'),
    '  kelvin-stardate --from-earth 2258-02-11 --mode all',
    '  kelvin-stardate --from-sd 2258.42 --mode gregorian',
    '',
    palette.paint('success', 'Subcommands'),
    '  kelvin-stardate earth-to 2258 feb 11 --mode no_leap',
    '  kelvin-stardate sd-to 2258.11499 --mode astronomical',
    '  kelvin-stardate errors [CODE] [--dev]',
  ]
}

export const HELP_SECTIONS: readonly Section[] = [
  { key: '1', title: 'Overview', render: () => overview() },
  { key: '2', title: 'Conversion Modes', render: (p) => modes(p) },
  { key: '3', title: 'Input Formats', render: () => formats() },
  { key: '4', title: 'Error Codes', render: (p, dev) => errorCodes(p, dev) },
  { key: '5', title: 'Usage', render: (p) => usage(p) },
]

export function renderHelpSection(key: string, palette: Palette, devMode = false): string[] | undefined {
  const section = HELP_SECTIONS.find((s) => s.key === key)
  if (!section) return undefined
  return [...sectionTitle(palette, section.title), ...section.render(palette, devMode)]
}

export function renderHelpMenu(palette: Palette): string[] {
  return [
    ...sectionTitle(palette, 'Help'),
    ...HELP_SECTIONS.map((s) => `   ${s.key}) ${s.title}`),
    '   b) Back (or press Enter)',
    '   q) Quit',
  ]
}

/** Numbered help menu; returns when the user goes back or quits */
export async function helpLoop(ask: Ask, out: Output, palette: Palette): Promise<HelpExit> {
  for (;;) {
    for (const line of renderHelpMenu(palette)) out.log(line)

    const raw = await ask(' Help topic: ')
    const choice = raw.trim().toLowerCase()
    if (isQuitWord(choice)) return 'quit'
    if (choice === '' || choice === 'b' || choice === 'back') return 'back'

    const lines = renderHelpSection(choice, palette)
    if (!lines) {
      printCliError({ out, palette }, new ValidationError(
        StardateErrorCode.INVALID_MENU_CHOICE,
        `Invalid selection '${raw.trim()}'. Choose 1-${HELP_SECTIONS.length}, b or q.`
      ))
      continue
    }
    for (const line of lines) out.log(line)
  }
}
