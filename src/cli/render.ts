/**
 * Result tables. Pure: each function returns the lines to print.
 */

import type { ConcreteMode } from '../domain-types'
import type { ConversionRow } from '../modes'
import { formatLongDate, type LocalDate } from '../time-date'
import type { ColorName, Palette } from './colors'

const MODE_LABELS: Readonly<Record<ConcreteMode, string>> = {
  no_leap: 'Kelvin (no_leap)',
  gregorian: 'Kelvin (gregorian)',
  astronomical: 'Astronomical',
}

const SINGLE_LABEL_WIDTH = 13
const ALL_LABEL_WIDTH = 20

export function center(text: string, width: number): string {
  if (text.length >= width) return text
  const left = Math.floor((width - text.length) / 2)
  return ' '.repeat(left) + text + ' '.repeat(width - text.length - left)
}

/** "2258-02-11  (February 11, 2258)" */
export function describeDate(date: LocalDate): string {
  return `${date}  (${formatLongDate(date)})`
}

function frame(
  title: string,
  color: ColorName,
  body: string[],
  width: number,
  palette: Palette
): string[] {
  const border = '='.repeat(width)
  return [
    '',
    ` ${border}`,
    ` ${palette.paint(color, center(title, width))}`,
    ` ${border}`,
    ...body,
    ` ${border}`,
    '',
  ]
}

function singleLine(label: string, value: string): string {
  return `   ${label.padEnd(SINGLE_LABEL_WIDTH)}:  ${value}`
}

function fanOutLine(palette: Palette, mode: ConcreteMode, value: string): string {
  return `   ${palette.paint(mode, MODE_LABELS[mode].padEnd(ALL_LABEL_WIDTH))}:  ${value}`
}

function errorLine(palette: Palette, mode: ConcreteMode): string {
  return `   ${palette.paint('error', `${MODE_LABELS[mode]}: ERROR`)}`
}

export function renderEarthResults(
  date: LocalDate,
  rows: ConversionRow<string>[],
  width: number,
  palette: Palette
): string[] {
  const [first] = rows
  if (rows.length === 1 && first && first.result.ok) {
    return frame(`RESULT (${first.mode.toUpperCase()})`, first.mode, [
      singleLine('Earth date', describeDate(date)),
      singleLine('Stardate', first.result.value),
    ], width, palette)
  }

  const body = [
    `   ${palette.paint('label', 'Earth date'.padEnd(ALL_LABEL_WIDTH))}:  ${describeDate(date)}`,
    '',
    ...rows.map((row) =>
      row.result.ok ? fanOutLine(palette, row.mode, row.result.value) : errorLine(palette, row.mode)
    ),
  ]
  return frame('RESULTS (ALL MODES)', 'all', body, width, palette)
}

export function renderStardateResults(
  stardate: string,
  rows: ConversionRow<LocalDate>[],
  width: number,
  palette: Palette
): string[] {
  const [first] = rows
  if (rows.length === 1 && first && first.result.ok) {
    return frame(`RESULT (${first.mode.toUpperCase()})`, first.mode, [
      singleLine('Stardate', stardate),
      singleLine('Earth date', describeDate(first.result.value)),
    ], width, palette)
  }

  const body = [
    `   ${palette.paint('label', 'Stardate'.padEnd(ALL_LABEL_WIDTH))}:  ${stardate}`,
    '',
    ...rows.map((row) =>
      row.result.ok
        ? fanOutLine(palette, row.mode, describeDate(row.result.value))
        : errorLine(palette, row.mode)
    ),
  ]
  return frame('RESULTS (ALL MODES)', 'all', body, width, palette)
}
