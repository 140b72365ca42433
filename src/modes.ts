/**
 * Mode Dispatch
 *
 * Normalizes user-facing mode aliases into the closed LeapMode variant and
 * runs a conversion in one mode, or fans out across all three for `all`.
 */

import {
  earthToStardate,
  earthToStardateAstronomical,
  stardateToEarth,
  stardateToEarthAstronomical,
} from './conversion'
import { StardateError, UnknownModeError } from './errors'
import { Err, Ok, type Result } from './result'
import { CONCRETE_MODES, type ConcreteMode, type LeapMode } from './domain-types'
import type { LocalDate } from './time-date'
import { detectStardateType, validateStardateString } from './validators'

// ============================================================================
// Alias Normalization
// ============================================================================

const MODE_ALIASES: ReadonlyMap<string, LeapMode> = new Map<string, LeapMode>([
  ['1', 'no_leap'], ['no_leap', 'no_leap'], ['noleap', 'no_leap'], ['nl', 'no_leap'],
  ['canon', 'no_leap'], ['ordinal', 'no_leap'],
  ['2', 'gregorian'], ['gregorian', 'gregorian'], ['greg', 'gregorian'], ['gr', 'gregorian'],
  ['3', 'astronomical'], ['astronomical', 'astronomical'], ['astro', 'astronomical'],
  ['astr', 'astronomical'],
  ['4', 'all'], ['all', 'all'], ['a', 'all'],
])

export function normalizeMode(value: string): LeapMode {
  const key = value.trim().toLowerCase()
  const mode = MODE_ALIASES.get(key)
  if (!mode) throw new UnknownModeError(`Unknown mode '${key}'.`)
  return mode
}

// ============================================================================
// Conversion Rows
// ============================================================================

/** One mode's answer; in a fan-out a failing mode does not hide the others */
export type ConversionRow<T> = {
  mode: ConcreteMode
  result: Result<T, StardateError>
}

function capture<T>(mode: ConcreteMode, run: () => T): ConversionRow<T> {
  try {
    return { mode, result: Ok(run()) }
  } catch (err) {
    if (err instanceof StardateError) return { mode, result: Err(err) }
    throw err
  }
}

function earthInMode(date: LocalDate, mode: ConcreteMode): string {
  switch (mode) {
    case 'no_leap':
    case 'gregorian':
      return earthToStardate(date, mode).format()
    case 'astronomical':
      return String(earthToStardateAstronomical(date))
  }
}

function stardateInMode(stardate: string, mode: ConcreteMode): LocalDate {
  switch (mode) {
    case 'no_leap':
    case 'gregorian':
      return stardateToEarth(stardate, mode)
    case 'astronomical':
      return stardateToEarthAstronomical(Number(stardate))
  }
}

/**
 * Earth date to stardate text. A single mode throws on failure; `all`
 * returns one row per concrete mode.
 */
export function convertEarthDate(date: LocalDate, mode: LeapMode): ConversionRow<string>[] {
  if (mode === 'all') return CONCRETE_MODES.map((m) => capture(m, () => earthInMode(date, m)))
  return [{ mode, result: Ok(earthInMode(date, mode)) }]
}

/** The concrete mode a single-mode stardate conversion actually runs in */
export function resolveStardateMode(stardate: string, mode: ConcreteMode): ConcreteMode {
  if (mode === 'astronomical' || detectStardateType(stardate) === 'astronomical') {
    return 'astronomical'
  }
  return mode
}

/**
 * Stardate text to Earth date. The input must pass validateStardateString.
 * A Kelvin mode is overridden by astronomical when the fraction has four or
 * more digits.
 */
export function convertStardate(stardate: string, mode: LeapMode): ConversionRow<LocalDate>[] {
  const s = validateStardateString(stardate)
  if (mode === 'all') return CONCRETE_MODES.map((m) => capture(m, () => stardateInMode(s, m)))

  const resolved = resolveStardateMode(s, mode)
  return [{ mode: resolved, result: Ok(stardateInMode(s, resolved)) }]
}
