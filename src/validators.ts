/**
 * Input Validators
 *
 * Pure string-to-value parsers and checkers that gate input into the
 * conversion core. Each either returns a typed value or throws a
 * ValidationError carrying a registry code; nothing here prints or prompts.
 */

import { StardateErrorCode, ValidationError } from './errors'
import type { EarthDateParts, StardateKind } from './domain-types'
import { MAX_YEAR, MIN_YEAR } from './time-date'

// ============================================================================
// Month Names
// ============================================================================

export const MONTH_LOOKUP: Readonly<Record<string, number>> = Object.freeze({
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
})

const DIGITS = /^\d+$/

const MAX_FRACTION_DIGITS = 8
const KELVIN_ORDINAL_DIGITS = 3
const MAX_KELVIN_ORDINAL = 366

// ============================================================================
// Guards
// ============================================================================

/** Trimmed input, or EMPTY_INPUT for a missing or blank value */
export function requireInput(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    throw new ValidationError(StardateErrorCode.EMPTY_INPUT, 'Empty input.')
  }
  const s = value.trim()
  if (s === '') {
    throw new ValidationError(StardateErrorCode.EMPTY_INPUT, 'Input cannot be empty.')
  }
  return s
}

function inYearRange(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR
}

// ============================================================================
// Earth Date Fields
// ============================================================================

export function parseYear(value: string): number {
  const raw = requireInput(value)

  if (raw.includes('.')) {
    throw new ValidationError(
      StardateErrorCode.INVALID_YEAR,
      `Invalid year '${value}' (must be an integer).`
    )
  }
  if (!DIGITS.test(raw)) {
    throw new ValidationError(StardateErrorCode.INVALID_YEAR, `Invalid year '${value}' (numeric only).`)
  }

  const year = parseInt(raw, 10)
  if (!inYearRange(year)) {
    throw new ValidationError(StardateErrorCode.YEAR_OUT_OF_RANGE, `Year '${year}' out of range 1-9999.`)
  }
  return year
}

/** parseYear, plus exactly four characters */
export function parseYearYYYY(value: string): number {
  const raw = requireInput(value)
  if (!raw.includes('.') && DIGITS.test(raw) && raw.length !== 4) {
    throw new ValidationError(
      StardateErrorCode.INVALID_YEAR,
      `Invalid year '${value}' (expected 4 digits, YYYY).`
    )
  }
  return parseYear(raw)
}

export function parseMonth(value: string): number {
  const raw = requireInput(value).toLowerCase()

  const named = MONTH_LOOKUP[raw]
  if (named !== undefined) return named

  if (DIGITS.test(raw)) {
    const month = parseInt(raw, 10)
    if (month >= 1 && month <= 12) return month
    throw new ValidationError(StardateErrorCode.INVALID_MONTH, `Invalid numeric month '${raw}'.`)
  }

  throw new ValidationError(StardateErrorCode.INVALID_MONTH, `Unrecognized month '${value}'.`)
}

/** 1-31 only; month lengths are the calendar constructor's job */
export function parseDay(value: string): number {
  const raw = requireInput(value)

  if (!DIGITS.test(raw)) {
    throw new ValidationError(StardateErrorCode.INVALID_DAY, `Invalid day '${value}'.`)
  }

  const day = parseInt(raw, 10)
  if (day < 1 || day > 31) {
    throw new ValidationError(StardateErrorCode.INVALID_DAY, `Day '${day}' out of range 1-31.`)
  }
  return day
}

/**
 * Parse `YYYY-MM-DD` or `YYYY-mon-DD`. When `leapCheck` is given, Feb 29 of a
 * year it rejects fails with LEAP_DAY.
 */
export function parseEarthDate(
  value: string,
  leapCheck?: (year: number) => boolean
): EarthDateParts {
  const raw = requireInput(value)

  const parts = raw.split('-')
  if (parts.length !== 3) {
    throw new ValidationError(
      StardateErrorCode.EARTH_DATE_FORMAT,
      `Invalid date '${value}'. Expected YYYY-MM-DD.`
    )
  }

  const [yearRaw = '', monthRaw = '', dayRaw = ''] = parts
  const year = parseYear(yearRaw)
  const month = parseMonth(monthRaw)
  const day = parseDay(dayRaw)

  if (leapCheck && month === 2 && day === 29 && !leapCheck(year)) {
    throw new ValidationError(StardateErrorCode.LEAP_DAY, `${year} is not a leap year.`)
  }

  return { year, month, day }
}

// ============================================================================
// Stardate Strings
// ============================================================================

/**
 * Check the generic stardate shape: one decimal point, a 4-digit year in
 * 0001-9999 and at most 8 fractional digits. Returns the trimmed input.
 */
export function validateStardateString(value: string): string {
  const s = requireInput(value)

  if (s.includes('-')) {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      "Stardate must not contain '-' (Earth date detected)."
    )
  }
  if (!s.includes('.')) {
    throw new ValidationError(
      StardateErrorCode.STARDATE_FORMAT,
      'Stardate must contain a decimal (e.g., 2258.042).'
    )
  }

  const parts = s.split('.')
  if (parts.length !== 2) {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      'Stardate must contain exactly one decimal point.'
    )
  }

  const [left = '', right = ''] = parts
  if (left === '' || right === '') {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      'Stardate must have digits on both sides of the decimal.'
    )
  }
  if (!DIGITS.test(left) || !DIGITS.test(right)) {
    throw new ValidationError(StardateErrorCode.INVALID_STARDATE, `Invalid stardate '${value}' (numeric only).`)
  }
  if (left.length !== 4) {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      `Invalid stardate '${value}' (year must be 4 digits, e.g., 2258.042).`
    )
  }
  if (!inYearRange(parseInt(left, 10))) {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      `Invalid stardate '${value}' (year out of range 0001-9999).`
    )
  }
  if (right.length > MAX_FRACTION_DIGITS) {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      `Invalid stardate '${value}' (fractional part too long).`
    )
  }

  return s
}

/** validateStardateString, plus a 3-digit ordinal in 001-366 */
export function validateKelvinStardateString(value: string): string {
  const s = validateStardateString(value)
  const right = s.slice(s.indexOf('.') + 1)

  if (right.length !== KELVIN_ORDINAL_DIGITS) {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      `Invalid Kelvin stardate '${value}' (expected 3-digit ordinal, e.g., 2258.042).`
    )
  }

  const ordinal = parseInt(right, 10)
  if (ordinal < 1 || ordinal > MAX_KELVIN_ORDINAL) {
    throw new ValidationError(
      StardateErrorCode.INVALID_STARDATE,
      `Invalid Kelvin stardate '${value}' (ordinal day must be 001-366).`
    )
  }

  return s
}

// ============================================================================
// Format Detection
// ============================================================================

/** Four or more fractional digits read as astronomical; anything else as Kelvin */
export function detectStardateType(value: string): StardateKind {
  const s = value.trim()
  const dot = s.indexOf('.')
  if (dot === -1) return 'kelvin'

  const fraction = s.slice(dot + 1)
  if (!DIGITS.test(fraction)) return 'kelvin'

  return fraction.length >= 4 ? 'astronomical' : 'kelvin'
}
