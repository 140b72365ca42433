/**
 * Time & Date Utilities
 *
 * Pure functions for calendar-date construction, parsing, formatting and
 * ordinal arithmetic. Uses Julian Day Number for all date arithmetic to avoid
 * month-length edge cases. Zero external dependencies.
 */

import { type Result, Ok, Err } from './result'
import { InvalidDateError, StardateErrorCode } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol

/** ISO 8601 date string: YYYY-MM-DD, year 0001-9999 */
export type LocalDate = string & { readonly [__localDate]: true }

export const MIN_YEAR = 1
export const MAX_YEAR = 9999

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS: readonly number[] = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1] ?? 0
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Build a calendar date, rejecting anything the Gregorian calendar does not
 * have. Feb 29 of a common year is LEAP_DAY; April 31 and the like are
 * INVALID_DATE.
 */
export function makeCalendarDate(year: number, month: number, day: number): LocalDate {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new InvalidDateError(
      `Year '${year}' out of range 1-9999.`,
      StardateErrorCode.YEAR_OUT_OF_RANGE
    )
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new InvalidDateError(`Invalid month '${month}'.`, StardateErrorCode.INVALID_MONTH)
  }
  if (month === 2 && day === 29 && !isLeapYear(year)) {
    throw new InvalidDateError(`${year} is not a leap year.`, StardateErrorCode.LEAP_DAY)
  }
  if (!Number.isInteger(day) || day < 1 || day > daysInMonth(year, month)) {
    throw new InvalidDateError(`Invalid date ${year}-${month}-${day}.`)
  }
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, InvalidDateError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new InvalidDateError(`Invalid date format: '${str}'`))

  const [, y = '', m = '', d = ''] = match
  try {
    return Ok(makeCalendarDate(parseInt(y, 10), parseInt(m, 10), parseInt(d, 10)))
  } catch (err) {
    if (err instanceof InvalidDateError) return Err(err)
    throw err
  }
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

// ============================================================================
// Ordinal Arithmetic (via JDN)
// ============================================================================

/** 1-based position of `date` within its year (Jan 1 = 1) */
export function dayOfYear(date: LocalDate): number {
  const year = yearOf(date)
  return dateToJDN(year, monthOf(date), dayOf(date)) - dateToJDN(year, 1, 1) + 1
}

/**
 * The `ordinal`-th day of `year`. Callers check the ordinal against
 * daysInYear first; an out-of-range ordinal is rejected here as well.
 */
export function dateFromOrdinal(year: number, ordinal: number): LocalDate {
  if (!Number.isInteger(ordinal) || ordinal < 1 || ordinal > daysInYear(year)) {
    throw new InvalidDateError(`Day ${ordinal} does not exist in year ${year}.`)
  }
  const { month, day } = jdnToDate(dateToJDN(year, 1, 1) + ordinal - 1)
  return makeCalendarDate(year, month, day)
}

// ============================================================================
// Formatting
// ============================================================================

const MONTH_NAMES: readonly string[] = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

/** US-style long form: "February 11, 2258" */
export function formatLongDate(date: LocalDate): string {
  const name = MONTH_NAMES[monthOf(date) - 1] ?? ''
  return `${name} ${pad2(dayOf(date))}, ${pad4(yearOf(date))}`
}

// ============================================================================
// Comparison
// ============================================================================

export function dateAfter(a: LocalDate, b: LocalDate): boolean {
  return a > b
}
