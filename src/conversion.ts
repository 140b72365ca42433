/**
 * Conversion Core
 *
 * Four one-shot pure transforms between calendar dates and stardates:
 *
 * - no_leap: every year has ordinals 1..365; Feb 29 shares ordinal 59 with
 *   Feb 28 and later days keep their common-year numbers.
 * - gregorian: the true calendar ordinal, 1..365 or 1..366.
 * - astronomical: year + ordinal / 365.2425, rounded to 5 decimals.
 */

import { ConversionError, StardateErrorCode } from './errors'
import { KelvinStardate } from './stardate'
import type { KelvinMode, LeapMode } from './domain-types'
import {
  type LocalDate,
  MAX_YEAR,
  MIN_YEAR,
  dateAfter,
  dateFromOrdinal,
  dayOfYear,
  daysInYear,
  isLeapYear,
  makeCalendarDate,
  yearOf,
} from './time-date'

export const MEAN_YEAR_DAYS = 365.2425
export const NO_LEAP_YEAR_DAYS = 365

/** Last ordinal that no_leap and gregorian agree on in a leap year (Feb 28) */
const LEAP_BOUNDARY = 59

const ASTRONOMICAL_PRECISION = 5

// ============================================================================
// Helpers
// ============================================================================

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  return Math.round(value * factor) / factor
}

function requireSupportedYear(year: number): void {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new ConversionError(
      StardateErrorCode.YEAR_OUT_OF_RANGE,
      `Stardate year '${year}' out of range 1-9999.`
    )
  }
}

function modeMismatch(mode: Exclude<LeapMode, KelvinMode>): ConversionError {
  const detail =
    mode === 'astronomical'
      ? 'astronomical mode takes a fractional stardate number'
      : "'all' is not a single conversion"
  return new ConversionError(
    StardateErrorCode.MODE_MISMATCH,
    `Kelvin conversion requires no_leap or gregorian mode (${detail}).`
  )
}

// ============================================================================
// Earth -> Stardate
// ============================================================================

export function earthToStardate(date: LocalDate, mode: LeapMode = 'no_leap'): KelvinStardate {
  const year = yearOf(date)
  const ordinal = dayOfYear(date)

  switch (mode) {
    case 'gregorian':
      return new KelvinStardate(year, ordinal)
    case 'no_leap': {
      const afterFeb28 = dateAfter(date, makeCalendarDate(year, 2, 28))
      return new KelvinStardate(year, isLeapYear(year) && afterFeb28 ? ordinal - 1 : ordinal)
    }
    case 'astronomical':
    case 'all':
      throw modeMismatch(mode)
  }
}

export function earthToStardateAstronomical(date: LocalDate): number {
  return roundTo(yearOf(date) + dayOfYear(date) / MEAN_YEAR_DAYS, ASTRONOMICAL_PRECISION)
}

// ============================================================================
// Stardate -> Earth
// ============================================================================

function gregorianOrdinal(year: number, ordinalDay: number): number {
  const yearLength = daysInYear(year)
  if (ordinalDay < 1 || ordinalDay > yearLength) {
    throw new ConversionError(
      StardateErrorCode.ORDINAL_OUT_OF_RANGE,
      `Ordinal ${ordinalDay} out of range 1-${yearLength} for gregorian year ${year}.`
    )
  }
  return ordinalDay
}

/** Undo the leap-day compression: no_leap ordinals past Feb 28 sit one day later */
function noLeapOrdinal(year: number, ordinalDay: number): number {
  if (ordinalDay < 1 || ordinalDay > NO_LEAP_YEAR_DAYS) {
    throw new ConversionError(
      StardateErrorCode.ORDINAL_OUT_OF_RANGE,
      `Ordinal ${ordinalDay} out of range 1-${NO_LEAP_YEAR_DAYS} in no_leap mode.`
    )
  }
  const realOrdinal = isLeapYear(year) && ordinalDay > LEAP_BOUNDARY ? ordinalDay + 1 : ordinalDay
  if (realOrdinal > daysInYear(year)) {
    throw new ConversionError(
      StardateErrorCode.ORDINAL_OUT_OF_RANGE,
      `Real ordinal ${realOrdinal} exceeds the length of year ${year}.`
    )
  }
  return realOrdinal
}

export function stardateToEarth(
  stardate: KelvinStardate | string,
  mode: LeapMode = 'no_leap'
): LocalDate {
  if (mode === 'astronomical' || mode === 'all') throw modeMismatch(mode)

  const { year, ordinalDay } =
    typeof stardate === 'string' ? KelvinStardate.parse(stardate) : stardate
  requireSupportedYear(year)

  const realOrdinal =
    mode === 'gregorian' ? gregorianOrdinal(year, ordinalDay) : noLeapOrdinal(year, ordinalDay)
  return dateFromOrdinal(year, realOrdinal)
}

/**
 * Fractional stardate back to a calendar date. The ordinal is clamped to at
 * least 1; an ordinal past the end of the year is rejected rather than
 * rolled into the next year.
 */
export function stardateToEarthAstronomical(value: number): LocalDate {
  if (!Number.isFinite(value)) {
    throw new ConversionError(
      StardateErrorCode.MODE_MISMATCH,
      `Astronomical stardate must be a finite number, got '${value}'.`
    )
  }

  const year = Math.floor(value)
  requireSupportedYear(year)

  const fraction = value - year
  const ordinal = Math.max(1, Math.round(fraction * MEAN_YEAR_DAYS))
  const yearLength = daysInYear(year)
  if (ordinal > yearLength) {
    throw new ConversionError(
      StardateErrorCode.ORDINAL_OUT_OF_RANGE,
      `Fraction ${fraction.toFixed(ASTRONOMICAL_PRECISION)} maps to day ${ordinal}, past the end of year ${year}.`
    )
  }

  return dateFromOrdinal(year, ordinal)
}
