/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Leap-year rule, calendar construction, ordinal arithmetic and formatting.
 * Pure functions with no external dependencies.
 */

import { describe, it, expect } from 'vitest'
import {
  isLeapYear,
  daysInMonth,
  daysInYear,
  makeCalendarDate,
  parseDate,
  yearOf,
  monthOf,
  dayOf,
  dayOfYear,
  dateFromOrdinal,
  formatLongDate,
  dateAfter,
  type LocalDate,
} from '../src/time-date'
import { InvalidDateError } from '../src/errors'

function date(s: string): LocalDate {
  const r = parseDate(s)
  if (!r.ok) throw new Error(`Invalid test date: ${s}`)
  return r.value
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof InvalidDateError) return err.code
    throw err
  }
  return undefined
}

// ============================================================================
// 1. LEAP YEARS
// ============================================================================

describe('Leap Years', () => {
  it('divisible by 4 is leap', () => {
    expect(isLeapYear(2020)).toBe(true)
    expect(isLeapYear(2260)).toBe(true)
  })

  it('not divisible by 4 is common', () => {
    expect(isLeapYear(2019)).toBe(false)
    expect(isLeapYear(2258)).toBe(false)
  })

  it('century is common unless divisible by 400', () => {
    expect(isLeapYear(2100)).toBe(false)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
    expect(isLeapYear(2400)).toBe(true)
  })

  it('daysInYear follows the rule', () => {
    expect(daysInYear(2260)).toBe(366)
    expect(daysInYear(2259)).toBe(365)
    expect(daysInYear(2300)).toBe(365)
  })

  it('daysInMonth handles February', () => {
    expect(daysInMonth(2023, 2)).toBe(28)
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2024, 4)).toBe(30)
    expect(daysInMonth(2024, 12)).toBe(31)
  })

  it('daysInMonth is 0 for a month that does not exist', () => {
    expect(daysInMonth(2024, 13)).toBe(0)
  })
})

// ============================================================================
// 2. CONSTRUCTION
// ============================================================================

describe('makeCalendarDate', () => {
  it('builds a padded ISO date', () => {
    expect(makeCalendarDate(2258, 2, 11)).toBe('2258-02-11')
    expect(makeCalendarDate(5, 1, 1)).toBe('0005-01-01')
    expect(makeCalendarDate(9999, 12, 31)).toBe('9999-12-31')
  })

  it('accepts Feb 29 in a leap year', () => {
    expect(makeCalendarDate(2260, 2, 29)).toBe('2260-02-29')
  })

  it('rejects Feb 29 in a common year as LEAP_DAY', () => {
    expect(codeOf(() => makeCalendarDate(2259, 2, 29))).toBe('LEAP_DAY')
    expect(codeOf(() => makeCalendarDate(2100, 2, 29))).toBe('LEAP_DAY')
  })

  it('names the year in the leap-day message', () => {
    expect(() => makeCalendarDate(2259, 2, 29)).toThrow('2259 is not a leap year.')
  })

  it('rejects Feb 30 even in a leap year as INVALID_DATE', () => {
    expect(codeOf(() => makeCalendarDate(2260, 2, 30))).toBe('INVALID_DATE')
  })

  it('rejects April 31', () => {
    expect(codeOf(() => makeCalendarDate(2258, 4, 31))).toBe('INVALID_DATE')
  })

  it('rejects day 0', () => {
    expect(codeOf(() => makeCalendarDate(2258, 4, 0))).toBe('INVALID_DATE')
  })

  it('rejects month 13', () => {
    expect(codeOf(() => makeCalendarDate(2258, 13, 1))).toBe('INVALID_MONTH')
  })

  it('rejects years outside 1-9999', () => {
    expect(codeOf(() => makeCalendarDate(0, 1, 1))).toBe('YEAR_OUT_OF_RANGE')
    expect(codeOf(() => makeCalendarDate(10000, 1, 1))).toBe('YEAR_OUT_OF_RANGE')
  })

  it('rejects non-integer components', () => {
    expect(codeOf(() => makeCalendarDate(2258.5, 1, 1))).toBe('YEAR_OUT_OF_RANGE')
    expect(codeOf(() => makeCalendarDate(2258, 1, 1.5))).toBe('INVALID_DATE')
  })
})

describe('parseDate', () => {
  it('parses a valid date', () => {
    const r = parseDate('2258-02-11')
    expect(r.ok).toBe(true)
    if (r.ok) expect(r.value).toBe('2258-02-11')
  })

  it('returns an error for the wrong separator', () => {
    expect(parseDate('2258/02/11').ok).toBe(false)
  })

  it('returns an error for an impossible date', () => {
    const r = parseDate('2258-04-31')
    expect(r.ok).toBe(false)
    if (!r.ok) expect(r.error.code).toBe('INVALID_DATE')
  })

  it('returns LEAP_DAY for Feb 29 of a common year', () => {
    const r = parseDate('2259-02-29')
    expect(r.ok).toBe(false)
    if (!r.ok) expect(r.error.code).toBe('LEAP_DAY')
  })

  it('returns an error for unpadded fields', () => {
    expect(parseDate('2258-2-11').ok).toBe(false)
  })
})

describe('Component extraction', () => {
  it('reads year, month and day', () => {
    const d = date('2263-01-02')
    expect(yearOf(d)).toBe(2263)
    expect(monthOf(d)).toBe(1)
    expect(dayOf(d)).toBe(2)
  })
})

// ============================================================================
// 3. ORDINAL ARITHMETIC
// ============================================================================

describe('dayOfYear', () => {
  it('Jan 1 is day 1', () => {
    expect(dayOfYear(date('0001-01-01'))).toBe(1)
    expect(dayOfYear(date('2258-01-01'))).toBe(1)
  })

  it('counts through February', () => {
    expect(dayOfYear(date('2258-02-11'))).toBe(42)
    expect(dayOfYear(date('2259-02-24'))).toBe(55)
  })

  it('includes Feb 29 in leap years', () => {
    expect(dayOfYear(date('2260-02-29'))).toBe(60)
    expect(dayOfYear(date('2260-03-01'))).toBe(61)
    expect(dayOfYear(date('2259-03-01'))).toBe(60)
  })

  it('Dec 31 is the last day', () => {
    expect(dayOfYear(date('2259-12-31'))).toBe(365)
    expect(dayOfYear(date('2260-12-31'))).toBe(366)
  })
})

describe('dateFromOrdinal', () => {
  it('maps ordinals back to dates', () => {
    expect(dateFromOrdinal(2258, 42)).toBe('2258-02-11')
    expect(dateFromOrdinal(2260, 60)).toBe('2260-02-29')
    expect(dateFromOrdinal(2260, 366)).toBe('2260-12-31')
    expect(dateFromOrdinal(2259, 365)).toBe('2259-12-31')
  })

  it('rejects ordinals outside the year', () => {
    expect(codeOf(() => dateFromOrdinal(2259, 366))).toBe('INVALID_DATE')
    expect(codeOf(() => dateFromOrdinal(2259, 0))).toBe('INVALID_DATE')
  })

  it('inverts dayOfYear across a whole leap year', () => {
    let previous = ''
    for (let ordinal = 1; ordinal <= 366; ordinal++) {
      const d = dateFromOrdinal(2260, ordinal)
      expect(dayOfYear(d)).toBe(ordinal)
      expect(d > previous).toBe(true)
      previous = d
    }
  })

  it('steps across month boundaries', () => {
    expect(dateFromOrdinal(2260, 59)).toBe('2260-02-28')
    expect(dateFromOrdinal(2259, 60)).toBe('2259-03-01')
    expect(dateFromOrdinal(2259, 1)).toBe('2259-01-01')
  })
})

// ============================================================================
// 4. FORMATTING & COMPARISON
// ============================================================================

describe('formatLongDate', () => {
  it('renders Month DD, YYYY', () => {
    expect(formatLongDate(date('2258-02-11'))).toBe('February 11, 2258')
    expect(formatLongDate(date('2263-01-02'))).toBe('January 02, 2263')
    expect(formatLongDate(date('0042-12-25'))).toBe('December 25, 0042')
  })
})

describe('dateAfter', () => {
  it('orders ISO dates', () => {
    expect(dateAfter(date('2260-02-29'), date('2260-02-28'))).toBe(true)
    expect(dateAfter(date('2260-02-28'), date('2260-02-28'))).toBe(false)
    expect(dateAfter(date('2259-12-31'), date('2260-01-01'))).toBe(false)
  })
})
