/**
 * Kelvin Stardate Value
 *
 * An immutable (year, ordinal day) pair with the on-screen formatting used by
 * the films: 2258.42, 2263.02, 2259.142. Range checks live with the
 * validators and the conversion core, not here.
 */

import { FormatError } from './errors'

/** Two digits below 100, three at or above: 4 -> "04", 142 -> "142" */
export function formatOrdinal(ordinalDay: number): string {
  if (ordinalDay < 100) return String(ordinalDay).padStart(2, '0')
  return String(ordinalDay).padStart(3, '0')
}

export class KelvinStardate {
  readonly year: number
  readonly ordinalDay: number

  constructor(year: number, ordinalDay: number) {
    this.year = year
    this.ordinalDay = ordinalDay
    Object.freeze(this)
  }

  /**
   * Parse `YEAR.ORDINAL`. The ordinal accepts any number of digits, so
   * "2258.4", "2258.04" and "2258.004" are the same stardate.
   */
  static parse(input: string): KelvinStardate {
    const s = input.trim()
    const dot = s.indexOf('.')
    if (dot === -1) {
      throw new FormatError(`Kelvin stardate must contain a decimal point: '${input}'`)
    }

    const yearPart = s.slice(0, dot)
    const ordinalPart = s.slice(dot + 1)

    if (!/^[+-]?\d+$/.test(yearPart)) {
      throw new FormatError(`Year part must be an integer: '${yearPart}'`)
    }
    if (!/^\d+$/.test(ordinalPart)) {
      throw new FormatError(`Ordinal part must be numeric: '${ordinalPart}'`)
    }

    return new KelvinStardate(parseInt(yearPart, 10), parseInt(ordinalPart, 10))
  }

  format(): string {
    return `${this.year}.${formatOrdinal(this.ordinalDay)}`
  }

  toString(): string {
    return this.format()
  }

  equals(other: KelvinStardate): boolean {
    return this.year === other.year && this.ordinalDay === other.ordinalDay
  }
}
