/**
 * Consolidated error system for kelvin-stardate.
 *
 * All error classes extend StardateError, which carries a typed error code.
 * The registry below holds the human-facing text for every code; only the
 * code itself is a stable contract.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const StardateErrorCode = {
  // Input guards
  EMPTY_INPUT: 'EMPTY_INPUT',

  // Earth date fields
  INVALID_MONTH: 'INVALID_MONTH',
  INVALID_DATE: 'INVALID_DATE',
  LEAP_DAY: 'LEAP_DAY',

  // Stardate strings
  STARDATE_FORMAT: 'STARDATE_FORMAT',

  // Mode dispatch
  UNKNOWN_MODE: 'UNKNOWN_MODE',

  // Years
  INVALID_YEAR: 'INVALID_YEAR',
  YEAR_OUT_OF_RANGE: 'YEAR_OUT_OF_RANGE',

  // Interactive prompts
  INVALID_MENU_CHOICE: 'INVALID_MENU_CHOICE',
  INVALID_YES_NO: 'INVALID_YES_NO',

  INVALID_STARDATE: 'INVALID_STARDATE',
  EARTH_DATE_FORMAT: 'EARTH_DATE_FORMAT',
  INVALID_DAY: 'INVALID_DAY',

  // Conversion core
  ORDINAL_OUT_OF_RANGE: 'ORDINAL_OUT_OF_RANGE',
  MODE_MISMATCH: 'MODE_MISMATCH',
} as const

export type StardateErrorCode = (typeof StardateErrorCode)[keyof typeof StardateErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class StardateError extends Error {
  readonly code: StardateErrorCode

  constructor(code: StardateErrorCode, message: string) {
    super(message)
    this.name = 'StardateError'
    this.code = code
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export type ValidationErrorCode =
  | typeof StardateErrorCode.EMPTY_INPUT
  | typeof StardateErrorCode.INVALID_MONTH
  | typeof StardateErrorCode.INVALID_DAY
  | typeof StardateErrorCode.LEAP_DAY
  | typeof StardateErrorCode.STARDATE_FORMAT
  | typeof StardateErrorCode.INVALID_YEAR
  | typeof StardateErrorCode.YEAR_OUT_OF_RANGE
  | typeof StardateErrorCode.INVALID_MENU_CHOICE
  | typeof StardateErrorCode.INVALID_YES_NO
  | typeof StardateErrorCode.INVALID_STARDATE
  | typeof StardateErrorCode.EARTH_DATE_FORMAT

export class ValidationError extends StardateError {
  constructor(code: ValidationErrorCode, message: string) {
    super(code, message)
    this.name = 'ValidationError'
  }
}

export type InvalidDateErrorCode =
  | typeof StardateErrorCode.INVALID_DATE
  | typeof StardateErrorCode.INVALID_MONTH
  | typeof StardateErrorCode.LEAP_DAY
  | typeof StardateErrorCode.YEAR_OUT_OF_RANGE

/** Thrown when a calendar date cannot exist (April 31, Feb 29 of 2259, year 0, ...) */
export class InvalidDateError extends StardateError {
  constructor(message: string, code: InvalidDateErrorCode = StardateErrorCode.INVALID_DATE) {
    super(code, message)
    this.name = 'InvalidDateError'
  }
}

// ============================================================================
// Stardate Value Errors
// ============================================================================

export class FormatError extends StardateError {
  constructor(message: string) {
    super(StardateErrorCode.STARDATE_FORMAT, message)
    this.name = 'FormatError'
  }
}

// ============================================================================
// Conversion Errors
// ============================================================================

export type ConversionErrorCode =
  | typeof StardateErrorCode.ORDINAL_OUT_OF_RANGE
  | typeof StardateErrorCode.MODE_MISMATCH
  | typeof StardateErrorCode.YEAR_OUT_OF_RANGE

export class ConversionError extends StardateError {
  constructor(code: ConversionErrorCode, message: string) {
    super(code, message)
    this.name = 'ConversionError'
  }
}

export class UnknownModeError extends StardateError {
  constructor(message: string) {
    super(StardateErrorCode.UNKNOWN_MODE, message)
    this.name = 'UnknownModeError'
  }
}

// ============================================================================
// Registry
// ============================================================================

export type ErrorInfo = {
  readonly code: StardateErrorCode
  /** Short legacy reference printed by the help screen (E001...) */
  readonly ref: string
  readonly short: string
  readonly long: string
  readonly dev?: string
}

export const ERROR_REGISTRY: Readonly<Record<StardateErrorCode, ErrorInfo>> = Object.freeze({
  EMPTY_INPUT: {
    code: StardateErrorCode.EMPTY_INPUT,
    ref: 'E001',
    short: 'Input cannot be empty.',
    long:
      'You pressed Enter without typing anything when the program asked for a value. ' +
      'The converter needs a year, month, day, or stardate string to work with.',
    dev: 'Raised when the trimmed input is empty or missing.',
  },
  INVALID_MONTH: {
    code: StardateErrorCode.INVALID_MONTH,
    ref: 'E002',
    short: 'Invalid month value.',
    long:
      'The month is outside 1-12, or the name could not be recognized.\n' +
      'Accepted names: jan, january, feb, february, ..., sep, sept, september, ...',
    dev: 'Raised by parseMonth and by makeCalendarDate for months outside 1-12.',
  },
  INVALID_DATE: {
    code: StardateErrorCode.INVALID_DATE,
    ref: 'E003',
    short: 'Date is not valid for the given month/year.',
    long:
      'The day does not exist in that month and year.\n' +
      '  - April 31 is invalid (April has only 30 days).\n' +
      '  - February 30 is invalid in every year.',
    dev: 'Raised by makeCalendarDate when the day exceeds daysInMonth.',
  },
  LEAP_DAY: {
    code: StardateErrorCode.LEAP_DAY,
    ref: 'E004',
    short: 'Invalid leap-day usage.',
    long:
      'February 29 only exists in leap years under the Gregorian rules:\n' +
      '  - divisible by 4   => leap year\n' +
      '  - divisible by 100 => NOT a leap year\n' +
      '  - divisible by 400 => leap year again',
    dev: 'Raised by makeCalendarDate, and by parseEarthDate when the injected leap check rejects the year.',
  },
  STARDATE_FORMAT: {
    code: StardateErrorCode.STARDATE_FORMAT,
    ref: 'E005',
    short: 'Invalid stardate format.',
    long:
      "A stardate must include a decimal point, such as 2258.42, not just '2258'. " +
      'The part after the decimal is the day (or fraction) of the year.',
    dev: 'Raised by KelvinStardate.parse and validateStardateString for structural failures.',
  },
  UNKNOWN_MODE: {
    code: StardateErrorCode.UNKNOWN_MODE,
    ref: 'E006',
    short: 'Unknown conversion mode.',
    long:
      'Supported modes and aliases:\n' +
      '  - no_leap, noleap, nl, canon, ordinal, 1\n' +
      '  - gregorian, greg, gr, 2\n' +
      '  - astronomical, astro, astr, 3\n' +
      '  - all, a, 4',
    dev: 'Raised by normalizeMode.',
  },
  INVALID_YEAR: {
    code: StardateErrorCode.INVALID_YEAR,
    ref: 'E007',
    short: 'Invalid year format.',
    long:
      'Years use digits only, with no decimal point, and exactly four digits ' +
      'where YYYY is requested.',
    dev: 'Raised by parseYear and parseYearYYYY.',
  },
  YEAR_OUT_OF_RANGE: {
    code: StardateErrorCode.YEAR_OUT_OF_RANGE,
    ref: 'E008',
    short: 'Year out of supported range.',
    long: 'Valid years are 0001 through 9999, inclusive.',
    dev: 'Raised by the year parsers, makeCalendarDate and the conversion core.',
  },
  INVALID_MENU_CHOICE: {
    code: StardateErrorCode.INVALID_MENU_CHOICE,
    ref: 'E009',
    short: 'Invalid menu selection.',
    long: 'Choose one of the listed options exactly as shown (for example: 1 or 2).',
    dev: 'Raised by promptMenuChoice.',
  },
  INVALID_YES_NO: {
    code: StardateErrorCode.INVALID_YES_NO,
    ref: 'E010',
    short: 'Invalid yes/no response.',
    long: 'Accepted answers: y, yes, n, no.',
    dev: 'Raised by promptYesNo.',
  },
  INVALID_STARDATE: {
    code: StardateErrorCode.INVALID_STARDATE,
    ref: 'E011',
    short: 'Invalid stardate.',
    long:
      'Stardates must contain exactly one decimal point, use a 4-digit year (0001-9999), ' +
      "use digits only and not look like an Earth date (no '-').\n" +
      'Kelvin stardates use a 3-digit ordinal between 001 and 366.\n' +
      '  ok:  2258.042\n' +
      '  bad: 2258-02-11, 2258.4.2',
    dev: 'Raised by validateStardateString and validateKelvinStardateString.',
  },
  EARTH_DATE_FORMAT: {
    code: StardateErrorCode.EARTH_DATE_FORMAT,
    ref: 'E012',
    short: 'Invalid Earth date format.',
    long:
      'Accepted formats: YYYY-MM-DD or YYYY-mon-DD (month names or abbreviations).\n' +
      '  ok:  2258-02-11, 2258-feb-11\n' +
      '  bad: 2258/02/11',
    dev: "Raised by parseEarthDate when the input does not split into three '-' parts.",
  },
  INVALID_DAY: {
    code: StardateErrorCode.INVALID_DAY,
    ref: 'E013',
    short: 'Invalid day value.',
    long: 'Days use digits only and must be between 1 and 31.',
    dev: 'Raised by parseDay. Month-specific limits are checked by makeCalendarDate.',
  },
  ORDINAL_OUT_OF_RANGE: {
    code: StardateErrorCode.ORDINAL_OUT_OF_RANGE,
    ref: 'E014',
    short: 'Ordinal day out of range.',
    long:
      'The day-of-year part of the stardate does not exist in that year. ' +
      'no_leap allows 1-365; gregorian allows 1-365, or 1-366 in leap years.',
    dev: 'Raised by stardateToEarth and stardateToEarthAstronomical.',
  },
  MODE_MISMATCH: {
    code: StardateErrorCode.MODE_MISMATCH,
    ref: 'E015',
    short: 'Stardate type does not match the conversion mode.',
    long:
      'Kelvin ordinal stardates (2258.42) use the no_leap or gregorian modes; ' +
      'fractional stardates (2258.11499) use the astronomical mode.',
    dev: 'Raised when a Kelvin entry point receives astronomical or all.',
  },
})

// ============================================================================
// Registry Helpers
// ============================================================================

export function getErrorInfo(code: string): ErrorInfo | undefined {
  return isErrorCode(code) ? ERROR_REGISTRY[code] : undefined
}

export function isErrorCode(code: string): code is StardateErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_REGISTRY, code)
}

export function formatErrorForCli(err: StardateError): string {
  return `Error [${err.code}]: ${err.message}`
}

export function formatErrorForHelp(code: string, devMode = false): string {
  const info = getErrorInfo(code)
  if (!info) return `${code}: (no registry entry found)`

  const head = `${info.code} (${info.ref}): ${info.long}`
  if (devMode && info.dev) return `${head}\n\n[DEV]\n${info.dev}`
  return head
}

const PREFERRED_ORDER: readonly StardateErrorCode[] = [
  StardateErrorCode.EMPTY_INPUT,
  StardateErrorCode.INVALID_MONTH,
  StardateErrorCode.INVALID_DATE,
  StardateErrorCode.LEAP_DAY,
  StardateErrorCode.STARDATE_FORMAT,
  StardateErrorCode.UNKNOWN_MODE,
]

/** Help-screen order: the most common input mistakes first, the rest by declaration */
export function listErrorCodesOrdered(): ErrorInfo[] {
  const rest = Object.values(StardateErrorCode).filter((c) => !PREFERRED_ORDER.includes(c))
  return [...PREFERRED_ORDER, ...rest].map((c) => ERROR_REGISTRY[c])
}
