/**
 * kelvin-stardate
 *
 * Public API exports
 */

// Error system (base class, codes, error classes, registry)
export {
  StardateError, StardateErrorCode,
  ValidationError, InvalidDateError, FormatError, ConversionError, UnknownModeError,
  ERROR_REGISTRY, getErrorInfo, isErrorCode,
  formatErrorForCli, formatErrorForHelp, listErrorCodesOrdered,
} from './errors'
export type {
  StardateErrorCode as StardateErrorCodeType,
  ValidationErrorCode, InvalidDateErrorCode, ConversionErrorCode, ErrorInfo,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar utilities
export type { LocalDate } from './time-date'
export {
  MIN_YEAR, MAX_YEAR,
  isLeapYear, daysInMonth, daysInYear,
  makeCalendarDate, parseDate,
  yearOf, monthOf, dayOf,
  dayOfYear, dateFromOrdinal,
  formatLongDate,
} from './time-date'

// Domain types
export type {
  LeapMode, KelvinMode, ConcreteMode, StardateKind, EarthDateParts,
} from './domain-types'
export { CONCRETE_MODES } from './domain-types'

// Stardate value
export { KelvinStardate, formatOrdinal } from './stardate'

// Conversion core
export {
  MEAN_YEAR_DAYS, NO_LEAP_YEAR_DAYS,
  earthToStardate, stardateToEarth,
  earthToStardateAstronomical, stardateToEarthAstronomical,
} from './conversion'

// Validators
export {
  MONTH_LOOKUP,
  requireInput,
  parseYear, parseYearYYYY, parseMonth, parseDay, parseEarthDate,
  validateStardateString, validateKelvinStardateString,
  detectStardateType,
} from './validators'

// Mode dispatch
export type { ConversionRow } from './modes'
export { normalizeMode, convertEarthDate, convertStardate, resolveStardateMode } from './modes'
