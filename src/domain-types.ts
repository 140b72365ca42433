/**
 * Canonical Domain Types
 *
 * Shared shapes for the conversion core, the validators and the mode
 * dispatch. Modules import from here rather than defining their own copies.
 */

// ============================================================================
// Leap Modes
// ============================================================================

/** Every way the tool can read the fractional part of a stardate */
export type LeapMode = 'no_leap' | 'gregorian' | 'astronomical' | 'all'

/** The modes that produce and accept a KelvinStardate */
export type KelvinMode = Extract<LeapMode, 'no_leap' | 'gregorian'>

/** The modes a single conversion row can be computed in (`all` fans out to these) */
export type ConcreteMode = Exclude<LeapMode, 'all'>

export const CONCRETE_MODES: readonly ConcreteMode[] = ['no_leap', 'gregorian', 'astronomical']

// ============================================================================
// Stardate Classification
// ============================================================================

export type StardateKind = 'kelvin' | 'astronomical'

// ============================================================================
// Earth Date Input
// ============================================================================

/** Year, month and day as entered; not yet checked against month lengths */
export type EarthDateParts = {
  year: number
  month: number
  day: number
}
