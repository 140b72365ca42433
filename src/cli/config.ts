/**
 * CLI configuration from the environment.
 *
 *   KELVIN_STARDATE_MODE   default leap mode (any alias accepted by normalizeMode)
 *   KELVIN_STARDATE_WIDTH  result table width, 40-200
 *   NO_COLOR / FORCE_COLOR disable / force ANSI color
 */

import type { LeapMode } from '../domain-types'
import { normalizeMode } from '../modes'

export type CliConfig = {
  defaultMode: LeapMode
  color: boolean
  resultWidth: number
}

export const DEFAULT_RESULT_WIDTH = 62
const MIN_RESULT_WIDTH = 40
const MAX_RESULT_WIDTH = 200

type Env = Record<string, string | undefined>

function parseWidth(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_RESULT_WIDTH
  const parsed = parseInt(raw, 10)
  if (isNaN(parsed)) return DEFAULT_RESULT_WIDTH
  return Math.min(MAX_RESULT_WIDTH, Math.max(MIN_RESULT_WIDTH, parsed))
}

function colorEnabled(env: Env, isTTY: boolean): boolean {
  if ((env.NO_COLOR ?? '') !== '') return false
  const force = env.FORCE_COLOR ?? ''
  if (force !== '') return force !== '0' && force !== 'false'
  return isTTY
}

/** An invalid KELVIN_STARDATE_MODE throws UnknownModeError */
export function loadConfig(env: Env = process.env, isTTY = process.stdout.isTTY === true): CliConfig {
  const modeRaw = env.KELVIN_STARDATE_MODE ?? ''
  return {
    defaultMode: modeRaw.trim() === '' ? 'no_leap' : normalizeMode(modeRaw),
    color: colorEnabled(env, isTTY),
    resultWidth: parseWidth(env.KELVIN_STARDATE_WIDTH),
  }
}
