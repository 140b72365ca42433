/**
 * Semantic color palette for terminal output. Names describe meaning, not hue.
 */

const RESET = '\u001b[0m'

export const COLORS = Object.freeze({
  // General
  error: '\u001b[91m',
  warning: '\u001b[93m',
  info: '\u001b[36m',
  success: '\u001b[92m',

  // Modes
  no_leap: '\u001b[94m',
  gregorian: '\u001b[96m',
  astronomical: '\u001b[92m',
  all: '\u001b[93m',

  // Headers / emphasis
  header: '\u001b[37m',
  label: '\u001b[33m',
} as const)

export type ColorName = keyof typeof COLORS

export type Palette = {
  readonly enabled: boolean
  paint(name: ColorName, text: string): string
}

export function createPalette(enabled: boolean): Palette {
  return {
    enabled,
    paint(name, text) {
      return enabled ? `${COLORS[name]}${text}${RESET}` : text
    },
  }
}
