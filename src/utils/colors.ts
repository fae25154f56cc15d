/**
 * Color constants for terminal output.
 * Emptied when NO_COLOR is set or colors are switched off in settings.
 */

const palette = (enabled: boolean) => ({
  reset: enabled ? '\u001B[0m' : '',
  bright: enabled ? '\u001B[1m' : '',
  green: enabled ? '\u001B[32m' : '',
  yellow: enabled ? '\u001B[33m' : '',
  blue: enabled ? '\u001B[34m' : '',
  magenta: enabled ? '\u001B[35m' : '',
  cyan: enabled ? '\u001B[36m' : '',
  red: enabled ? '\u001B[31m' : '',
  gray: enabled ? '\u001B[90m' : '',
})

export const colors = palette(!process.env.NO_COLOR)

export const setColorEnabled = (enabled: boolean): void => {
  Object.assign(colors, palette(enabled))
}
