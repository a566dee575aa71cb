/**
 * ANSI color codes for maze rendering in the terminal.
 *
 * 256-color escape sequences; every colored glyph must be followed by
 * `colors.reset`.
 */
export const colors = {
  // Basic formatting
  reset: '\x1b[0m', // Reset all attributes
  bright: '\x1b[1m', // Bright/bold text
  dim: '\x1b[2m', // Dim text

  // Foregrounds
  blueNeon: '\x1b[38;5;45m', // Walls
  orangeNeon: '\x1b[38;5;208m', // Start and exit markers
  cyanNeon: '\x1b[38;5;87m', // Player
  gridLineText: '\x1b[38;5;23m', // Open floor dots
  neonRed: '\x1b[38;5;196m', // Blocked notice
  pureGreen: '\x1b[38;5;46;1m', // Win message

  // Backgrounds
  bgBlack: '\x1b[48;5;16m',
  floorBg: '\x1b[48;5;234m', // Almost black for empty floor
} as const;
