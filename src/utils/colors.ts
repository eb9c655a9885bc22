/**
 * Terminal Colors
 *
 * ANSI codes for console output. Disabled when NO_COLOR is set or stdout
 * is not a terminal, so piped logs stay plain.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Codes
// ═══════════════════════════════════════════════════════════════════════════════

const ANSI = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',

  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightBlue: '\x1b[94m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof ANSI;

/** Whether escape codes are written at all */
export const colorEnabled = !process.env['NO_COLOR'] && process.stdout.isTTY === true;

const PLAIN: Record<ColorName, string> = {
  reset: '',
  bright: '',
  dim: '',
  red: '',
  green: '',
  yellow: '',
  blue: '',
  magenta: '',
  cyan: '',
  white: '',
  gray: '',
  brightRed: '',
  brightGreen: '',
  brightYellow: '',
  brightBlue: '',
  brightCyan: ''
};

export const colors: Record<ColorName, string> = colorEnabled ? ANSI : PLAIN;

// ═══════════════════════════════════════════════════════════════════════════════
// Color Functions
// ═══════════════════════════════════════════════════════════════════════════════

export function colorize(text: string, color: ColorName): string {
  if (!colorEnabled) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

export const c = {
  dim: (text: string) => colorize(text, 'dim'),
  bright: (text: string) => colorize(text, 'bright'),

  red: (text: string) => colorize(text, 'red'),
  green: (text: string) => colorize(text, 'green'),
  yellow: (text: string) => colorize(text, 'yellow'),
  blue: (text: string) => colorize(text, 'blue'),
  magenta: (text: string) => colorize(text, 'magenta'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),
  gray: (text: string) => colorize(text, 'gray'),

  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),
  brightYellow: (text: string) => colorize(text, 'brightYellow'),
  brightBlue: (text: string) => colorize(text, 'brightBlue'),
  brightCyan: (text: string) => colorize(text, 'brightCyan'),

  // Semantic colors
  success: (text: string) => colorize(text, 'brightGreen'),
  warning: (text: string) => colorize(text, 'yellow'),
  error: (text: string) => colorize(text, 'brightRed'),
  info: (text: string) => colorize(text, 'brightCyan')
} as const;
