/**
 * ASCII Banner
 *
 * MINUTES block letters in a single-line box: outline strokes in white,
 * block fill dimmed, tagline and version underneath.
 */

import { type ColorName, colors } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// ASCII Art
// ═══════════════════════════════════════════════════════════════════════════════

const MINUTES_ASCII = [
  '███╗   ███╗██╗███╗   ██╗██╗   ██╗████████╗███████╗███████╗',
  '████╗ ████║██║████╗  ██║██║   ██║╚══██╔══╝██╔════╝██╔════╝',
  '██╔████╔██║██║██╔██╗ ██║██║   ██║   ██║   █████╗  ███████╗',
  '██║╚██╔╝██║██║██║╚██╗██║██║   ██║   ██║   ██╔══╝  ╚════██║',
  '██║ ╚═╝ ██║██║██║ ╚████║╚██████╔╝   ██║   ███████╗███████║',
  '╚═╝     ╚═╝╚═╝╚═╝  ╚═══╝ ╚═════╝    ╚═╝   ╚══════╝╚══════╝'
];

const TAGLINE = 'Meetings in, action items out';

// ═══════════════════════════════════════════════════════════════════════════════
// Layout
// ═══════════════════════════════════════════════════════════════════════════════

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│'
} as const;

const BORDER_COLOR: ColorName = 'white';
const FILL_COLOR: ColorName = 'dim';

const BANNER_WIDTH = 72;
const CONTENT_WIDTH = BANNER_WIDTH - 4;

/** Outline strokes of the block font */
const STROKE_CHARS = new Set(['╔', '╗', '╚', '╝', '═', '║']);

// ═══════════════════════════════════════════════════════════════════════════════
// Rendering
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Color one art line: strokes in the border color, blocks in the fill color.
 * Escape codes are only emitted when the character class changes.
 */
function colorizeArtLine(line: string): string {
  let result = '';
  let current: ColorName | null = null;

  for (const char of line) {
    const next: ColorName | null = STROKE_CHARS.has(char)
      ? BORDER_COLOR
      : char === '█'
        ? FILL_COLOR
        : null;

    if (next !== current) {
      result += next ? colors[next] : colors.reset;
      current = next;
    }
    result += char;
  }

  return current ? `${result}${colors.reset}` : result;
}

/**
 * Center a plain line in the content area. `visibleLength` is passed
 * separately because colored lines carry escape codes.
 */
function center(text: string, visibleLength: number): string {
  const padding = Math.max(0, CONTENT_WIDTH - visibleLength);
  const left = Math.floor(padding / 2);
  return ' '.repeat(left) + text + ' '.repeat(padding - left);
}

function row(content: string): string {
  const border = `${colors[BORDER_COLOR]}${BOX.vertical}${colors.reset}`;
  return `${border} ${content} ${border}`;
}

function edge(left: string, right: string): string {
  const line = BOX.horizontal.repeat(BANNER_WIDTH - 2);
  return `${colors[BORDER_COLOR]}${left}${line}${right}${colors.reset}`;
}

/**
 * Build the banner.
 * @param version - Shown under the tagline when given
 */
export function generateBanner(version?: string): string {
  const blank = row(' '.repeat(CONTENT_WIDTH));
  const lines = [edge(BOX.topLeft, BOX.topRight), blank];

  for (const artLine of MINUTES_ASCII) {
    lines.push(row(center(colorizeArtLine(artLine), artLine.length)));
  }

  lines.push(blank);
  lines.push(row(`${colors.dim}${center(TAGLINE, TAGLINE.length)}${colors.reset}`));
  if (version) {
    const label = `v${version}`;
    lines.push(row(`${colors.dim}${center(label, label.length)}${colors.reset}`));
  }
  lines.push(blank);
  lines.push(edge(BOX.bottomLeft, BOX.bottomRight));

  return lines.join('\n');
}

export function displayBanner(version?: string): void {
  console.log(generateBanner(version));
}
