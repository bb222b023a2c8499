/**
 * Minimal terminal colors utility
 *
 * Zero dependencies. Supports:
 * - Color detection (NO_COLOR, FORCE_COLOR, TERM, CI, TTY)
 * - Named colors for log lines, xterm-256 foregrounds for charts, bold
 * - Nestable: colors.bold(colors.fg256(196)('text'))
 * - Explicit palettes via createColors(enabled), used by renderers and tests
 */

export type Style = (s: string | number) => string;

export interface Colors {
  readonly enabled: boolean;
  bold: Style;
  red: Style;
  yellow: Style;
  cyan: Style;
  gray: Style;
  /** Foreground from the xterm 256-color table */
  fg256: (code: number) => Style;
}

/**
 * Decide whether the current process should emit ANSI colors
 */
export function detectColorSupport(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout?.isTTY ?? false
): boolean {
  // Respect NO_COLOR standard (https://no-color.org/)
  if ('NO_COLOR' in env) return false;

  if ('FORCE_COLOR' in env) return true;

  if (env.TERM === 'dumb') return false;

  if (isTTY) return true;

  // CI environments usually support colors
  if (env.CI) return true;

  return false;
}

const plain: Style = (s) => String(s);

// ANSI escape code wrapper
const code = (enabled: boolean, open: string, close: string): Style => {
  if (!enabled) return plain;

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  // Handle nested codes by re-opening after an inner close
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  return (s) => openCode + String(s).replace(closeRe, openCode) + closeCode;
};

export function createColors(enabled: boolean): Colors {
  return {
    enabled,
    bold: code(enabled, '1', '22'),
    red: code(enabled, '31', '39'),
    yellow: code(enabled, '33', '39'),
    cyan: code(enabled, '36', '39'),
    gray: code(enabled, '90', '39'),
    fg256: (n) => code(enabled, `38;5;${n}`, '39'),
  };
}

const ANSI_RE = /\x1b\[[0-9;]*m/g;

/** Remove SGR escape sequences */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_RE, '');
}

/**
 * Number of terminal columns a styled string occupies.
 * Counts code points, so each glyph used by the renderers is one column.
 */
export function visibleWidth(text: string): number {
  return Array.from(stripAnsi(text)).length;
}

const colors = createColors(detectColorSupport());

export default colors;
