/**
 * Shared display utilities for CLI commands.
 *
 * Provides ANSI styling gated by the color option and box-drawing borders
 * used across CLI commands.
 */

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * ANSI codes for the styles the CLI uses; empty strings when colors are off.
 */
export interface AnsiStyles {
  bold: string;
  dim: string;
  green: string;
  yellow: string;
  red: string;
  cyan: string;
  reset: string;
}

export function getAnsiStyles(options: DisplayOptions): AnsiStyles {
  const code = (value: string): string => (options.colors ? value : '');
  return {
    bold: code('\x1b[1m'),
    dim: code('\x1b[2m'),
    green: code('\x1b[32m'),
    yellow: code('\x1b[33m'),
    red: code('\x1b[31m'),
    cyan: code('\x1b[36m'),
    reset: code('\x1b[0m'),
  };
}

export function getBorderChars(options: DisplayOptions): BorderChars {
  if (options.unicode) {
    return {
      topLeft: '┌',
      topRight: '┐',
      bottomLeft: '└',
      bottomRight: '┘',
      horizontal: '─',
      vertical: '│',
    };
  }
  return {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  };
}

/**
 * Strips ANSI escape sequences from a string to get visible length.
 *
 * @param str - The string potentially containing ANSI codes.
 * @returns The string with ANSI codes removed.
 */
export function stripAnsi(str: string): string {
  return str.replace(ANSI_ESCAPE_PATTERN, '');
}

export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const lines = text.split('\n');
  const maxLength = Math.max(...lines.map((line) => stripAnsi(line).length));
  const horizontalBorder = border.horizontal.repeat(maxLength + 2);

  let result = border.topLeft + horizontalBorder + border.topRight + '\n';
  for (const line of lines) {
    const visibleLength = stripAnsi(line).length;
    const padding = ' '.repeat(maxLength - visibleLength);
    result += border.vertical + ' ' + line + padding + ' ' + border.vertical + '\n';
  }
  result += border.bottomLeft + horizontalBorder + border.bottomRight;

  return result;
}
