import type { Color } from './types';

export const CLEAR: Color = { r: 0, g: 0, b: 0, a: 0 };
export const BLACK: Color = { r: 0, g: 0, b: 0, a: 1 };

// HTML names accepted alongside hex notation.
const NAMED_COLORS: Record<string, string> = {
  red: '#ff0000',
  cyan: '#00ffff',
  blue: '#0000ff',
  darkblue: '#0000a0',
  lightblue: '#add8e6',
  purple: '#800080',
  yellow: '#ffff00',
  lime: '#00ff00',
  fuchsia: '#ff00ff',
  white: '#ffffff',
  silver: '#c0c0c0',
  grey: '#808080',
  gray: '#808080',
  black: '#000000',
  orange: '#ffa500',
  brown: '#a52a2a',
  maroon: '#800000',
  green: '#008000',
  olive: '#808000',
  navy: '#000080',
  teal: '#008080',
  aqua: '#00ffff',
  magenta: '#ff00ff',
  clear: '#00000000',
};

const HEX_RE = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

function channel(hex: string): number {
  return parseInt(hex, 16) / 255;
}

/**
 * Parses `#RGB`, `#RGBA`, `#RRGGBB`, `#RRGGBBAA` or a color name.
 * Returns `null` for empty or unrecognised text.
 */
export function parseColor(text: string | null | undefined): Color | null {
  if (!text) return null;
  const trimmed = text.trim();
  const hex = NAMED_COLORS[trimmed.toLowerCase()] ?? trimmed;

  const match = HEX_RE.exec(hex);
  if (!match) return null;

  let digits = match[1] ?? '';
  if (digits.length <= 4) {
    // Short form: each digit is doubled (#f80 -> #ff8800).
    digits = digits
      .split('')
      .map((d) => d + d)
      .join('');
  }

  return {
    r: channel(digits.slice(0, 2)),
    g: channel(digits.slice(2, 4)),
    b: channel(digits.slice(4, 6)),
    a: digits.length === 8 ? channel(digits.slice(6, 8)) : 1,
  };
}

function toHex(v: number): string {
  const byte = Math.round(Math.max(0, Math.min(1, v)) * 255);
  return byte.toString(16).padStart(2, '0');
}

/** Formats a color as `#RRGGBBAA`. Channels outside 0..1 are clamped. */
export function formatColor(c: Color): string {
  return `#${toHex(c.r)}${toHex(c.g)}${toHex(c.b)}${toHex(c.a)}`;
}
