import { describe, it, expect } from 'vitest';
import { formatColor, parseColor } from './color';

describe('parseColor', () => {
  it('reads the long hex forms', () => {
    expect(parseColor('#ff8000')).toEqual({ r: 1, g: 128 / 255, b: 0, a: 1 });
    expect(parseColor('#0000ff80')).toEqual({ r: 0, g: 0, b: 1, a: 128 / 255 });
  });

  it('expands the short hex forms', () => {
    expect(parseColor('#f80')).toEqual({ r: 1, g: 136 / 255, b: 0, a: 1 });
    expect(parseColor('#0f08')).toEqual({ r: 0, g: 1, b: 0, a: 136 / 255 });
  });

  it('accepts color names regardless of case', () => {
    expect(parseColor('Red')).toEqual({ r: 1, g: 0, b: 0, a: 1 });
    expect(parseColor('clear')).toEqual({ r: 0, g: 0, b: 0, a: 0 });
  });

  it('returns null for empty or malformed text', () => {
    expect(parseColor('')).toBeNull();
    expect(parseColor(undefined)).toBeNull();
    expect(parseColor('#12345')).toBeNull();
    expect(parseColor('ff0000')).toBeNull();
    expect(parseColor('not-a-color')).toBeNull();
  });
});

describe('formatColor', () => {
  it('renders #RRGGBBAA and clamps channels', () => {
    expect(formatColor({ r: 1, g: 0.5, b: 0, a: 1 })).toBe('#ff8000ff');
    expect(formatColor({ r: 2, g: -1, b: 0, a: 0 })).toBe('#ff000000');
  });
});
