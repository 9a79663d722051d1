import type { ColorRGB, NamedColor, NormalizedColor } from '../types';

export class MalformedColorSpecError extends Error {
  readonly spec: string;

  constructor(spec: string, reason: string) {
    super(`Malformed color "${spec}": ${reason}`);
    this.name = 'MalformedColorSpecError';
    this.spec = spec;
  }
}

export const OPAQUE_BLACK: NormalizedColor = { r: 0, g: 0, b: 0, a: 1 };

export const NAMED_COLORS: Record<NamedColor, { color: NormalizedColor; label: string }> = {
  black: { color: OPAQUE_BLACK, label: '#000000' },
  white: { color: { r: 1, g: 1, b: 1, a: 1 }, label: '#FFFFFF' },
  clear: { color: { r: 0, g: 0, b: 0, a: 0 }, label: 'Clear' }
};

const clamp01 = (v: number): number => Math.max(0, Math.min(1, v));

export const rgbToHex = (r: number, g: number, b: number): string => {
  const componentToHex = (c: number) => {
    const hex = Math.max(0, Math.min(255, Math.round(c))).toString(16).padStart(2, '0');
    return hex;
  };
  return `#${componentToHex(r)}${componentToHex(g)}${componentToHex(b)}`.toUpperCase();
};

/**
 * Parse `#RRGGBB` or `#RRGGBBAA` (leading `#` optional, any case) into
 * channels in [0, 1]. Six digits imply alpha 1.
 * @throws MalformedColorSpecError on wrong length or non-hex characters
 */
export const parseHex = (spec: string): NormalizedColor => {
  const digits = spec.startsWith('#') ? spec.slice(1) : spec;

  if (digits.length !== 6 && digits.length !== 8) {
    throw new MalformedColorSpecError(spec, `expected 6 or 8 hex digits, got ${digits.length}`);
  }
  if (!/^[0-9a-f]+$/i.test(digits)) {
    throw new MalformedColorSpecError(spec, 'contains non-hex characters');
  }

  const channel = (offset: number) => parseInt(digits.slice(offset, offset + 2), 16) / 255;
  return {
    r: channel(0),
    g: channel(2),
    b: channel(4),
    a: digits.length === 8 ? channel(6) : 1
  };
};

export const parseHexOrDefault = (spec: string, fallback: NormalizedColor = OPAQUE_BLACK): NormalizedColor => {
  try {
    return parseHex(spec);
  } catch (err) {
    if (err instanceof MalformedColorSpecError) return fallback;
    throw err;
  }
};

export const toRgb = (color: NormalizedColor): ColorRGB => ({
  r: Math.round(color.r * 255),
  g: Math.round(color.g * 255),
  b: Math.round(color.b * 255)
});

export const toHex = (color: NormalizedColor, includeAlpha: boolean = false): string => {
  const { r, g, b } = toRgb(color);
  const hex = rgbToHex(r, g, b);
  if (!includeAlpha) return hex;
  return hex + Math.round(clamp01(color.a) * 255).toString(16).padStart(2, '0').toUpperCase();
};

// Up to three decimals, no trailing zeros: 0.85 -> "0.85", 0.9 -> "0.9"
export const formatOpacity = (opacity: number): string => {
  return String(Math.round(opacity * 1000) / 1000);
};

export const toCssRgba = (color: NormalizedColor): string => {
  const { r, g, b } = toRgb(color);
  return `rgba(${r}, ${g}, ${b}, ${formatOpacity(clamp01(color.a))})`;
};

/**
 * Multiply an opacity onto the color's own alpha.
 */
export const withOpacity = (color: NormalizedColor, opacity: number): NormalizedColor => ({
  ...color,
  a: color.a * clamp01(opacity)
});

/**
 * Porter-Duff "source over": lay `fg` on top of `bg`.
 * A fully transparent result comes back as transparent black.
 */
export const compositeOver = (fg: NormalizedColor, bg: NormalizedColor): NormalizedColor => {
  const a = fg.a + bg.a * (1 - fg.a);
  if (a === 0) return { r: 0, g: 0, b: 0, a: 0 };

  const mix = (f: number, b: number) => (f * fg.a + b * bg.a * (1 - fg.a)) / a;
  return {
    r: mix(fg.r, bg.r),
    g: mix(fg.g, bg.g),
    b: mix(fg.b, bg.b),
    a
  };
};
