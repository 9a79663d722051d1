import type { Category, ColorEntry, NormalizedColor, Palette, ResolvedSwatch } from '../types';
import { BACKDROP_HEX } from '../constants/layout';
import {
  MalformedColorSpecError,
  NAMED_COLORS,
  OPAQUE_BLACK,
  compositeOver,
  formatOpacity,
  parseHex,
  withOpacity
} from './colorUtils';

export const BACKDROP: NormalizedColor = parseHex(BACKDROP_HEX);

// Drawn in place of a color that fails to parse
export const FALLBACK_COLOR: NormalizedColor = OPAQUE_BLACK;

export const formatCaption = (name: string, descriptor: string, opacity: number): string => {
  return opacity !== 1
    ? `${name}: ${descriptor} (${formatOpacity(opacity)})`
    : `${name}: ${descriptor}`;
};

/**
 * Resolve one palette entry into what the swatch draws.
 * A malformed hex is logged and drawn as FALLBACK_COLOR; it never throws,
 * so a typo in the palette only affects its own swatch.
 */
export const resolveSwatch = (entry: ColorEntry, backdrop: NormalizedColor = BACKDROP): ResolvedSwatch => {
  let base: NormalizedColor = FALLBACK_COLOR;
  let descriptor: string;
  let malformed = false;

  if (entry.source.kind === 'named') {
    const named = NAMED_COLORS[entry.source.name];
    base = named.color;
    descriptor = named.label;
  } else {
    descriptor = entry.source.hex;
    try {
      base = parseHex(entry.source.hex);
    } catch (err) {
      if (!(err instanceof MalformedColorSpecError)) throw err;
      console.error('Malformed swatch color, drawing fallback', { name: entry.name, spec: err.spec, reason: err.message });
      malformed = true;
    }
  }

  const fill = withOpacity(base, entry.opacity);
  return {
    name: entry.name,
    descriptor,
    caption: formatCaption(entry.name, descriptor, entry.opacity),
    opacity: entry.opacity,
    fill,
    composited: compositeOver(fill, backdrop),
    malformed
  };
};

export const resolveCategory = (category: Category, backdrop: NormalizedColor = BACKDROP): ResolvedSwatch[] => {
  return category.entries.map(entry => resolveSwatch(entry, backdrop));
};

export const countSwatches = (palette: Palette): number => {
  return palette.reduce((total, category) => total + category.entries.length, 0);
};
