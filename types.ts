export interface ColorRGB {
  r: number;
  g: number;
  b: number;
}

/** Channels normalized to [0, 1]. */
export interface NormalizedColor {
  r: number;
  g: number;
  b: number;
  a: number;
}

export type NamedColor = 'black' | 'white' | 'clear';

export type ColorSource =
  | { kind: 'named'; name: NamedColor }
  | { kind: 'hex'; hex: string };

export interface ColorEntry {
  readonly name: string;
  readonly source: ColorSource;
  readonly opacity: number; // 0-1, multiplied onto the color's own alpha
}

export type CategoryId = 'background' | 'text' | 'accent' | 'status' | 'glass';

export interface Category {
  readonly id: CategoryId;
  readonly title: string;
  readonly entries: readonly ColorEntry[];
}

export type Palette = readonly Category[];

export type PaletteKey = 'mockup' | 'tokens';

export interface ResolvedSwatch {
  name: string;
  descriptor: string;       // Authored hex, or the named color's label
  caption: string;
  opacity: number;
  fill: NormalizedColor;    // Source color with the entry opacity applied
  composited: NormalizedColor; // fill laid over the screen backdrop
  malformed: boolean;
}
