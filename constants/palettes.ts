import type { Category, ColorEntry, NamedColor, Palette, PaletteKey } from '../types';

const clampOpacity = (opacity: number): number => Math.max(0, Math.min(1, opacity));

export const hexEntry = (name: string, hex: string, opacity: number = 1): ColorEntry => {
  const entry: ColorEntry = { name, source: { kind: 'hex', hex }, opacity: clampOpacity(opacity) };
  return Object.freeze(entry);
};

export const namedEntry = (name: string, color: NamedColor, opacity: number = 1): ColorEntry => {
  const entry: ColorEntry = { name, source: { kind: 'named', name: color }, opacity: clampOpacity(opacity) };
  return Object.freeze(entry);
};

export const category = (id: Category['id'], title: string, entries: ColorEntry[]): Category => {
  const result: Category = { id, title, entries: Object.freeze(entries) };
  return Object.freeze(result);
};

// The palette as shown on the mockup screen
export const MOCKUP_PALETTE: Palette = Object.freeze([
  category('background', 'Background Colors', [
    namedEntry('baseBackground', 'black'),
    hexEntry('deepBackground', '#0A0A0A'),
    hexEntry('cardSurface', '#1A1A1A', 0.85),
    hexEntry('elevatedSurface', '#212121', 0.9),
    hexEntry('divider', '#3A3A3A', 0.2)
  ]),
  category('text', 'Text Colors', [
    namedEntry('textPrimary', 'white'),
    hexEntry('textSecondary', '#A0A0A0'),
    hexEntry('textTertiary', '#777777'),
    hexEntry('textDisabled', '#505050')
  ]),
  category('accent', 'Accent Colors', [
    hexEntry('highlightAccent', '#00AEEF'),
    hexEntry('supportAccent', '#D7FF00'),
    namedEntry('tertiaryAccent', 'clear')
  ]),
  category('status', 'Status Colors', [
    hexEntry('statusSuccess', '#00AEEF', 0.9),
    namedEntry('statusWarning', 'clear'),
    namedEntry('statusError', 'clear')
  ]),
  category('glass', 'Glassmorphic Effects', [
    namedEntry('glassEffect', 'white', 0.05),
    namedEntry('glassHighlight', 'white', 0.1),
    namedEntry('glassShadow', 'black', 0.3)
  ])
]);

// Full style-sheet token set; the mockup leaves out inputBackground and the
// primaryAccent alias, and shows the warning/error colors as clear
export const TOKEN_PALETTE: Palette = Object.freeze([
  category('background', 'Background Colors', [
    namedEntry('baseBackground', 'black'),
    hexEntry('deepBackground', '#0A0A0A'),
    hexEntry('cardSurface', '#1A1A1A', 0.85),
    hexEntry('elevatedSurface', '#212121', 0.9),
    hexEntry('divider', '#3A3A3A', 0.2),
    hexEntry('inputBackground', '#1D1D1D', 0.8)
  ]),
  category('text', 'Text Colors', [
    namedEntry('textPrimary', 'white'),
    hexEntry('textSecondary', '#A0A0A0'),
    hexEntry('textTertiary', '#777777'),
    hexEntry('textDisabled', '#505050')
  ]),
  category('accent', 'Accent Colors', [
    hexEntry('highlightAccent', '#00AEEF'),
    hexEntry('supportAccent', '#D7FF00'),
    namedEntry('tertiaryAccent', 'clear'),
    hexEntry('primaryAccent', '#00AEEF')
  ]),
  category('status', 'Status Colors', [
    hexEntry('statusSuccess', '#00AEEF', 0.9),
    hexEntry('statusWarning', '#FF8A00', 0.9),
    hexEntry('statusError', '#FF5470', 0.9)
  ]),
  category('glass', 'Glassmorphic Effects', [
    namedEntry('glassEffect', 'white', 0.05),
    namedEntry('glassHighlight', 'white', 0.1),
    namedEntry('glassShadow', 'black', 0.3)
  ])
]);

export const PALETTES: Record<PaletteKey, Palette> = {
  mockup: MOCKUP_PALETTE,
  tokens: TOKEN_PALETTE
};

export const PALETTE_LABELS: Record<PaletteKey, string> = {
  mockup: 'Mockup',
  tokens: 'Design Tokens'
};
