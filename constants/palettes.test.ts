import { describe, it, expect } from 'vitest';
import { MOCKUP_PALETTE, PALETTES, TOKEN_PALETTE, hexEntry, namedEntry } from './palettes';

const TITLES = ['Background Colors', 'Text Colors', 'Accent Colors', 'Status Colors', 'Glassmorphic Effects'];

describe('MOCKUP_PALETTE', () => {
  it('lists the five categories in display order', () => {
    expect(MOCKUP_PALETTE.map(c => c.title)).toEqual(TITLES);
    expect(MOCKUP_PALETTE.map(c => c.id)).toEqual(['background', 'text', 'accent', 'status', 'glass']);
  });

  it('has 5, 4, 3, 3 and 3 entries per category', () => {
    expect(MOCKUP_PALETTE.map(c => c.entries.length)).toEqual([5, 4, 3, 3, 3]);
  });

  it('keeps entry order within a category', () => {
    expect(MOCKUP_PALETTE[0].entries.map(e => e.name)).toEqual([
      'baseBackground',
      'deepBackground',
      'cardSurface',
      'elevatedSurface',
      'divider'
    ]);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(MOCKUP_PALETTE)).toBe(true);
    expect(Object.isFrozen(MOCKUP_PALETTE[0])).toBe(true);
    expect(Object.isFrozen(MOCKUP_PALETTE[0].entries)).toBe(true);
    expect(Object.isFrozen(MOCKUP_PALETTE[0].entries[0])).toBe(true);
  });
});

describe('TOKEN_PALETTE', () => {
  it('uses the same categories with the full token set', () => {
    expect(TOKEN_PALETTE.map(c => c.title)).toEqual(TITLES);
    expect(TOKEN_PALETTE.map(c => c.entries.length)).toEqual([6, 4, 4, 3, 3]);
  });

  it('carries the real warning and error colors', () => {
    expect(TOKEN_PALETTE[3].entries[1]).toEqual({ name: 'statusWarning', source: { kind: 'hex', hex: '#FF8A00' }, opacity: 0.9 });
    expect(TOKEN_PALETTE[3].entries[2]).toEqual({ name: 'statusError', source: { kind: 'hex', hex: '#FF5470' }, opacity: 0.9 });
  });

  it('is reachable by key', () => {
    expect(PALETTES.mockup).toBe(MOCKUP_PALETTE);
    expect(PALETTES.tokens).toBe(TOKEN_PALETTE);
  });
});

describe('entry builders', () => {
  it('default opacity to 1', () => {
    expect(hexEntry('x', '#101010').opacity).toBe(1);
    expect(namedEntry('y', 'white').opacity).toBe(1);
  });

  it('clamp opacity into [0, 1]', () => {
    expect(hexEntry('x', '#101010', 1.5).opacity).toBe(1);
    expect(namedEntry('y', 'black', -0.2).opacity).toBe(0);
  });
});
