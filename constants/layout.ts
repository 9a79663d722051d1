/**
 * Layout constants shared by the palette screen components
 */

// Swatch rectangle size (px)
export const SWATCH_WIDTH = 80;
export const SWATCH_HEIGHT = 40;

// Horizontal gap between swatches in a row
export const SWATCH_SPACING = 10;

// Vertical gap between the title and each category section
export const SECTION_SPACING = 20;

export const SCREEN_PADDING = 16;

// Screen backdrop; swatches are composited over it
export const BACKDROP_HEX = '#000000';

export const PALETTE_TITLE = 'Rocket Launch Tracker Palette';
