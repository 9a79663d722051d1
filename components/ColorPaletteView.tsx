import React from 'react';
import type { Palette } from '../types';
import { MOCKUP_PALETTE } from '../constants/palettes';
import { BACKDROP_HEX, PALETTE_TITLE, SCREEN_PADDING, SECTION_SPACING } from '../constants/layout';
import { CategorySection } from './CategorySection';

interface ColorPaletteViewProps {
  palette?: Palette;
  title?: string;
}

/**
 * The palette screen: a title, then one section per category, stacked in
 * palette order on a black backdrop. With no props it shows the mockup palette.
 */
export const ColorPaletteView: React.FC<ColorPaletteViewProps> = ({
  palette = MOCKUP_PALETTE,
  title = PALETTE_TITLE
}) => {
  return (
    <main
      className="dark flex-1 overflow-y-auto"
      style={{ backgroundColor: BACKDROP_HEX, padding: SCREEN_PADDING, colorScheme: 'dark' }}
    >
      <div className="flex flex-col items-center" style={{ gap: SECTION_SPACING }}>
        <h1 className="text-2xl font-bold text-white">{title}</h1>
        {palette.map(category => (
          <CategorySection key={category.id} category={category} />
        ))}
      </div>
    </main>
  );
};
