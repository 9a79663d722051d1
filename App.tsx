import React, { useState } from 'react';
import type { PaletteKey } from './types';
import { PALETTES } from './constants/palettes';
import { countSwatches } from './utils/swatch';
import { Header } from './components/Header';
import { ColorPaletteView } from './components/ColorPaletteView';

const App: React.FC = () => {
  const [paletteKey, setPaletteKey] = useState<PaletteKey>('mockup');
  const palette = PALETTES[paletteKey];

  return (
    <div className="flex flex-col h-screen bg-black">
      <Header
        activePalette={paletteKey}
        swatchCount={countSwatches(palette)}
        onPaletteChange={setPaletteKey}
      />
      <ColorPaletteView palette={palette} />
    </div>
  );
};

export default App;
