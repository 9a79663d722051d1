import React from 'react';
import type { PaletteKey } from '../types';
import { PALETTE_LABELS } from '../constants/palettes';

interface HeaderProps {
  activePalette: PaletteKey;
  swatchCount: number;
  onPaletteChange: (key: PaletteKey) => void;
}

const PALETTE_KEYS: PaletteKey[] = ['mockup', 'tokens'];

export const Header: React.FC<HeaderProps> = ({ activePalette, swatchCount, onPaletteChange }) => {
  return (
    <header className="bg-[#0A0A0A] h-12 flex-none border-b border-white/10 z-50">
      <nav className="w-full max-w-[1600px] mx-auto h-full px-6 md:px-16">
        <div className="flex items-center justify-between h-full">
          <div className="flex items-center gap-3">
            <h1 className="text-white text-xl font-black tracking-tighter leading-none uppercase">
              Palette Board
            </h1>
            <span className="px-2 py-0.5 text-[10px] font-medium tracking-wider uppercase bg-[#00AEEF]/20 text-[#00AEEF] rounded">
              {swatchCount} swatches
            </span>
          </div>
          <div className="flex items-center gap-1">
            {PALETTE_KEYS.map(key => (
              <button
                key={key}
                type="button"
                aria-pressed={key === activePalette}
                onClick={() => onPaletteChange(key)}
                className={`px-2 py-1 text-[10px] font-bold uppercase tracking-wide rounded transition-colors ${key === activePalette ? 'bg-[#00AEEF] text-black' : 'text-white/70 hover:text-white'}`}
              >
                {PALETTE_LABELS[key]}
              </button>
            ))}
          </div>
        </div>
      </nav>
    </header>
  );
};
