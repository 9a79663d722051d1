import React from 'react';
import type { ResolvedSwatch } from '../types';
import { toCssRgba, toHex } from '../utils/colorUtils';
import { SWATCH_HEIGHT, SWATCH_WIDTH } from '../constants/layout';

interface SwatchProps {
  swatch: ResolvedSwatch;
}

export const Swatch: React.FC<SwatchProps> = ({ swatch }) => {
  return (
    <div className="flex flex-col items-center gap-1" data-malformed={swatch.malformed || undefined}>
      <div
        role="img"
        aria-label={swatch.caption}
        title={`On backdrop: ${toHex(swatch.composited)}`}
        style={{ width: SWATCH_WIDTH, height: SWATCH_HEIGHT, backgroundColor: toCssRgba(swatch.fill) }}
      />
      <span className="text-xs text-white text-center" style={{ maxWidth: SWATCH_WIDTH * 1.5 }}>
        {swatch.caption}
      </span>
    </div>
  );
};
