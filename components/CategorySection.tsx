import React, { useMemo } from 'react';
import type { Category } from '../types';
import { resolveCategory } from '../utils/swatch';
import { SWATCH_SPACING } from '../constants/layout';
import { Swatch } from './Swatch';

interface CategorySectionProps {
  category: Category;
}

export const CategorySection: React.FC<CategorySectionProps> = ({ category }) => {
  const swatches = useMemo(() => resolveCategory(category), [category]);
  const headingId = `palette-${category.id}-title`;

  return (
    <section role="region" aria-labelledby={headingId} className="flex flex-col items-center gap-2">
      <h2 id={headingId} className="text-base font-semibold text-white">
        {category.title}
      </h2>
      <div className="flex flex-row items-start" style={{ gap: SWATCH_SPACING }}>
        {swatches.map((swatch, index) => (
          <Swatch key={`${swatch.name}-${index}`} swatch={swatch} />
        ))}
      </div>
    </section>
  );
};
