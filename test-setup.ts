/**
 * Vitest test setup file.
 * Registers DOM matchers and unmounts rendered trees between tests.
 */

import '@testing-library/jest-dom/vitest';
import { cleanup } from '@testing-library/react';
import { afterEach } from 'vitest';

afterEach(() => {
  cleanup();
});
