import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './App.tsx', './index.tsx', './components/**/*.tsx'],
  darkMode: 'class',
  theme: {
    extend: {},
  },
  plugins: [],
} satisfies Config;
