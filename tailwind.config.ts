import type { Config } from 'tailwindcss';

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  darkMode: 'class',
  theme: {
    extend: {
      colors: {
        brand: {
          50: '#f0f1ff',
          100: '#e3e5ff',
          200: '#ccd0ff',
          500: '#7d87f0',
          600: '#737de6',
          700: '#5b63c9',
          800: '#3f4591',
          900: '#2a2e63',
        },
      },
    },
  },
  plugins: [],
} satisfies Config;
