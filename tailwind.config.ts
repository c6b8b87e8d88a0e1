import type { Config } from 'tailwindcss'

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        primary: {
          50: '#eff8fc',
          100: '#d9eef7',
          500: '#2980b9',
          600: '#226d9e',
          700: '#1c5980',
        },
      },
    },
  },
  plugins: [],
} satisfies Config
