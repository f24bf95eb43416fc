import type { Config } from 'tailwindcss';

const color = (name: string) => `hsl(var(--${name}))`;

const config: Config = {
  content: ['./src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        background: color('background'),
        foreground: color('foreground'),
        border: color('border'),
        input: color('input'),
        ring: color('ring'),
        card: { DEFAULT: color('card'), foreground: color('card-foreground') },
        primary: { DEFAULT: color('primary'), foreground: color('primary-foreground') },
        accent: { DEFAULT: color('accent'), foreground: color('accent-foreground') },
        destructive: { DEFAULT: color('destructive'), foreground: color('destructive-foreground') },
        muted: { foreground: color('muted-foreground') },
      },
    },
  },
  plugins: [],
};

export default config;
