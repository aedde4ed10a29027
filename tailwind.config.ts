import type { Config } from "tailwindcss";
import { tokens } from "./app/lib/design/tokens";

export default {
  content: ["./app/**/{**,.client,.server}/**/*.{js,jsx,ts,tsx}"],
  darkMode: "class",
  theme: {
    extend: {
      colors: {
        background: {
          primary: tokens.background.primary,
          secondary: tokens.background.secondary,
          elevated: tokens.background.elevated,
        },
        foreground: {
          primary: tokens.foreground.primary,
          secondary: tokens.foreground.secondary,
          muted: tokens.foreground.muted,
        },
        accent: {
          primary: tokens.accent.primary,
          hover: tokens.accent.hover,
          foreground: tokens.accent.foreground,
          secondary: tokens.accent.secondary,
          tertiary: tokens.accent.tertiary,
        },
        status: {
          success: tokens.status.success,
          error: tokens.status.error,
        },
        border: {
          subtle: tokens.border.subtle,
          emphasis: tokens.border.emphasis,
        },
      },
      fontFamily: {
        sans: [
          "Inter",
          "-apple-system",
          "BlinkMacSystemFont",
          "Segoe UI",
          "Roboto",
          "Oxygen",
          "Ubuntu",
          "Cantarell",
          "Fira Sans",
          "Droid Sans",
          "Helvetica Neue",
          "ui-sans-serif",
          "system-ui",
          "sans-serif",
          "Apple Color Emoji",
          "Segoe UI Emoji",
          "Segoe UI Symbol",
          "Noto Color Emoji",
        ],
      },
    },
  },
  plugins: [],
} satisfies Config;
