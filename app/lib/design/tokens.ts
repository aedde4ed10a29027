/**
 * Design tokens for the CineBase UI.
 *
 * Dark slate surfaces with a coral primary, teal secondary and gold
 * highlight for ratings.
 */

export const tokens = {
  background: {
    primary: '#0F1720', // Page background
    secondary: '#16212C', // Panels
    elevated: '#1F2D3A', // Cards, inputs, menus
  },
  foreground: {
    primary: '#F5F7FA',
    secondary: '#C3CCD6',
    muted: '#7B8794',
  },
  accent: {
    primary: '#E17154', // Coral for primary actions
    hover: '#EA8B72',
    foreground: '#0F1720', // Text on coral
    secondary: '#1EA9A8', // Teal for secondary actions and links
    tertiary: '#edc979', // Gold for ratings
  },
  status: {
    success: '#4ADE80',
    error: '#F87171',
  },
  border: {
    subtle: '#1F2D3A',
    emphasis: '#33475B',
  },
} as const;
