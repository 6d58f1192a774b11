// config.ts — runtime configuration and shared constants

// Data source: served from frontend/public by default
export const DATA_URL = import.meta.env.VITE_DATA_URL || '/ifct_foods.csv'
export const DEBUG_MODE = import.meta.env.VITE_DEBUG_MODE === 'true'

export const APP_TITLE = 'IFCT Explorer'

// Sentinel option of the category selector
export const ALL_CATEGORIES = 'All'

// Chart/theme palette (dark theme, gold accent)
export const PALETTE = {
  gold: '#D4AF37',
  protein: '#4CAF50',
  carbs: '#FFC107',
  fat: '#F44336',
  trace: '#FF6347',
  coral: '#FF7F50',
  lime: '#ADFF2F',
  text: '#FAFAFA',
  gridline: 'rgba(255,255,255,0.12)',
} as const
