// ─── Map Theme Presets ───────────────────────────────────

import type { MapTheme } from '../types/map';
import type { ThemePresetName } from '../types/inputs';

export const THEME_PRESETS: Readonly<Record<ThemePresetName, MapTheme>> = {
  light: {
    land: '#888888',
    ocean: '#aaaaaa',
    border: '#0f172a',
    neutralMarker: '#6b7280',
    neutralText: '#374151',
  },
  dark: {
    land: '#0f172a',
    ocean: '#aaaaaa',
    border: '#334155',
    neutralMarker: '#9ca3af',
    neutralText: '#d1d5db',
  },
  minimal: {
    land: 'transparent',
    ocean: 'transparent',
    border: '#b5b7bb',
    neutralMarker: '#aba2a0',
    neutralText: '#374151',
  },
  cool: {
    land: '#f1f5f9',
    ocean: '#aaaaaa',
    border: '#64748b',
    neutralMarker: '#64748b',
    neutralText: '#334155',
  },
  warm: {
    land: '#fef7ed',
    ocean: '#aaaaaa',
    border: '#c2410c',
    neutralMarker: '#92400e',
    neutralText: '#451a03',
  },
  high_contrast: {
    land: '#ffffff',
    ocean: '#aaaaaa',
    border: '#000000',
    neutralMarker: '#404040',
    neutralText: '#000000',
  },
  // CSS-variable theme that follows the host page's light/dark mode
  responsive: {
    land: 'oklch(var(--color-base-100) / 1)',
    ocean: 'oklch(var(--color-base-200) / 1)',
    border: 'oklch(var(--color-base-300) / 1)',
    neutralMarker: 'oklch(var(--color-base-content) / 0.6)',
    neutralText: 'oklch(var(--color-base-content) / 0.8)',
  },
};

export const DEFAULT_THEME_PRESET: ThemePresetName = 'light';

export function isThemePresetName(name: string): name is ThemePresetName {
  return Object.prototype.hasOwnProperty.call(THEME_PRESETS, name);
}
