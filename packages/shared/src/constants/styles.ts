// ─── Marker Style Presets ────────────────────────────────
// Read-only preset table consumed by the style normaliser.

import type { MarkerStyle } from '../types/map';

export interface StylePresetEntry {
  name: string;
  description: string;
  style: MarkerStyle;
}

const preset = (
  name: string,
  colour: string,
  description: string,
  overrides: Partial<MarkerStyle> = {},
): StylePresetEntry => ({
  name,
  description,
  style: {
    colour,
    size: 4,
    animation: 'none',
    gradient: false,
    glow: false,
    ...overrides,
  },
});

export const STYLE_PRESETS: Readonly<Record<string, StylePresetEntry>> = {
  operational: preset('operational', '#10b981', 'Running normally'),
  warning: preset('warning', '#f59e0b', 'Running but degraded'),
  danger: preset('danger', '#ef4444', 'Failed or critical', { animation: 'pulse' }),
  inactive: preset('inactive', '#6b7280', 'Intentionally stopped'),
  primary: preset('primary', '#3b82f6', 'General purpose accent'),
  secondary: preset('secondary', '#14b8a6', 'Secondary accent'),
  info: preset('info', '#0ea5e9', 'Informational or neutral'),
};

/** Older preset names kept working for existing producers. */
export const STYLE_PRESET_ALIASES: Readonly<Record<string, string>> = {
  active: 'operational',
  success: 'operational',
  acknowledged: 'operational',
  expected: 'warning',
};

/** Palette for non-semantic groups, ordered for maximum visual distinction. */
export const CYCLE_COLOURS: readonly string[] = [
  '#2563eb',
  '#16a34a',
  '#dc2626',
  '#9333ea',
  '#ea580c',
  '#0891b2',
  '#ca8a04',
  '#db2777',
  '#0d9488',
  '#65a30d',
  '#d97706',
  '#4338ca',
];

export const DEFAULT_MARKER_SIZE = 6;
export const MIN_MARKER_SIZE = 1;
export const MAX_MARKER_SIZE = 64;

export const MARKER_ANIMATIONS = ['none', 'pulse', 'fade', 'bounce'] as const;

/** Resolve a preset name (or alias) to its table entry. */
export function lookupStylePreset(name: string): StylePresetEntry | undefined {
  const key = STYLE_PRESET_ALIASES[name] ?? name;
  return Object.prototype.hasOwnProperty.call(STYLE_PRESETS, key) ? STYLE_PRESETS[key] : undefined;
}
