import { DEFAULT_THEME_PRESET, THEME_PRESETS, isThemePresetName } from '../constants/themes';
import type { ThemeInput } from '../types/inputs';
import { THEME_KEYS, type MapTheme } from '../types/map';

/**
 * Resolve a theme input: a preset name, or a partial colour map merged over
 * the default preset. Unknown preset names fall back to the default preset.
 */
export function resolveTheme(input: ThemeInput | undefined): MapTheme {
  const base = THEME_PRESETS[DEFAULT_THEME_PRESET];
  if (input === undefined) return { ...base };
  if (typeof input === 'string') {
    return { ...(isThemePresetName(input) ? THEME_PRESETS[input] : base) };
  }
  return { ...base, ...pickThemeColours(input) };
}

/** Keep only known theme keys with non-empty values. */
export function pickThemeColours(patch: Partial<MapTheme>): Partial<MapTheme> {
  const out: Partial<MapTheme> = {};
  for (const key of THEME_KEYS) {
    const value = patch[key];
    if (typeof value === 'string' && value !== '') out[key] = value;
  }
  return out;
}

/** Keys whose value differs between two themes, with the new values. */
export function themeDelta(previous: MapTheme, next: MapTheme): Partial<MapTheme> {
  const out: Partial<MapTheme> = {};
  for (const key of THEME_KEYS) {
    if (previous[key] !== next[key]) out[key] = next[key];
  }
  return out;
}
