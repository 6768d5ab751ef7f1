// ─── Constants ───────────────────────────────────────────

import type { BoundingBox } from '../types/map';

/** Drawing surface extents of the bundled world map. */
export const DEFAULT_BBOX: BoundingBox = { minX: 0, minY: 0, maxX: 800, maxY: 391 };

/** Client render flush interval in ms */
export const DEFAULT_THROTTLE_MS = 50;

/** Off-frame coordinate used for unknown locations in legacy mode */
export const OFF_FRAME_COORDINATES = { lat: 0, lng: -190 } as const;

/** Default room key when a page does not name one */
export const DEFAULT_ROOM_KEY = 'default';

/** Default id of the rendering surface element */
export const DEFAULT_SURFACE_ID = 'map-surface';

export {
  STYLE_PRESETS,
  STYLE_PRESET_ALIASES,
  CYCLE_COLOURS,
  DEFAULT_MARKER_SIZE,
  MIN_MARKER_SIZE,
  MAX_MARKER_SIZE,
  MARKER_ANIMATIONS,
  lookupStylePreset,
} from './styles';
export type { StylePresetEntry } from './styles';

export { THEME_PRESETS, DEFAULT_THEME_PRESET, isThemePresetName } from './themes';
