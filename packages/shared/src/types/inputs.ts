import type { LatLng, MapTheme, SceneConfig } from './map';

// ─── Producer Input Types ────────────────────────────────
// Loosely-shaped values accepted at the API boundary.

export interface StyleAttributes {
  colour?: string;
  size?: number;
  /** Checked against the animation enum by the normaliser. */
  animation?: string;
  gradient?: boolean;
  glow?: boolean;
}

export interface PresetStyleInput extends StyleAttributes {
  preset: string;
}

export interface CycleStyleInput extends StyleAttributes {
  cycle: number;
}

export interface AttributeStyleInput extends StyleAttributes {
  colour: string;
}

/** A preset name, a preset with overrides, a palette index, or explicit attributes. */
export type StyleInput = string | PresetStyleInput | CycleStyleInput | AttributeStyleInput;

export interface CoordinateNodeInput {
  lat: number;
  lng: number;
  label?: string;
  id?: string;
}

export interface PairNodeInput {
  coordinates: LatLng;
  label?: string;
  id?: string;
}

/** A location key, or an explicit coordinate with an optional label. */
export type MapNodeInput = string | CoordinateNodeInput | PairNodeInput;

export interface MarkerGroupInput {
  id: string;
  label?: string;
  style?: StyleInput;
  /**
   * Each entry should be a MapNodeInput. Anything else is reported as
   * `malformed_node` and skipped, since bodies arrive as untyped JSON.
   */
  nodes: readonly unknown[];
  visible?: boolean;
}

export type ThemePresetName =
  | 'light'
  | 'dark'
  | 'minimal'
  | 'cool'
  | 'warm'
  | 'high_contrast'
  | 'responsive';

export type ThemeInput = string | Partial<MapTheme>;

export interface FullStateInput {
  groups: readonly MarkerGroupInput[];
  theme?: ThemeInput;
  config?: Partial<SceneConfig>;
}
