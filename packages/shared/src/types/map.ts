// ─── Map Domain Types ────────────────────────────────────
// Canonical, already-normalised records. Raw producer input lives in
// ./inputs and never travels past the normalisers.

/** Geographic pair. Only the wire codec turns this into `[lat, lng]`. */
export interface LatLng {
  lat: number;
  lng: number;
}

/** Drawing-surface coordinate. */
export interface Point {
  x: number;
  y: number;
}

export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export type MarkerAnimation = 'none' | 'pulse' | 'fade' | 'bounce';

export interface MarkerStyle {
  readonly colour: string;
  readonly size: number;
  readonly animation: MarkerAnimation;
  readonly gradient: boolean;
  readonly glow: boolean;
}

/** A node after resolution against the location table. */
export interface PlacedNode {
  readonly id: string;
  readonly label: string;
  readonly coordinates: LatLng;
  /** Location key the node was resolved from, when it was a named node. */
  readonly location?: string;
}

export interface MarkerGroup {
  readonly id: string;
  readonly label: string;
  readonly style: MarkerStyle;
  readonly nodes: readonly PlacedNode[];
  readonly visible: boolean;
}

export const THEME_KEYS = ['land', 'ocean', 'border', 'neutralMarker', 'neutralText'] as const;

export type ThemeKey = (typeof THEME_KEYS)[number];

export type MapTheme = Record<ThemeKey, string>;

export interface SceneConfig {
  bbox: BoundingBox;
  /** Minimum interval between client render flushes. */
  throttleMs: number;
}

export interface SceneState {
  readonly roomKey: string;
  readonly groups: readonly MarkerGroup[];
  readonly theme: MapTheme;
  readonly config: SceneConfig;
  /** Incremented once per emitted event; a full_state carries the latest value. */
  readonly revision: number;
  readonly updatedAt: number;
}
