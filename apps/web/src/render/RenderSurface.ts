import type { MapTheme, MarkerGroup, PlacedNode, SceneConfig, SceneState } from '@mapsync/shared';

/** Drawing target for the reconciler. Every call reflects the latest mirror. */
export interface RenderSurface {
  renderAll(scene: SceneState): void;
  renderGroup(group: MarkerGroup, config: SceneConfig): void;
  upsertMarker(group: MarkerGroup, node: PlacedNode, config: SceneConfig): void;
  removeMarker(groupId: string, markerId: string): void;
  setGroupVisible(groupId: string, visible: boolean): void;
  applyTheme(theme: MapTheme): void;
  /** Remove every client-rendered marker. */
  clear(): void;
  /** Mark the surface as server-rendered only. */
  showStatic(): void;
}
