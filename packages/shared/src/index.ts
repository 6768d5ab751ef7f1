// ─── @mapsync/shared barrel export ───────────────────────

// Types
export type {
  LatLng,
  Point,
  BoundingBox,
  MarkerAnimation,
  MarkerStyle,
  PlacedNode,
  MarkerGroup,
  ThemeKey,
  MapTheme,
  SceneConfig,
  SceneState,
} from './types/map';
export { THEME_KEYS } from './types/map';

export type {
  StyleAttributes,
  PresetStyleInput,
  CycleStyleInput,
  AttributeStyleInput,
  StyleInput,
  CoordinateNodeInput,
  PairNodeInput,
  MapNodeInput,
  MarkerGroupInput,
  ThemePresetName,
  ThemeInput,
  FullStateInput,
} from './types/inputs';

export type {
  SceneEvent,
  SceneEventKind,
  RoomEvent,
  SyncStatus,
  WireNode,
  WireStyle,
  WireGroup,
  FullStatePayload,
  ServerEventFrame,
  ServerReplyFrame,
  ServerFrame,
  ClientMessage,
  BootstrapPayload,
} from './types/events';

export type { LogEventType, LogLevel, LogEvent } from './types/diagnostics';

// Errors
export { ValidationError, ok, fail, toDiagnostic } from './errors';
export type { ValidationErrorCode, Result, SceneDiagnostic } from './errors';

// Schemas
export {
  StyleInputSchema,
  MapNodeInputSchema,
  MarkerGroupInputSchema,
  ThemeInputSchema,
  BoundingBoxSchema,
  SceneConfigInputSchema,
  FullStateInputSchema,
  GroupUpdateInputSchema,
  MarkerAddInputSchema,
  VisibilityInputSchema,
  ThemeChangeInputSchema,
  LocationEntrySchema,
  LocationFileSchema,
} from './schemas/inputs';

export {
  WireNodeSchema,
  WireStyleSchema,
  WireGroupSchema,
  WireThemeSchema,
  WireConfigSchema,
  FullStatePayloadSchema,
  ServerEventSchema,
  ServerReplySchema,
  ClientMessageSchema,
  BootstrapPayloadSchema,
} from './schemas/wire';

export { LogEventTypeSchema, LogLevelSchema, LogEventSchema } from './schemas/diagnostics';

export {
  HealthResponseSchema,
  StatusResponseSchema,
  RoomSummarySchema,
  RoomListResponseSchema,
} from './schemas/http';
export type { HealthResponse, StatusResponse, RoomListResponse } from './schemas/http';

// ─── Validators ──────────────────────────────────────────
export {
  zLatitude,
  zLongitude,
  zLatLngPair,
  zPlacedLatLngPair,
  zHexColour,
  zThemeVariable,
  zColour,
  zRoomKey,
  describeColour,
} from './schemas/validators';
export type { ColourKind } from './schemas/validators';

// Geo
export { createLocationTable, defaultLocationTable } from './geo/locations';
export type { LocationEntry, LocationTable, LocationDefinition, LocationTableOptions } from './geo/locations';
export {
  coordinateNodeId,
  resolveNode,
  projectCoordinates,
  unprojectPoint,
  project,
} from './geo/projection';
export type { ResolveOptions } from './geo/projection';

// Style
export { normalizeStyle, cycleColour, DEFAULT_STYLE } from './style/normalizeStyle';

// Scene
export {
  defaultSceneConfig,
  createSceneState,
  withRevision,
  findGroup,
  uniqueNodeId,
  buildGroup,
  applyGroups,
  replaceState,
  replaceGroupNodes,
  nodesEqual,
  stylesEqual,
  upsertNode,
  addMarker,
  removeMarker,
  changeTheme,
  setGroupVisibility,
} from './scene/sceneState';
export type { SceneContext, SceneUpdate, SceneOptions, GroupNodesInput } from './scene/sceneState';
export { resolveTheme, pickThemeColours, themeDelta } from './scene/theme';
export { applySceneEvent } from './scene/applyEvent';
export { diffScenes, fullStateEvent } from './scene/diff';
export { sceneFingerprint } from './scene/fingerprint';

// Wire codec
export {
  encodeNode,
  encodeStyle,
  encodeGroup,
  encodeTheme,
  encodeConfig,
  encodeFullState,
  encodeEvent,
  encodeRoomEvent,
  decodeNode,
  decodeStyle,
  decodeGroup,
  decodeConfig,
  decodeFullState,
  decodeEvent,
  parseServerFrame,
} from './wire/codec';
export type { DecodeContext, Decoded } from './wire/codec';

// Constants
export * from './constants';
