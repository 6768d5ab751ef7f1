// ─── @mapsync/web barrel export ──────────────────────────

export { MapReconciler, isSupported } from './lib/reconciler/MapReconciler';
export type { ReconcilerOptions, ReconcilerState } from './lib/reconciler/MapReconciler';
export { applyServerEvent, createMirror } from './lib/reconciler/mirror';
export type { MapMirror, MirrorUpdate, RenderChange } from './lib/reconciler/mirror';
export { validateServerState, validateMarkerData, validateServerEvent } from './lib/reconciler/validate';
export { backoffDelay } from './lib/reconciler/backoff';
export { readBootstrap } from './lib/bootstrap';
export type { BootstrapResult } from './lib/bootstrap';

export type { RenderSurface } from './render/RenderSurface';
export { SvgMapSurface } from './render/svgSurface';

export type { MapTransport, ClientRequest, Unsubscribe } from './services/mapTransport';
export { TransportError } from './services/mapTransport';
export { WebSocketMapTransport } from './services/mapSocket';
export type { WebSocketMapTransportOptions } from './services/mapSocket';
export { getHealth, listRooms, getRoomBootstrap } from './services/backendClient';
export type { ApiResult } from './services/backendClient';

export { useLiveMap } from './hooks/useLiveMap';
export type { UseLiveMapOptions, LiveMapHandle } from './hooks/useLiveMap';
export { LiveMap } from './components/LiveMap';
export { Badge, ConnectionBadge } from './components/Badge';
