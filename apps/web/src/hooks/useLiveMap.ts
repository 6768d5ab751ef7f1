'use client';

import { useCallback, useEffect, useRef, useState, type RefObject } from 'react';
import type { BootstrapPayload } from '@mapsync/shared';
import { MapReconciler, type ReconcilerOptions, type ReconcilerState } from '@/lib/reconciler/MapReconciler';
import { SvgMapSurface } from '@/render/svgSurface';
import { WebSocketMapTransport } from '@/services/mapSocket';
import type { MapTransport } from '@/services/mapTransport';

export interface UseLiveMapOptions
  extends Pick<
    ReconcilerOptions,
    'maxAttempts' | 'baseDelayMs' | 'maxDelayMs' | 'requestTimeoutMs' | 'healthCheckMs' | 'isSupported' | 'legacy'
  > {
  bootstrap: BootstrapPayload;
  socketUrl: string;
  /** Overrides the browser WebSocket transport. */
  createTransport?: () => MapTransport;
  onFallback?: (reason: string) => void;
}

export interface LiveMapHandle {
  state: ReconcilerState;
  fallbackReason: string | null;
  retry: () => void;
}

/** Mount a reconciler on the referenced <svg> for as long as the component lives. */
export function useLiveMap(svgRef: RefObject<SVGSVGElement>, options: UseLiveMapOptions): LiveMapHandle {
  const [state, setState] = useState<ReconcilerState>('disconnected');
  const [fallbackReason, setFallbackReason] = useState<string | null>(null);
  const reconcilerRef = useRef<MapReconciler | null>(null);
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const { socketUrl } = options;
  const room = options.bootstrap.room;

  useEffect(() => {
    const current = optionsRef.current;
    const svg = svgRef.current;
    const surface = svg ? new SvgMapSurface(svg) : null;

    const reconciler = new MapReconciler({
      room,
      surface,
      bootstrap: current.bootstrap,
      legacy: current.legacy,
      maxAttempts: current.maxAttempts,
      baseDelayMs: current.baseDelayMs,
      maxDelayMs: current.maxDelayMs,
      requestTimeoutMs: current.requestTimeoutMs,
      healthCheckMs: current.healthCheckMs,
      isSupported: current.isSupported,
      createTransport: current.createTransport ?? (() => new WebSocketMapTransport(socketUrl)),
      onFallback: (reason) => {
        setFallbackReason(reason);
        optionsRef.current.onFallback?.(reason);
      },
    });
    reconcilerRef.current = reconciler;

    const unsubscribe = reconciler.subscribe(setState);
    setFallbackReason(null);
    reconciler.start();
    setState(reconciler.getState());

    return () => {
      unsubscribe();
      reconciler.destroy();
      reconcilerRef.current = null;
      // fallback leaves the static marker on the element for the host page
      if (reconciler.getState() !== 'fallback') surface?.dispose();
    };
  }, [room, socketUrl, svgRef]);

  const retry = useCallback(() => {
    reconcilerRef.current?.retry();
  }, []);

  return { state, fallbackReason, retry };
}
