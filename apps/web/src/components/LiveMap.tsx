'use client';

import { useRef } from 'react';
import type { BootstrapPayload } from '@mapsync/shared';
import { useLiveMap, type UseLiveMapOptions } from '@/hooks/useLiveMap';
import { ConnectionBadge } from './Badge';

interface LiveMapProps extends Omit<UseLiveMapOptions, 'bootstrap'> {
  bootstrap: BootstrapPayload;
  title?: string;
  className?: string;
}

export function LiveMap({ bootstrap, title = 'Live map', className = '', ...options }: LiveMapProps) {
  const svgRef = useRef<SVGSVGElement>(null);
  const { state, fallbackReason } = useLiveMap(svgRef, { ...options, bootstrap });

  return (
    <div className={`relative ${className}`} data-room={bootstrap.room}>
      <svg
        ref={svgRef}
        id={bootstrap.surface_id}
        role="img"
        aria-label={title}
        className="h-full w-full"
        preserveAspectRatio="xMidYMid meet"
      />
      <div className="absolute right-2 top-2">
        <ConnectionBadge state={state} />
      </div>
      {fallbackReason && (
        <p className="sr-only" role="status">
          Live updates unavailable: {fallbackReason}
        </p>
      )}
    </div>
  );
}
