'use client';

import type { ReactNode } from 'react';
import { Loader2, Radio, WifiOff } from 'lucide-react';
import type { ReconcilerState } from '@/lib/reconciler/MapReconciler';

interface BadgeProps {
  children: ReactNode;
  variant?: 'success' | 'error' | 'warning' | 'info' | 'default';
  size?: 'sm' | 'md' | 'lg';
  testId?: string;
}

const variantStyles = {
  success: 'bg-green-900/30 text-green-400 border-green-900/50',
  error: 'bg-red-900/30 text-red-400 border-red-900/50',
  warning: 'bg-yellow-900/30 text-yellow-400 border-yellow-900/50',
  info: 'bg-blue-900/30 text-blue-400 border-blue-900/50',
  default: 'bg-gray-900/30 text-gray-400 border-gray-800',
};

const sizeStyles = {
  sm: 'px-2 py-0.5 text-xs',
  md: 'px-3 py-1 text-sm',
  lg: 'px-4 py-1.5 text-base',
};

export function Badge({ children, variant = 'default', size = 'md', testId }: BadgeProps) {
  return (
    <span
      data-testid={testId}
      className={`
        inline-flex items-center justify-center gap-1 rounded-full border font-semibold
        ${variantStyles[variant]}
        ${sizeStyles[size]}
      `}
    >
      {children}
    </span>
  );
}

/** LIVE while joined, STATIC once the surface has fallen back. */
export function ConnectionBadge({ state }: { state: ReconcilerState }) {
  if (state === 'joined') {
    return (
      <Badge variant="success" size="sm" testId="connection-badge">
        <Radio className="h-3 w-3" aria-hidden />
        LIVE
      </Badge>
    );
  }
  if (state === 'fallback') {
    return (
      <Badge variant="warning" size="sm" testId="connection-badge">
        <WifiOff className="h-3 w-3" aria-hidden />
        STATIC
      </Badge>
    );
  }
  return (
    <Badge variant="info" size="sm" testId="connection-badge">
      <Loader2 className="h-3 w-3 animate-spin" aria-hidden />
      {state === 'recovering' ? 'RECONNECTING' : 'CONNECTING'}
    </Badge>
  );
}
