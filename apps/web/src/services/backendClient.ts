// ─── Backend API Client ──────────────────────────────────
// Typed HTTP access to the sync backend. Reads NEXT_PUBLIC_BACKEND_URL
// from env, defaults to http://localhost:4000.

import {
  BootstrapPayloadSchema,
  HealthResponseSchema,
  RoomListResponseSchema,
  type BootstrapPayload,
  type HealthResponse,
  type RoomListResponse,
} from '@mapsync/shared';
import type { z } from 'zod';

const DEFAULT_BASE_URL =
  (typeof process !== 'undefined' ? process.env.NEXT_PUBLIC_BACKEND_URL : undefined) ?? 'http://localhost:4000';

const TIMEOUT_MS = 10_000;

// ─── Result wrapper ──────────────────────────────────────

export type ApiResult<T> =
  | { ok: true; data: T; error?: undefined }
  | { ok: false; error: string; data?: undefined };

// ─── Internal helpers ────────────────────────────────────

async function request<T>(
  baseUrl: string,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init?: RequestInit,
): Promise<ApiResult<T>> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TIMEOUT_MS);

  try {
    const res = await fetch(`${baseUrl}${path}`, {
      ...init,
      signal: controller.signal,
      headers: {
        'Content-Type': 'application/json',
        ...(init?.headers ?? {}),
      },
    });

    if (!res.ok) {
      const text = await res.text().catch(() => res.statusText);
      return { ok: false, error: `HTTP ${res.status}: ${text}` };
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      return { ok: false, error: `Unexpected response from ${path}` };
    }
    return { ok: true, data: parsed.data };
  } catch (err: unknown) {
    if (err instanceof DOMException && err.name === 'AbortError') {
      return { ok: false, error: 'Request timed out (10s)' };
    }
    return {
      ok: false,
      error: err instanceof Error ? err.message : String(err),
    };
  } finally {
    clearTimeout(timer);
  }
}

// ─── Public API ──────────────────────────────────────────

export function getHealth(baseUrl: string = DEFAULT_BASE_URL): Promise<ApiResult<HealthResponse>> {
  return request(baseUrl, '/health', HealthResponseSchema);
}

export function listRooms(baseUrl: string = DEFAULT_BASE_URL): Promise<ApiResult<RoomListResponse>> {
  return request(baseUrl, '/api/rooms', RoomListResponseSchema);
}

/** Initial state for a room, for pages that did not embed one. */
export function getRoomBootstrap(
  room: string,
  surfaceId?: string,
  baseUrl: string = DEFAULT_BASE_URL,
): Promise<ApiResult<BootstrapPayload>> {
  const query = surfaceId ? `?surface=${encodeURIComponent(surfaceId)}` : '';
  return request(baseUrl, `/api/rooms/${encodeURIComponent(room)}/bootstrap${query}`, BootstrapPayloadSchema);
}
