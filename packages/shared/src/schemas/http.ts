import { z } from 'zod';

// ─── HTTP Response Schemas ───────────────────────────────

export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  service: z.string(),
  version: z.string(),
  uptime: z.number().nonnegative(),
  timestamp: z.string(),
  rooms: z.number().int().nonnegative(),
  members: z.number().int().nonnegative(),
});

export const StatusResponseSchema = z.object({
  alive: z.boolean(),
  uptime: z.number().nonnegative(),
  rooms: z.number().int().nonnegative(),
  diagnosticsCount: z.number().int().nonnegative(),
});

export const RoomSummarySchema = z.object({
  roomKey: z.string().min(1),
  state: z.enum(['empty', 'active', 'draining']),
  members: z.number().int().nonnegative(),
  producers: z.number().int().nonnegative(),
  groups: z.number().int().nonnegative(),
  revision: z.number().int().nonnegative(),
  updatedAt: z.number(),
});

export const RoomListResponseSchema = z.object({
  ok: z.literal(true),
  rooms: z.array(RoomSummarySchema),
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type StatusResponse = z.infer<typeof StatusResponseSchema>;
export type RoomListResponse = z.infer<typeof RoomListResponseSchema>;
