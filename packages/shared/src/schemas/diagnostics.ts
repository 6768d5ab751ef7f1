import { z } from 'zod';

export const LogEventTypeSchema = z.enum([
  'ROOM_CREATED', 'ROOM_DRAINING', 'ROOM_DISCARDED',
  'MEMBER_JOINED', 'MEMBER_LEFT', 'MEMBER_DROPPED', 'JOIN_REJECTED',
  'PUBLISH', 'VALIDATION_SKIP', 'PROTOCOL_ERROR', 'SYNC_REQUEST', 'ERROR',
]);

export const LogLevelSchema = z.enum(['INFO', 'WARN', 'ERROR']);

export const LogEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  type: LogEventTypeSchema,
  room: z.string().optional(),
  payload: z.unknown(),
  level: LogLevelSchema,
});
