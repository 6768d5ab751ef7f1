// ─── Operator Diagnostics ────────────────────────────────
// Recorded by the sync server. Never shown to end users.

export type LogEventType =
  | 'ROOM_CREATED'
  | 'ROOM_DRAINING'
  | 'ROOM_DISCARDED'
  | 'MEMBER_JOINED'
  | 'MEMBER_LEFT'
  | 'MEMBER_DROPPED'
  | 'JOIN_REJECTED'
  | 'PUBLISH'
  | 'VALIDATION_SKIP'
  | 'PROTOCOL_ERROR'
  | 'SYNC_REQUEST'
  | 'ERROR';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

export interface LogEvent {
  id: string;
  timestamp: number;
  type: LogEventType;
  /** Room the event concerns, when there is one */
  room?: string;
  payload: unknown;
  level: LogLevel;
}
