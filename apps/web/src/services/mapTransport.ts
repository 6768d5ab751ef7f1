import type { ClientMessage, ServerReplyFrame } from '@mapsync/shared';

/** A client message before the transport stamps its ref. */
export type ClientRequest = {
  [K in ClientMessage['type']]: Omit<Extract<ClientMessage, { type: K }>, 'ref'>;
}[ClientMessage['type']];

export type Unsubscribe = () => void;

/**
 * What the reconciler needs from a connection. Events arrive as raw JSON
 * and are validated by the reconciler; replies are matched by ref.
 */
export interface MapTransport {
  connect(): Promise<void>;
  request(message: ClientRequest, timeoutMs: number): Promise<ServerReplyFrame>;
  onEvent(listener: (raw: unknown) => void): Unsubscribe;
  onClose(listener: (reason: string) => void): Unsubscribe;
  close(): void;
}

export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}
