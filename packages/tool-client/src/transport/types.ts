import type { ServerDescriptor, TransportKind } from '../types/server';

/**
 * A bidirectional, message-framed byte channel to one tool server.
 *
 * `receive()` yields decoded frames lazily. It ends on graceful EOF and
 * throws TransportIOError when the peer disappears. A transport is opened
 * once; after `close()` a fresh instance is required.
 */
export interface Transport {
  readonly kind: TransportKind;
  readonly isOpen: boolean;
  open(): Promise<void>;
  send(message: string): Promise<void>;
  receive(): AsyncIterable<string>;
  close(): Promise<void>;
}

export type TransportFactory = (descriptor: ServerDescriptor) => Transport;

export interface TransportOptions {
  /** Connect or spawn deadline. */
  connectTimeoutMs?: number;
  /** Grace period between the polite and the forced shutdown. */
  closeTimeoutMs?: number;
  maxFrameBytes?: number;
}
