import WebSocket from 'ws';
import { createLogger, type ComponentLogger } from '@toolrelay/logger';
import { ConnectError, TransportIOError } from '../errors';
import type { NetworkServerDescriptor } from '../types/server';
import { AsyncQueue } from './message-queue';
import type { Transport, TransportOptions } from './types';

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_CLOSE_TIMEOUT_MS = 2_000;
const NORMAL_CLOSURE = 1000;

type SocketState = 'idle' | 'opening' | 'open' | 'closing' | 'closed';

const rawDataToString = (data: WebSocket.RawData): string => {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
};

/**
 * Persistent WebSocket connection to a remote tool server.
 * Each text message carries exactly one JSON-RPC message.
 */
export class NetworkTransport implements Transport {
  readonly kind = 'network';

  private socket: WebSocket | undefined;
  private state: SocketState = 'idle';
  private closing: Promise<void> | undefined;
  private readonly inbound = new AsyncQueue<string>();
  private readonly log: ComponentLogger;

  constructor(
    private readonly descriptor: NetworkServerDescriptor,
    private readonly options: TransportOptions = {}
  ) {
    this.log = createLogger('network-transport', { serverName: descriptor.name });
  }

  get isOpen(): boolean {
    return this.state === 'open' && this.socket?.readyState === WebSocket.OPEN;
  }

  async open(): Promise<void> {
    if (this.state !== 'idle') {
      throw new ConnectError(`Transport for "${this.descriptor.name}" has already been opened`);
    }
    this.state = 'opening';

    const { url, headers } = this.descriptor;
    this.log.debug('Connecting to tool server', { url });

    let socket: WebSocket;
    try {
      socket = new WebSocket(url, {
        headers,
        handshakeTimeout: this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      });
    } catch (error) {
      this.markClosed();
      throw new ConnectError(`Invalid WebSocket url "${url}"`, { cause: error });
    }
    this.socket = socket;

    socket.on('message', (data: WebSocket.RawData) => {
      this.inbound.push(rawDataToString(data));
    });
    socket.on('error', error => {
      this.log.debug('WebSocket error', { error });
    });
    socket.on('close', (code: number, reason: Buffer) => this.handleClose(code, reason.toString('utf8')));

    try {
      await new Promise<void>((resolve, reject) => {
        const cleanup = () => {
          socket.off('open', onOpen);
          socket.off('error', onError);
          socket.off('close', onClose);
        };
        const onOpen = () => {
          cleanup();
          resolve();
        };
        const onError = (error: Error) => {
          cleanup();
          reject(new ConnectError(`Failed to connect to ${url}: ${error.message}`, { cause: error }));
        };
        const onClose = (code: number) => {
          cleanup();
          reject(new ConnectError(`Connection to ${url} closed during handshake (code ${code})`));
        };
        socket.once('open', onOpen);
        socket.once('error', onError);
        socket.once('close', onClose);
      });
    } catch (error) {
      socket.terminate();
      this.markClosed();
      throw error;
    }

    if (this.state !== 'opening') {
      throw new ConnectError(`Transport for "${this.descriptor.name}" was closed while opening`);
    }
    this.state = 'open';
    this.log.debug('Connected to tool server', { url });
  }

  async send(message: string): Promise<void> {
    const socket = this.socket;
    if (!socket || this.state !== 'open' || socket.readyState !== WebSocket.OPEN) {
      throw new TransportIOError(`Cannot write to "${this.descriptor.name}": transport is ${this.state}`);
    }

    await new Promise<void>((resolve, reject) => {
      socket.send(message, error => {
        if (error) {
          reject(new TransportIOError(`Failed to write to "${this.descriptor.name}": ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): AsyncIterable<string> {
    return this.inbound;
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState === WebSocket.CLOSED) {
      this.markClosed();
      return;
    }

    this.state = 'closing';
    this.inbound.end();

    const graceMs = this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    await new Promise<void>(resolve => {
      const forceClose = setTimeout(() => {
        this.log.warn('WebSocket close handshake timed out, terminating', undefined, { graceMs });
        socket.terminate();
      }, graceMs);
      socket.once('close', () => {
        clearTimeout(forceClose);
        resolve();
      });
      socket.close(NORMAL_CLOSURE, 'client closing');
    });
    this.markClosed();
  }

  private handleClose(code: number, reason: string): void {
    const unexpected = this.state === 'open';
    this.state = 'closed';

    if (unexpected) {
      this.log.warn('Tool server connection closed unexpectedly', undefined, { code, reason });
      this.inbound.fail(
        new TransportIOError(`Connection to "${this.descriptor.name}" closed unexpectedly (code ${code})`, {
          details: { code, reason },
        })
      );
    } else {
      this.inbound.end();
    }
  }

  private markClosed(): void {
    this.state = 'closed';
    this.inbound.end();
  }
}
