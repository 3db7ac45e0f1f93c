import { EventEmitter } from 'eventemitter3';
import {
  CallToolResultSchema,
  InitializeResultSchema,
  LATEST_PROTOCOL_VERSION,
  ListResourcesResultSchema,
  ListToolsResultSchema,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import { createLogger, LogLevel, type ComponentLogger } from '@toolrelay/logger';
import {
  ConnectError,
  ConnectionLostError,
  HandshakeError,
  ProtocolError,
  RequestCancelledError,
  ToolCallError,
  errorMessage,
  toError,
} from '../errors';
import type { PendingRequestTable, AbandonReason, Outcome } from '../session/pending-table';
import { AsyncQueue } from '../transport/message-queue';
import type { Transport } from '../transport/types';
import type { Capability, Resource, ServerInfo, ServerNotification, ToolCallResult } from '../types/tools';
import {
  ErrorCode,
  decodeMessage,
  encodeError,
  encodeNotification,
  encodeRequest,
  encodeResult,
  type InboundMessage,
  type RequestId,
} from './messages';

export interface ClientInfo {
  name: string;
  version: string;
}

export interface ConnectorOptions {
  serverName: string;
  clientInfo: ClientInfo;
  pending: PendingRequestTable;
}

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HandshakeResult {
  serverInfo: ServerInfo;
  capabilities: Capability[];
  resources: Resource[];
}

export interface ConnectorEvents {
  disconnected: (error?: Error) => void;
}

type ConnectorState = 'idle' | 'open' | 'closed';

/**
 * JSON-RPC endpoint over a single transport.
 *
 * Inbound frames are decoded into a tagged union and routed two ways:
 * responses complete entries in the pending table, notifications are queued
 * for `notifications()`. Requests initiated by the server are answered
 * directly.
 */
export class Connector extends EventEmitter<ConnectorEvents> {
  private state: ConnectorState = 'idle';
  private pump: Promise<void> = Promise.resolve();
  private closing: Promise<void> | undefined;
  private readonly inboundNotifications = new AsyncQueue<ServerNotification>();
  private readonly log: ComponentLogger;

  constructor(
    private readonly transport: Transport,
    private readonly options: ConnectorOptions
  ) {
    super();
    this.log = createLogger('connector', { serverName: options.serverName });
  }

  get isOpen(): boolean {
    return this.state === 'open' && this.transport.isOpen;
  }

  get serverName(): string {
    return this.options.serverName;
  }

  async open(): Promise<void> {
    if (this.state !== 'idle') {
      throw new ConnectError(`Connector for "${this.serverName}" has already been opened`);
    }
    try {
      await this.transport.open();
    } catch (error) {
      this.state = 'closed';
      this.inboundNotifications.end();
      throw error instanceof ConnectError
        ? error
        : new ConnectError(`Failed to open transport to "${this.serverName}": ${errorMessage(error)}`, { cause: error });
    }
    this.state = 'open';
    this.pump = this.readLoop();
  }

  private async readLoop(): Promise<void> {
    let failure: Error | undefined;
    try {
      for await (const frame of this.transport.receive()) {
        this.dispatch(frame);
      }
    } catch (error) {
      failure = toError(error);
    }

    this.inboundNotifications.end();
    if (this.state === 'open') {
      this.state = 'closed';
      this.log.warn('Connection to tool server lost', failure);
      this.transport.close().catch(error => this.log.debug('Error releasing transport', { error }));
      this.emit('disconnected', failure);
    }
  }

  private dispatch(frame: string): void {
    const decoded = decodeMessage(frame);
    if (!decoded.ok) {
      this.log.warn('Dropping malformed message', undefined, { reason: decoded.reason, frame: frame.slice(0, 200) });
      return;
    }

    const message = decoded.message;
    switch (message.kind) {
      case 'response':
        this.complete(message.id, { ok: true, value: message.result });
        break;
      case 'error':
        if (message.id === null) {
          this.log.warn('Tool server reported an uncorrelated error', undefined, { code: message.error.code, reason: message.error.message });
          break;
        }
        this.complete(message.id, {
          ok: false,
          error: new ToolCallError(message.error.message, message.error.code, message.error.data),
        });
        break;
      case 'notification':
        this.inboundNotifications.push({ method: message.method, ...(message.params && { params: message.params }) });
        break;
      case 'request':
        this.answerPeerRequest(message);
        break;
    }
  }

  private complete(id: RequestId, outcome: Outcome): void {
    const accepted = typeof id === 'number' && this.options.pending.settle(id, outcome);
    if (!accepted) {
      this.log.debug('Discarding response for unknown or completed request', { requestId: id });
    }
  }

  private answerPeerRequest(message: Extract<InboundMessage, { kind: 'request' }>): void {
    const reply =
      message.method === 'ping'
        ? encodeResult(message.id, {})
        : encodeError(message.id, ErrorCode.MethodNotFound, `Method not found: ${message.method}`);

    if (message.method !== 'ping') {
      this.log.debug('Rejecting unsupported server request', { method: message.method });
    }
    this.transport.send(reply).catch(error => this.log.warn('Failed to answer server request', error, { method: message.method }));
  }

  /**
   * Send a request and wait for its response.
   * The correlation id comes from the session's pending table, which also
   * enforces the deadline and abort signal.
   */
  request(method: string, params?: Record<string, unknown>, options: RequestOptions = {}): Promise<unknown> {
    if (this.state !== 'open') {
      return Promise.reject(new ConnectionLostError(`Connection to "${this.serverName}" is not open`));
    }
    if (options.signal?.aborted) {
      return Promise.reject(new RequestCancelledError(`Request "${method}" was cancelled before it was sent`));
    }

    const pending = this.options.pending;
    const id = pending.allocate();
    const payload = encodeRequest(id, method, params);
    const completion = pending.register({
      id,
      method,
      payload,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      onAbandon: (abandonedId, reason) => this.sendCancellation(abandonedId, reason),
    });

    this.transport.send(payload).catch(error => {
      pending.settle(id, {
        ok: false,
        error: new ConnectionLostError(`Failed to send "${method}" to "${this.serverName}": ${errorMessage(error)}`, {
          cause: error,
        }),
      });
    });

    return completion;
  }

  async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    if (this.state !== 'open') {
      throw new ConnectionLostError(`Connection to "${this.serverName}" is not open`);
    }
    await this.transport.send(encodeNotification(method, params));
  }

  private sendCancellation(id: number, reason: AbandonReason): void {
    if (this.state !== 'open') {
      return;
    }
    const text = reason === 'timeout' ? 'Request timed out' : 'Request cancelled by client';
    this.notify('notifications/cancelled', { requestId: id, reason: text }).catch(error =>
      this.log.debug('Failed to send cancellation', { requestId: id, error })
    );
  }

  /** Inbound notifications, in arrival order. Ends when the connector closes. */
  notifications(): AsyncIterable<ServerNotification> {
    return this.inboundNotifications;
  }

  /**
   * Initialization exchange: `initialize`, `notifications/initialized`, then
   * capability discovery. Every failure, including timeouts and a dropped
   * connection, surfaces as HandshakeError.
   */
  async handshake(timeoutMs: number): Promise<HandshakeResult> {
    const deadline = Date.now() + timeoutMs;
    const remaining = () => Math.max(1, deadline - Date.now());
    const timer = this.log.timer('handshake');

    this.log.info('Starting handshake', { timeoutMs });
    try {
      const raw = await this.request(
        'initialize',
        {
          protocolVersion: LATEST_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: { name: this.options.clientInfo.name, version: this.options.clientInfo.version },
        },
        { timeoutMs: remaining() }
      );

      const parsed = InitializeResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new HandshakeError(`Malformed initialize result from "${this.serverName}"`, {
          details: { issues: parsed.error.issues.map(issue => issue.message) },
        });
      }
      const init = parsed.data;
      if (!SUPPORTED_PROTOCOL_VERSIONS.includes(init.protocolVersion)) {
        throw new HandshakeError(`Server "${this.serverName}" speaks unsupported protocol version ${init.protocolVersion}`);
      }

      await this.notify('notifications/initialized');

      const capabilities = init.capabilities.tools ? await this.listTools(remaining()) : [];
      const resources = init.capabilities.resources ? await this.listResources(remaining()) : [];

      const serverInfo: ServerInfo = {
        name: init.serverInfo.name,
        version: init.serverInfo.version,
        protocolVersion: init.protocolVersion,
        ...(init.instructions !== undefined && { instructions: init.instructions }),
      };

      timer.stop(LogLevel.INFO, {
        server: serverInfo.name,
        protocolVersion: serverInfo.protocolVersion,
        toolCount: capabilities.length,
        resourceCount: resources.length,
      });
      return { serverInfo, capabilities, resources };
    } catch (error) {
      timer.stopWithError(error);
      if (error instanceof HandshakeError) {
        throw error;
      }
      throw new HandshakeError(`Handshake with "${this.serverName}" failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Fetch every page of `tools/list`. */
  async listTools(timeoutMs?: number): Promise<Capability[]> {
    const deadline = timeoutMs !== undefined ? Date.now() + timeoutMs : undefined;
    const capabilities: Capability[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;

    do {
      const raw = await this.request('tools/list', cursor !== undefined ? { cursor } : undefined, {
        timeoutMs: deadline !== undefined ? Math.max(1, deadline - Date.now()) : undefined,
      });
      const parsed = ListToolsResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolError(`Malformed tools/list result from "${this.serverName}"`);
      }
      for (const tool of parsed.data.tools) {
        capabilities.push({
          name: tool.name,
          ...(tool.description !== undefined && { description: tool.description }),
          inputSchema: { ...tool.inputSchema },
        });
      }
      cursor = parsed.data.nextCursor;
      if (cursor !== undefined) {
        if (seenCursors.has(cursor)) {
          throw new ProtocolError(`Server "${this.serverName}" repeated pagination cursor "${cursor}"`);
        }
        seenCursors.add(cursor);
      }
    } while (cursor !== undefined);

    return capabilities;
  }

  /** Fetch every page of `resources/list`. */
  async listResources(timeoutMs?: number): Promise<Resource[]> {
    const deadline = timeoutMs !== undefined ? Date.now() + timeoutMs : undefined;
    const resources: Resource[] = [];
    let cursor: string | undefined;
    const seenCursors = new Set<string>();

    do {
      const raw = await this.request('resources/list', cursor !== undefined ? { cursor } : undefined, {
        timeoutMs: deadline !== undefined ? Math.max(1, deadline - Date.now()) : undefined,
      });
      const parsed = ListResourcesResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolError(`Malformed resources/list result from "${this.serverName}"`);
      }
      for (const resource of parsed.data.resources) {
        resources.push({
          uri: resource.uri,
          name: resource.name,
          ...(resource.description !== undefined && { description: resource.description }),
          ...(resource.mimeType !== undefined && { mimeType: resource.mimeType }),
        });
      }
      cursor = parsed.data.nextCursor;
      if (cursor !== undefined) {
        if (seenCursors.has(cursor)) {
          throw new ProtocolError(`Server "${this.serverName}" repeated pagination cursor "${cursor}"`);
        }
        seenCursors.add(cursor);
      }
    } while (cursor !== undefined);

    return resources;
  }

  async callTool(name: string, args: Record<string, unknown>, options: RequestOptions = {}): Promise<ToolCallResult> {
    const raw = await this.request('tools/call', { name, arguments: args }, options);
    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError(`Malformed tools/call result for "${name}" from "${this.serverName}"`);
    }
    return {
      content: parsed.data.content.map(item => ({ ...item })),
      ...(parsed.data.structuredContent !== undefined && { structuredContent: { ...parsed.data.structuredContent } }),
      isError: parsed.data.isError === true,
    };
  }

  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.state = 'closed';
    this.inboundNotifications.end();
    try {
      await this.transport.close();
    } finally {
      await this.pump;
    }
  }
}
