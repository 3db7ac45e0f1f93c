import { EventEmitter } from 'eventemitter3';
import { createLogger, LogLevel, type ComponentLogger } from '@toolrelay/logger';
import { Connector, type ClientInfo } from '../connector/connector';
import {
  ConnectionLostError,
  InvalidArgumentsError,
  SessionClosedError,
  SessionNotReadyError,
  TimeoutError,
  UnknownCapabilityError,
} from '../errors';
import type { TransportFactory } from '../transport/types';
import type { ServerDescriptor, SessionState } from '../types/server';
import type { CallOptions, Capability, Resource, ServerInfo, ServerNotification, ToolCallResult } from '../types/tools';
import { ArgumentValidator } from './argument-validator';
import { PendingRequestTable } from './pending-table';

export const TOOLS_LIST_CHANGED = 'notifications/tools/list_changed';

export interface SessionOptions {
  clientInfo: ClientInfo;
  /** Deadline for the whole initialization exchange, and for capability refreshes. */
  discoveryTimeoutMs: number;
  /** Default per-call deadline when `call` is given none. */
  invocationTimeoutMs: number;
  transportFactory: TransportFactory;
}

export interface SessionEvents {
  state: (state: SessionState, previous: SessionState) => void;
  notification: (notification: ServerNotification) => void;
  'capabilities:changed': (capabilities: readonly Capability[]) => void;
}

/**
 * One logical conversation with one tool server.
 *
 * State machine: connecting → ready → degraded → closed. `closed` is
 * terminal; a degraded session is replaced, never revived.
 */
export class Session extends EventEmitter<SessionEvents> {
  private currentState: SessionState = 'connecting';
  private readonly pending = new PendingRequestTable();
  private readonly connector: Connector;
  private readonly validator = new ArgumentValidator();
  private readonly log: ComponentLogger;

  private capabilitySet: readonly Capability[] | undefined;
  private capabilityIndex = new Map<string, Capability>();
  private resourceList: readonly Resource[] = [];
  private info: ServerInfo | undefined;

  private starting: Promise<void> | undefined;
  private connectionLost = false;
  private closing: Promise<void> | undefined;
  private notificationPump: Promise<void> = Promise.resolve();

  constructor(
    readonly descriptor: ServerDescriptor,
    private readonly options: SessionOptions
  ) {
    super();
    this.log = createLogger('session', { serverName: descriptor.name });
    this.connector = new Connector(options.transportFactory(descriptor), {
      serverName: descriptor.name,
      clientInfo: options.clientInfo,
      pending: this.pending,
    });
    this.connector.on('disconnected', error => this.handleDisconnect(error));
  }

  get name(): string {
    return this.descriptor.name;
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** Discovered capabilities; undefined until the handshake completes. */
  get capabilities(): readonly Capability[] | undefined {
    return this.capabilitySet;
  }

  get resources(): readonly Resource[] {
    return this.resourceList;
  }

  get serverInfo(): ServerInfo | undefined {
    return this.info;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Open the transport and run the handshake. Concurrent callers share one
   * attempt, bounded by the first caller's `timeoutMs`. On failure the
   * session is closed and the error rethrown.
   */
  start(timeoutMs: number = this.options.discoveryTimeoutMs): Promise<void> {
    if (this.closing) {
      return Promise.reject(new SessionClosedError(`Session "${this.name}" is closed`));
    }
    this.starting ??= this.establish(timeoutMs);
    return this.starting;
  }

  private async establish(timeoutMs: number): Promise<void> {
    try {
      await this.connector.open();
      const result = await this.connector.handshake(timeoutMs);
      if (this.currentState !== 'connecting') {
        throw new SessionClosedError(`Session "${this.name}" was closed during the handshake`);
      }
      if (this.connectionLost || !this.connector.isOpen) {
        throw new ConnectionLostError(`Connection to "${this.name}" was lost right after the handshake`);
      }

      this.info = result.serverInfo;
      this.resourceList = Object.freeze([...result.resources]);
      this.applyCapabilities(result.capabilities);
      this.transition('ready');
      this.notificationPump = this.pumpNotifications();
    } catch (error) {
      const closedMeanwhile = this.currentState === 'closed';
      await this.close();
      if (closedMeanwhile && !(error instanceof SessionClosedError)) {
        throw new SessionClosedError(`Session "${this.name}" was closed while starting`, { cause: error });
      }
      throw error;
    }
  }

  private async pumpNotifications(): Promise<void> {
    for await (const notification of this.connector.notifications()) {
      this.log.debug('Notification received', { method: notification.method });
      try {
        this.emit('notification', notification);
      } catch (error) {
        this.log.warn('Notification listener failed', error, { method: notification.method });
      }

      if (notification.method === TOOLS_LIST_CHANGED && this.currentState === 'ready') {
        this.refreshCapabilities().catch(error => this.log.warn('Failed to refresh capabilities', error));
      }
    }
  }

  /**
   * Re-fetch `tools/list` and swap the capability set in one step.
   * Calls already past validation keep the set they were checked against.
   */
  async refreshCapabilities(timeoutMs: number = this.options.discoveryTimeoutMs): Promise<readonly Capability[]> {
    this.assertReady();
    const capabilities = await this.connector.listTools(timeoutMs);
    if (this.isClosed()) {
      throw new SessionClosedError(`Session "${this.name}" was closed during a capability refresh`);
    }
    return this.applyCapabilities(capabilities);
  }

  private applyCapabilities(capabilities: Capability[]): readonly Capability[] {
    const previous = this.capabilitySet;
    const frozen = Object.freeze(capabilities.map(capability => Object.freeze({ ...capability })));

    this.capabilityIndex = new Map(frozen.map(capability => [capability.name, capability]));
    this.capabilitySet = frozen;

    if (previous !== undefined) {
      this.log.info('Capabilities changed', { toolCount: frozen.length, previousToolCount: previous.length });
      this.emit('capabilities:changed', frozen);
    }
    return frozen;
  }

  /**
   * Invoke a capability. Arguments are validated against its input schema
   * before anything is sent.
   */
  async call(capabilityName: string, args: Record<string, unknown> = {}, options: CallOptions = {}): Promise<ToolCallResult> {
    this.assertReady();

    const capability = this.capabilityIndex.get(capabilityName);
    if (!capability) {
      throw new UnknownCapabilityError(capabilityName, this.name);
    }

    const validation = this.validator.validate(capabilityName, capability.inputSchema, args);
    if (!validation.valid) {
      throw new InvalidArgumentsError(capabilityName, validation.issues);
    }

    const timeoutMs = options.timeoutMs ?? this.options.invocationTimeoutMs;
    const timer = this.log.timer('tools/call', { tool: capabilityName });
    this.log.debug('Calling tool', { tool: capabilityName, timeoutMs });

    try {
      const result = await this.connector.callTool(capabilityName, args, { timeoutMs, signal: options.signal });
      timer.stop(LogLevel.DEBUG, { isError: result.isError });
      return result;
    } catch (error) {
      if (error instanceof TimeoutError) {
        timer.stopWithWarning({ timeoutMs });
      } else {
        timer.stopWithError(error);
      }
      throw error;
    }
  }

  private assertReady(): void {
    switch (this.currentState) {
      case 'ready':
        return;
      case 'closed':
        throw new SessionClosedError(`Session "${this.name}" is closed`);
      case 'degraded':
        throw new ConnectionLostError(`Session "${this.name}" has lost its connection`);
      case 'connecting':
        throw new SessionNotReadyError(`Session "${this.name}" is still connecting`);
    }
  }

  private isClosed(): boolean {
    return this.currentState === 'closed';
  }

  private handleDisconnect(cause?: Error): void {
    if (this.isClosed()) {
      return;
    }
    this.connectionLost = true;

    const failed = this.pending.failAll(
      new ConnectionLostError(`Connection to "${this.name}" was lost`, cause ? { cause } : {})
    );
    this.log.warn('Connection lost', cause, { failedRequests: failed, state: this.currentState });

    if (this.currentState === 'ready') {
      this.transition('degraded');
    }
  }

  /** Fail outstanding requests, release the transport and enter `closed`. Never throws. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.transition('closed');
    const failed = this.pending.failAll(new SessionClosedError(`Session "${this.name}" was closed`));

    try {
      await this.connector.close();
    } catch (error) {
      this.log.warn('Error while closing connection', error);
    }
    await this.notificationPump;

    this.capabilitySet = undefined;
    this.capabilityIndex = new Map();
    this.log.info('Session closed', { failedRequests: failed });
  }

  private transition(next: SessionState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    this.log.info('Session state changed', { from: previous, to: next });
    try {
      this.emit('state', next, previous);
    } catch (error) {
      this.log.warn('State listener failed', error, { state: next });
    }
  }
}
