import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';
import { createLogger } from '@toolrelay/logger';
import type { ClientInfo } from '../connector/connector';
import {
  ConfigError,
  ConnectionLostError,
  SessionClosedError,
  SessionNotReadyError,
  UnknownServerError,
  errorMessage,
} from '../errors';
import { loadServerConfig, parseServerConfig } from '../manager/config-loader';
import { Session } from '../session/session';
import { createTransport } from '../transport';
import type { TransportFactory, TransportOptions } from '../transport/types';
import type { ServerDescriptor, ServerDescriptorInput, SessionState } from '../types/server';
import type { CallOptions, Capability, ServerCapability, ServerNotification, ToolCallResult } from '../types/tools';
import { formatIssues } from '../utils';
import { BackoffPolicy, type BackoffOptions } from './backoff';

const log = createLogger('tool-client');

export const DEFAULT_CLIENT_VERSION = '0.1.0';

export const ToolClientOptionsSchema = z.object({
  clientInfo: z
    .object({
      name: z.string().min(1).optional(),
      version: z.string().min(1).optional(),
    })
    .default({}),
  discoveryTimeoutMs: z.number().int().positive().default(30_000),
  invocationTimeoutMs: z.number().int().positive().default(60_000),
});

export interface ToolClientOptions extends z.input<typeof ToolClientOptionsSchema> {
  /** Delay policy for reconnecting a degraded session; only its first delay is used. */
  reconnectBackoff?: BackoffOptions | BackoffPolicy;
  transportFactory?: TransportFactory;
  transportOptions?: TransportOptions;
}

export interface ToolClientEvents {
  'session:state': (serverName: string, state: SessionState, previous: SessionState) => void;
  'session:reconnecting': (serverName: string, delayMs: number) => void;
  notification: (serverName: string, notification: ServerNotification) => void;
}

export interface DiscoverOptions {
  /** Re-fetch the capability list from the server instead of returning the cached one. */
  refresh?: boolean;
  /**
   * Deadline for this discovery instead of `discoveryTimeoutMs`. A start that
   * is already in flight keeps the deadline it was begun with.
   */
  timeoutMs?: number;
}

export type ServerSource = readonly ServerDescriptorInput[] | Readonly<Record<string, unknown>>;

function normalizeServers(servers: ServerSource): readonly ServerDescriptor[] {
  return Array.isArray(servers) ? parseServerConfig({ servers }) : parseServerConfig({ mcpServers: servers });
}

/**
 * Facade over every configured tool server.
 *
 * Owns the server name → Session map. Sessions start lazily on first use;
 * concurrent callers for one server share a single start. A degraded session
 * is replaced at most once per invocation.
 */
export class ToolClient extends EventEmitter<ToolClientEvents> {
  private readonly descriptors = new Map<string, ServerDescriptor>();
  private readonly sessions = new Map<string, Session>();
  private readonly starting = new Map<string, Promise<Session>>();
  private readonly clientInfo: ClientInfo;
  private readonly discoveryTimeoutMs: number;
  private readonly invocationTimeoutMs: number;
  private readonly backoff: BackoffPolicy;
  private readonly transportFactory: TransportFactory;
  private closing: Promise<void> | undefined;

  constructor(servers: ServerSource, options: ToolClientOptions = {}) {
    super();

    const parsed = ToolClientOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigError('Invalid tool client options', formatIssues(parsed.error));
    }

    for (const descriptor of normalizeServers(servers)) {
      this.descriptors.set(descriptor.name, descriptor);
    }

    this.clientInfo = {
      name: parsed.data.clientInfo.name ?? (process.env.TOOLRELAY_CLIENT_NAME || 'toolrelay'),
      version: parsed.data.clientInfo.version ?? DEFAULT_CLIENT_VERSION,
    };
    this.discoveryTimeoutMs = parsed.data.discoveryTimeoutMs;
    this.invocationTimeoutMs = parsed.data.invocationTimeoutMs;
    this.backoff =
      options.reconnectBackoff instanceof BackoffPolicy
        ? options.reconnectBackoff
        : new BackoffPolicy(options.reconnectBackoff);

    const transportOptions = options.transportOptions;
    this.transportFactory = options.transportFactory ?? (descriptor => createTransport(descriptor, transportOptions));

    log.debug('Tool client configured', { servers: [...this.descriptors.keys()] });
  }

  /** Build a client from a JSON file of the form `{ "mcpServers": { ... } }`. */
  static async fromConfigFile(path: string, options: ToolClientOptions = {}): Promise<ToolClient> {
    const descriptors = await loadServerConfig(path);
    return new ToolClient(descriptors, options);
  }

  serverNames(): string[] {
    return [...this.descriptors.keys()];
  }

  getSessionState(serverName: string): SessionState | undefined {
    this.descriptorFor(serverName);
    return this.sessions.get(serverName)?.state;
  }

  /** Capabilities of one server, starting its session if needed. */
  async discover(serverName: string, options: DiscoverOptions = {}): Promise<readonly Capability[]> {
    const { session } = await this.ensureSession(serverName, options.timeoutMs);
    if (options.refresh) {
      return session.refreshCapabilities(options.timeoutMs);
    }
    const capabilities = session.capabilities;
    if (!capabilities) {
      throw new SessionNotReadyError(`Session "${serverName}" has not completed discovery`);
    }
    return capabilities;
  }

  /**
   * Capabilities of every configured server, tagged with the server name.
   * Servers that cannot be started are logged and left out.
   */
  async listTools(): Promise<ServerCapability[]> {
    const results = await Promise.allSettled(
      this.serverNames().map(async serverName => {
        const capabilities = await this.discover(serverName);
        return capabilities.map((capability): ServerCapability => ({ ...capability, serverName }));
      })
    );

    const tools: ServerCapability[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        tools.push(...result.value);
      } else {
        log.warn('Skipping server during tool listing', result.reason, { serverName: this.serverNames()[index] });
      }
    });
    return tools;
  }

  /**
   * Invoke a tool. A lost connection triggers exactly one reconnect and one
   * retry; if that also fails the caller receives ConnectionLostError.
   */
  async invoke(
    serverName: string,
    tool: string,
    args: Record<string, unknown> = {},
    options: CallOptions = {}
  ): Promise<ToolCallResult> {
    const { session, reconnected } = await this.ensureSession(serverName);
    const callOptions: CallOptions = { ...options, timeoutMs: options.timeoutMs ?? this.invocationTimeoutMs };

    try {
      return await session.call(tool, args, callOptions);
    } catch (error) {
      if (!(error instanceof ConnectionLostError) || reconnected || this.closing) {
        throw error;
      }
      log.warn('Connection lost during call, reconnecting once', undefined, { serverName, tool });
      const fresh = await this.reconnect(serverName, session);
      return fresh.call(tool, args, callOptions);
    }
  }

  async closeSession(serverName: string): Promise<void> {
    this.descriptorFor(serverName);
    const session = this.sessions.get(serverName);
    this.sessions.delete(serverName);
    await session?.close();
  }

  /** Close every session. Safe to call more than once. */
  shutdown(): Promise<void> {
    this.closing ??= this.closeAll();
    return this.closing;
  }

  private async closeAll(): Promise<void> {
    log.info('Shutting down tool client', { sessions: this.sessions.size, starting: this.starting.size });

    const inFlight = [...this.starting.values()];
    const sessions = [...this.sessions.values()];
    this.sessions.clear();

    await Promise.all(sessions.map(session => session.close()));
    // Starts that were racing shutdown either fail or close their own session below.
    const settled = await Promise.allSettled(inFlight);
    await Promise.all(
      settled.flatMap(result => (result.status === 'fulfilled' ? [result.value.close()] : []))
    );
    this.sessions.clear();
  }

  private descriptorFor(serverName: string): ServerDescriptor {
    const descriptor = this.descriptors.get(serverName);
    if (!descriptor) {
      throw new UnknownServerError(serverName);
    }
    return descriptor;
  }

  private assertNotShutdown(): void {
    if (this.closing) {
      throw new SessionClosedError('Tool client has been shut down');
    }
  }

  private async ensureSession(
    serverName: string,
    timeoutMs?: number
  ): Promise<{ session: Session; reconnected: boolean }> {
    this.assertNotShutdown();
    this.descriptorFor(serverName);

    const inFlight = this.starting.get(serverName);
    if (inFlight) {
      return { session: await inFlight, reconnected: false };
    }

    const existing = this.sessions.get(serverName);
    if (existing?.state === 'ready') {
      return { session: existing, reconnected: false };
    }
    if (existing?.state === 'degraded') {
      return { session: await this.reconnect(serverName, existing, timeoutMs), reconnected: true };
    }
    return { session: await this.startSession(serverName, undefined, timeoutMs), reconnected: false };
  }

  private async reconnect(serverName: string, stale: Session, timeoutMs?: number): Promise<Session> {
    try {
      return await this.startSession(serverName, stale, timeoutMs);
    } catch (error) {
      if (error instanceof SessionClosedError) {
        throw error;
      }
      log.error('Reconnect failed', error, { serverName });
      throw new ConnectionLostError(`Reconnect to "${serverName}" failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /** Start (or replace) the session for a server; concurrent callers share one attempt. */
  private startSession(serverName: string, replacing?: Session, timeoutMs?: number): Promise<Session> {
    const inFlight = this.starting.get(serverName);
    if (inFlight) {
      return inFlight;
    }

    const attempt = this.createSession(serverName, replacing, timeoutMs);
    this.starting.set(serverName, attempt);
    const clear = () => {
      if (this.starting.get(serverName) === attempt) {
        this.starting.delete(serverName);
      }
    };
    attempt.then(clear, clear);
    return attempt;
  }

  private async createSession(serverName: string, replacing?: Session, timeoutMs?: number): Promise<Session> {
    const descriptor = this.descriptorFor(serverName);

    if (replacing) {
      const delayMs = this.backoff.delayFor(1);
      log.info('Reconnecting to tool server', { serverName, delayMs });
      this.emit('session:reconnecting', serverName, delayMs);
      await this.backoff.pause(delayMs);

      if (this.sessions.get(serverName) === replacing) {
        this.sessions.delete(serverName);
      }
      await replacing.close();
    }
    this.assertNotShutdown();

    const session = new Session(descriptor, {
      clientInfo: this.clientInfo,
      discoveryTimeoutMs: this.discoveryTimeoutMs,
      invocationTimeoutMs: this.invocationTimeoutMs,
      transportFactory: this.transportFactory,
    });
    session.on('state', (state, previous) => {
      this.emit('session:state', serverName, state, previous);
      if (state === 'closed' && this.sessions.get(serverName) === session) {
        this.sessions.delete(serverName);
      }
    });
    session.on('notification', notification => this.emit('notification', serverName, notification));

    this.sessions.set(serverName, session);
    await session.start(timeoutMs);
    return session;
  }
}
