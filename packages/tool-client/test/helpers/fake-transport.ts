import { z } from 'zod';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { TransportIOError } from '../../src/errors';
import { AsyncQueue } from '../../src/transport/message-queue';
import type { Transport } from '../../src/transport/types';
import type { ToolCallResult } from '../../src/types/tools';

const WireMessageSchema = z.object({
  jsonrpc: z.string(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number(), message: z.string(), data: z.unknown().optional() }).optional(),
});

export type WireMessage = z.infer<typeof WireMessageSchema>;

export const parseWire = (frame: string): WireMessage => WireMessageSchema.parse(JSON.parse(frame));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** In-memory transport; `deliver` plays the server side. */
export class FakeTransport implements Transport {
  readonly kind = 'process';
  readonly sent: string[] = [];
  openError: Error | undefined;
  closeCount = 0;
  onSend: ((message: string) => void) | undefined;

  private state: 'idle' | 'open' | 'closed' = 'idle';
  private readonly inbound = new AsyncQueue<string>();

  get isOpen(): boolean {
    return this.state === 'open';
  }

  async open(): Promise<void> {
    if (this.openError) {
      this.state = 'closed';
      throw this.openError;
    }
    this.state = 'open';
  }

  async send(message: string): Promise<void> {
    if (this.state !== 'open') {
      throw new TransportIOError('fake transport is not open');
    }
    this.sent.push(message);
    this.onSend?.(message);
  }

  receive(): AsyncIterable<string> {
    return this.inbound;
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.state = 'closed';
    this.inbound.end();
  }

  deliver(message: WireMessage | string): void {
    this.inbound.push(typeof message === 'string' ? message : JSON.stringify(message));
  }

  /** Simulate the peer vanishing. */
  disconnect(error: Error = new TransportIOError('peer vanished')): void {
    this.state = 'closed';
    this.inbound.fail(error);
  }

  sentMessages(): WireMessage[] {
    return this.sent.map(parseWire);
  }
}

export interface FakeTool {
  name: string;
  description?: string;
  inputSchema?: Record<string, unknown>;
  handler?: (args: Record<string, unknown>) => ToolCallResult | Promise<ToolCallResult>;
}

export interface FakeToolServerOptions {
  tools?: FakeTool[];
  resources?: Array<{ uri: string; name: string }>;
  holdCalls?: boolean;
  /** Never answer `initialize`. */
  silentInitialize?: boolean;
  /** Replace the `initialize` result. */
  initializeResult?: Record<string, unknown>;
  /** Split `tools/list` into pages of this size. */
  pageSize?: number;
}

export interface HeldCall {
  id: number;
  name: string;
  args: Record<string, unknown>;
}

export const textResult = (text: string, isError = false): ToolCallResult => ({
  content: [{ type: 'text', text }],
  isError,
});

export const searchListingsTool: FakeTool = {
  name: 'search_listings',
  description: 'Search holiday rentals by location',
  inputSchema: {
    type: 'object',
    properties: {
      location: { type: 'string' },
      guests: { type: 'integer', minimum: 1 },
    },
    required: ['location'],
  },
  handler: args => textResult(`listings in ${String(args.location)}`),
};

/**
 * Scripted tool server behind a FakeTransport. Answers the handshake and
 * `tools/list` automatically; `tools/call` runs the tool's handler or, with
 * `holdCalls`, waits for the test to answer.
 */
export class FakeToolServer {
  readonly transport = new FakeTransport();
  readonly received: WireMessage[] = [];
  readonly heldCalls: HeldCall[] = [];
  tools: FakeTool[];
  holdCalls: boolean;

  constructor(private readonly options: FakeToolServerOptions = {}) {
    this.tools = options.tools ?? [searchListingsTool];
    this.holdCalls = options.holdCalls ?? false;
    this.transport.onSend = message => this.handle(message);
  }

  methods(): string[] {
    return this.received.flatMap(message => (message.method ? [message.method] : []));
  }

  private handle(frame: string): void {
    const message = parseWire(frame);
    this.received.push(message);
    const id = message.id;
    if (id === undefined || id === null || message.method === undefined) {
      return;
    }

    switch (message.method) {
      case 'initialize':
        if (!this.options.silentInitialize) {
          this.respond(
            id,
            this.options.initializeResult ?? {
              protocolVersion: LATEST_PROTOCOL_VERSION,
              capabilities: this.options.resources ? { tools: {}, resources: {} } : { tools: {} },
              serverInfo: { name: 'fake-listings', version: '1.0.0' },
            }
          );
        }
        break;
      case 'tools/list':
        this.respond(id, this.listTools(message.params?.cursor));
        break;
      case 'resources/list':
        this.respond(id, { resources: this.options.resources ?? [] });
        break;
      case 'tools/call':
        this.call(id, message.params ?? {});
        break;
      default:
        this.respondError(id, -32601, `Method not found: ${message.method}`);
    }
  }

  private listTools(cursor: unknown): Record<string, unknown> {
    const tools = this.tools.map(tool => ({
      name: tool.name,
      ...(tool.description !== undefined && { description: tool.description }),
      inputSchema: tool.inputSchema ?? { type: 'object' },
    }));
    const pageSize = this.options.pageSize;
    if (pageSize === undefined) {
      return { tools };
    }
    const start = typeof cursor === 'string' ? Number(cursor) : 0;
    const end = start + pageSize;
    return { tools: tools.slice(start, end), ...(end < tools.length && { nextCursor: String(end) }) };
  }

  private call(id: string | number, params: Record<string, unknown>): void {
    const name = String(params.name);
    const args = isRecord(params.arguments) ? { ...params.arguments } : {};
    if (this.holdCalls) {
      this.heldCalls.push({ id: Number(id), name, args });
      return;
    }
    const tool = this.tools.find(candidate => candidate.name === name);
    if (!tool) {
      this.respondError(id, -32602, `Unknown tool: ${name}`);
      return;
    }
    Promise.resolve(tool.handler ? tool.handler(args) : textResult(name)).then(
      result => this.respond(id, result),
      (error: unknown) => this.respondError(id, -32603, String(error))
    );
  }

  respond(id: string | number, result: unknown): void {
    this.transport.deliver({ jsonrpc: '2.0', id, result });
  }

  respondError(id: string | number, code: number, message: string): void {
    this.transport.deliver({ jsonrpc: '2.0', id, error: { code, message } });
  }

  notify(method: string, params?: Record<string, unknown>): void {
    this.transport.deliver({ jsonrpc: '2.0', method, ...(params && { params }) });
  }
}
