import { describe, it, expect, vi } from 'vitest';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { Connector } from '../src/connector/connector';
import { PendingRequestTable } from '../src/session/pending-table';
import {
  ConnectionLostError,
  HandshakeError,
  TimeoutError,
  ToolCallError,
  TransportIOError,
} from '../src/errors';
import { FakeToolServer, searchListingsTool, type FakeToolServerOptions } from './helpers/fake-transport';

const clientInfo = { name: 'test-client', version: '0.0.1' };

async function openConnector(options: FakeToolServerOptions = {}) {
  const server = new FakeToolServer(options);
  const pending = new PendingRequestTable();
  const connector = new Connector(server.transport, { serverName: 'listings', clientInfo, pending });
  await connector.open();
  return { server, pending, connector };
}

describe('Connector', () => {
  describe('handshake', () => {
    it('initializes, confirms and discovers tools in order', async () => {
      const { server, connector } = await openConnector();

      const result = await connector.handshake(1000);

      expect(result.serverInfo).toEqual({
        name: 'fake-listings',
        version: '1.0.0',
        protocolVersion: LATEST_PROTOCOL_VERSION,
      });
      expect(result.capabilities.map(capability => capability.name)).toEqual(['search_listings']);
      expect(result.resources).toEqual([]);
      expect(server.methods()).toEqual(['initialize', 'notifications/initialized', 'tools/list']);
      expect(server.received[0]?.params).toEqual({
        protocolVersion: LATEST_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: 'test-client', version: '0.0.1' },
      });
    });

    it('follows tools/list pagination', async () => {
      const { server, connector } = await openConnector({
        tools: [searchListingsTool, { name: 'get_listing' }, { name: 'get_reviews' }],
        pageSize: 2,
      });

      const result = await connector.handshake(1000);

      expect(result.capabilities.map(capability => capability.name)).toEqual([
        'search_listings',
        'get_listing',
        'get_reviews',
      ]);
      const listCalls = server.received.filter(message => message.method === 'tools/list');
      expect(listCalls.map(message => message.params)).toEqual([undefined, { cursor: '2' }]);
    });

    it('fetches resources when the server advertises them', async () => {
      const { server, connector } = await openConnector({
        resources: [{ uri: 'listing://42', name: 'Canal house' }],
      });

      const result = await connector.handshake(1000);

      expect(result.resources).toEqual([{ uri: 'listing://42', name: 'Canal house' }]);
      expect(server.methods()).toContain('resources/list');
    });

    it('fails with HandshakeError on a malformed initialize result', async () => {
      const { connector } = await openConnector({ initializeResult: { hello: 'world' } });

      await expect(connector.handshake(1000)).rejects.toBeInstanceOf(HandshakeError);
    });

    it('fails with HandshakeError when the server never answers', async () => {
      const { connector } = await openConnector({ silentInitialize: true });

      const error = await connector.handshake(30).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(HandshakeError);
      expect(error instanceof HandshakeError && error.cause).toBeInstanceOf(TimeoutError);
    });
  });

  describe('inbound dispatch', () => {
    it('answers ping requests from the server', async () => {
      const { server } = await openConnector();

      server.transport.deliver({ jsonrpc: '2.0', id: 'srv-1', method: 'ping' });

      await vi.waitFor(() => {
        expect(server.received).toContainEqual({ jsonrpc: '2.0', id: 'srv-1', result: {} });
      });
    });

    it('rejects other server requests with method not found', async () => {
      const { server } = await openConnector();

      server.transport.deliver({ jsonrpc: '2.0', id: 9, method: 'sampling/createMessage' });

      await vi.waitFor(() => {
        expect(server.received).toContainEqual({
          jsonrpc: '2.0',
          id: 9,
          error: { code: -32601, message: 'Method not found: sampling/createMessage' },
        });
      });
    });

    it('drops malformed frames and unknown ids without failing the connection', async () => {
      const { server, connector } = await openConnector();

      server.transport.deliver('this is not json');
      server.transport.deliver({ jsonrpc: '2.0', id: 999, result: {} });

      await expect(connector.request('tools/list')).resolves.toEqual({
        tools: [expect.objectContaining({ name: 'search_listings' })],
      });
      expect(connector.isOpen).toBe(true);
    });

    it('queues notifications for the notification stream', async () => {
      const { server, connector } = await openConnector();
      const stream = connector.notifications()[Symbol.asyncIterator]();

      server.notify('notifications/message', { level: 'info', data: 'indexing' });

      await expect(stream.next()).resolves.toEqual({
        done: false,
        value: { method: 'notifications/message', params: { level: 'info', data: 'indexing' } },
      });
    });

    it('maps JSON-RPC errors to ToolCallError with the error code', async () => {
      const { connector } = await openConnector();

      const error = await connector.callTool('missing_tool', {}).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ToolCallError);
      expect(error instanceof ToolCallError && error.code).toBe(-32602);
    });
  });

  describe('requests', () => {
    it('sends a cancellation when a request times out', async () => {
      const { server, connector } = await openConnector({ holdCalls: true });

      await expect(connector.callTool('search_listings', { location: 'Lisbon' }, { timeoutMs: 20 })).rejects.toBeInstanceOf(
        TimeoutError
      );

      const heldId = server.heldCalls[0]?.id;
      await vi.waitFor(() => {
        expect(server.received).toContainEqual({
          jsonrpc: '2.0',
          method: 'notifications/cancelled',
          params: { requestId: heldId, reason: 'Request timed out' },
        });
      });
    });

    it('emits disconnected once when the transport fails and refuses new requests', async () => {
      const { server, connector } = await openConnector();
      const disconnected = vi.fn();
      connector.on('disconnected', disconnected);

      server.transport.disconnect();

      await vi.waitFor(() => expect(disconnected).toHaveBeenCalledTimes(1));
      expect(disconnected.mock.calls[0]?.[0]).toBeInstanceOf(TransportIOError);
      expect(connector.isOpen).toBe(false);
      await expect(connector.request('tools/list')).rejects.toBeInstanceOf(ConnectionLostError);
    });

    it('does not emit disconnected for a deliberate close', async () => {
      const { server, connector } = await openConnector();
      const disconnected = vi.fn();
      connector.on('disconnected', disconnected);

      await connector.close();
      await connector.close();

      expect(disconnected).not.toHaveBeenCalled();
      expect(server.transport.closeCount).toBe(1);
    });
  });
});
