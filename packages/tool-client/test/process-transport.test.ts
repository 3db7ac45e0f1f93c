import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { ProcessTransport, buildProcessEnv } from '../src/transport/process-transport';
import { ConnectError, TransportIOError } from '../src/errors';
import type { ProcessServerDescriptor } from '../src/types/server';

interface FakeChildOptions {
  spawnError?: Error;
  ignoreSigterm?: boolean;
}

/** Stands in for a spawned tool server: piped stdio plus exit events. */
class FakeChild extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  readonly signals: string[] = [];
  readonly written: string[] = [];

  constructor(private readonly options: FakeChildOptions = {}) {
    super();
    this.stdin.on('data', (chunk: Buffer) => this.written.push(chunk.toString('utf8')));
    setImmediate(() => {
      if (options.spawnError) {
        this.emit('error', options.spawnError);
      } else {
        this.emit('spawn');
      }
    });
  }

  kill(signal: string): boolean {
    this.signals.push(signal);
    if (signal === 'SIGKILL' || !this.options.ignoreSigterm) {
      setImmediate(() => this.emit('close', null, signal));
    }
    return true;
  }
}

const mocks = vi.hoisted(() => ({ spawn: vi.fn() }));

vi.mock('child_process', () => ({ spawn: mocks.spawn }));

const descriptor: ProcessServerDescriptor = {
  name: 'listings',
  transport: 'process',
  command: 'listings-server',
  args: ['--stdio'],
  env: { LISTINGS_TOKEN: 'test-secret' },
  framing: 'newline',
};

let child: FakeChild;

const useChild = (options: FakeChildOptions = {}) => {
  mocks.spawn.mockImplementation(() => {
    child = new FakeChild(options);
    return child;
  });
};

describe('buildProcessEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('layers the overrides over the parent environment', () => {
    vi.stubEnv('LISTINGS_REGION', 'eu');
    vi.stubEnv('LISTINGS_TOKEN', 'parent-token');

    const env = buildProcessEnv({ LISTINGS_TOKEN: 'test-secret' });

    expect(env.LISTINGS_REGION).toBe('eu');
    expect(env.LISTINGS_TOKEN).toBe('test-secret');
  });
});

describe('ProcessTransport', () => {
  beforeEach(() => {
    mocks.spawn.mockReset();
    useChild();
  });

  it('spawns the command with its arguments and environment', async () => {
    const transport = new ProcessTransport(descriptor);
    await transport.open();

    expect(transport.isOpen).toBe(true);
    expect(mocks.spawn).toHaveBeenCalledWith(
      'listings-server',
      ['--stdio'],
      expect.objectContaining({ env: expect.objectContaining({ LISTINGS_TOKEN: 'test-secret' }) })
    );
    await transport.close();
  });

  it('writes newline framed messages to stdin', async () => {
    const transport = new ProcessTransport(descriptor);
    await transport.open();

    await transport.send('{"jsonrpc":"2.0","method":"ping","id":1}');

    expect(child.written.join('')).toBe('{"jsonrpc":"2.0","method":"ping","id":1}\n');
    await transport.close();
  });

  it('writes content-length framed messages when configured', async () => {
    const transport = new ProcessTransport({ ...descriptor, framing: 'content-length' });
    await transport.open();

    await transport.send('{"id":1}');

    expect(child.written.join('')).toBe('Content-Length: 8\r\n\r\n{"id":1}');
    await transport.close();
  });

  it('yields complete frames from stdout', async () => {
    const transport = new ProcessTransport(descriptor);
    await transport.open();
    const frames = transport.receive()[Symbol.asyncIterator]();

    child.stdout.write('{"id":1}\n{"id"');
    child.stdout.write(':2}\n');

    await expect(frames.next()).resolves.toEqual({ value: '{"id":1}', done: false });
    await expect(frames.next()).resolves.toEqual({ value: '{"id":2}', done: false });
    await transport.close();
  });

  it('fails the inbound stream when the process exits on its own', async () => {
    const transport = new ProcessTransport(descriptor);
    await transport.open();
    const frames = transport.receive()[Symbol.asyncIterator]();

    child.emit('close', 1, null);

    await expect(frames.next()).rejects.toThrow('Tool server "listings" exited unexpectedly with code 1');
    expect(transport.isOpen).toBe(false);
    await expect(transport.send('{}')).rejects.toBeInstanceOf(TransportIOError);
  });

  it('reports a spawn failure as ConnectError', async () => {
    useChild({ spawnError: new Error('spawn listings-server ENOENT') });
    const transport = new ProcessTransport(descriptor);

    await expect(transport.open()).rejects.toThrow(
      new ConnectError('Failed to spawn "listings-server": spawn listings-server ENOENT')
    );
    expect(transport.isOpen).toBe(false);
  });

  it('closes once with SIGTERM and ends the inbound stream', async () => {
    const transport = new ProcessTransport(descriptor);
    await transport.open();
    const frames = transport.receive()[Symbol.asyncIterator]();

    await Promise.all([transport.close(), transport.close()]);
    await transport.close();

    expect(child.signals).toEqual(['SIGTERM']);
    await expect(frames.next()).resolves.toEqual({ value: undefined, done: true });
  });

  it('escalates to SIGKILL when the process ignores SIGTERM', async () => {
    useChild({ ignoreSigterm: true });
    const transport = new ProcessTransport(descriptor, { closeTimeoutMs: 20 });
    await transport.open();

    await transport.close();

    expect(child.signals).toEqual(['SIGTERM', 'SIGKILL']);
  });
});
