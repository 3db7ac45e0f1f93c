import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { createLogger, type ComponentLogger } from '@toolrelay/logger';
import { ConnectError, TransportIOError, errorMessage } from '../errors';
import type { ProcessServerDescriptor } from '../types/server';
import { AsyncQueue } from './message-queue';
import { createFramer, type Framer } from './framing';
import type { Transport, TransportOptions } from './types';

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_CLOSE_TIMEOUT_MS = 2_000;

type ProcessState = 'idle' | 'opening' | 'open' | 'closing' | 'closed';

/**
 * Build the child environment: the parent's environment with undefined
 * entries dropped, overridden by the descriptor's `env`.
 */
export function buildProcessEnv(overrides: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return Object.assign(env, overrides);
}

/**
 * Speaks to a tool server running as a subprocess over its stdin/stdout.
 * Stderr is forwarded line by line to the debug log.
 */
export class ProcessTransport implements Transport {
  readonly kind = 'process';

  private child: ChildProcessWithoutNullStreams | undefined;
  private state: ProcessState = 'idle';
  private exited = false;
  private exitPromise: Promise<void> = Promise.resolve();
  private closing: Promise<void> | undefined;
  private stderrTail = '';
  private readonly framer: Framer;
  private readonly inbound = new AsyncQueue<string>();
  private readonly log: ComponentLogger;

  constructor(
    private readonly descriptor: ProcessServerDescriptor,
    private readonly options: TransportOptions = {}
  ) {
    this.framer = createFramer(descriptor.framing, options.maxFrameBytes);
    this.log = createLogger('process-transport', { serverName: descriptor.name });
  }

  get isOpen(): boolean {
    return this.state === 'open';
  }

  async open(): Promise<void> {
    if (this.state !== 'idle') {
      throw new ConnectError(`Transport for "${this.descriptor.name}" has already been opened`);
    }
    this.state = 'opening';

    const { command, args, cwd, env } = this.descriptor;
    this.log.debug('Spawning tool server', { command, args, cwd });

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(command, args, { env: buildProcessEnv(env), cwd });
    } catch (error) {
      this.markClosed();
      throw new ConnectError(`Failed to spawn "${command}": ${errorMessage(error)}`, { cause: error });
    }

    this.child = child;
    this.exitPromise = new Promise(resolve => {
      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        this.handleExit(code, signal);
        resolve();
      });
    });
    child.on('error', error => {
      this.log.debug('Child process error', { error });
    });
    child.stdout.on('data', (chunk: Buffer) => this.handleData(chunk));
    child.stdout.on('error', error => this.log.warn('Error reading tool server stdout', error));
    child.stderr.on('data', (chunk: Buffer) => this.handleStderr(chunk));
    child.stdin.on('error', error => this.log.debug('Error writing tool server stdin', { error }));

    try {
      await this.waitForSpawn(child);
    } catch (error) {
      this.state = 'closing';
      child.kill('SIGKILL');
      this.markClosed();
      throw error;
    }

    if (this.state !== 'opening') {
      throw new ConnectError(`Transport for "${this.descriptor.name}" was closed while opening`);
    }
    this.state = 'open';
    this.log.debug('Tool server process started', { pid: child.pid });
  }

  private waitForSpawn(child: ChildProcessWithoutNullStreams): Promise<void> {
    const timeoutMs = this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const { command } = this.descriptor;

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        child.off('spawn', onSpawn);
        child.off('error', onError);
      };
      const onSpawn = () => {
        cleanup();
        resolve();
      };
      const onError = (error: Error) => {
        cleanup();
        reject(new ConnectError(`Failed to spawn "${command}": ${error.message}`, { cause: error }));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new ConnectError(`Timed out after ${timeoutMs}ms waiting for "${command}" to start`));
      }, timeoutMs);

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }

  async send(message: string): Promise<void> {
    const child = this.child;
    if (this.state !== 'open' || !child) {
      throw new TransportIOError(`Cannot write to "${this.descriptor.name}": transport is ${this.state}`);
    }

    const frame = this.framer.encode(message);
    await new Promise<void>((resolve, reject) => {
      child.stdin.write(frame, error => {
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
    const child = this.child;
    if (!child || this.exited) {
      this.markClosed();
      return;
    }

    this.state = 'closing';
    this.inbound.end();
    child.stdin.end();
    child.kill('SIGTERM');

    const graceMs = this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    const forceKill = setTimeout(() => {
      this.log.warn('Tool server ignored SIGTERM, sending SIGKILL', undefined, { graceMs });
      child.kill('SIGKILL');
    }, graceMs);

    try {
      await this.exitPromise;
    } finally {
      clearTimeout(forceKill);
      this.markClosed();
    }
  }

  private handleData(chunk: Buffer): void {
    const { frames, errors } = this.framer.decode(chunk);
    for (const error of errors) {
      this.log.warn('Dropping malformed frame', error);
    }
    for (const frame of frames) {
      this.inbound.push(frame);
    }
  }

  private handleStderr(chunk: Buffer): void {
    const text = this.stderrTail + chunk.toString('utf8');
    const lines = text.split('\n');
    this.stderrTail = lines.pop() ?? '';
    for (const line of lines) {
      const trimmed = line.trimEnd();
      if (trimmed) {
        this.log.debug(trimmed, { stream: 'stderr' });
      }
    }
  }

  private handleExit(code: number | null, signal: NodeJS.Signals | null): void {
    this.exited = true;
    const unexpected = this.state === 'open';
    this.state = 'closed';

    if (this.stderrTail.trim()) {
      this.log.debug(this.stderrTail.trimEnd(), { stream: 'stderr' });
      this.stderrTail = '';
    }

    if (unexpected) {
      const reason = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
      this.log.warn('Tool server process exited unexpectedly', undefined, { exitCode: code, signal });
      this.inbound.fail(
        new TransportIOError(`Tool server "${this.descriptor.name}" exited unexpectedly with ${reason}`, {
          details: { exitCode: code, signal },
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
