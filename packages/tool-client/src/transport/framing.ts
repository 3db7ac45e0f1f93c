import { TransportIOError } from '../errors';
import type { Framing } from '../types/server';

/** 16 MiB; larger frames indicate a broken or hostile peer. */
export const DEFAULT_MAX_FRAME_BYTES = 16 * 1024 * 1024;

export interface DecodeResult {
  frames: string[];
  /** Framing faults hit while decoding; the framer has already resynchronised past them. */
  errors: TransportIOError[];
}

export interface Framer {
  readonly kind: Framing;
  encode(message: string): Buffer;
  /**
   * Feed a chunk of raw bytes and return every frame completed by it.
   * Oversized frames discard the buffered bytes and are reported in `errors`.
   */
  decode(chunk: Buffer): DecodeResult;
  reset(): void;
}

/** One JSON message per line, as spoken by most stdio tool servers. */
export class NewlineFramer implements Framer {
  readonly kind = 'newline';
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  encode(message: string): Buffer {
    return Buffer.from(`${message}\n`, 'utf8');
  }

  decode(chunk: Buffer): DecodeResult {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: string[] = [];
    const errors: TransportIOError[] = [];
    let newline = this.buffer.indexOf(0x0a);
    while (newline !== -1) {
      const line = this.buffer.subarray(0, newline).toString('utf8').replace(/\r$/, '');
      this.buffer = this.buffer.subarray(newline + 1);
      if (line.trim().length > 0) {
        frames.push(line);
      }
      newline = this.buffer.indexOf(0x0a);
    }

    if (this.buffer.length > this.maxFrameBytes) {
      const size = this.buffer.length;
      this.reset();
      errors.push(new TransportIOError(`Incoming line exceeds ${this.maxFrameBytes} bytes (${size} buffered)`));
    }

    return { frames, errors };
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}

const HEADER_SEPARATOR = Buffer.from('\r\n\r\n', 'ascii');
const MAX_HEADER_BYTES = 1024;

/**
 * `Content-Length: N\r\n\r\n<body>` framing, as used by LSP-style servers.
 * Header names are case-insensitive; headers other than Content-Length are ignored.
 */
export class ContentLengthFramer implements Framer {
  readonly kind = 'content-length';
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  encode(message: string): Buffer {
    const body = Buffer.from(message, 'utf8');
    return Buffer.concat([Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'ascii'), body]);
  }

  decode(chunk: Buffer): DecodeResult {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: string[] = [];
    const errors: TransportIOError[] = [];
    for (;;) {
      const headerEnd = this.buffer.indexOf(HEADER_SEPARATOR);
      if (headerEnd === -1) {
        break;
      }

      const header = this.buffer.subarray(0, headerEnd).toString('ascii');
      const match = /(?:^|\r\n)content-length:\s*(\d+)\s*(?:\r\n|$)/i.exec(header);
      if (!match) {
        // Unparseable header block: skip past it so the stream can resynchronise.
        this.buffer = this.buffer.subarray(headerEnd + HEADER_SEPARATOR.length);
        errors.push(new TransportIOError(`Frame header without Content-Length: ${JSON.stringify(header)}`));
        continue;
      }

      const length = Number.parseInt(match[1], 10);
      if (length > this.maxFrameBytes) {
        this.reset();
        errors.push(new TransportIOError(`Incoming frame of ${length} bytes exceeds ${this.maxFrameBytes} bytes`));
        break;
      }

      const bodyStart = headerEnd + HEADER_SEPARATOR.length;
      if (this.buffer.length < bodyStart + length) {
        break;
      }

      frames.push(this.buffer.subarray(bodyStart, bodyStart + length).toString('utf8'));
      this.buffer = this.buffer.subarray(bodyStart + length);
    }

    if (this.buffer.length > this.maxFrameBytes + MAX_HEADER_BYTES) {
      this.reset();
      errors.push(new TransportIOError(`Incoming frame exceeds ${this.maxFrameBytes} bytes`));
    }

    return { frames, errors };
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}

export function createFramer(kind: Framing, maxFrameBytes?: number): Framer {
  switch (kind) {
    case 'newline':
      return new NewlineFramer(maxFrameBytes);
    case 'content-length':
      return new ContentLengthFramer(maxFrameBytes);
  }
}
