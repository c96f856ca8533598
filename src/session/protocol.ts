/**
 * Transfer protocol
 *
 * Wire format, one exchange per connection:
 *   client -> server: secret bytes (exact length, no framing)
 *   server -> client: [4-byte BE length][payload bytes]
 */

import type { Socket } from 'net';
import { timingSafeEqual } from 'crypto';
import { AuthenticationMismatch, ConnectionError, TransferIncomplete, toError } from '../errors.js';
import { SHARE } from '../constants.js';

export const LENGTH_HEADER_BYTES = 4;

/**
 * Encode a payload length as a 4-byte big-endian header
 */
export function encodeLengthHeader(length: number): Buffer {
  if (!Number.isInteger(length) || length < 0 || length > SHARE.MAX_PAYLOAD_BYTES) {
    throw new RangeError(`Payload length out of range: ${length}`);
  }
  const header = Buffer.alloc(LENGTH_HEADER_BYTES);
  header.writeUInt32BE(length, 0);
  return header;
}

export function decodeLengthHeader(header: Buffer): number {
  if (header.length !== LENGTH_HEADER_BYTES) {
    throw new RangeError(`Length header must be ${LENGTH_HEADER_BYTES} bytes, got ${header.length}`);
  }
  return header.readUInt32BE(0);
}

/**
 * Constant-time comparison; differing lengths never match
 */
export function secretsMatch(presented: Buffer, expected: Buffer): boolean {
  if (presented.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(presented, expected);
}

/**
 * Accumulates socket data so callers can read exact byte counts
 */
export class SocketReader {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(socket: Socket) {
    // A socket that closed before the reader attached never emits again
    this.ended = socket.destroyed || socket.readableEnded;
    socket.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.buffered += chunk.length;
      this.notify();
    });
    socket.on('end', () => {
      this.ended = true;
      this.notify();
    });
    socket.on('close', () => {
      this.ended = true;
      this.notify();
    });
    socket.on('error', (err: Error) => {
      this.failure = err;
      this.notify();
    });
  }

  /**
   * Bytes received but not yet read
   */
  get available(): number {
    return this.buffered;
  }

  /**
   * Read exactly `length` bytes. Throws TransferIncomplete if the
   * connection ends first; partial data is discarded.
   */
  async readExact(length: number, what = 'payload'): Promise<Buffer> {
    while (this.buffered < length) {
      if (this.failure || this.ended) {
        throw new TransferIncomplete(length, this.buffered, what, this.failure ?? undefined);
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
    return this.take(length);
  }

  private take(length: number): Buffer {
    const all = Buffer.concat(this.chunks, this.buffered);
    const result = all.subarray(0, length);
    const rest = all.subarray(length);
    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return result;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Write data and resolve once it has been flushed to the socket
 */
export function writeAll(socket: Socket, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.write(data, (err) => (err ? reject(err) : resolve()));
  });
}

export interface ServeOptions {
  secret: Buffer;
  payload: Buffer;
  idleTimeoutMs?: number;
  // Called once authentication has passed, before the payload is sent
  onAuthenticated?: () => void;
}

/**
 * Server side of one exchange. Resolves with the number of payload bytes
 * sent; rejects with AuthenticationMismatch (connection already destroyed)
 * or ConnectionError. The socket is always finished or destroyed on return.
 */
export async function serveConnection(socket: Socket, options: ServeOptions): Promise<number> {
  const { secret, payload } = options;
  const idleTimeoutMs = options.idleTimeoutMs ?? SHARE.IDLE_TIMEOUT_MS;

  socket.setTimeout(idleTimeoutMs, () => {
    socket.destroy(new Error(`Peer idle for ${idleTimeoutMs}ms`));
  });

  const reader = new SocketReader(socket);

  let presented: Buffer;
  try {
    presented = await reader.readExact(secret.length, 'secret');
  } catch (err) {
    socket.destroy();
    throw new AuthenticationMismatch('peer sent a short secret', toError(err));
  }

  if (!secretsMatch(presented, secret) || reader.available > 0) {
    socket.destroy();
    throw new AuthenticationMismatch('peer sent a wrong secret');
  }

  options.onAuthenticated?.();

  try {
    await writeAll(socket, encodeLengthHeader(payload.length));
    if (payload.length > 0) {
      await writeAll(socket, payload);
    }
  } catch (err) {
    socket.destroy();
    throw new ConnectionError(`Peer connection failed during transfer: ${toError(err).message}`, false, toError(err));
  }

  socket.setTimeout(0);
  socket.end();
  return payload.length;
}
