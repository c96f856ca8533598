/**
 * Receiving side of a log sharing session
 */

import { Socket } from 'net';
import { RECEIVE, LOG_TAGS } from '../constants.js';
import { ConnectionError, ShareError, ShareErrorCode, toError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { decodeRendezvous } from './codec.js';
import { LENGTH_HEADER_BYTES, SocketReader, decodeLengthHeader, writeAll } from './protocol.js';
import type { PayloadConsumer, ReceiveIntoOptions, ReceiveOptions } from './types.js';

const TAG = LOG_TAGS.CLIENT;

function connect(socket: Socket, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    socket.once('error', onError);
    socket.connect(port, host, () => {
      socket.off('error', onError);
      resolve();
    });
  });
}

function decodePayload(bytes: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (err) {
    throw new ShareError('Received payload is not valid UTF-8 text', ShareErrorCode.InvalidPayload, toError(err));
  }
}

/**
 * Connect with a session code, authenticate and return the shared text.
 *
 * One attempt only; the host keeps accepting, so callers may retry with the
 * same code.
 */
export async function receive(code: string, options: ReceiveOptions = {}): Promise<string> {
  const info = decodeRendezvous(code);
  const timeoutMs = options.timeoutMs ?? RECEIVE.DEFAULT_TIMEOUT_MS;
  const target = `${info.address}:${info.port}`;

  const socket = new Socket();
  const reader = new SocketReader(socket);
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    socket.destroy(new Error(`No complete transfer within ${timeoutMs}ms`));
  }, timeoutMs);

  logger.info(TAG, `Connecting to ${target}`);

  try {
    await connect(socket, info.address, info.port);
    await writeAll(socket, Buffer.from(info.secret, 'utf-8'));

    const length = decodeLengthHeader(await reader.readExact(LENGTH_HEADER_BYTES, 'length header'));
    logger.debug(TAG, `Expecting ${length} bytes`);

    const payload = await reader.readExact(length);
    logger.info(TAG, `Received ${payload.length} bytes from ${target}`);

    return decodePayload(payload);
  } catch (err) {
    if (timedOut) {
      throw new ConnectionError(`Connection to ${target} timed out after ${timeoutMs}ms`, true, toError(err));
    }
    if (err instanceof ShareError) {
      throw err;
    }
    const cause = toError(err);
    throw new ConnectionError(`Connection to ${target} failed: ${cause.message}`, false, cause);
  } finally {
    clearTimeout(timer);
    socket.destroy();
  }
}

/**
 * Receive and hand the text to a consumer, e.g. the log importer
 */
export async function receiveInto(
  code: string,
  consumer: PayloadConsumer,
  options: ReceiveIntoOptions = {}
): Promise<void> {
  const text = await receive(code, { timeoutMs: options.timeoutMs });
  await consumer(text, options.merge ?? false);
}
