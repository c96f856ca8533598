/**
 * Rendezvous code codec
 *
 * A code is the base64url encoding of a UTF-8 JSON object:
 *   {"ip": "203.0.113.7", "port": 45678, "secret": "..."}
 *
 * Extra keys are ignored so newer hosts can add fields.
 */

import { randomBytes } from 'crypto';
import { isIP } from 'net';
import { DecodeError, toError } from '../errors.js';
import { SHARE } from '../constants.js';
import type { RendezvousInfo } from './types.js';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+={0,2}$/;

/**
 * Generate a fresh session secret (base64url text of random bytes)
 */
export function generateSecret(byteLength: number = SHARE.SECRET_BYTES): string {
  return randomBytes(byteLength).toString('base64url');
}

/**
 * Encode rendezvous info into a copyable code.
 * Padding is kept so strict base64url decoders accept the code as well.
 */
export function encodeRendezvous(info: RendezvousInfo): string {
  const json = JSON.stringify({ ip: info.address, port: info.port, secret: info.secret });
  return Buffer.from(json, 'utf-8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

/**
 * Decode a code back into rendezvous info. Throws DecodeError on any defect.
 */
export function decodeRendezvous(code: string): RendezvousInfo {
  const trimmed = code.trim();

  if (!BASE64URL_PATTERN.test(trimmed)) {
    throw new DecodeError('not base64url text');
  }

  const unpadded = trimmed.replace(/=+$/, '');
  if (unpadded.length % 4 === 1) {
    throw new DecodeError('truncated base64url text');
  }

  let parsed: unknown;
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(Buffer.from(unpadded, 'base64url'));
    parsed = JSON.parse(text);
  } catch (err) {
    throw new DecodeError('payload is not JSON', toError(err));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new DecodeError('payload is not an object');
  }

  const fields = new Map<string, unknown>(Object.entries(parsed));
  const ip = fields.get('ip');
  const port = fields.get('port');
  const secret = fields.get('secret');

  if (typeof ip !== 'string' || isIP(ip) === 0) {
    throw new DecodeError('missing or invalid "ip"');
  }
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new DecodeError('missing or invalid "port"');
  }
  if (typeof secret !== 'string' || secret.length === 0) {
    throw new DecodeError('missing or invalid "secret"');
  }

  return { address: ip, port, secret };
}
