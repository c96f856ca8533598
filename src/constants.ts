/**
 * Application constants
 */

import * as os from 'os';
import * as path from 'path';

export const SHARE = {
  // Fixed external port; only one hosting session per machine can hold it
  DEFAULT_PORT: 45678,

  DEFAULT_BIND_HOST: '0.0.0.0',

  // Random bytes behind each session secret
  SECRET_BYTES: 32,

  // Idle read timeout per accepted connection (ms)
  IDLE_TIMEOUT_MS: 15 * 1000,

  // Largest payload a 4-byte length header can describe
  MAX_PAYLOAD_BYTES: 0xffffffff,

  // Pending connections kept while one is being served
  BACKLOG: 2,
} as const;

export const RECEIVE = {
  // Budget for connect plus the whole exchange (ms)
  DEFAULT_TIMEOUT_MS: 10 * 1000,
} as const;

export const MAPPING = {
  DESCRIPTION: 'LogShareSession',

  // 0 keeps the mapping until it is removed
  TTL_SECONDS: 0,

  // Bound on each gateway request (discovery, map, unmap, external address)
  REQUEST_TIMEOUT_MS: 3 * 1000,

  GATEWAY_DEVICE_TYPE: 'urn:schemas-upnp-org:device:InternetGatewayDevice:1',
  GATEWAY_DEVICE_TYPE_PREFIX: 'urn:schemas-upnp-org:device:InternetGatewayDevice:',
} as const;

export const LOGS = {
  // Relative to the per-user local data directory
  SUBDIRECTORY: ['TL', 'Saved', 'CombatLogs'] as const,

  EXTENSION: '.txt',
} as const;

export const CONFIG = {
  DEFAULT_PATH: path.join(os.homedir(), '.logshare.json'),
} as const;

export const LOG_TAGS = {
  HOST: '[Host]',
  CLIENT: '[Client]',
  NAT: '[NAT]',
  CLI: '[CLI]',
} as const;
