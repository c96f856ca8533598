/**
 * Session type definitions
 */

import type { PortMapper } from './nat.js';

/**
 * What a rendezvous code carries
 */
export interface RendezvousInfo {
  address: string;
  port: number;
  secret: string;
}

/**
 * Host lifecycle. `closed` is terminal.
 */
export type SessionState = 'idle' | 'mapping' | 'listening' | 'authenticating' | 'serving' | 'closed';

/**
 * A port mapping held on the gateway
 */
export interface PortMapping {
  publicAddress: string;
  externalPort: number;
  internalPort: number;
  localAddress: string;
}

export interface SessionHostOptions {
  port: number;
  bindHost?: string;
  idleTimeoutMs?: number;
  secretBytes?: number;
  mapper: PortMapper;
}

export interface ReceiveOptions {
  timeoutMs?: number;
}

/**
 * Receives the decoded payload; `merge` asks to combine it with existing data
 */
export type PayloadConsumer = (text: string, merge: boolean) => void | Promise<void>;

export interface ReceiveIntoOptions extends ReceiveOptions {
  merge?: boolean;
}

/**
 * Summary of one served connection
 */
export interface ServedConnection {
  remoteAddress: string;
  bytes: number;
}

/**
 * SessionHost events
 */
export interface SessionHostEvents {
  stateChange: (state: SessionState, previous: SessionState) => void;
  served: (connection: ServedConnection) => void;
  rejected: (remoteAddress: string, reason: Error) => void;
  failed: (err: Error) => void;
  closed: () => void;
}
