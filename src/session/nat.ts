/**
 * UPnP port mapping
 *
 * Mapping runs in five stages, each reported distinctly on failure:
 * discover -> select -> local-address -> map -> external-address
 */

import * as natUpnp from 'nat-upnp';
import { isIPv4 } from 'net';
import { networkInterfaces } from 'os';
import type { NetworkInterfaceInfo } from 'os';
import { MAPPING, LOG_TAGS } from '../constants.js';
import { MappingError, toError } from '../errors.js';
import type { MappingStage } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { PortMapping } from './types.js';

const TAG = LOG_TAGS.NAT;

/**
 * A device that answered discovery
 */
export interface GatewayCandidate {
  deviceType: string;
}

export interface MappingRequest {
  externalPort: number;
  internalPort: number;
  localAddress: string;
  description: string;
  ttlSeconds: number;
}

/**
 * Low-level gateway operations the mapper sequences
 */
export interface GatewayDriver {
  discover(): Promise<GatewayCandidate[]>;
  addPortMapping(request: MappingRequest): Promise<void>;
  removePortMapping(externalPort: number): Promise<void>;
  externalAddress(): Promise<string>;
  close(): void;
}

export interface PortMapperOptions {
  description?: string;
  ttlSeconds?: number;
  // LAN address the mapping points at; defaults to findLocalAddress()
  localAddress?: () => string | null;
}

/**
 * The part of a mapper a session host needs
 */
export interface PortMapper {
  establish(port: number): Promise<PortMapping>;
  release(): Promise<void>;
}

/**
 * First non-internal IPv4 address of this machine
 */
export function findLocalAddress(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = networkInterfaces()
): string | null {
  for (const name of Object.keys(interfaces)) {
    for (const iface of interfaces[name] || []) {
      if (iface.family === 'IPv4' && !iface.internal) {
        return iface.address;
      }
    }
  }
  return null;
}

/**
 * GatewayDriver backed by the nat-upnp client.
 *
 * nat-upnp searches for an InternetGatewayDevice before every request and
 * talks to the first one that answers, so the gateway cannot be pinned
 * between calls. Every request is bounded by the same timeout.
 */
export class UpnpGatewayDriver implements GatewayDriver {
  private client: natUpnp.Client | null = null;
  private timeoutMs: number;

  constructor(timeoutMs: number = MAPPING.REQUEST_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  private getClient(): natUpnp.Client {
    if (!this.client) {
      this.client = natUpnp.createClient();
    }
    return this.client;
  }

  discover(): Promise<GatewayCandidate[]> {
    const client = this.getClient();
    return this.withTimeout(
      'Gateway discovery',
      new Promise((resolve, reject) => {
        client.findGateway((err, gateway) => {
          if (err) {
            reject(err);
            return;
          }
          resolve(gateway ? [{ deviceType: MAPPING.GATEWAY_DEVICE_TYPE }] : []);
        });
      })
    );
  }

  addPortMapping(request: MappingRequest): Promise<void> {
    const client = this.getClient();
    return this.withTimeout(
      'Port mapping request',
      new Promise((resolve, reject) => {
        client.portMapping(
          {
            public: request.externalPort,
            private: { host: request.localAddress, port: request.internalPort },
            protocol: 'TCP',
            description: request.description,
            ttl: request.ttlSeconds,
          },
          (err) => (err ? reject(err) : resolve())
        );
      })
    );
  }

  removePortMapping(externalPort: number): Promise<void> {
    const client = this.getClient();
    return this.withTimeout(
      'Port unmapping request',
      new Promise((resolve, reject) => {
        client.portUnmapping({ public: externalPort, protocol: 'TCP' }, (err) => (err ? reject(err) : resolve()));
      })
    );
  }

  externalAddress(): Promise<string> {
    const client = this.getClient();
    return this.withTimeout(
      'External address request',
      new Promise((resolve, reject) => {
        client.externalIp((err, ip) => {
          if (err) {
            reject(err);
          } else if (!ip) {
            reject(new Error('Gateway returned no external address'));
          } else {
            resolve(ip);
          }
        });
      })
    );
  }

  close(): void {
    if (this.client) {
      this.client.close();
      this.client = null;
    }
  }

  private withTimeout<T>(what: string, request: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${what} timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    });
    return Promise.race([request, expired]).finally(() => clearTimeout(timer));
  }
}

/**
 * Pick the gateway to map through: the first InternetGatewayDevice
 */
export function selectGateway(candidates: GatewayCandidate[]): GatewayCandidate {
  const selected = candidates.find((candidate) =>
    candidate.deviceType.startsWith(MAPPING.GATEWAY_DEVICE_TYPE_PREFIX)
  );
  if (!selected) {
    throw new Error(`None of ${candidates.length} discovered device(s) is an Internet gateway`);
  }
  return selected;
}

export class UpnpPortMapper implements PortMapper {
  private driver: GatewayDriver;
  private description: string;
  private ttlSeconds: number;
  private resolveLocalAddress: () => string | null;
  private active: PortMapping | null = null;
  private pending = false;

  constructor(driver: GatewayDriver = new UpnpGatewayDriver(), options: PortMapperOptions = {}) {
    this.driver = driver;
    this.description = options.description ?? MAPPING.DESCRIPTION;
    this.ttlSeconds = options.ttlSeconds ?? MAPPING.TTL_SECONDS;
    this.resolveLocalAddress = options.localAddress ?? (() => findLocalAddress());
  }

  get mapping(): PortMapping | null {
    return this.active;
  }

  /**
   * Map `port` on the gateway to the same port on this host
   */
  async establish(port: number): Promise<PortMapping> {
    if (this.pending || this.active) {
      throw new MappingError('map', new Error(`A mapping is already held by this host (port ${this.active?.externalPort ?? port})`));
    }
    this.pending = true;
    let mapped = false;

    try {
      const candidates = await this.stage('discover', async () => {
        const found = await this.driver.discover();
        if (found.length === 0) {
          throw new Error('No UPnP gateway responded');
        }
        return found;
      });
      logger.debug(TAG, `Discovered ${candidates.length} gateway(s)`);

      const gateway = await this.stage('select', async () => selectGateway(candidates));
      logger.debug(TAG, `Selected gateway ${gateway.deviceType}`);

      const localAddress = await this.stage('local-address', async () => {
        const address = this.resolveLocalAddress();
        if (!address || !isIPv4(address)) {
          throw new Error('No LAN IPv4 address found for this host');
        }
        return address;
      });

      await this.stage('map', () =>
        this.driver.addPortMapping({
          externalPort: port,
          internalPort: port,
          localAddress,
          description: this.description,
          ttlSeconds: this.ttlSeconds,
        })
      );
      mapped = true;
      logger.info(TAG, `Mapped external TCP ${port} -> ${localAddress}:${port}`);

      const publicAddress = await this.stage('external-address', () => this.driver.externalAddress());
      logger.info(TAG, `Public address is ${publicAddress}`);

      this.active = { publicAddress, externalPort: port, internalPort: port, localAddress };
      return this.active;
    } catch (err) {
      if (mapped) {
        await this.removeMapping(port);
      }
      this.driver.close();
      throw err;
    } finally {
      this.pending = false;
    }
  }

  /**
   * Remove the mapping this mapper created, if any. Never throws.
   */
  async release(): Promise<void> {
    const mapping = this.active;
    this.active = null;

    if (mapping) {
      await this.removeMapping(mapping.externalPort);
    }
    this.driver.close();
  }

  private async removeMapping(port: number): Promise<void> {
    try {
      await this.driver.removePortMapping(port);
      logger.info(TAG, `Removed mapping for external TCP ${port}`);
    } catch (err) {
      logger.warn(TAG, `Failed to remove mapping for port ${port}:`, toError(err));
    }
  }

  private async stage<T>(stage: MappingStage, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw new MappingError(stage, toError(err));
    }
  }
}
