import * as fs from 'fs';
import { CONFIG, MAPPING, RECEIVE, SHARE } from './constants.js';
import { defaultLogDirectory } from './logs.js';

export interface ShareConfig {
  port: number;
  bindHost: string;
  mappingDescription: string;
  mappingTtlSeconds: number;
  gatewayTimeoutMs: number;
  idleTimeoutMs: number;
}

export interface ReceiveConfig {
  timeoutMs: number;
}

export interface Config {
  share: ShareConfig;
  receive: ReceiveConfig;
  logDirectory: string;
}

/**
 * Partial config as it may appear in the JSON file
 */
export interface ConfigFile {
  share?: Partial<ShareConfig>;
  receive?: Partial<ReceiveConfig>;
  logDirectory?: string;
}

export function defaultConfig(): Config {
  return {
    share: {
      port: SHARE.DEFAULT_PORT,
      bindHost: SHARE.DEFAULT_BIND_HOST,
      mappingDescription: MAPPING.DESCRIPTION,
      mappingTtlSeconds: MAPPING.TTL_SECONDS,
      gatewayTimeoutMs: MAPPING.REQUEST_TIMEOUT_MS,
      idleTimeoutMs: SHARE.IDLE_TIMEOUT_MS,
    },
    receive: {
      timeoutMs: RECEIVE.DEFAULT_TIMEOUT_MS,
    },
    logDirectory: defaultLogDirectory(),
  };
}

export function getConfigPath(customPath?: string): string {
  return customPath || CONFIG.DEFAULT_PATH;
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge file contents over the defaults, keeping only known keys
 */
export function mergeConfig(base: Config, file: unknown): Config {
  if (!isRecord(file)) {
    throw new Error('Config must be a JSON object');
  }
  const config: Config = {
    share: { ...base.share },
    receive: { ...base.receive },
    logDirectory: base.logDirectory,
  };

  const share = file.share;
  if (isRecord(share)) {
    if (typeof share.port === 'number') config.share.port = share.port;
    if (typeof share.bindHost === 'string') config.share.bindHost = share.bindHost;
    if (typeof share.mappingDescription === 'string') config.share.mappingDescription = share.mappingDescription;
    if (typeof share.mappingTtlSeconds === 'number') config.share.mappingTtlSeconds = share.mappingTtlSeconds;
    if (typeof share.gatewayTimeoutMs === 'number') config.share.gatewayTimeoutMs = share.gatewayTimeoutMs;
    if (typeof share.idleTimeoutMs === 'number') config.share.idleTimeoutMs = share.idleTimeoutMs;
  }

  const receive = file.receive;
  if (isRecord(receive) && typeof receive.timeoutMs === 'number') {
    config.receive.timeoutMs = receive.timeoutMs;
  }

  if (typeof file.logDirectory === 'string') {
    config.logDirectory = file.logDirectory;
  }

  return config;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const filePath = getConfigPath(configPath);
  let config = defaultConfig();

  // A missing file means defaults; an explicit path must exist
  if (fs.existsSync(filePath)) {
    const raw = fs.readFileSync(filePath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new Error(`Config file is not valid JSON: ${filePath}`);
    }
    config = mergeConfig(config, parsed);
  } else if (configPath) {
    throw new Error(`Config file not found: ${filePath}\nRun 'logshare --init' to create one`);
  }

  // Environment overrides
  if (env.LOGSHARE_PORT) {
    config.share.port = parseInteger('LOGSHARE_PORT', env.LOGSHARE_PORT);
  }
  if (env.LOGSHARE_TIMEOUT_MS) {
    config.receive.timeoutMs = parseInteger('LOGSHARE_TIMEOUT_MS', env.LOGSHARE_TIMEOUT_MS);
  }
  if (env.LOGSHARE_LOG_DIR) {
    config.logDirectory = env.LOGSHARE_LOG_DIR;
  }

  validateConfig(config);

  return config;
}

export function validateConfig(config: Config): void {
  const { port } = config.share;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`share.port must be an integer between 0 and 65535, got ${port}`);
  }
  if (!config.share.bindHost) {
    throw new Error('share.bindHost must not be empty');
  }
  if (!Number.isInteger(config.share.mappingTtlSeconds) || config.share.mappingTtlSeconds < 0) {
    throw new Error('share.mappingTtlSeconds must be a non-negative integer');
  }
  for (const [name, value] of [
    ['share.gatewayTimeoutMs', config.share.gatewayTimeoutMs],
    ['share.idleTimeoutMs', config.share.idleTimeoutMs],
    ['receive.timeoutMs', config.receive.timeoutMs],
  ] as const) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(`${name} must be a positive number, got ${value}`);
    }
  }
}

export function initConfig(configPath?: string): string {
  const filePath = getConfigPath(configPath);

  if (fs.existsSync(filePath)) {
    throw new Error(`Config file already exists: ${filePath}`);
  }

  fs.writeFileSync(filePath, JSON.stringify(defaultConfig(), null, 2), 'utf-8');
  return filePath;
}
