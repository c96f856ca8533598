import * as fs from 'fs';
import { loadConfig, initConfig, validateConfig } from './config.js';
import { LOG_TAGS } from './constants.js';
import { toError } from './errors.js';
import { findLatestLog } from './logs.js';
import { receiveInto } from './session/client.js';
import { SessionHost } from './session/host.js';
import { UpnpGatewayDriver, UpnpPortMapper } from './session/nat.js';
import { logger } from './utils/logger.js';

export { loadConfig, initConfig, validateConfig, defaultConfig } from './config.js';
export type { Config, ShareConfig, ReceiveConfig } from './config.js';
export * from './constants.js';
export * from './errors.js';
export * from './logs.js';
export * from './session/index.js';
export { logger, Logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';

const TAG = LOG_TAGS.CLI;

export async function main(args: string[]): Promise<number> {
  const configPath = getArgValue(args, '--config', '-c');

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return 0;
  }

  if (args.includes('--init')) {
    const path = initConfig(configPath);
    console.log(`Config file created: ${path}`);
    return 0;
  }

  const config = loadConfig(configPath);

  const port = getArgValue(args, '--port', '-p');
  if (port !== undefined) {
    config.share.port = parseIntegerArg('--port', port);
  }
  const timeout = getArgValue(args, '--timeout', '-t');
  if (timeout !== undefined) {
    config.receive.timeoutMs = parseIntegerArg('--timeout', timeout);
  }
  validateConfig(config);

  const [command, target] = positionals(args);

  switch (command) {
    case 'host': {
      const filePath = target ?? (await findLatestLog(config.logDirectory));
      const mapper = new UpnpPortMapper(new UpnpGatewayDriver(config.share.gatewayTimeoutMs), {
        description: config.share.mappingDescription,
        ttlSeconds: config.share.mappingTtlSeconds,
      });
      const host = new SessionHost({
        port: config.share.port,
        bindHost: config.share.bindHost,
        idleTimeoutMs: config.share.idleTimeoutMs,
        mapper,
      });

      const code = await host.share(filePath);
      console.log(code);
      logger.info(TAG, `Sharing ${filePath}; press Ctrl+C to stop`);

      process.once('SIGINT', () => host.stop());
      process.once('SIGTERM', () => host.stop());

      await host.wait();
      if (host.status) {
        logger.warn(TAG, `Last status: ${host.status}`);
      }
      return 0;
    }

    case 'receive': {
      if (!target) {
        throw new Error('Usage: logshare receive <code> [-o file] [--append]');
      }
      const outPath = getArgValue(args, '--out', '-o');
      await receiveInto(
        target,
        (text, merge) => {
          if (!outPath) {
            process.stdout.write(text);
          } else if (merge) {
            fs.appendFileSync(outPath, text, 'utf-8');
          } else {
            fs.writeFileSync(outPath, text, 'utf-8');
          }
        },
        { merge: args.includes('--append'), timeoutMs: config.receive.timeoutMs }
      );
      if (outPath) {
        logger.info(TAG, `Saved shared log to ${outPath}`);
      }
      return 0;
    }

    default:
      printHelp();
      return 1;
  }
}

const VALUE_FLAGS = new Set(['--config', '-c', '--port', '-p', '--timeout', '-t', '--out', '-o']);

function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      i++;
    } else if (!arg.startsWith('-')) {
      result.push(arg);
    }
  }
  return result;
}

function getArgValue(args: string[], longFlag: string, shortFlag: string): string | undefined {
  const longIndex = args.indexOf(longFlag);
  if (longIndex !== -1 && args[longIndex + 1]) {
    return args[longIndex + 1];
  }

  const shortIndex = args.indexOf(shortFlag);
  if (shortIndex !== -1 && args[shortIndex + 1]) {
    return args[shortIndex + 1];
  }

  return undefined;
}

function parseIntegerArg(flag: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${flag} expects an integer, got "${value}"`);
  }
  return parsed;
}

function printHelp(): void {
  console.log(`
logshare - share a log file with a peer across NAT using a session code

Usage:
  logshare host [file]                  Share a file (default: newest log) and print its code
  logshare receive <code> [options]     Fetch a shared file

Options:
  --init                  Create a config file template
  -c, --config PATH       Config file path (default: ~/.logshare.json)
  -p, --port PORT         Port to listen on and map (default: 45678)
  -t, --timeout MS        Receive timeout in milliseconds (default: 10000)
  -o, --out FILE          Write the received log to FILE instead of stdout
  --append                Append to FILE instead of replacing it
  -h, --help              Show this help

Environment:
  LOGSHARE_PORT           Overrides share.port
  LOGSHARE_TIMEOUT_MS     Overrides receive.timeoutMs
  LOGSHARE_LOG_DIR        Overrides logDirectory
  LOG_LEVEL               debug | info | warn | error | silent
`);
}

export function reportFatal(err: unknown): number {
  logger.error(TAG, toError(err).message);
  return 1;
}
