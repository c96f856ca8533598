/**
 * Local log files: where they live and how they are loaded for sharing
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LOGS, SHARE } from './constants.js';
import { LocalReadError, toError } from './errors.js';

/**
 * Per-user local data directory for the current platform
 */
export function localDataDirectory(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): string {
  const home = os.homedir();
  switch (platform) {
    case 'win32':
      return env.LOCALAPPDATA || path.join(home, 'AppData', 'Local');
    case 'darwin':
      return path.join(home, 'Library', 'Application Support');
    default:
      return env.XDG_DATA_HOME || path.join(home, '.local', 'share');
  }
}

export function defaultLogDirectory(): string {
  return path.join(localDataDirectory(), ...LOGS.SUBDIRECTORY);
}

/**
 * Most recently modified log file in `directory`
 */
export async function findLatestLog(directory: string): Promise<string> {
  let names: string[];
  try {
    names = await fs.promises.readdir(directory);
  } catch (err) {
    throw new LocalReadError(directory, toError(err));
  }

  let latest: { file: string; mtimeMs: number } | null = null;
  for (const name of names) {
    if (!name.toLowerCase().endsWith(LOGS.EXTENSION)) {
      continue;
    }
    const file = path.join(directory, name);
    const stat = await fs.promises.stat(file);
    if (stat.isFile() && (!latest || stat.mtimeMs > latest.mtimeMs)) {
      latest = { file, mtimeMs: stat.mtimeMs };
    }
  }

  if (!latest) {
    throw new LocalReadError(directory, new Error(`no ${LOGS.EXTENSION} log files found`));
  }
  return latest.file;
}

/**
 * Load a whole file as the payload to share
 */
export async function readPayload(filePath: string): Promise<Buffer> {
  let payload: Buffer;
  try {
    payload = await fs.promises.readFile(filePath);
  } catch (err) {
    throw new LocalReadError(filePath, toError(err));
  }

  if (payload.length > SHARE.MAX_PAYLOAD_BYTES) {
    throw new LocalReadError(filePath, new Error(`file is larger than ${SHARE.MAX_PAYLOAD_BYTES} bytes`));
  }
  return payload;
}
