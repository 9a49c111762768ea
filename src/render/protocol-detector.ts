/**
 * Terminal graphics capability detection.
 *
 * Runs once per preview (or on an explicit re-detect), never per frame.
 * Preference: terminal-native graphics, img2sixel, chafa, ASCII.
 */

import { accessSync, constants, statSync } from 'fs';
import { delimiter, join } from 'path';
import type { EnvMap } from '../config/index.js';
import type { ImageProtocol } from '../types/index.js';

export const SIXEL_HELPER = 'img2sixel';
export const GENERAL_HELPER = 'chafa';

export interface ProtocolDetector {
  detect(): ImageProtocol;
}

export type LookPath = (command: string) => string | null;

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Resolve a command against PATH the way a shell would.
 * Returns the absolute path of the first executable match.
 */
export function findExecutable(command: string, env: EnvMap = process.env): string | null {
  const searchPath = envText(env, 'PATH') ?? '';
  const extensions = process.platform === 'win32'
    ? (envText(env, 'PATHEXT') ?? '.EXE;.CMD;.BAT').split(';')
    : [''];

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      try {
        if (!statSync(candidate).isFile()) continue;
        accessSync(candidate, constants.X_OK);
        return candidate;
      } catch {
        // not here; keep searching
      }
    }
  }
  return null;
}

export function isKittyTerminal(env: EnvMap): boolean {
  const term = envText(env, 'TERM')?.toLowerCase() ?? '';
  return term.includes('kitty') || envText(env, 'KITTY_WINDOW_ID') !== undefined;
}

/** Accepts the tier names and the helper names operators know them by. */
export function parseProtocolOverride(value: string | undefined): ImageProtocol | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'native':
    case 'kitty':
      return 'native';
    case 'sixel':
    case 'sixel-helper':
    case SIXEL_HELPER:
      return 'sixel-helper';
    case 'chafa':
    case 'general':
    case 'general-helper':
      return 'general-helper';
    case 'ascii':
      return 'ascii';
    default:
      return undefined;
  }
}

export type EnvironmentDetectorOptions = {
  env?: EnvMap;
  lookPath?: LookPath;
};

export class EnvironmentProtocolDetector implements ProtocolDetector {
  private env: EnvMap;
  private lookPath: LookPath;

  constructor(options?: EnvironmentDetectorOptions) {
    this.env = options?.env ?? process.env;
    this.lookPath = options?.lookPath ?? ((command) => findExecutable(command, this.env));
  }

  detect(): ImageProtocol {
    const forced = parseProtocolOverride(this.env.GEOPEEK_IMAGE_PROTOCOL);
    if (forced) return forced;

    if (isKittyTerminal(this.env)) return 'native';
    if (this.lookPath(SIXEL_HELPER)) return 'sixel-helper';
    if (this.lookPath(GENERAL_HELPER)) return 'general-helper';
    return 'ascii';
  }
}

/** Detector pinned to one tier, for tests and for --protocol. */
export class FixedProtocolDetector implements ProtocolDetector {
  constructor(private protocol: ImageProtocol) {}

  detect(): ImageProtocol {
    return this.protocol;
  }
}

export function protocolLabel(protocol: ImageProtocol): string {
  switch (protocol) {
    case 'native':
      return 'Kitty';
    case 'sixel-helper':
      return 'Sixel';
    case 'general-helper':
      return 'Chafa';
    case 'ascii':
      return 'ASCII';
  }
}
