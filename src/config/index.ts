/**
 * Connection profiles and environment overrides.
 *
 * Profiles live in $XDG_CONFIG_HOME/geopeek/config.json (default
 * ~/.config/geopeek/config.json). The file is read, never written.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import type { ServerConnection } from '../types/index.js';

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
export const DEFAULT_HELPER_TIMEOUT_MS = 10_000;

export interface ConnectionProfile extends ServerConnection {
  id: string;
  name: string;
}

export interface GeopeekConfig {
  connections: ConnectionProfile[];
  activeConnection?: string;
}

export type EnvMap = Readonly<Record<string, string | undefined>>;

export type ConnectionOverrides = {
  url?: string;
  username?: string;
  password?: string;
  connection?: string;
};

export function getEnvInt(name: string, defaultValue: number, env: EnvMap = process.env): number {
  const raw = env[name];
  if (!raw) return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultValue;
  return Math.trunc(n);
}

export function getConfigPath(env: EnvMap = process.env): string {
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(configHome, 'geopeek', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : '';
}

function parseProfile(raw: unknown, index: number): ConnectionProfile | null {
  if (!isRecord(raw)) return null;
  const url = readString(raw, 'url').trim();
  if (!url) return null;
  const id = readString(raw, 'id') || String(index);
  return {
    id,
    name: readString(raw, 'name') || id,
    url,
    username: readString(raw, 'username'),
    password: readString(raw, 'password'),
  };
}

export function parseConfig(text: string): GeopeekConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error(`failed to parse config: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error('failed to parse config: expected a JSON object');
  }

  const rawConnections = Array.isArray(parsed.connections) ? parsed.connections : [];
  const connections = rawConnections
    .map((entry, index) => parseProfile(entry, index))
    .filter((entry): entry is ConnectionProfile => entry !== null);
  const activeConnection = readString(parsed, 'activeConnection') || undefined;

  return { connections, ...(activeConnection ? { activeConnection } : {}) };
}

export function loadConfig(path: string = getConfigPath()): GeopeekConfig {
  if (!existsSync(path)) return { connections: [] };
  return parseConfig(readFileSync(path, 'utf8'));
}

function findProfile(config: GeopeekConfig, key: string | undefined): ConnectionProfile | undefined {
  if (!key) return undefined;
  return config.connections.find((profile) => profile.id === key || profile.name === key);
}

/**
 * Resolve the server to talk to. Precedence, per field:
 * command-line flags, then GEOPEEK_* environment, then the selected profile
 * (--connection, else activeConnection, else the only profile).
 */
export function resolveConnection(
  config: GeopeekConfig,
  overrides: ConnectionOverrides = {},
  env: EnvMap = process.env,
): ServerConnection {
  const selected = overrides.connection;
  const profile = selected
    ? findProfile(config, selected)
    : findProfile(config, config.activeConnection) ?? (config.connections.length === 1 ? config.connections[0] : undefined);

  if (selected && !profile) {
    throw new Error(`connection '${selected}' not found in ${getConfigPath(env)}`);
  }

  const url = overrides.url || env.GEOPEEK_URL || profile?.url || '';
  if (!url) {
    throw new Error('no server URL: pass --url, set GEOPEEK_URL, or add a connection to the config file');
  }

  return {
    url: url.replace(/\/+$/, ''),
    username: overrides.username ?? env.GEOPEEK_USERNAME ?? profile?.username ?? '',
    password: overrides.password ?? env.GEOPEEK_PASSWORD ?? profile?.password ?? '',
  };
}
