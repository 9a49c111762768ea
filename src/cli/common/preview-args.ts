import type { BBox, ImageProtocol } from '../../types/index.js';
import { parseProtocolOverride } from '../../render/protocol-detector.js';

export type PreviewCliOptions = {
  workspace: string;
  layer: string;
  url?: string;
  username?: string;
  password?: string;
  connection?: string;
  styles?: string[];
  bbox?: BBox;
  protocol?: ImageProtocol;
};

export type ParsedPreviewArgs =
  | { kind: 'run'; options: PreviewCliOptions }
  | { kind: 'usage' }
  | { kind: 'error'; error: string };

export const PREVIEW_USAGE = [
  'Usage: geopeek <workspace:layer> [options]',
  '',
  'Options:',
  '  --url <url>               server base URL (e.g. http://localhost:8080/geoserver)',
  '  --user <name>             basic-auth username',
  '  --password <password>     basic-auth password',
  '  --connection <id|name>    connection profile from the config file',
  '  --style <a,b,...>         style names to cycle with s/S',
  '  --bbox <minX,minY,maxX,maxY>  initial extent (EPSG:4326)',
  '  --protocol <native|sixel|chafa|ascii>  force an image protocol',
  '  -h, --help                show this help',
].join('\n');

export function parseLayerArg(raw: string): { workspace: string; layer: string } | null {
  const idx = raw.indexOf(':');
  if (idx <= 0 || idx >= raw.length - 1) return null;
  const workspace = raw.slice(0, idx).trim();
  const layer = raw.slice(idx + 1).trim();
  if (!workspace || !layer) return null;
  return { workspace, layer };
}

export function parseBBoxArg(raw: string): BBox | null {
  const parts = raw.split(',').map((part) => part.trim());
  if (parts.length !== 4 || parts.some((part) => part.length === 0)) return null;
  const [minX, minY, maxX, maxY] = parts.map(Number);
  if (![minX, minY, maxX, maxY].every(Number.isFinite)) return null;
  if (minX >= maxX || minY >= maxY) return null;
  return [minX, minY, maxX, maxY];
}

const VALUE_FLAGS = new Set(['--url', '--user', '--password', '--connection', '--style', '--bbox', '--protocol']);

export function parsePreviewArgs(argv: readonly string[]): ParsedPreviewArgs {
  const values = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const part = argv[i];
    if (part === '--help' || part === '-h') {
      return { kind: 'usage' };
    }
    if (!part.startsWith('--')) {
      positional.push(part);
      continue;
    }

    const eqIndex = part.indexOf('=');
    const flag = eqIndex >= 0 ? part.slice(0, eqIndex) : part;
    if (!VALUE_FLAGS.has(flag)) {
      return { kind: 'error', error: `unknown option: ${flag}` };
    }

    let value: string | undefined;
    if (eqIndex >= 0) {
      value = part.slice(eqIndex + 1);
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i += 1;
      }
    }
    if (value === undefined) {
      return { kind: 'error', error: `${flag} requires a value` };
    }
    values.set(flag, value);
  }

  if (positional.length === 0) {
    return { kind: 'error', error: 'missing layer: expected <workspace:layer>' };
  }
  if (positional.length > 1) {
    return { kind: 'error', error: `unexpected argument: ${positional[1]}` };
  }
  const layerRef = parseLayerArg(positional[0]);
  if (!layerRef) {
    return { kind: 'error', error: `invalid layer '${positional[0]}': expected <workspace:layer>` };
  }

  const options: PreviewCliOptions = { ...layerRef };
  const url = values.get('--url');
  if (url !== undefined) options.url = url;
  const username = values.get('--user');
  if (username !== undefined) options.username = username;
  const password = values.get('--password');
  if (password !== undefined) options.password = password;
  const connection = values.get('--connection');
  if (connection !== undefined) options.connection = connection;

  const style = values.get('--style');
  if (style !== undefined) {
    options.styles = style.split(',').map((name) => name.trim()).filter(Boolean);
  }

  const bboxRaw = values.get('--bbox');
  if (bboxRaw !== undefined) {
    const bbox = parseBBoxArg(bboxRaw);
    if (!bbox) return { kind: 'error', error: `invalid --bbox '${bboxRaw}': expected minX,minY,maxX,maxY` };
    options.bbox = bbox;
  }

  const protocolRaw = values.get('--protocol');
  if (protocolRaw !== undefined) {
    const protocol = parseProtocolOverride(protocolRaw);
    if (!protocol) return { kind: 'error', error: `invalid --protocol '${protocolRaw}'` };
    options.protocol = protocol;
  }

  return { kind: 'run', options };
}
