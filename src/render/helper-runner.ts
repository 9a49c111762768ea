/**
 * Synchronous helper-process execution for the image renderer.
 */

import { spawnSync } from 'child_process';
import { DEFAULT_HELPER_TIMEOUT_MS } from '../config/index.js';

export type HelperRunResult =
  | { ok: true; stdout: string }
  | { ok: false; reason: string };

export interface HelperRunner {
  run(command: string, args: string[], input?: Uint8Array): HelperRunResult;
}

/** Kitty graphics output for a full-size frame runs to a few megabytes. */
const MAX_HELPER_OUTPUT_BYTES = 64 * 1024 * 1024;

function normalizeLogText(input: string, maxLength: number = 240): string {
  const compact = input.replace(/\s+/g, ' ').trim();
  if (!compact) return '';
  if (compact.length <= maxLength) return compact;
  return `${compact.slice(0, maxLength - 3)}...`;
}

export class SpawnHelperRunner implements HelperRunner {
  constructor(private timeoutMs: number = DEFAULT_HELPER_TIMEOUT_MS) {}

  run(command: string, args: string[], input?: Uint8Array): HelperRunResult {
    const result = spawnSync(command, args, {
      input,
      encoding: 'utf8',
      timeout: this.timeoutMs,
      maxBuffer: MAX_HELPER_OUTPUT_BYTES,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    if (result.error || result.status !== 0) {
      const details: string[] = [];
      if (result.error) {
        details.push(`error=${result.error.message}`);
      }
      if (Number.isInteger(result.status)) {
        details.push(`exit=${result.status}`);
      }
      if (result.signal) {
        details.push(`signal=${result.signal}`);
      }
      const stderr = normalizeLogText(result.stderr || '');
      if (stderr) {
        details.push(`stderr=${stderr}`);
      }
      return { ok: false, reason: `${command} failed: ${details.join(', ') || 'unknown failure'}` };
    }

    return { ok: true, stdout: result.stdout || '' };
  }
}
