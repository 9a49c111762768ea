/**
 * Image renderer: PNG bytes to a terminal frame.
 *
 * Each protocol maps to an ordered list of helper invocations; the first one
 * that exits cleanly with well-formed output wins. The ASCII renderer ends
 * every chain and cannot fail.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ImageProtocol } from '../types/index.js';
import { renderAscii } from './ascii.js';
import { asciiCellGrid, helperCellGrid, type CellGrid } from './cell-grid.js';
import type { HelperRunner } from './helper-runner.js';
import { GENERAL_HELPER, SIXEL_HELPER } from './protocol-detector.js';

export type RenderedBy = 'kitty' | 'symbols' | 'sixel' | 'chafa' | 'ascii';

export type HelperInvocation = {
  name: Exclude<RenderedBy, 'ascii'>;
  command: string;
  args: string[];
  /** 'file': the image path is appended to args. 'stdin': bytes are piped. */
  input: 'file' | 'stdin';
  accepts: (output: string) => boolean;
};

export type RenderedFrame = {
  text: string;
  renderedBy: RenderedBy;
  /** Helper failures before the frame was produced. */
  failures: string[];
};

const KITTY_APC = '\x1b_G';
const SIXEL_DCS = '\x1bP';

const nonEmpty = (output: string) => output.trim().length > 0;

function sizeArg(grid: CellGrid): string {
  return `${grid.cols}x${grid.rows}`;
}

function assertNever(value: never): never {
  throw new Error(`unhandled image protocol: ${String(value)}`);
}

/** Helper attempts for a protocol, in order. ASCII follows all of them. */
export function fallbackChain(protocol: ImageProtocol, grid: CellGrid): HelperInvocation[] {
  const size = sizeArg(grid);
  switch (protocol) {
    case 'native':
      return [
        {
          name: 'kitty',
          command: GENERAL_HELPER,
          args: ['--format', 'kitty', '--size', size, '--colors', 'full', '--color-space', 'rgb'],
          input: 'file',
          accepts: (output) => output.includes(KITTY_APC),
        },
        {
          name: 'symbols',
          command: GENERAL_HELPER,
          args: ['--format', 'symbols', '--size', size, '--colors', 'full'],
          input: 'file',
          accepts: nonEmpty,
        },
      ];
    case 'sixel-helper':
      return [
        {
          name: 'sixel',
          command: SIXEL_HELPER,
          args: ['-'],
          input: 'stdin',
          accepts: (output) => output.includes(SIXEL_DCS),
        },
      ];
    case 'general-helper':
      return [
        {
          name: 'chafa',
          command: GENERAL_HELPER,
          args: ['--size', size, '--colors', 'full'],
          input: 'file',
          accepts: nonEmpty,
        },
      ];
    case 'ascii':
      return [];
    default:
      return assertNever(protocol);
  }
}

export class ImageRenderer {
  constructor(private runner: HelperRunner) {}

  /** Terminal size is the component's, chrome included. */
  render(protocol: ImageProtocol, bytes: Uint8Array, width: number, height: number): RenderedFrame {
    const failures: string[] = [];
    if (bytes.length === 0) {
      return { text: '', renderedBy: 'ascii', failures };
    }

    const chain = fallbackChain(protocol, helperCellGrid(width, height));
    let tempDir: string | undefined;

    try {
      for (const invocation of chain) {
        let args = invocation.args;
        let input: Uint8Array | undefined;
        if (invocation.input === 'file') {
          if (!tempDir) {
            tempDir = mkdtempSync(join(tmpdir(), 'geopeek-preview-'));
            writeFileSync(join(tempDir, 'map.png'), bytes);
          }
          args = [...invocation.args, join(tempDir, 'map.png')];
        } else {
          input = bytes;
        }

        const result = this.runner.run(invocation.command, args, input);
        if (!result.ok) {
          failures.push(result.reason);
          continue;
        }
        if (!invocation.accepts(result.stdout)) {
          failures.push(`${invocation.command} produced unusable ${invocation.name} output`);
          continue;
        }
        return { text: result.stdout, renderedBy: invocation.name, failures };
      }
    } catch (error) {
      failures.push(`helper setup failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    }

    return {
      text: renderAscii(bytes, asciiCellGrid(width, height)),
      renderedBy: 'ascii',
      failures,
    };
  }
}
