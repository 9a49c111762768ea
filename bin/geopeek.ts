#!/usr/bin/env node

import chalk from 'chalk';
import { previewCommand } from '../src/cli/commands/preview.js';
import { PREVIEW_USAGE, parsePreviewArgs } from '../src/cli/common/preview-args.js';
import { sanitizeForLog } from '../src/infra/log-sanitizer.js';

async function main(): Promise<void> {
  const parsed = parsePreviewArgs(process.argv.slice(2));

  switch (parsed.kind) {
    case 'usage':
      console.log(PREVIEW_USAGE);
      return;
    case 'error':
      console.error(chalk.red(parsed.error));
      console.error(chalk.gray(PREVIEW_USAGE));
      process.exit(1);
    case 'run':
      break;
  }

  try {
    await previewCommand(parsed.options);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(sanitizeForLog(message)));
    process.exit(1);
  }
  // In-flight GetMap requests may still hold sockets open after close.
  process.exit(0);
}

void main();
