/**
 * Append-only diagnostic log.
 *
 * The preview owns the whole terminal while it runs, so console output would
 * tear the screen. Diagnostics go to the file named by GEOPEEK_DEBUG_LOG
 * instead, and are dropped when it is unset.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { sanitizeForLog } from './log-sanitizer.js';

export type DebugLogger = (message: string) => void;

export function createDebugLogger(logFile: string | undefined = process.env.GEOPEEK_DEBUG_LOG): DebugLogger {
  if (!logFile) return () => {};

  let dirReady = false;
  return (message: string) => {
    try {
      if (!dirReady) {
        mkdirSync(dirname(logFile), { recursive: true });
        dirReady = true;
      }
      appendFileSync(logFile, `${new Date().toISOString()} ${sanitizeForLog(message)}\n`, 'utf8');
    } catch (error) {
      process.emitWarning(`debug log write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  };
}
