/**
 * Log sanitization utilities.
 *
 * Keeps credentials (basic-auth headers, passwords embedded in URLs) and
 * home directory paths out of status lines and the debug log.
 */

import { homedir } from 'os';

const homeDir = homedir();

/**
 * Truncate a string for safe logging.
 * Returns the first `maxLen` characters followed by "..." if truncated.
 */
export function truncateContent(text: string, maxLen = 200): string {
  if (text.length <= maxLen) return text;
  return text.substring(0, maxLen) + '...';
}

/**
 * Mask credentials appearing anywhere in a message: authorization values and
 * `user:password@` URL userinfo.
 */
export function maskCredentials(text: string): string {
  return text
    .replace(/\b(Basic|Bearer) [A-Za-z0-9+/=._~-]+/g, '$1 ***')
    .replace(/(\b[a-z][a-z0-9+.-]*:\/\/)[^\s/@:]+:[^\s/@]*@/gi, '$1***@');
}

/**
 * Replace the user's home directory path with `~` in a string.
 */
export function sanitizePath(text: string): string {
  if (!homeDir) return text;
  return text.replaceAll(homeDir, '~');
}

/**
 * Apply all sanitization to a log message string:
 * - Mask credentials
 * - Replace home directory with ~
 */
export function sanitizeForLog(message: string): string {
  return sanitizePath(maskCredentials(message));
}
