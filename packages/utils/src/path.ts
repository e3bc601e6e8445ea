/**
 * Path Utilities
 */

import { basename, extname, resolve } from 'node:path';

const MAX_NAME_LENGTH = 200;

// Characters that are illegal in file names on at least one platform
const RESERVED_CHARACTERS = /[<>:"/\\|?*]/g;
// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\x00-\x1f\x7f-\x9f]/g;

/**
 * Make a name usable as a single path segment everywhere.
 * May return an empty string.
 */
export function sanitizeFilename(name: string): string {
  return name
    .replace(CONTROL_CHARACTERS, '')
    .replace(RESERVED_CHARACTERS, '_')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .slice(0, MAX_NAME_LENGTH);
}

/**
 * File name without directory or extension
 */
export function getBasename(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/**
 * Absolute, normalized form of a path, used as an identity key
 */
export function normalizePath(filePath: string): string {
  return resolve(filePath);
}
