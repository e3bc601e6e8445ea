/**
 * Binary Configuration
 *
 * Resolves the encoder and prober executables.
 *
 * Priority order:
 * 1. Explicit path (environment variable, e.g. FFMPEG_PATH)
 * 2. Bundled binary folder (binaries/<os>/ at the repository root)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// packages/core/src/config -> repository root
const BINARY_ROOT = resolve(__dirname, '../../../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

/**
 * Resolve binary path
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  explicitPath: string | undefined,
  binaryRoot: string = BINARY_ROOT
): BinaryConfig {
  // 1. Explicit path. Trust it even if missing: the spawn will report it.
  if (explicitPath) {
    return { name, envVar, resolvedPath: explicitPath, source: 'env' };
  }

  // 2. Bundled binary folder
  const bundledPath = join(binaryRoot, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // 3. Let the system PATH resolve it
  return { name, envVar, resolvedPath: name, source: 'path' };
}

export function getBinariesConfig(
  explicit: { ffmpeg?: string; ffprobe?: string } = {},
  binaryRoot?: string
): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', explicit.ffmpeg, binaryRoot),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', explicit.ffprobe, binaryRoot),
  };
}
