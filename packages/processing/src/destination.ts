/**
 * Output naming
 */

import { join } from 'node:path';
import { getBasename, sanitizeFilename } from '@encodeq/utils';
import type { ConversionProfile } from './profile.js';

export interface DestinationOptions {
  tag?: string;
}

/**
 * outputDir/<tag><source base name>.<container>
 */
export function buildDestinationPath(
  source: string,
  outputDir: string,
  profile: ConversionProfile,
  options: DestinationOptions = {}
): string {
  const name = sanitizeFilename(`${options.tag ?? ''}${getBasename(source)}`) || 'output';
  return join(outputDir, `${name}.${profile.container}`);
}
