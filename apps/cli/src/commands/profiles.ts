/**
 * Profiles Command
 *
 * List the conversion profiles.
 */

import chalk from 'chalk';
import { ProfileCatalog } from '@encodeq/processing';
import { printHeader, printJson } from '../lib/output.js';

interface ProfilesOptions {
  json?: boolean;
}

export function profilesCommand(options: ProfilesOptions): void {
  const catalog = ProfileCatalog.withBuiltins();
  const profiles = catalog.list();

  if (options.json) {
    printJson(profiles.map(profile => ({
      ...profile.toDefinition(),
      arguments: catalog.resolve(profile),
    })));
    return;
  }

  printHeader(`Profiles (${profiles.length})`);

  for (const profile of profiles) {
    const codecs = [profile.videoCodec, profile.audioCodec]
      .filter((codec): codec is string => codec !== null)
      .join(' + ');

    console.log(`  ${chalk.cyan(profile.id.padEnd(18))} ${profile.label}`);
    console.log(`  ${' '.repeat(18)} ${chalk.gray(`.${profile.container}  ${codecs}`)}`);
    console.log(`  ${' '.repeat(18)} ${chalk.dim(catalog.resolve(profile).join(' '))}`);
    console.log();
  }
}
