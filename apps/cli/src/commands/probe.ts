/**
 * Probe Command
 *
 * Show container and stream details of a media file.
 */

import ora from 'ora';
import chalk from 'chalk';
import { toErrorMessage } from '@encodeq/core';
import { formatDuration } from '@encodeq/utils';
import { createRuntime } from '../lib/runtime.js';
import { printError, printHeader, printJson, printKeyValue } from '../lib/output.js';

interface ProbeOptions {
  json?: boolean;
  debug?: boolean;
}

export async function probeCommand(file: string, options: ProbeOptions): Promise<void> {
  const { prober } = createRuntime({ debug: options.debug });
  const spinner = ora('Probing media file...').start();

  try {
    const result = await prober.probe(file);
    spinner.stop();

    if (options.json) {
      printJson(result);
      return;
    }

    printHeader('Media Info');
    printKeyValue('File', file);
    printKeyValue('Format', result.formatName ?? 'unknown');
    printKeyValue('Duration', result.durationMs !== null ? formatDuration(result.durationMs) : 'unknown');
    printKeyValue('Bitrate', result.bitRate !== null ? `${Math.round(result.bitRate / 1000)} kbps` : 'unknown');
    console.log();

    console.log(chalk.bold(`Streams (${result.streams.length}):`));
    for (const stream of result.streams) {
      const details: string[] = [];
      if (stream.width !== undefined && stream.height !== undefined) details.push(`${stream.width}x${stream.height}`);
      if (stream.channels !== undefined) details.push(`${stream.channels}ch`);
      if (stream.sampleRate !== undefined) details.push(`${stream.sampleRate} Hz`);

      console.log(
        `  ${chalk.cyan(`#${stream.index}`)} ${stream.type} ${stream.codec ?? '?'}` +
        (details.length > 0 ? ` ${chalk.gray(details.join(', '))}` : '')
      );
    }
  } catch (error) {
    spinner.fail('Probe failed');
    printError(toErrorMessage(error));
    process.exitCode = 1;
  }
}
