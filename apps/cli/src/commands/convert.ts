/**
 * Convert Command
 *
 * Queue files for conversion and follow them until the queue drains.
 * Ctrl-C cancels every job; the exit code is 1 when any job failed.
 */

import { basename, resolve } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { JobState, toErrorMessage, type JobOptions } from '@encodeq/core';
import { buildDestinationPath, type ConversionProfile, type JobEvent } from '@encodeq/processing';
import { formatDuration, getFileSizeBytes } from '@encodeq/utils';
import { createRuntime } from '../lib/runtime.js';
import { formatBytes, formatJobProgress } from '../lib/format.js';
import { printError, printHeader, printInfo, printTable, printWarning, stateColors } from '../lib/output.js';

export interface ConvertOptions {
  profile: string;
  output: string;
  concurrency?: number;
  tag?: string;
  overwrite?: boolean;
  subtitles?: boolean;
  deleteSource?: boolean;
  silenceTimeout?: number;
  probe: boolean;
  debug?: boolean;
}

export async function convertCommand(files: string[], options: ConvertOptions): Promise<void> {
  const { catalog, queue, prober } = createRuntime({
    debug: options.debug,
    maxConcurrentJobs: options.concurrency,
    outputSilenceTimeoutMs: options.silenceTimeout,
  });

  let profile: ConversionProfile;
  try {
    profile = catalog.get(options.profile);
  } catch (error) {
    printError(toErrorMessage(error));
    printInfo(`Run ${chalk.cyan('encodeq profiles')} to list the available profiles`);
    process.exitCode = 1;
    return;
  }

  // Known durations give percentages and ETAs from the first progress line
  const durations = new Map<string, number>();
  if (options.probe) {
    const spinner = ora('Reading media durations...').start();
    for (const file of files) {
      try {
        const info = await prober.probe(resolve(file));
        if (info.durationMs !== null) durations.set(file, info.durationMs);
      } catch (error) {
        spinner.warn(`Could not probe ${basename(file)}: ${toErrorMessage(error)}`);
        spinner.start('Reading media durations...');
      }
    }
    spinner.stop();
  }

  const outputDir = resolve(options.output);
  const labels = new Map<string, string>();

  for (const file of files) {
    const source = resolve(file);
    const jobOptions: JobOptions = {
      overwrite: options.overwrite,
      includeSubtitles: options.subtitles,
      deleteSourceOnSuccess: options.deleteSource,
      durationMs: durations.get(file),
    };

    try {
      const destination = buildDestinationPath(source, outputDir, profile, { tag: options.tag });
      labels.set(queue.enqueue(source, destination, profile, jobOptions), basename(file));
    } catch (error) {
      printError(`${basename(file)}: ${toErrorMessage(error)}`);
      process.exitCode = 1;
    }
  }

  if (labels.size === 0) {
    printWarning('Nothing to convert');
    return;
  }

  const spinner = ora(`Converting ${labels.size} file(s) with ${profile.id}`).start();
  const lines = new Map<string, string>();

  const render = (): void => {
    if (lines.size > 0) {
      spinner.text = Array.from(lines.values()).join('\n');
    }
  };

  const onEvent = (event: JobEvent): void => {
    const label = labels.get(event.jobId) ?? event.jobId;

    switch (event.kind) {
      case 'queued':
        break;
      case 'started':
        lines.set(event.jobId, `${label} starting`);
        break;
      case 'progress':
        lines.set(event.jobId, formatJobProgress(label, event.payload));
        break;
      case 'succeeded':
        lines.delete(event.jobId);
        spinner.stopAndPersist({ symbol: chalk.green('✓'), text: label });
        spinner.start();
        break;
      case 'failed':
        lines.delete(event.jobId);
        spinner.stopAndPersist({ symbol: chalk.red('✗'), text: `${label}: ${event.payload.reason}` });
        spinner.start();
        break;
      case 'canceled':
        lines.delete(event.jobId);
        spinner.stopAndPersist({ symbol: chalk.yellow('-'), text: `${label}: ${event.payload.reason}` });
        spinner.start();
        break;
    }
    render();
  };

  // Replay what happened while the files were being queued
  const subscription = queue.bus.subscribe(onEvent, { replay: true });

  const onInterrupt = (): void => {
    spinner.text = 'Canceling...';
    void queue.cancelAll('Interrupted').catch((error: unknown) => {
      printError(toErrorMessage(error));
    });
  };
  process.once('SIGINT', onInterrupt);

  try {
    await queue.whenIdle();
    await queue.bus.drain();
  } finally {
    process.off('SIGINT', onInterrupt);
    subscription.unsubscribe();
    spinner.stop();
  }

  const jobs = queue.list();
  const rows = await Promise.all(jobs.map(async job => {
    const { startedAt, finishedAt } = job.timestamps;
    let size = '-';
    if (job.state === JobState.SUCCEEDED) {
      size = await getFileSizeBytes(job.destination).then(formatBytes, () => '-');
    }
    return {
      file: labels.get(job.id) ?? job.source,
      state: stateColors[job.state](job.state),
      output: job.state === JobState.SUCCEEDED ? job.destination : job.outcome?.status === 'failed' ? job.outcome.code : '',
      size,
      time: startedAt && finishedAt ? formatDuration(finishedAt.getTime() - startedAt.getTime()) : '-',
    };
  }));

  printHeader('Summary');
  printTable(rows);

  if (jobs.some(job => job.state === JobState.FAILED)) {
    process.exitCode = 1;
  }
}
