/**
 * Plain-text formatting shared by the commands
 */

import { InvalidArgumentError } from 'commander';
import { formatDuration, formatTimecode } from '@encodeq/utils';
import type { ProgressEvent } from '@encodeq/processing';

/**
 * One status line for a running conversion
 */
export function formatJobProgress(label: string, progress: ProgressEvent): string {
  const parts = [label];

  if (progress.percent !== null) {
    parts.push(`${progress.percent.toFixed(1)}%`);
  } else {
    parts.push(formatTimecode(progress.positionMs));
  }
  if (progress.speed !== null) {
    parts.push(`${progress.speed}x`);
  }
  if (progress.etaMs !== null) {
    parts.push(`ETA ${formatDuration(progress.etaMs)}`);
  }

  return parts.join(' ');
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i] ?? 'B'}`;
}

/**
 * Commander argument parser for integers >= 1
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a whole number of at least 1.');
  }
  return parsed;
}
