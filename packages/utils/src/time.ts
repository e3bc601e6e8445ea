/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) {
    return '--';
  }
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Parse an encoder timecode (HH:MM:SS.ff, fractional part of any length)
 * to milliseconds. Returns null when the text is not a timecode.
 */
export function parseTimecode(timecode: string): number | null {
  const match = /^(-)?(\d+):(\d{1,2}):(\d{1,2})(?:\.(\d+))?$/.exec(timecode.trim());
  if (!match) {
    return null;
  }

  const [, negative, h, m, s, fraction] = match;
  const hours = Number(h);
  const minutes = Number(m);
  const seconds = Number(s);
  if (minutes >= 60 || seconds >= 60) {
    return null;
  }

  const milliseconds = Math.round(Number(`0.${fraction ?? '0'}`) * 1000);
  const total = (hours * 3600 + minutes * 60 + seconds) * 1000 + milliseconds;
  return negative ? -total : total;
}

/**
 * Format milliseconds to timecode string (HH:MM:SS.mmm)
 */
export function formatTimecode(ms: number): string {
  const safe = Math.max(0, Math.round(ms));
  const hours = Math.floor(safe / 3600000);
  const minutes = Math.floor((safe % 3600000) / 60000);
  const seconds = Math.floor((safe % 60000) / 1000);
  const milliseconds = safe % 1000;

  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}.${milliseconds.toString().padStart(3, '0')}`;
}
