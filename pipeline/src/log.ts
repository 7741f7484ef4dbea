/**
 * Console logging helpers
 */

import { format } from 'date-fns';

/**
 * Log a pipeline stage with a wall-clock timestamp
 */
export function logStep(message: string, now: Date = new Date()): void {
  console.log(`[${format(now, 'HH:mm:ss')}] ${message}`);
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
}
