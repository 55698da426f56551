/**
 * Helpers for turning ffmpeg progress output into percentages
 */

/**
 * Parses an ffmpeg timemark (`HH:MM:SS.ss`) into seconds
 */
export function parseTimemark(timemark: string): number | null {
  const match = /^(\d+):(\d{1,2}):(\d{1,2}(?:\.\d+)?)$/.exec(timemark.trim());
  if (!match) return null;

  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/**
 * Percentage of `durationSeconds` covered, clamped to [0, 100] with one decimal
 */
export function progressPercent(currentSeconds: number, durationSeconds: number): number {
  if (!(durationSeconds > 0) || !Number.isFinite(currentSeconds)) return 0;
  const percent = (currentSeconds / durationSeconds) * 100;
  const clamped = Math.min(100, Math.max(0, percent));
  return Math.round(clamped * 10) / 10;
}

/**
 * Formats whole seconds as `HH:MM:SS`
 */
export function formatClock(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(Math.floor(seconds / 3600))}:${pad(Math.floor((seconds % 3600) / 60))}:${pad(seconds % 60)}`;
}
