const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Human-readable byte count, rounded half-up to whole units (e.g. `512B`, `2KB`, `15MB`)
 */
export function humanSize(bytes: number): string {
  if (bytes < KB) return `${bytes}B`;
  if (bytes < MB) return `${Math.floor((bytes + KB / 2) / KB)}KB`;
  if (bytes < GB) return `${Math.floor((bytes + MB / 2) / MB)}MB`;
  return `${Math.floor((bytes + GB / 2) / GB)}GB`;
}

/**
 * Whole-percent space saved. Negative when the output grew.
 */
export function savingsPercent(originalBytes: number, outputBytes: number): number {
  if (originalBytes <= 0) return 0;
  return 100 - Math.floor((outputBytes * 100) / originalBytes);
}

/**
 * Report lines for a single converted file
 */
export function formatSizeReport(
  originalBytes: number,
  outputBytes: number,
  labels: { original?: string; output?: string } = {}
): string[] {
  const { original = 'Original size', output = 'New size' } = labels;
  return [
    `${original}: ${humanSize(originalBytes)}`,
    `${output}: ${humanSize(outputBytes)}`,
    `Space saved: ${savingsPercent(originalBytes, outputBytes)}%`,
  ];
}
