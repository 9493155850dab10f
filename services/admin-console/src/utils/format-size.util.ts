const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Binary size with at most two decimals: `0 B`, `1.5 KB`, `1 MB`, `2.33 GB`.
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < SIZE_UNITS.length - 1) {
    unitIndex++;
    value /= 1024;
  }
  return `${Math.round(value * 100) / 100} ${SIZE_UNITS[unitIndex]}`;
}
