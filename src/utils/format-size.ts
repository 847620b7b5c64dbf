const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Human readable byte size, binary units (1 KB = 1024 B)
 *
 * @example formatSize(1536) === '1.50 KB'
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < UNITS.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${UNITS[unit]}`;
}
