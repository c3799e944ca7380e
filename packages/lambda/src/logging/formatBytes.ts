const UNITS = [
  [1e9, 'GB'],
  [1e6, 'MB'],
  [1e3, 'KB'],
] as const;

const oneDecimal = new Intl.NumberFormat('en-US', { minimumFractionDigits: 1, maximumFractionDigits: 1 });

/** Human-readable byte count in decimal units, e.g. `1,234.5 MB`. */
export function formatBytes(count: number): string {
  for (const [size, unit] of UNITS) {
    if (count >= size) return `${oneDecimal.format(count / size)} ${unit}`;
  }
  return `${String(count)} B`;
}
