const UNIT = 1000;
const PREFIXES = 'KMGTPE';

/**
 * Formats a byte count with base-1000 units, e.g. 999 -> '999 B', 1500 -> '1.5 KB'.
 */
export function hrBytes(bytes: number): string {
  if (bytes < UNIT) return `${bytes} B`;
  let div = UNIT;
  let exp = 0;
  for (let n = Math.floor(bytes / UNIT); n >= UNIT && exp < PREFIXES.length - 1; n = Math.floor(n / UNIT)) {
    div *= UNIT;
    exp++;
  }
  return `${(bytes / div).toFixed(1)} ${PREFIXES[exp]}B`;
}
