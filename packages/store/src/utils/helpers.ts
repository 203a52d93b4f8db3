import { uuidv7 } from 'uuidv7';

export function generateId(): string {
  return uuidv7();
}

/** Split a list into consecutive slices of at most `size` items. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/** `?, ?, ?` for an IN (...) list of n parameters */
export function placeholders(n: number): string {
  return new Array(n).fill('?').join(', ');
}
