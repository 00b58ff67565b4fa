/**
 * Splits `records` into consecutive chunks of at most `size` items.
 *
 * Order is preserved; only the last chunk may be shorter.
 */
export function chunk<T>(records: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < records.length; i += size) {
    batches.push(records.slice(i, i + size));
  }
  return batches;
}
