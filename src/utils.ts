export function parseFlag(value: string | undefined): boolean {
  const v = (value ?? '').toLowerCase().trim();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

/**
 * Parse a comma separated list of positive integers, e.g. `10,100,1000`.
 */
export function parsePositiveIntList(raw: string): number[] {
  const values = raw
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const n = Number(part);
      if (!Number.isInteger(n) || n <= 0) throw new Error(`Invalid positive integer "${part}"`);
      return n;
    });
  if (values.length === 0) throw new Error(`Expected at least one value in "${raw}"`);
  return values;
}
