/**
 * Event identity: the `(host, sequence)` pair rendered as `"{host}_{sequence}"`.
 *
 * Sequence numbers are only unique per host, so the host prefix is what
 * keeps identities from colliding when several machines share one
 * persisted state file.
 */

export interface ParsedIdentity {
  readonly host: string;
  readonly sequence: number;
}

const SEPARATOR = '_';
const DIGITS = /^\d+$/;

export function identity(host: string, sequence: number): string {
  return `${host}${SEPARATOR}${sequence}`;
}

/**
 * Splits an identity back into host and sequence.
 *
 * Splits on the last separator: the sequence never contains one, the host
 * may. Returns null for anything that is not `<host>_<digits>`.
 */
export function parseIdentity(id: string): ParsedIdentity | null {
  const idx = id.lastIndexOf(SEPARATOR);
  if (idx <= 0) return null;

  const host = id.slice(0, idx);
  const digits = id.slice(idx + 1);
  if (!DIGITS.test(digits)) return null;

  const sequence = Number(digits);
  if (!Number.isSafeInteger(sequence)) return null;

  return { host, sequence };
}

/**
 * Normalizes one `processed_ids` entry read from disk.
 *
 * Older state files stored bare record numbers; those belong to the
 * machine that wrote them, which is the local host.
 */
export function migrateLegacyIdentity(entry: unknown, localHost: string): string | null {
  if (typeof entry === 'number') {
    return Number.isSafeInteger(entry) && entry >= 0 ? identity(localHost, entry) : null;
  }
  if (typeof entry !== 'string' || entry === '') return null;
  if (DIGITS.test(entry)) return identity(localHost, Number(entry));
  return entry;
}
