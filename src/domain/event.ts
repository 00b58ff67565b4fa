/**
 * Core domain types for the spoolwatch print event model.
 *
 * A raw event is what the host's print log reports; a canonical event is
 * the normalized record the collector stores. Neither carries framework
 * dependencies.
 */

/** One entry of the host print log, as surfaced by an EventSource. */
export interface RawEvent {
  /** Monotonically increasing record number, local to `host`. */
  readonly sequence: number;
  readonly timestamp: string;
  readonly host: string;
  readonly message: string;
}

export const MIN_PAGES = 1;
export const MAX_PAGES = 10_000;

export const UNKNOWN_USER = 'Unknown';
export const UNKNOWN_DOCUMENT = 'Document';
export const UNKNOWN_PRINTER = 'Printer';

/**
 * Collector-ready print job.
 *
 * `identity` and `sequence` are internal bookkeeping and never leave the
 * agent; see `toWireEvent`.
 */
export interface CanonicalEvent {
  readonly identity: string;
  readonly sequence: number;
  readonly date: string;
  readonly user: string;
  readonly machine: string;
  readonly printer: string;
  readonly document: string;
  readonly pages: number;
}

/** Shape of a single entry in the collector POST body. */
export interface WireEvent {
  readonly date: string;
  readonly user: string;
  readonly machine: string;
  readonly pages: number;
  readonly document: string;
  readonly printer: string;
}

/** Returns true when `pages` is an integer inside [MIN_PAGES, MAX_PAGES]. */
export function isValidPageCount(pages: number): boolean {
  return Number.isInteger(pages) && pages >= MIN_PAGES && pages <= MAX_PAGES;
}

export interface CanonicalEventInput {
  identity: string;
  sequence: number;
  date: string;
  user?: string | undefined;
  machine: string;
  printer?: string | undefined;
  document?: string | undefined;
  pages?: number | undefined;
}

function orDefault(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? fallback : trimmed;
}

/**
 * Builds a CanonicalEvent from loosely extracted fields.
 *
 * Blank text fields become their sentinel; a page count outside
 * [1, 10000] (or missing) becomes 1.
 */
export function createCanonicalEvent(input: CanonicalEventInput): CanonicalEvent {
  const pages = input.pages !== undefined && isValidPageCount(input.pages) ? input.pages : MIN_PAGES;

  return {
    identity: input.identity,
    sequence: input.sequence,
    date: input.date,
    user: orDefault(input.user, UNKNOWN_USER),
    machine: input.machine,
    printer: orDefault(input.printer, UNKNOWN_PRINTER),
    document: orDefault(input.document, UNKNOWN_DOCUMENT),
    pages,
  };
}

/** Strips internal-only fields before transmission. */
export function toWireEvent(event: CanonicalEvent): WireEvent {
  return {
    date: event.date,
    user: event.user,
    machine: event.machine,
    pages: event.pages,
    document: event.document,
    printer: event.printer,
  };
}
