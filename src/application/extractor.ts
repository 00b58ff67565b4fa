import type { CanonicalEvent, RawEvent } from '../domain/index.js';
import { createCanonicalEvent, identity, isValidPageCount } from '../domain/index.js';
import type { Language, PagePattern, PageSource } from './extraction-patterns.js';
import { KEYWORD_SCAN, detectLanguage } from './extraction-patterns.js';

export type ExtractionField = 'document' | 'user' | 'printer' | 'pages';

/**
 * Result of turning one raw log entry into a canonical event.
 *
 * A successful extraction may still be degraded: every field that fell
 * back to its sentinel is listed in `fallbacks`, and every page count that
 * matched but was out of range is kept in `rejectedPageCounts`.
 */
export type Extraction =
  | {
      readonly ok: true;
      readonly event: CanonicalEvent;
      readonly language: Language;
      readonly pageSource: PageSource | 'default';
      readonly fallbacks: readonly ExtractionField[];
      readonly rejectedPageCounts: readonly number[];
    }
  | { readonly ok: false; readonly identity: string; readonly error: string };

interface PageMatch {
  pages: number | undefined;
  source: PageSource | 'default';
  rejected: number[];
}

function firstGroup(pattern: RegExp, message: string): string | undefined {
  return pattern.exec(message)?.[1]?.trim();
}

function matchPages(patterns: readonly PagePattern[], message: string): PageMatch {
  const rejected: number[] = [];
  for (const { source, pattern } of patterns) {
    const digits = firstGroup(pattern, message);
    if (digits === undefined) continue;

    const pages = Number(digits);
    if (isValidPageCount(pages)) {
      return { pages, source, rejected };
    }
    rejected.push(pages);
  }
  return { pages: undefined, source: 'default', rejected };
}

/**
 * Extracts a canonical print job from a raw event.
 *
 * Pure function: no I/O, never throws. Fields that no pattern matches
 * degrade to their sentinel value instead of failing the record; only an
 * event without a usable host or sequence is reported as a failure.
 */
export function extractEvent(raw: RawEvent): Extraction {
  const id = identity(raw.host, raw.sequence);

  try {
    if (raw.host.trim() === '') {
      return { ok: false, identity: id, error: 'Event has no host' };
    }
    if (!Number.isSafeInteger(raw.sequence) || raw.sequence < 0) {
      return { ok: false, identity: id, error: `Invalid sequence number: ${raw.sequence}` };
    }

    const message = raw.message;
    const group = detectLanguage(message);

    const docUser = group.documentAndUser.exec(message);
    const document = docUser?.[1]?.trim();
    const user = docUser?.[2]?.trim();
    const printer = firstGroup(group.printer, message);
    const pageMatch = matchPages([...group.pages, ...KEYWORD_SCAN], message);

    const fallbacks: ExtractionField[] = [];
    if (!document) fallbacks.push('document');
    if (!user) fallbacks.push('user');
    if (!printer) fallbacks.push('printer');
    if (pageMatch.pages === undefined) fallbacks.push('pages');

    const event = createCanonicalEvent({
      identity: id,
      sequence: raw.sequence,
      date: raw.timestamp,
      user,
      machine: raw.host,
      printer,
      document,
      pages: pageMatch.pages,
    });

    return {
      ok: true,
      event,
      language: group.language,
      pageSource: pageMatch.source,
      fallbacks,
      rejectedPageCounts: pageMatch.rejected,
    };
  } catch (err: unknown) {
    return {
      ok: false,
      identity: id,
      error: err instanceof Error ? err.message : String(err),
    };
  }
}
