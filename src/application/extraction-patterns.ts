/**
 * Message patterns for Windows print log entries (PrintService event 307).
 *
 * The message text is localized by the host OS. Each language group lists
 * its patterns in priority order; the extractor takes the first match per
 * field category.
 */

export type Language = 'pt' | 'en';

export type PageSource =
  | 'pages-printed'
  | 'total-pages-printed'
  | 'trailing-count'
  | 'size-and-count'
  | 'keyword-scan';

export interface PagePattern {
  readonly source: PageSource;
  readonly pattern: RegExp;
}

export interface PatternGroup {
  readonly language: Language;
  /** Group 1 = document name, group 2 = user. */
  readonly documentAndUser: RegExp;
  /** Group 1 = printer name. */
  readonly printer: RegExp;
  readonly pages: readonly PagePattern[];
}

// "Size in bytes: 1024. Pages printed: 3" and its Portuguese counterpart
const SIZE_AND_COUNT: PagePattern = {
  source: 'size-and-count',
  pattern: /(?:Size in bytes:|Tamanho em bytes:)\s*\d+\.\s*(?:Pages printed:|Páginas impressas:)?\s*(\d+)/,
};

export const PORTUGUESE: PatternGroup = {
  language: 'pt',
  documentAndUser: /O documento \d+, (.+?) pertencente a (.+?) em/,
  printer: /foi impresso em (.+?)(?:\s+pela porta|\s+através|\.|$)/,
  pages: [
    { source: 'pages-printed', pattern: /Páginas impressas:\s*(\d+)/ },
    { source: 'total-pages-printed', pattern: /Total de páginas impressas:\s*(\d+)/ },
    { source: 'trailing-count', pattern: /(\d+)\s+páginas?\b/i },
    SIZE_AND_COUNT,
  ],
};

export const ENGLISH: PatternGroup = {
  language: 'en',
  documentAndUser: /Document \d+, (.+?) owned by (.+?) on/,
  printer: /was printed on (.+?)(?:\s+through|\s+via|\.|$)/,
  pages: [
    { source: 'pages-printed', pattern: /Pages printed:\s*(\d+)/ },
    { source: 'total-pages-printed', pattern: /Total pages printed:\s*(\d+)/ },
    { source: 'trailing-count', pattern: /(\d+)\s+pages?\b/i },
    SIZE_AND_COUNT,
  ],
};

/** Last resort for either language: any number next to a page keyword. */
export const KEYWORD_SCAN: readonly PagePattern[] = [
  { source: 'keyword-scan', pattern: /(?:páginas?|pages?)\s*:\s*(\d+)/i },
  { source: 'keyword-scan', pattern: /(\d+)\s*(?:páginas?|pages?)/i },
  { source: 'keyword-scan', pattern: /total\s*:\s*(\d+)/i },
  { source: 'keyword-scan', pattern: /(?:impressas?|printed)\s*:\s*(\d+)/i },
];

const PORTUGUESE_MARKERS = ['pertencente a', 'foi impresso'];

export function detectLanguage(message: string): PatternGroup {
  return PORTUGUESE_MARKERS.some((marker) => message.includes(marker)) ? PORTUGUESE : ENGLISH;
}
