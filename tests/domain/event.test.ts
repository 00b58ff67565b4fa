import { describe, it, expect } from 'vitest';
import {
  UNKNOWN_DOCUMENT,
  UNKNOWN_PRINTER,
  UNKNOWN_USER,
  createCanonicalEvent,
  isValidPageCount,
  toWireEvent,
} from '../../src/domain/event.js';

const base = { identity: 'PC1_1', sequence: 1, date: '2026-03-02 09:15:00', machine: 'PC1' };

describe('isValidPageCount', () => {
  it('accepts integers in [1, 10000]', () => {
    expect(isValidPageCount(1)).toBe(true);
    expect(isValidPageCount(10_000)).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isValidPageCount(0)).toBe(false);
    expect(isValidPageCount(10_001)).toBe(false);
    expect(isValidPageCount(2.5)).toBe(false);
    expect(isValidPageCount(Number.NaN)).toBe(false);
  });
});

describe('createCanonicalEvent', () => {
  it('trims text fields', () => {
    const event = createCanonicalEvent({ ...base, user: '  bob ', printer: ' Canon ', document: ' a.txt', pages: 3 });
    expect(event.user).toBe('bob');
    expect(event.printer).toBe('Canon');
    expect(event.document).toBe('a.txt');
    expect(event.pages).toBe(3);
  });

  it('falls back to sentinels for missing or blank fields', () => {
    const event = createCanonicalEvent({ ...base, user: '   ' });
    expect(event.user).toBe(UNKNOWN_USER);
    expect(event.document).toBe(UNKNOWN_DOCUMENT);
    expect(event.printer).toBe(UNKNOWN_PRINTER);
    expect(event.pages).toBe(1);
  });

  it('replaces an out-of-range page count with 1', () => {
    expect(createCanonicalEvent({ ...base, pages: 0 }).pages).toBe(1);
    expect(createCanonicalEvent({ ...base, pages: 25_000 }).pages).toBe(1);
  });
});

describe('toWireEvent', () => {
  it('drops identity and sequence', () => {
    const wire = toWireEvent(createCanonicalEvent({ ...base, user: 'bob', pages: 2 }));
    expect(wire).toEqual({
      date: '2026-03-02 09:15:00',
      user: 'bob',
      machine: 'PC1',
      pages: 2,
      document: UNKNOWN_DOCUMENT,
      printer: UNKNOWN_PRINTER,
    });
    expect(Object.keys(wire)).not.toContain('identity');
    expect(Object.keys(wire)).not.toContain('sequence');
  });
});
