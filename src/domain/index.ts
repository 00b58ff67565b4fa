export type { RawEvent, CanonicalEvent, CanonicalEventInput, WireEvent } from './event.js';
export {
  MIN_PAGES,
  MAX_PAGES,
  UNKNOWN_USER,
  UNKNOWN_DOCUMENT,
  UNKNOWN_PRINTER,
  isValidPageCount,
  createCanonicalEvent,
  toWireEvent,
} from './event.js';
export type { ParsedIdentity } from './identity.js';
export { identity, parseIdentity, migrateLegacyIdentity } from './identity.js';
export type { PersistedState } from './state.js';
