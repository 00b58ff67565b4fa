import { describe, it, expect } from 'vitest';
import { identity, migrateLegacyIdentity, parseIdentity } from '../../src/domain/identity.js';

describe('identity', () => {
  it('renders host and sequence joined by an underscore', () => {
    expect(identity('PC1', 42)).toBe('PC1_42');
  });

  it('is deterministic', () => {
    expect(identity('PC1', 42)).toBe(identity('PC1', 42));
  });

  it('never collides for distinct (host, sequence) pairs', () => {
    const pairs: Array<[string, number]> = [
      ['a', 1],
      ['a', 12],
      ['a_1', 2],
      ['a1', 2],
      ['b', 1],
    ];
    const ids = pairs.map(([host, seq]) => identity(host, seq));
    expect(new Set(ids).size).toBe(pairs.length);
  });

  it('round-trips through parseIdentity, including hosts with underscores', () => {
    expect(parseIdentity(identity('my_host', 7))).toEqual({ host: 'my_host', sequence: 7 });
    expect(parseIdentity(identity('PC1', 0))).toEqual({ host: 'PC1', sequence: 0 });
  });
});

describe('parseIdentity', () => {
  it.each(['PC1', '_5', 'PC1_', 'PC1_x1', '42', 'PC1_-3'])('rejects %s', (id) => {
    expect(parseIdentity(id)).toBeNull();
  });
});

describe('migrateLegacyIdentity', () => {
  it('qualifies bare integers with the local host', () => {
    expect(migrateLegacyIdentity(17, 'PC1')).toBe('PC1_17');
    expect(migrateLegacyIdentity('17', 'PC1')).toBe('PC1_17');
  });

  it('keeps host-qualified identities as they are', () => {
    expect(migrateLegacyIdentity('PC2_5', 'PC1')).toBe('PC2_5');
  });

  it('rejects values that cannot be identities', () => {
    expect(migrateLegacyIdentity(-1, 'PC1')).toBeNull();
    expect(migrateLegacyIdentity(1.5, 'PC1')).toBeNull();
    expect(migrateLegacyIdentity('', 'PC1')).toBeNull();
    expect(migrateLegacyIdentity(null, 'PC1')).toBeNull();
    expect(migrateLegacyIdentity({ id: 3 }, 'PC1')).toBeNull();
  });
});
