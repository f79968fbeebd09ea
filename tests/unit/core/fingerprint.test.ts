import { describe, it, expect } from 'vitest';
import { createFingerprint, normalizeParams } from '../../../src/core/fingerprint.js';

describe('fingerprint', () => {
  describe('normalizeParams', () => {
    it('sorts by name and stringifies values', () => {
      expect(normalizeParams({ season: 2024, league: 39, live: 'all' })).toEqual([
        ['league', '39'],
        ['live', 'all'],
        ['season', '2024'],
      ]);
    });

    it('drops null and undefined values', () => {
      expect(normalizeParams({ team: 33, date: undefined, round: null })).toEqual([['team', '33']]);
    });

    it('keeps falsy but present values', () => {
      expect(normalizeParams({ national: false, last: 0 })).toEqual([
        ['last', '0'],
        ['national', 'false'],
      ]);
    });
  });

  describe('createFingerprint', () => {
    it('is independent of parameter order', () => {
      const a = createFingerprint('fixtures', { league: 39, season: 2024 });
      const b = createFingerprint('fixtures', { season: 2024, league: 39 });

      expect(a.key).toBe(b.key);
    });

    it('treats number and string spellings of a value alike', () => {
      const a = createFingerprint('teams', { id: 33 });
      const b = createFingerprint('teams', { id: '33' });

      expect(a.key).toBe(b.key);
    });

    it('ignores absent parameters', () => {
      const a = createFingerprint('teams', { id: 33, name: undefined });
      const b = createFingerprint('teams', { id: 33 });

      expect(a.key).toBe(b.key);
    });

    it('separates families with identical parameters', () => {
      const a = createFingerprint('teams', { id: 33 });
      const b = createFingerprint('fixtures', { id: 33 });

      expect(a.key).not.toBe(b.key);
    });

    it('separates distinct parameter values', () => {
      const a = createFingerprint('fixtures', { date: '2025-03-01' });
      const b = createFingerprint('fixtures', { date: '2025-03-02' });

      expect(a.key).not.toBe(b.key);
    });

    it('prefixes the key with the family and keeps the canonical form', () => {
      const fingerprint = createFingerprint('team_statistics', { team: 33, league: 39, season: 2024 });

      expect(fingerprint.family).toBe('team_statistics');
      expect(fingerprint.key).toMatch(/^team_statistics:[0-9a-f]{64}$/);
      expect(fingerprint.canonical).toBe('[["league","39"],["season","2024"],["team","33"]]');
    });
  });
});
