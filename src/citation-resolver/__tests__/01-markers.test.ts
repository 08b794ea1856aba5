/**
 * Citation marker scanning
 */

import {
  canonicalizeMarkers,
  extractCitationKeys,
  extractMarkers,
  findMalformedMarkers,
  isValidKey,
  normalizeKey,
  replaceMarkers,
  scanMarkers,
} from '../markers';

describe('Citation markers', () => {
  describe('extractMarkers', () => {
    it('should normalize and de-duplicate keys', () => {
      const text = 'See [CITE:Smith2024] and [cite: doe-2023 ] and again [CITE:smith2024].';
      expect(extractMarkers(text)).toEqual(new Set(['smith2024', 'doe-2023']));
    });

    it('should accept the full key alphabet', () => {
      expect(extractMarkers('[CITE:doi:10.1000/xyz_1-2]')).toEqual(new Set(['doi:10.1000/xyz_1-2']));
    });

    it('should ignore malformed markers', () => {
      const text = 'Open [CITE:smith2024 and [CITE:] and [CITE:two words] end';
      expect(extractMarkers(text).size).toBe(0);
    });

    it('should return sorted keys for snapshots', () => {
      expect(extractCitationKeys('[CITE:zeta] [CITE:alpha] [CITE:Zeta]')).toEqual(['alpha', 'zeta']);
    });
  });

  describe('scanMarkers', () => {
    it('should report raw text and position', () => {
      expect(scanMarkers('ab [Cite: Key1 ]')).toEqual([{ raw: '[Cite: Key1 ]', key: 'key1', index: 3 }]);
    });
  });

  describe('findMalformedMarkers', () => {
    it('should classify each malformed marker', () => {
      const text = 'Claim [CITE:smith2024 never closed\nNext [CITE:] and [CITE:bad key] and [CITE:ok]';

      expect(findMalformedMarkers(text)).toEqual([
        { raw: '[CITE:smith2024 never closed', index: 6, reason: 'unclosed' },
        { raw: '[CITE:]', index: 40, reason: 'empty_key' },
        { raw: '[CITE:bad key]', index: 52, reason: 'invalid_key' },
      ]);
    });

    it('should return nothing for well-formed text', () => {
      expect(findMalformedMarkers('Fine [CITE: a ] and [cite:b].')).toEqual([]);
    });
  });

  describe('replaceMarkers', () => {
    it('should keep the marker when the replacer returns null', () => {
      const result = replaceMarkers('[CITE:A] [CITE:b]', key => (key === 'a' ? 'A!' : null));
      expect(result).toBe('A! [CITE:b]');
    });

    it('should canonicalize markers', () => {
      expect(canonicalizeMarkers('x [cite:  Smith2024 ] y')).toBe('x [CITE:smith2024] y');
    });
  });

  it('should normalize and validate keys', () => {
    expect(normalizeKey('  Smith2024 ')).toBe('smith2024');
    expect(isValidKey('smith-2024.v2')).toBe(true);
    expect(isValidKey('smith 2024')).toBe(false);
    expect(isValidKey('')).toBe(false);
  });
});
