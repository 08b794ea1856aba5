/**
 * Citation Marker Scanning
 *
 * Marker syntax: `[CITE:key]`. The tag is case-insensitive, whitespace
 * around the key is allowed, and a key is one token of letters, digits
 * and `_ - . : /`. Keys compare after trimming and case folding.
 */

/** Well-formed marker */
const MARKER_PATTERN = /\[\s*cite\s*:\s*([A-Za-z0-9_\-.:/]+)\s*\]/gi;

/** Anything that opens like a marker, up to the closing bracket or end of line */
const CANDIDATE_PATTERN = /\[\s*cite\s*:([^\]\n]*)(\]?)/gi;

export interface MarkerMatch {
  /** Exact marker text as it appears */
  raw: string;
  /** Normalized key */
  key: string;
  index: number;
}

export type MalformedReason = 'unclosed' | 'empty_key' | 'invalid_key';

export interface MalformedMarker {
  raw: string;
  index: number;
  reason: MalformedReason;
}

/**
 * Normalize a citation key (trim + lowercase)
 */
export function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

export function isValidKey(key: string): boolean {
  return /^[A-Za-z0-9_\-.:/]+$/.test(key.trim());
}

/**
 * All well-formed markers in order of appearance
 */
export function scanMarkers(text: string): MarkerMatch[] {
  const matches: MarkerMatch[] = [];
  for (const match of text.matchAll(MARKER_PATTERN)) {
    matches.push({
      raw: match[0],
      key: normalizeKey(match[1]),
      index: match.index ?? 0,
    });
  }
  return matches;
}

/**
 * Set of normalized keys referenced by well-formed markers
 */
export function extractMarkers(text: string): Set<string> {
  return new Set(scanMarkers(text).map(m => m.key));
}

/**
 * Sorted, de-duplicated keys (the form stored on snapshots)
 */
export function extractCitationKeys(text: string): string[] {
  return Array.from(extractMarkers(text)).sort();
}

/**
 * Marker-like text that extraction ignores
 */
export function findMalformedMarkers(text: string): MalformedMarker[] {
  const malformed: MalformedMarker[] = [];

  for (const match of text.matchAll(CANDIDATE_PATTERN)) {
    const body = match[1];
    const closed = match[2] === ']';
    const index = match.index ?? 0;

    if (!closed) {
      malformed.push({ raw: match[0], index, reason: 'unclosed' });
    } else if (body.trim() === '') {
      malformed.push({ raw: match[0], index, reason: 'empty_key' });
    } else if (!isValidKey(body)) {
      malformed.push({ raw: match[0], index, reason: 'invalid_key' });
    }
  }

  return malformed;
}

/**
 * Replace each well-formed marker using the callback; returning null keeps the marker
 */
export function replaceMarkers(text: string, replacer: (key: string, raw: string) => string | null): string {
  return text.replace(MARKER_PATTERN, (raw: string, key: string) => {
    const replacement = replacer(normalizeKey(key), raw);
    return replacement ?? raw;
  });
}

/**
 * Rewrite markers into canonical `[CITE:key]` form
 */
export function canonicalizeMarkers(text: string): string {
  return replaceMarkers(text, key => `[CITE:${key}]`);
}
