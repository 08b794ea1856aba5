/**
 * ID Generator
 *
 * Sortable, URL-safe identifiers: `<prefix>_<timestamp>_<random>`.
 */

import { customAlphabet } from 'nanoid';

const RANDOM_LENGTH = 8;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, RANDOM_LENGTH);

export function generateId(prefix: string): string {
  return `${prefix}_${Date.now()}_${nanoid()}`;
}

export function isGeneratedId(value: string, prefix: string): boolean {
  const pattern = new RegExp(`^${prefix}_\\d+_[${ALPHABET}]{${RANDOM_LENGTH}}$`);
  return pattern.test(value);
}
