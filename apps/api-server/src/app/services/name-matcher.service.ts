import { Injectable } from '@nestjs/common';
import { SequenceMatcher } from 'difflib';

/** Minimum similarity ratio for a fuzzy roster match */
export const NAME_SIMILARITY_CUTOFF = 0.85;

const NON_NAME_CHARACTERS = /[^\p{L}\p{N}\s]/gu;

/**
 * Fuzzy roster membership for free-text agent names.
 *
 * A name belongs to a roster if, for some entry, one normalized string
 * contains the other, an entry token equals a name token, or their
 * similarity ratio reaches NAME_SIMILARITY_CUTOFF.
 */
@Injectable()
export class NameMatcherService {
  /**
   * Lowercase, keep letters/digits/whitespace, collapse whitespace.
   * Missing input normalizes to "".
   */
  normalize(raw: unknown): string {
    if (raw === null || raw === undefined) {
      return '';
    }
    return String(raw)
      .toLowerCase()
      .trim()
      .replace(NON_NAME_CHARACTERS, '')
      .split(/\s+/)
      .filter((token) => token !== '')
      .join(' ');
  }

  normalizeRoster(entries: readonly string[]): string[] {
    return entries.map((entry) => this.normalize(entry));
  }

  /**
   * @param normalizedRoster roster entries already passed through normalize()
   */
  isMember(rawName: unknown, normalizedRoster: readonly string[]): boolean {
    const name = this.normalize(rawName);
    if (name === '') {
      return false;
    }
    const nameTokens = new Set(name.split(' '));

    for (const entry of normalizedRoster) {
      if (entry === '') continue;

      if (name.includes(entry) || entry.includes(name)) {
        return true;
      }
      if (entry.split(' ').some((token) => nameTokens.has(token))) {
        return true;
      }
      if (this.similarity(name, entry) >= NAME_SIMILARITY_CUTOFF) {
        return true;
      }
    }
    return false;
  }

  /**
   * Ratio of matching characters (longest matching blocks), in [0, 1].
   */
  similarity(a: string, b: string): number {
    return new SequenceMatcher(null, a, b).ratio();
  }
}
