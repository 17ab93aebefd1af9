import { Injectable } from '@nestjs/common';

/** Plain decimal number, optionally signed, optionally with an exponent */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts call-duration cells into seconds.
 *
 * Accepts numbers, numeric text ("95", "95.5") and clock text
 * ("MM:SS", "HH:MM:SS"). Anything else becomes null. Never throws.
 */
@Injectable()
export class DurationParserService {
  /**
   * Parse a duration cell. Negative values pass through unchanged;
   * range policy is applied by the caller.
   */
  parse(value: unknown): number | null {
    if (value === null || value === undefined) {
      return null;
    }

    // Booleans go down the text path so true/false never become 1/0
    if (typeof value === 'number') {
      return Number.isNaN(value) ? null : value;
    }

    const text = String(value).trim();
    if (text === '') {
      return null;
    }

    const direct = this.parseDecimal(text);
    if (direct !== null) {
      return direct;
    }

    const parts = text.split(':').map((part) => this.parseDecimal(part.trim()));
    if (parts.some((part) => part === null)) {
      return null;
    }
    const [first, second, third] = parts;

    if (parts.length === 2 && first != null && second != null) {
      return first * 60 + second;
    }
    if (parts.length === 3 && first != null && second != null && third != null) {
      return first * 3600 + second * 60 + third;
    }
    return null;
  }

  private parseDecimal(text: string): number | null {
    if (!DECIMAL_PATTERN.test(text)) {
      return null;
    }
    const value = Number(text);
    return Number.isFinite(value) ? value : null;
  }
}
