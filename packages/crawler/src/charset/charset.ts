import type { CharsetOrder, CharsetPreset, CharsetTier } from './types.js';

const DIGITS = '0123456789';
const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz';
// ASCII punctuation without backslash and quotes
const PUNCTUATION = '!#$%&()*+,-./:;<=>?@[]^_`{|}~';

/**
 * Ordered alphabet prefixes are built from.
 *
 * Primary characters come first and are explored before special ones. The
 * ordering used to decide which characters sort after a pivot is either the
 * plain code-unit order a sorted string list follows (`codepoint`) or the
 * order the characters were declared in (`declared`).
 */
export class Charset {
  readonly characters: readonly string[];
  readonly order: CharsetOrder;
  private readonly tiers: Map<string, CharsetTier>;
  private readonly ranks: Map<string, number>;

  constructor(primary: string, special = '', order: CharsetOrder = 'codepoint') {
    this.order = order;
    this.tiers = new Map();

    for (const char of Array.from(primary)) {
      if (!this.tiers.has(char)) {
        this.tiers.set(char, 'primary');
      }
    }

    for (const char of Array.from(special)) {
      if (!this.tiers.has(char)) {
        this.tiers.set(char, 'special');
      }
    }

    if (this.tiers.size === 0) {
      throw new Error('Charset requires at least one character');
    }

    this.characters = [...this.tiers.keys()];
    this.ranks = new Map(this.characters.map((char, index) => [char, index]));
  }

  static fromPreset(preset: CharsetPreset, order: CharsetOrder = 'codepoint'): Charset {
    switch (preset) {
      case 'alphanumeric':
        return new Charset(DIGITS + LOWERCASE, '', order);
      case 'extended':
        return new Charset(DIGITS + LOWERCASE, PUNCTUATION, order);
    }
  }

  get size(): number {
    return this.characters.length;
  }

  has(char: string): boolean {
    return this.tiers.has(char);
  }

  tierOf(char: string): CharsetTier | undefined {
    return this.tiers.get(char);
  }

  compare(left: string, right: string): number {
    if (this.order === 'declared') {
      const leftRank = this.ranks.get(left) ?? Number.MAX_SAFE_INTEGER;
      const rightRank = this.ranks.get(right) ?? Number.MAX_SAFE_INTEGER;
      return leftRank - rightRank;
    }

    if (left === right) {
      return 0;
    }

    return left < right ? -1 : 1;
  }

  /** Charset members sorting strictly after `pivot`, in declaration order. */
  after(pivot: string): string[] {
    return this.characters.filter((char) => this.compare(char, pivot) > 0);
  }

  describe(): string {
    const primary = this.characters.filter((char) => this.tiers.get(char) === 'primary');
    const special = this.characters.filter((char) => this.tiers.get(char) === 'special');

    return `primary="${primary.join('')}" special="${special.join('')}" order=${this.order}`;
  }
}

export { DIGITS, LOWERCASE, PUNCTUATION };
