import { RANKS, SUITS, formatCard, formatRows, makeCard, type Card } from '../../cards/Card.js';
import type { RNG } from '../../util/rng.js';
import { InvalidArgumentError, NoDataError, OutOfMemoryError } from '../../util/errors.js';

export const STANDARD_DECK_SIZE = 52;
/** Cards per line in a deck listing. */
export const DECK_REP_LEN = 13;

/**
 * A shoe of one or more packs over a fixed card buffer. `head` is the next
 * card to deal and `tail` the last dealable one; the deck is empty once
 * `head > tail`.
 */
export class Deck {
  private cards: Card[] | null;
  private head = 0;
  private readonly tail: number;

  private constructor(cards: Card[]) {
    this.cards = cards;
    this.tail = cards.length - 1;
  }

  /** Builds `packs` concatenated packs, each in new-deck order. */
  static generate(packs: number): Deck {
    if (!Number.isInteger(packs) || packs < 1) {
      throw new InvalidArgumentError(`Pack count must be a positive integer, got ${packs}`);
    }
    let cards: Card[];
    try {
      cards = new Array<Card>(STANDARD_DECK_SIZE * packs);
    } catch (e) {
      throw new OutOfMemoryError(`Cannot allocate a shoe of ${packs} packs`, e);
    }
    let index = 0;
    for (let p = 0; p < packs; p++) {
      for (const suit of SUITS) {
        for (const rank of RANKS) {
          cards[index++] = { rank, suit };
        }
      }
    }
    return new Deck(cards);
  }

  /** A deck dealt in exactly the given order, first card first. */
  static fromCards(cards: readonly Card[]): Deck {
    if (cards.length === 0) throw new InvalidArgumentError('A deck needs at least one card');
    return new Deck(cards.map((c) => makeCard(c.rank, c.suit)));
  }

  get capacity(): number {
    return this.tail + 1;
  }

  get released(): boolean {
    return this.cards === null;
  }

  size(): number {
    this.buffer();
    return this.head > this.tail ? 0 : this.tail - this.head + 1;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  /**
   * Fisher-Yates over `[head, tail]`. The draw is `rng(i + 1)`, relative to
   * the start of the buffer rather than to `head`, so once cards have been
   * dealt an index below `head` can be picked.
   */
  shuffle(rng: RNG): void {
    const cards = this.buffer();
    for (let i = this.tail; i > this.head; i--) {
      const j = rng(i + 1);
      [cards[i], cards[j]] = [cards[j], cards[i]];
    }
  }

  /** Cards still to be dealt, next card first. */
  remaining(): Card[] {
    const cards = this.buffer();
    return this.head > this.tail ? [] : cards.slice(this.head, this.tail + 1);
  }

  format(): string {
    return formatRows(this.remaining().map(formatCard), DECK_REP_LEN);
  }

  /** Card at `head`. Only `deal` consumes it, via `advance`. */
  top(): Card {
    const cards = this.buffer();
    if (this.head > this.tail) throw new NoDataError('Cannot deal from an empty deck');
    return cards[this.head];
  }

  /** @internal */
  advance(): void {
    this.buffer();
    this.head += 1;
  }

  release(): void {
    this.cards = null;
  }

  private buffer(): Card[] {
    if (this.cards === null) throw new InvalidArgumentError('Deck has been released');
    return this.cards;
  }
}
