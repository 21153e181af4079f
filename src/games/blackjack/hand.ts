import { CARD_LABEL_WIDTH, formatRows, type Card } from '../../cards/Card.js';
import { cardFace, type CardStyle } from '../../cards/unicode.js';
import { InvalidArgumentError } from '../../util/errors.js';

/** Cards per line in a hand listing. */
export const HAND_REP_LEN = 7;

/** Cards held by one participant for one round, most recently dealt first. */
export class Hand implements Iterable<Card> {
  private cards: Card[] | null = [];

  get released(): boolean {
    return this.cards === null;
  }

  get length(): number {
    return this.list().length;
  }

  /** @internal Used by `deal`. */
  prepend(card: Card): void {
    this.list().unshift(card);
  }

  toArray(): Card[] {
    return this.list().slice();
  }

  [Symbol.iterator](): Iterator<Card> {
    return this.list()[Symbol.iterator]();
  }

  format(style: CardStyle = 'text'): string {
    const width = style === 'unicode' ? 2 : CARD_LABEL_WIDTH;
    return formatRows(this.list().map((c) => cardFace(c, style)), HAND_REP_LEN, width);
  }

  /** Drops every card. Releasing twice is a no-op. */
  release(): void {
    this.cards = null;
  }

  private list(): Card[] {
    if (this.cards === null) throw new InvalidArgumentError('Hand has been released');
    return this.cards;
  }
}

export function releaseHand(hand: Hand | null | undefined): void {
  hand?.release();
}

export function assertHand(hand: unknown): asserts hand is Hand {
  if (!(hand instanceof Hand) || hand.released) {
    throw new InvalidArgumentError('Malformed hand');
  }
}
