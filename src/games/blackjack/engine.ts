import type { Card, Rank } from '../../cards/Card.js';
import { InvalidArgumentError } from '../../util/errors.js';
import { assertHand, type Hand } from './hand.js';

export const BLACKJACK = 21;
/** Score of a busted hand. */
export const BUST = 0;
/** Score of a two-card 21, ranked above any other 21. */
export const NATURAL = 22;
export const DEALER_STANDS_ON = 17;
export const INITIAL_DEAL = 2;

const VALUES: Record<Rank, number> = {
  A: 11, '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8, '9': 9, '10': 10,
  J: 10, Q: 10, K: 10,
};

export function cardValue(card: Card): number {
  const v = VALUES[card.rank];
  if (v === undefined) throw new InvalidArgumentError(`Invalid rank: ${String(card.rank)}`);
  return v;
}

export function scoreCards(cards: Iterable<Card>): number {
  let total = 0;
  let aces = 0;
  let count = 0;
  for (const c of cards) {
    total += cardValue(c);
    count++;
    if (c.rank === 'A') aces++;
    while (total > BLACKJACK && aces > 0) {
      total -= 10; // count one Ace as 1 instead of 11
      aces--;
    }
    if (total > BLACKJACK) return BUST;
  }
  if (count === INITIAL_DEAL && total === BLACKJACK) return NATURAL;
  return total;
}

/**
 * Blackjack score of a hand: the best total not over 21, `NATURAL` for a
 * two-card 21, `BUST` once no ace is left to soften. An empty hand scores 0.
 */
export function score(hand: Hand): number {
  assertHand(hand);
  return scoreCards(hand);
}

export function describeScore(s: number): string {
  return s === NATURAL ? 'Blackjack' : String(s);
}
