import { InvalidArgumentError } from '../../util/errors.js';
import { Deck } from './deck.js';
import { assertHand, type Hand } from './hand.js';

/**
 * Moves the next card of `deck` to the front of `hand`. The card lands in the
 * hand before the deck cursor moves, so a failure leaves both untouched.
 */
export function deal(deck: Deck, hand: Hand): void {
  if (!(deck instanceof Deck) || deck.released) throw new InvalidArgumentError('Malformed deck');
  assertHand(hand);
  const card = deck.top();
  hand.prepend(card);
  deck.advance();
}
