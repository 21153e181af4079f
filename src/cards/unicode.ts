import { formatCard, type Card, type Rank, type Suit } from './Card.js';
import { InvalidArgumentError } from '../util/errors.js';

// Unicode Playing Cards block mapping (no Knights)
// Suits base code points (Ace): Spades U+1F0A1, Hearts U+1F0B1, Diamonds U+1F0C1, Clubs U+1F0D1
const SUIT_BASE: Record<Suit, number> = { S: 0x1f0a1, H: 0x1f0b1, D: 0x1f0c1, C: 0x1f0d1 };

const RANK_OFFSET: Record<Rank, number> = {
  A: 0, '2': 1, '3': 2, '4': 3, '5': 4, '6': 5, '7': 6, '8': 7, '9': 8, '10': 9,
  J: 10, Q: 12, K: 13,
};

export type CardStyle = 'text' | 'unicode';

export function cardToUnicode(card: Card): string {
  const base = SUIT_BASE[card.suit];
  const off = RANK_OFFSET[card.rank];
  if (base === undefined || off === undefined) {
    throw new InvalidArgumentError(`Invalid card: ${String(card.rank)}${String(card.suit)}`);
  }
  // Offset 11 is the Knight; the table above never produces it.
  return String.fromCodePoint(base + off);
}

export function cardFace(card: Card, style: CardStyle): string {
  return style === 'unicode' ? cardToUnicode(card) : formatCard(card);
}
