import { InvalidArgumentError } from '../util/errors.js';

export type Suit = 'S' | 'D' | 'C' | 'H';
export type Rank = 'A' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K';
export type Card = { readonly rank: Rank; readonly suit: Suit };

// New-deck order: Spades, Diamonds, Clubs, Hearts; Ace through King.
export const SUITS: readonly Suit[] = ['S', 'D', 'C', 'H'];
export const RANKS: readonly Rank[] = ['A', '2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K'];

/** Widest label `formatCard` produces ("10H"). */
export const CARD_LABEL_WIDTH = 3;

export function isRank(value: unknown): value is Rank {
  return RANKS.some((r) => r === value);
}

export function isSuit(value: unknown): value is Suit {
  return SUITS.some((s) => s === value);
}

export function makeCard(rank: unknown, suit: unknown): Card {
  if (!isRank(rank)) throw new InvalidArgumentError(`Invalid rank: ${String(rank)}`);
  if (!isSuit(suit)) throw new InvalidArgumentError(`Invalid suit: ${String(suit)}`);
  return Object.freeze({ rank, suit });
}

/** Ace = 1 through King = 13. */
export function rankOrdinal(rank: Rank): number {
  const i = RANKS.indexOf(rank);
  if (i < 0) throw new InvalidArgumentError(`Invalid rank: ${String(rank)}`);
  return i + 1;
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Short label such as "AS" or "10H". */
export function formatCard(card: Card): string {
  if (!isRank(card.rank)) throw new InvalidArgumentError(`Invalid rank: ${String(card.rank)}`);
  if (!isSuit(card.suit)) throw new InvalidArgumentError(`Invalid suit: ${String(card.suit)}`);
  return `${card.rank}${card.suit}`;
}

/**
 * Lays labels out in rows of at most `perLine`, each padded to the widest
 * label so columns line up. No cards gives a single empty row.
 */
export function formatRows(labels: readonly string[], perLine: number, width = CARD_LABEL_WIDTH): string {
  if (labels.length === 0) return '';
  const rows: string[] = [];
  for (let i = 0; i < labels.length; i += perLine) {
    rows.push(labels.slice(i, i + perLine).map((l) => l.padStart(width)).join(' '));
  }
  return rows.join('\n');
}
