import type { Card } from '../../cards/Card.js';
import type { CardStyle } from '../../cards/unicode.js';
import type { RNG } from '../../util/rng.js';
import type { Deck } from './deck.js';
import type { Hand } from './hand.js';

export type Role = 'player' | 'dealer';
export type Winner = Role | 'draw';

/** Where game text goes. One call per line or block of lines. */
export interface Transcript {
  write(text: string): void;
}

/** Supplies one line of player input, or null once input has ended. */
export interface LineSource {
  ask(prompt: string): Promise<string | null>;
}

export interface TurnStrategy {
  /** Plays the turn out and returns the final `score` of the hand. */
  takeTurn(deck: Deck, hand: Hand): Promise<number>;
}

export interface RoundOptions {
  rng: RNG;
  player: TurnStrategy;
  dealer: TurnStrategy;
  transcript: Transcript;
  packs?: number; // default 6
  /** Builds the shoe for the round; defaults to a freshly shuffled one. */
  shoe?: (packs: number, rng: RNG) => Deck;
  /** Called with the shoe after shuffling, before the first card is dealt. */
  onShoe?: (deck: Deck) => void;
}

export interface RoundResult {
  playerScore: number;
  dealerScore: number;
  winner: Winner;
  message: string;
  player: Card[];
  dealer: Card[];
}

export interface TurnOptions {
  transcript: Transcript;
  style?: CardStyle;
}
