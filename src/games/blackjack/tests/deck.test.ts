import { describe, test, expect } from '@jest/globals';
import { RANKS, SUITS, formatCard, type Card } from '../../../cards/Card.js';
import { seededRNG, type RNG } from '../../../util/rng.js';
import { InvalidArgumentError, NoDataError } from '../../../util/errors.js';
import { deal } from '../deal.js';
import { Deck } from '../deck.js';
import { Hand } from '../hand.js';
import { freshShoe } from '../round.js';

const labels = (cards: Card[]) => cards.map(formatCard);

function tally(cards: Card[]): Map<string, number> {
  const m = new Map<string, number>();
  for (const label of labels(cards)) m.set(label, (m.get(label) ?? 0) + 1);
  return m;
}

describe('deck generation', () => {
  test('one pack is in new-deck order', () => {
    const deck = Deck.generate(1);
    const cards = labels(deck.remaining());
    expect(deck.size()).toBe(52);
    expect(cards.slice(0, 13)).toEqual(['AS', '2S', '3S', '4S', '5S', '6S', '7S', '8S', '9S', '10S', 'JS', 'QS', 'KS']);
    expect(cards[13]).toBe('AD');
    expect(cards[26]).toBe('AC');
    expect(cards[51]).toBe('KH');
  });

  test('six packs hold every card six times', () => {
    const deck = Deck.generate(6);
    expect(deck.size()).toBe(312);
    expect(deck.capacity).toBe(312);
    const counts = tally(deck.remaining());
    expect(counts.size).toBe(RANKS.length * SUITS.length);
    for (const n of counts.values()) expect(n).toBe(6);
  });

  test('rejects pack counts below one or fractional', () => {
    expect(() => Deck.generate(0)).toThrow(InvalidArgumentError);
    expect(() => Deck.generate(-2)).toThrow(InvalidArgumentError);
    expect(() => Deck.generate(1.5)).toThrow(InvalidArgumentError);
  });

  test('released deck is malformed', () => {
    const deck = Deck.generate(1);
    deck.release();
    deck.release();
    expect(() => deck.size()).toThrow(InvalidArgumentError);
    expect(() => deck.shuffle(seededRNG(1))).toThrow(InvalidArgumentError);
  });
});

describe('shuffle', () => {
  test('is a permutation of the remaining cards', () => {
    const deck = Deck.generate(2);
    const before = tally(deck.remaining());
    deck.shuffle(seededRNG(99));
    expect(tally(deck.remaining())).toEqual(before);
    expect(deck.size()).toBe(104);
  });

  test('same seed, same order', () => {
    const a = freshShoe(1, seededRNG(1));
    const b = freshShoe(1, seededRNG(1));
    expect(a.remaining()).toEqual(b.remaining());
  });

  test('swaps with the index drawn in [0, i]', () => {
    const deck = Deck.fromCards([
      { rank: 'A', suit: 'S' },
      { rank: '2', suit: 'S' },
      { rank: '3', suit: 'S' },
      { rank: '4', suit: 'S' },
    ]);
    deck.shuffle(() => 0);
    expect(labels(deck.remaining())).toEqual(['2S', '3S', '4S', 'AS']);
  });

  test('after a deal the draw still spans the whole buffer', () => {
    const deck = Deck.fromCards([
      { rank: 'A', suit: 'S' },
      { rank: '2', suit: 'S' },
      { rank: '3', suit: 'S' },
      { rank: '4', suit: 'S' },
    ]);
    deal(deck, new Hand());
    const bounds: number[] = [];
    const rng: RNG = (max) => {
      bounds.push(max);
      return 0;
    };
    deck.shuffle(rng);
    expect(bounds).toEqual([4, 3]);
    // the dealt ace is swapped back into the dealable range
    expect(labels(deck.remaining())).toEqual(['2S', '4S', 'AS']);
  });
});

describe('deck listing', () => {
  test('thirteen padded labels per line', () => {
    const lines = Deck.generate(1).format().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(' AS  2S  3S  4S  5S  6S  7S  8S  9S 10S  JS  QS  KS');
    expect(lines[3]).toBe(' AH  2H  3H  4H  5H  6H  7H  8H  9H 10H  JH  QH  KH');
  });

  test('lists only undealt cards', () => {
    const deck = Deck.fromCards([
      { rank: 'A', suit: 'S' },
      { rank: '10', suit: 'H' },
    ]);
    expect(deck.format()).toBe(' AS 10H');
    deal(deck, new Hand());
    expect(deck.format()).toBe('10H');
    deal(deck, new Hand());
    expect(deck.format()).toBe('');
  });
});

describe('deal', () => {
  test('moves one card from the deck to the front of the hand', () => {
    const deck = Deck.generate(1);
    const hand = new Hand();
    deal(deck, hand);
    deal(deck, hand);
    expect(deck.size()).toBe(50);
    expect(hand.length).toBe(2);
    expect(labels(hand.toArray())).toEqual(['2S', 'AS']);
  });

  test('empty deck reports no data', () => {
    const deck = Deck.fromCards([{ rank: 'K', suit: 'C' }]);
    const hand = new Hand();
    deal(deck, hand);
    expect(deck.isEmpty()).toBe(true);
    expect(() => deal(deck, hand)).toThrow(NoDataError);
    expect(hand.length).toBe(1);
  });

  test('malformed hand leaves the deck untouched', () => {
    const deck = Deck.generate(1);
    const hand = new Hand();
    hand.release();
    expect(() => deal(deck, hand)).toThrow(InvalidArgumentError);
    expect(deck.size()).toBe(52);
  });

  test('released deck is rejected', () => {
    const deck = Deck.generate(1);
    deck.release();
    expect(() => deal(deck, new Hand())).toThrow(InvalidArgumentError);
  });
});
