import type { Card } from '../../../cards/Card.js';
import { BufferTranscript } from '../../../cli/transcript.js';
import { ScriptedPrompt } from '../../../cli/prompt.js';
import { deal } from '../deal.js';
import { Deck } from '../deck.js';
import { BUST, NATURAL } from '../engine.js';
import { Hand } from '../hand.js';
import { DealerTurn, PlayerTurn, TURN_PROMPT } from '../turn.js';

/** Deals the first two cards into a fresh hand and leaves the rest in the deck. */
function setup(cards: Card[]): { deck: Deck; hand: Hand } {
  const deck = Deck.fromCards(cards);
  const hand = new Hand();
  deal(deck, hand);
  deal(deck, hand);
  return { deck, hand };
}

describe('dealer turn', () => {
  test('stands on 17 without drawing', async () => {
    const out = new BufferTranscript();
    const { deck, hand } = setup([{ rank: '10', suit: 'S' }, { rank: '7', suit: 'H' }, { rank: '5', suit: 'C' }]);
    const s = await new DealerTurn({ transcript: out }).takeTurn(deck, hand);
    expect(s).toBe(17);
    expect(deck.size()).toBe(1);
    expect(out.lines).toEqual(["Dealer's hand:", ' 7H 10S', 'Dealer sticks with 17.']);
  });

  test('draws until reaching 17 or more', async () => {
    const out = new BufferTranscript();
    const pause = jest.fn(async () => {});
    const { deck, hand } = setup([
      { rank: '10', suit: 'S' },
      { rank: '2', suit: 'H' },
      { rank: '3', suit: 'C' },
      { rank: '4', suit: 'D' },
      { rank: '9', suit: 'S' },
    ]);
    const s = await new DealerTurn({ transcript: out, pause }).takeTurn(deck, hand);
    expect(s).toBe(19);
    expect(deck.size()).toBe(1);
    expect(pause).toHaveBeenCalledTimes(3);
    expect(out.lines).toEqual([
      "Dealer's hand:",
      ' 2H 10S',
      'Dealer hits.',
      ' 3C  2H 10S',
      'Dealer hits.',
      ' 4D  3C  2H 10S',
      'Dealer sticks with 19.',
    ]);
  });

  test('reports a bust', async () => {
    const out = new BufferTranscript();
    const { deck, hand } = setup([{ rank: '10', suit: 'S' }, { rank: '6', suit: 'H' }, { rank: 'K', suit: 'C' }]);
    const s = await new DealerTurn({ transcript: out }).takeTurn(deck, hand);
    expect(s).toBe(BUST);
    expect(out.lines[out.lines.length - 1]).toBe('Dealer busts!');
  });

  test('a natural stops the dealer', async () => {
    const out = new BufferTranscript();
    const { deck, hand } = setup([{ rank: 'A', suit: 'S' }, { rank: 'Q', suit: 'H' }, { rank: '2', suit: 'C' }]);
    const s = await new DealerTurn({ transcript: out }).takeTurn(deck, hand);
    expect(s).toBe(NATURAL);
    expect(deck.size()).toBe(1);
    expect(out.lines[out.lines.length - 1]).toBe('Dealer sticks with Blackjack.');
  });
});

describe('player turn', () => {
  const cards: Card[] = [
    { rank: '10', suit: 'S' },
    { rank: '5', suit: 'H' },
    { rank: '3', suit: 'C' },
    { rank: 'K', suit: 'D' },
  ];

  test('rejects unknown input, hits, then sticks', async () => {
    const out = new BufferTranscript();
    const input = new ScriptedPrompt(['x', 'h', 's']);
    const { deck, hand } = setup(cards);
    const s = await new PlayerTurn({ transcript: out, input }).takeTurn(deck, hand);
    expect(s).toBe(18);
    expect(input.prompts).toEqual([TURN_PROMPT, TURN_PROMPT, TURN_PROMPT]);
    expect(out.lines).toEqual([
      'Your hand:',
      ' 5H 10S',
      'Please enter h or s.',
      'You hit.',
      ' 3C  5H 10S',
      'Player sticks with 18.',
    ]);
  });

  test('stops prompting once bust', async () => {
    const out = new BufferTranscript();
    const input = new ScriptedPrompt(['h', 'h', 's']);
    const { deck, hand } = setup(cards);
    const s = await new PlayerTurn({ transcript: out, input }).takeTurn(deck, hand);
    expect(s).toBe(BUST);
    expect(input.remaining).toBe(1);
    expect(out.lines[out.lines.length - 1]).toBe('Player busts!');
  });

  test('end of input sticks', async () => {
    const out = new BufferTranscript();
    const { deck, hand } = setup(cards);
    const s = await new PlayerTurn({ transcript: out, input: new ScriptedPrompt([]) }).takeTurn(deck, hand);
    expect(s).toBe(15);
    expect(deck.size()).toBe(2);
  });

  test('unicode style lists card glyphs', async () => {
    const out = new BufferTranscript();
    const { deck, hand } = setup([{ rank: 'A', suit: 'S' }, { rank: 'K', suit: 'C' }]);
    await new PlayerTurn({ transcript: out, input: new ScriptedPrompt(['s']), style: 'unicode' }).takeTurn(deck, hand);
    expect(out.lines[1]).toBe(`${String.fromCodePoint(0x1f0de)} ${String.fromCodePoint(0x1f0a1)}`);
    expect(out.lines[2]).toBe('Player sticks with Blackjack.');
  });
});
