import type { RNG } from '../../util/rng.js';
import { deal } from './deal.js';
import { Deck } from './deck.js';
import { describeScore, INITIAL_DEAL } from './engine.js';
import { Hand, releaseHand } from './hand.js';
import type { RoundOptions, RoundResult, Winner } from './types.js';

export const DEFAULT_PACKS = 6;

export function freshShoe(packs: number, rng: RNG): Deck {
  const deck = Deck.generate(packs);
  try {
    deck.shuffle(rng);
  } catch (e) {
    deck.release();
    throw e;
  }
  return deck;
}

/** Higher score wins; equal scores, a double bust included, are a draw. */
export function decideOutcome(playerScore: number, dealerScore: number): Winner {
  if (playerScore > dealerScore) return 'player';
  if (dealerScore > playerScore) return 'dealer';
  return 'draw';
}

export function outcomeMessage(winner: Winner, playerScore: number, dealerScore: number): string {
  switch (winner) {
    case 'player': return `Player wins with ${describeScore(playerScore)}!`;
    case 'dealer': return `Dealer wins with ${describeScore(dealerScore)}!`;
    default: return 'Draw!';
  }
}

/**
 * One round: shuffle a shoe, deal two cards each (dealer first), let the
 * player act, then the dealer, and compare. The shoe and both hands are
 * released on every path out.
 */
export async function playRound(opts: RoundOptions): Promise<RoundResult> {
  const packs = opts.packs ?? DEFAULT_PACKS;
  const makeShoe = opts.shoe ?? freshShoe;
  let deck: Deck | undefined;
  const dealer = new Hand();
  const player = new Hand();
  try {
    deck = makeShoe(packs, opts.rng);
    opts.onShoe?.(deck);
    for (let i = 0; i < INITIAL_DEAL; i++) {
      deal(deck, dealer);
      deal(deck, player);
    }

    const playerScore = await opts.player.takeTurn(deck, player);
    const dealerScore = await opts.dealer.takeTurn(deck, dealer);
    const winner = decideOutcome(playerScore, dealerScore);
    const message = outcomeMessage(winner, playerScore, dealerScore);
    opts.transcript.write(message);
    return {
      playerScore,
      dealerScore,
      winner,
      message,
      player: player.toArray(),
      dealer: dealer.toArray(),
    };
  } finally {
    deck?.release();
    releaseHand(player);
    releaseHand(dealer);
  }
}
