import type { CardStyle } from '../../cards/unicode.js';
import { deal } from './deal.js';
import type { Deck } from './deck.js';
import { BUST, DEALER_STANDS_ON, describeScore, score } from './engine.js';
import type { Hand } from './hand.js';
import type { LineSource, Transcript, TurnOptions, TurnStrategy } from './types.js';

export const HIT = 'h';
export const STICK = 's';
export const TURN_PROMPT = 'Hit or stick h/s? ';

export type Pause = () => Promise<void>;

const noPause: Pause = async () => {};

abstract class BaseTurn implements TurnStrategy {
  protected readonly transcript: Transcript;
  protected readonly style: CardStyle;

  constructor(opts: TurnOptions) {
    this.transcript = opts.transcript;
    this.style = opts.style ?? 'text';
  }

  abstract takeTurn(deck: Deck, hand: Hand): Promise<number>;

  protected show(title: string, hand: Hand): void {
    this.transcript.write(title);
    this.transcript.write(hand.format(this.style));
  }

  protected finish(name: string, s: number): number {
    this.transcript.write(s === BUST ? `${name} busts!` : `${name} sticks with ${describeScore(s)}.`);
    return s;
  }
}

/** House policy: draw while the score is live and under 17. */
export class DealerTurn extends BaseTurn {
  private readonly pause: Pause;

  constructor(opts: TurnOptions & { pause?: Pause }) {
    super(opts);
    this.pause = opts.pause ?? noPause;
  }

  async takeTurn(deck: Deck, hand: Hand): Promise<number> {
    this.show("Dealer's hand:", hand);
    let s = score(hand);
    while (s > BUST && s < DEALER_STANDS_ON) {
      await this.pause();
      deal(deck, hand);
      s = score(hand);
      this.show('Dealer hits.', hand);
    }
    await this.pause();
    return this.finish('Dealer', s);
  }
}

/**
 * Interactive policy. Reads `h` or `s` until the player sticks or busts;
 * anything else reprompts. Running out of input counts as sticking.
 */
export class PlayerTurn extends BaseTurn {
  private readonly input: LineSource;

  constructor(opts: TurnOptions & { input: LineSource }) {
    super(opts);
    this.input = opts.input;
  }

  async takeTurn(deck: Deck, hand: Hand): Promise<number> {
    this.show('Your hand:', hand);
    let s = score(hand);
    while (s !== BUST) {
      const answer = await this.input.ask(TURN_PROMPT);
      if (answer === null || answer === STICK) break;
      if (answer !== HIT) {
        this.transcript.write(`Please enter ${HIT} or ${STICK}.`);
        continue;
      }
      deal(deck, hand);
      s = score(hand);
      this.show('You hit.', hand);
    }
    return this.finish('Player', s);
  }
}
