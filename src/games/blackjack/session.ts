import type { ScopedLog } from '../../cli/logger.js';
import type { LineSource, RoundResult, Transcript } from './types.js';

export const REPLAY_PROMPT = 'Play again y/n? ';

export interface SessionOptions {
  play: () => Promise<RoundResult>;
  input: LineSource;
  transcript: Transcript;
  log?: ScopedLog;
}

/** Plays rounds until the answer to the replay prompt is anything but `y`. */
export async function playSession(opts: SessionOptions): Promise<RoundResult[]> {
  const results: RoundResult[] = [];
  let again: boolean;
  do {
    // a failed round propagates; the caller reports it
    const result = await opts.play();
    results.push(result);
    opts.log?.debug('Round finished', {
      round: results.length,
      winner: result.winner,
      playerScore: result.playerScore,
      dealerScore: result.dealerScore,
    });
    const answer = await opts.input.ask(REPLAY_PROMPT);
    opts.transcript.write('');
    again = answer === 'y';
  } while (again);
  return results;
}
