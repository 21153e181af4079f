import { setTimeout as sleep } from 'node:timers/promises';
import type { Pause } from '../games/blackjack/turn.js';
import { ui } from './ui.js';

/** Presentation pause around dealer actions. Zero disables it. */
export function dealerPause(ms: number, label = 'Dealer is drawing...'): Pause {
  if (ms <= 0) return async () => {};
  return async () => {
    const spinner = ui.step(label).start();
    try {
      await sleep(ms);
    } finally {
      spinner.stop();
    }
  };
}
