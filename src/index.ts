#!/usr/bin/env node
import dotenv from 'dotenv';
import { resolveRuntime } from './config/runtime.js';
import { ui } from './cli/ui.js';
import { log } from './cli/logger.js';
import { ConsoleTranscript } from './cli/transcript.js';
import { TerminalPrompt } from './cli/prompt.js';
import { dealerPause } from './cli/pace.js';
import { DealerTurn, PlayerTurn } from './games/blackjack/turn.js';
import { playRound } from './games/blackjack/round.js';
import { playSession } from './games/blackjack/session.js';
import { rngFromSeed } from './util/rng.js';
import { normalizeError, shortStack } from './util/errors.js';

dotenv.config({ override: false });

async function main(): Promise<number> {
  const cfg = resolveRuntime();
  process.env.LOG_LEVEL = cfg.logLevel;
  if (cfg.production) process.env.QUIET = '1';
  if (!cfg.pretty) process.env.CLI_BANNER = 'off';

  const scope = log.withScope('blackjack');
  ui.banner();
  scope.debug('Session starting', { packs: cfg.packs, seeded: cfg.seed !== undefined, cardsStyle: cfg.cardsStyle });

  const rng = rngFromSeed(cfg.seed);
  const transcript = new ConsoleTranscript(process.stdout, ui.tone);
  const prompt = new TerminalPrompt();
  const player = new PlayerTurn({ transcript, style: cfg.cardsStyle, input: prompt });
  const dealer = new DealerTurn({ transcript, style: cfg.cardsStyle, pause: dealerPause(cfg.dealerDelayMs) });

  try {
    const results = await playSession({
      input: prompt,
      transcript,
      log: scope,
      play: () =>
        playRound({
          rng,
          packs: cfg.packs,
          player,
          dealer,
          transcript,
          onShoe: (deck) => {
            scope.debug('Shoe shuffled', { cards: deck.size() });
            if (cfg.showShoe) transcript.write(deck.format());
          },
        }),
    });
    const wins = results.filter((r) => r.winner === 'player').length;
    scope.info(`Played ${results.length} round(s), won ${wins}`);
    return 0;
  } finally {
    prompt.close();
  }
}

main()
  .then((code) => {
    log.flush();
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    const info = normalizeError(e);
    log.error(`${info.name}: ${info.message}`, 'main', { code: info.code, stack: shortStack(e, 6) });
    log.flush();
    process.exitCode = 1;
  });
