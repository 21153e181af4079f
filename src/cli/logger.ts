import path from 'node:path';
import pino, { type Logger } from 'pino';
import { ui } from './ui.js';
import { isTestEnv } from '../util/env.js';

type Data = Record<string, unknown>;

let logger: Logger | null = null;

// NDJSON goes to logs/blackjack.ndjson; test runs log nowhere.
function file(): Logger {
  if (logger) return logger;
  const level = process.env.LOG_LEVEL || 'info';
  if (isTestEnv()) {
    logger = pino({ level: 'silent' });
  } else {
    const stream = pino.destination({ dest: path.resolve('logs', 'blackjack.ndjson'), mkdir: true, sync: false });
    logger = pino({ level, base: undefined }, stream);
  }
  return logger;
}

function info(msg: string, scope?: string, data?: Data) {
  if (process.env.QUIET !== '1' && !process.argv.includes('--quiet')) ui.say(msg, 'info');
  file().info({ scope, data }, msg);
}
function warn(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'warn');
  file().warn({ scope, data }, msg);
}
function error(msg: string, scope?: string, data?: Data) {
  ui.say(msg, 'error');
  file().error({ scope, data }, msg);
}
function debug(msg: string, scope?: string, data?: Data) {
  if (file().level === 'debug' || file().level === 'trace') ui.say(msg, 'dim');
  file().debug({ scope, data }, msg);
}

export type ScopedLog = {
  info: (msg: string, data?: Data) => void;
  warn: (msg: string, data?: Data) => void;
  error: (msg: string, data?: Data) => void;
  debug: (msg: string, data?: Data) => void;
};

function withScope(scope: string): ScopedLog {
  return {
    info: (msg, data) => info(msg, scope, data),
    warn: (msg, data) => warn(msg, scope, data),
    error: (msg, data) => error(msg, scope, data),
    debug: (msg, data) => debug(msg, scope, data),
  };
}

function flush() {
  logger?.flush();
}

export const log = { info, warn, error, debug, withScope, flush };
export default log;
