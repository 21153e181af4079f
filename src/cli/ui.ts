import fs from 'node:fs';
import path from 'node:path';
import boxen from 'boxen';
import gradient from 'gradient-string';
import figlet from 'figlet';
import ora from 'ora';
import logSymbols from 'log-symbols';
import { getPalette, makeChalk, toneLine } from './theme.js';
import { isTestEnv } from '../util/env.js';

export type Style = 'info' | 'warn' | 'error' | 'dim';

export function isInteractive() {
  return !!process.stdout.isTTY && !process.env.CI && process.env.QUIET !== '1' && !process.argv.includes('--quiet');
}

function noColor() {
  return (!!process.env.NO_COLOR && process.env.NO_COLOR !== '0') || process.argv.includes('--no-color') || !isInteractive();
}

let bannerPrinted = false;

function banner() {
  if (process.argv.includes('--banner=off') || process.env.CLI_BANNER === 'off' || process.env.CLI_BANNER === '0') return;
  if (bannerPrinted || !isInteractive()) return;
  bannerPrinted = true;
  const palette = getPalette(undefined, noColor());
  const c = makeChalk(noColor());
  const text = figlet.textSync('Blackjack', { font: 'Standard' });
  const title = gradient(palette.gradient).multiline(text);
  const body = `${title}\n\n${c.dim('v' + safeReadPkgVersion())}  ${c.dim(process.version)}`;
  console.log(boxen(body, { padding: 1, borderColor: 'cyan', borderStyle: 'round' }));
}

function safeReadPkgVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.resolve('package.json'), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function decorate(msg: string, style: Style): string {
  const palette = getPalette(undefined, noColor());
  switch (style) {
    case 'warn': return `${logSymbols.warning} ${palette.warn(msg)}`;
    case 'error': return `${logSymbols.error} ${palette.error(msg)}`;
    case 'dim': return palette.dim(msg);
    default: return `${logSymbols.info} ${palette.info(msg)}`;
  }
}

function say(msg: string, style: Style = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if ((process.env.QUIET === '1' || process.argv.includes('--quiet')) && style !== 'error') return;
  const out = decorate(msg, style);
  if (style === 'error') console.error(out);
  else console.log(out);
}

function step(title: string) {
  return ora({ text: title, isEnabled: isInteractive() && !noColor() && !isTestEnv() });
}

/** Transcript styling for the terminal. */
function tone(text: string): string {
  return toneLine(getPalette(undefined, noColor()), text);
}

export const ui = { banner, say, step, tone };
export default ui;
