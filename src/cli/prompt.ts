import readline from 'node:readline';
import type { LineSource } from '../games/blackjack/types.js';

/**
 * Line reader over a readable stream. Lines that arrive before they are
 * asked for are queued; once the stream ends every pending and later
 * `ask` resolves to null.
 */
export class TerminalPrompt implements LineSource {
  private readonly rl: readline.Interface;
  private readonly queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on('line', (line) => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(line);
      } else {
        this.queued.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      const resolve = this.waiting;
      this.waiting = null;
      resolve?.(null);
    });
  }

  ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = this.queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.rl.close();
  }
}

/** Answers prompts from a fixed list, then reports end of input. */
export class ScriptedPrompt implements LineSource {
  readonly prompts: string[] = [];
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = answers.slice();
  }

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.answers.shift() ?? null;
  }

  get remaining(): number {
    return this.answers.length;
  }
}
