import type { Transcript } from '../games/blackjack/types.js';
import { IoError } from '../util/errors.js';

/**
 * Writes game text to stdout, optionally styled. Stream errors arrive as
 * events; the first one is kept and fails the next write.
 */
export class ConsoleTranscript implements Transcript {
  private failure: Error | null = null;

  constructor(
    private readonly out: NodeJS.WritableStream = process.stdout,
    private readonly style: (text: string) => string = (t) => t,
  ) {
    out.on('error', (e: Error) => {
      this.failure ??= e;
    });
  }

  write(text: string): void {
    if (this.failure) throw new IoError('Failed to write to output', this.failure);
    try {
      this.out.write(this.style(text) + '\n');
    } catch (e) {
      throw new IoError('Failed to write to output', e);
    }
  }
}

/** Keeps every line in memory. */
export class BufferTranscript implements Transcript {
  readonly lines: string[] = [];

  write(text: string): void {
    this.lines.push(...text.split('\n'));
  }

  text(): string {
    return this.lines.join('\n');
  }
}
