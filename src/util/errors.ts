export type GameErrorCode = 'EINVAL' | 'ENOMEM' | 'ENODATA' | 'EIO';

export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed handle or a value outside its enumeration. */
export class InvalidArgumentError extends GameError {
  constructor(message: string) {
    super('EINVAL', message);
  }
}

export class OutOfMemoryError extends GameError {
  constructor(message: string, cause?: unknown) {
    super('ENOMEM', message, { cause });
  }
}

/** Deal attempted on an empty deck. */
export class NoDataError extends GameError {
  constructor(message: string) {
    super('ENODATA', message);
  }
}

export class IoError extends GameError {
  constructor(message: string, cause?: unknown) {
    super('EIO', message, { cause });
  }
}

export function shortStack(err: unknown, lines = 3): string {
  const st = err instanceof Error && err.stack ? err.stack : '';
  if (!st) return '';
  const parts = st.split('\n').slice(0, lines + 1);
  return parts.join('\n');
}

export function normalizeError(err: unknown) {
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      code: err instanceof GameError ? err.code : undefined,
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    code: undefined,
    message: String(err),
    stack: '',
  };
}
