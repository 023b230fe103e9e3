export type ErrorCode =
  | 'NOT_FOUND'
  | 'DUPLICATE_KEY'
  | 'FOREIGN_KEY_VIOLATION'
  | 'PERMISSION_DENIED'
  | 'STORE_UNAVAILABLE'
  | 'VALIDATION_ERROR';

const STATUS: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  DUPLICATE_KEY: 409,
  FOREIGN_KEY_VIOLATION: 409,
  PERMISSION_DENIED: 403,
  STORE_UNAVAILABLE: 503,
  VALIDATION_ERROR: 400,
};

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.status = STATUS[code];
  }
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}

function sqlState(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

// socket errno codes from node, plus the server-side shutdown SQLSTATEs (admin_shutdown, cannot_connect_now)
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', '57P01', '57P03']);

/**
 * Maps a raw pg error onto the app's error kinds. Anything unrecognised is
 * returned as-is so callers can rethrow it.
 */
export function translatePgError(err: unknown, what: string): unknown {
  if (err instanceof AppError) return err;
  const code = sqlState(err);
  if (code === '23505') return new AppError('DUPLICATE_KEY', `${what} already exists`, { cause: err });
  if (code === '23503') return new AppError('FOREIGN_KEY_VIOLATION', `${what} references a missing row`, { cause: err });
  if (code && (CONNECTION_CODES.has(code) || code.startsWith('08'))) {
    return new AppError('STORE_UNAVAILABLE', 'database unavailable', { cause: err });
  }
  return err;
}

/** Runs a store call and rethrows its failure as an AppError where one applies. */
export async function withStoreErrors<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw translatePgError(err, what);
  }
}
