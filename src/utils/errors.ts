export enum ErrorKind {
  INVALID_INPUT = 'INVALID_INPUT',
  UNAUTHORIZED = 'UNAUTHORIZED',
  NOT_FOUND = 'NOT_FOUND',
  ALREADY_DELETED = 'ALREADY_DELETED',
  CONFLICT = 'CONFLICT',
  WEATHER_UNAVAILABLE = 'WEATHER_UNAVAILABLE',
  STORAGE_ERROR = 'STORAGE_ERROR',
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  [ErrorKind.INVALID_INPUT]: 400,
  [ErrorKind.UNAUTHORIZED]: 401,
  [ErrorKind.NOT_FOUND]: 404,
  [ErrorKind.ALREADY_DELETED]: 409,
  [ErrorKind.CONFLICT]: 409,
  [ErrorKind.WEATHER_UNAVAILABLE]: 502,
  [ErrorKind.STORAGE_ERROR]: 500,
};

/**
 * Error raised by the services and repositories. The kind decides the HTTP
 * status; the message is safe to show to the caller.
 */
export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export const invalidInput = (message: string) => new AppError(ErrorKind.INVALID_INPUT, message);
export const notFound = (message: string) => new AppError(ErrorKind.NOT_FOUND, message);

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
