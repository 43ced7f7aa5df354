export type ReservationFailureKind = 'validation' | 'not_found' | 'conflict' | 'forbidden' | 'consistency';

const STATUS_BY_KIND: Record<ReservationFailureKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  forbidden: 403,
  consistency: 500,
};

export class ReservationError extends Error {
  readonly kind: ReservationFailureKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ReservationFailureKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ReservationError';
    this.kind = kind;
    this.details = details;
  }

  get statusCode(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export function isReservationError(error: unknown): error is ReservationError {
  return error instanceof ReservationError;
}

export const validationFailure = (message: string, details?: Record<string, unknown>) =>
  new ReservationError('validation', message, details);

export const notFound = (message: string, details?: Record<string, unknown>) =>
  new ReservationError('not_found', message, details);

export const conflict = (message: string, details?: Record<string, unknown>) =>
  new ReservationError('conflict', message, details);

export const forbidden = (message: string, details?: Record<string, unknown>) =>
  new ReservationError('forbidden', message, details);

export const consistencyFailure = (message: string, details?: Record<string, unknown>) =>
  new ReservationError('consistency', message, details);
