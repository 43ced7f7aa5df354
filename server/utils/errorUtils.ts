function isNonNullObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function hasProperty<K extends string>(value: unknown, key: K): value is Record<K, unknown> {
  return isNonNullObject(value) && key in value;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  return hasProperty(error, 'code') ? String(error.code) : undefined;
}

export function getErrorDetail(error: unknown): string | undefined {
  return hasProperty(error, 'detail') ? String(error.detail) : undefined;
}

export function getErrorConstraint(error: unknown): string | undefined {
  return hasProperty(error, 'constraint') ? String(error.constraint) : undefined;
}

export function isConstraintError(error: unknown): { type: 'unique' | 'foreign_key' | null, detail?: string } {
  const code = getErrorCode(error);
  const detail = getErrorDetail(error);
  if (code === '23505') return { type: 'unique', detail };
  if (code === '23503') return { type: 'foreign_key', detail };
  return { type: null };
}
