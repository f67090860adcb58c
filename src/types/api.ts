export type RegistryErrorKind = 'timeout' | 'network' | 'http' | 'parse';

export class RegistryError extends Error {
  readonly kind: RegistryErrorKind;
  readonly status?: number;

  constructor(kind: RegistryErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'RegistryError';
    this.kind = kind;
    this.status = status;
  }
}

export class MissingApiKeyError extends Error {
  constructor() {
    super('A Companies House API key is required.');
    this.name = 'MissingApiKeyError';
  }
}

export type RegistryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RegistryError };

export function ok<T>(value: T): RegistryResult<T> {
  return { ok: true, value };
}

export function err<T>(error: RegistryError): RegistryResult<T> {
  return { ok: false, error };
}

// Collapses a failure into the caller's default, as the registry layer used to.
export function unwrapOr<T>(result: RegistryResult<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

/** For react-query: a failed read becomes a rejected query. */
export function unwrap<T>(result: RegistryResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
