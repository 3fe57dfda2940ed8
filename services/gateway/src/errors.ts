/** Error kinds that can cross the wire. */
export type ErrorKind =
  | 'InvalidInput'
  | 'NotFound'
  | 'VersionConflict'
  | 'HostRejected'
  | 'Internal';

/** Error kinds a resource store may report. */
export type StoreErrorKind = Extract<ErrorKind, 'InvalidInput' | 'NotFound' | 'VersionConflict'>;

export interface StoreError {
  kind: StoreErrorKind;
  message: string;
  currentVersion?: number;
}

export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StoreError };

export function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function invalidInput(message: string): { ok: false; error: StoreError } {
  return { ok: false, error: { kind: 'InvalidInput', message } };
}

export function notFound(id: string): { ok: false; error: StoreError } {
  return { ok: false, error: { kind: 'NotFound', message: `resource ${id} not found` } };
}

export function versionConflict(
  id: string,
  expected: number,
  current: number,
): { ok: false; error: StoreError } {
  return {
    ok: false,
    error: {
      kind: 'VersionConflict',
      message: `resource ${id} is at version ${current}, expected ${expected}`,
      currentVersion: current,
    },
  };
}

export const HTTP_STATUS: Record<ErrorKind, number> = {
  InvalidInput: 400,
  HostRejected: 403,
  NotFound: 404,
  VersionConflict: 409,
  Internal: 500,
};

/**
 * Raised at startup when the gateway cannot run as configured
 * (identity file never published, unreadable or malformed, invalid env).
 * Never raised per request.
 */
export class MisconfigurationError extends Error {
  readonly kind = 'Misconfiguration';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MisconfigurationError';
  }
}
