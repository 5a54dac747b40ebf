import { ImplementationHandle } from './types.js';

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isBackendError(handle: ImplementationHandle, err: unknown): boolean {
  return handle.errorTypes.some(t => err instanceof t);
}

/** Encoding failed. Thrown in place of whatever the backend raised. */
export class EncodeError extends TypeError {
  readonly backend: string;

  constructor(message: string, backend: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EncodeError';
    this.backend = backend;
  }

  static from(handle: ImplementationHandle, err: unknown): EncodeError {
    return new EncodeError(messageOf(err), handle.name, { cause: err });
  }
}

export type DecodeFailureReason = 'decoded_size_exceeded' | 'depth_exceeded';

/** Decoding failed, or the decoded value broke a guardrail. */
export class DecodeError extends Error {
  readonly backend: string;
  readonly reason?: DecodeFailureReason;

  constructor(message: string, backend: string, options?: ErrorOptions & { reason?: DecodeFailureReason }) {
    super(message, options);
    this.name = 'DecodeError';
    this.backend = backend;
    this.reason = options?.reason;
  }

  static from(handle: ImplementationHandle, err: unknown): DecodeError {
    return new DecodeError(messageOf(err), handle.name, { cause: err });
  }
}

export class BackendResolutionError extends Error {
  readonly code = 'ERR_NO_JSON_BACKEND';
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[], options?: ErrorOptions) {
    super(`no supported JSON backend found (tried: ${candidates.join(', ') || 'none'})`, options);
    this.name = 'BackendResolutionError';
    this.candidates = candidates;
  }
}
