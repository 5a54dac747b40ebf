import { Readable } from 'stream';
import { DecodedGuardrails } from './guards.js';

export type Replacer = (key: string, value: unknown) => unknown;
export type Reviver = (key: string, value: unknown) => unknown;

export type ErrorType = abstract new (...args: never[]) => Error;

export interface DumpsOptions {
  indent?: number | string;
  sortKeys?: boolean;
  replacer?: Replacer;
}

export interface LoadsOptions {
  reviver?: Reviver;
  guardrails?: DecodedGuardrails | false; // false disables configured caps for this call
}

export type LoadsInput = string | Uint8Array | ArrayBuffer;

/**
 * A resolved backend: its entry points bound together with the error
 * types it throws on failure.
 */
export interface ImplementationHandle {
  readonly name: string; // 'lossless-json' | 'json' | future
  readonly errorTypes: readonly ErrorType[];
  encode(data: unknown, options: DumpsOptions): string | undefined;
  decode(value: string | Uint8Array, options: LoadsOptions): unknown;
  decodeStream?(stream: Readable, options: LoadsOptions): unknown;
}

export interface BackendCandidate {
  name: string;
  /** Throws when the backend's package cannot be loaded. */
  load(req: NodeJS.Require): ImplementationHandle;
}
