import { DumpsOptions, ImplementationHandle, LoadsInput, LoadsOptions } from './types.js';
import { DecodeError, EncodeError, isBackendError } from './errors.js';
import { checkDecodedPayload, DecodedGuardrails } from './guards.js';
import { toBuffer, toStream } from './stream.js';
import { JsonlLogger } from '../log/jsonl.js';

export interface FacadeOptions {
  guardrails?: DecodedGuardrails | null;
  logger?: JsonlLogger | null;
}

function describe(data: unknown): string {
  if (data === undefined) return 'undefined';
  if (typeof data === 'function') return `function ${data.name || '(anonymous)'}`;
  return typeof data;
}

/**
 * Uniform dumps/loads over a resolved backend. Options go to the backend
 * as they are; only its errors are normalized.
 */
export class JsonFacade {
  readonly impl: ImplementationHandle;
  private readonly guardrails: DecodedGuardrails | null;
  private readonly logger: JsonlLogger | null;

  constructor(impl: ImplementationHandle, options: FacadeOptions = {}) {
    this.impl = impl;
    this.guardrails = options.guardrails ?? null;
    this.logger = options.logger ?? null;
  }

  dumps(data: unknown, options: DumpsOptions = {}): string {
    let out: string | undefined;
    try {
      out = this.impl.encode(data, options);
    } catch (e: unknown) {
      this.logFailure('encode_failed', e);
      throw EncodeError.from(this.impl, e);
    }
    if (typeof out !== 'string') {
      const err = new EncodeError(`${describe(data)} is not JSON serializable`, this.impl.name);
      this.logFailure('encode_failed', err);
      throw err;
    }
    return out;
  }

  loads(value: LoadsInput, options: LoadsOptions = {}): unknown {
    let result: unknown;
    try {
      if (this.impl.decodeStream && typeof value !== 'string') {
        result = this.impl.decodeStream(toStream(value), options);
      } else {
        result = this.impl.decode(typeof value === 'string' ? value : toBuffer(value), options);
      }
    } catch (e: unknown) {
      this.logFailure('decode_failed', e);
      throw DecodeError.from(this.impl, e);
    }

    const guardrails = options.guardrails === undefined ? this.guardrails : options.guardrails || null;
    if (guardrails) {
      const check = checkDecodedPayload(result, guardrails);
      if (!check.valid) {
        this.logger?.log({
          event: 'guardrail_violation',
          backend: this.impl.name,
          reason: check.reason,
          limit: check.limit,
          actual: check.actual
        });
        throw new DecodeError(`${check.reason}: ${check.actual} > ${check.limit}`, this.impl.name, {
          reason: check.reason
        });
      }
    }
    return result;
  }

  serialize(data: unknown, options?: DumpsOptions): string {
    return this.dumps(data, options);
  }

  deserialize(value: LoadsInput, options?: LoadsOptions): unknown {
    return this.loads(value, options);
  }

  private logFailure(event: 'encode_failed' | 'decode_failed', e: unknown): void {
    this.logger?.log({
      event,
      backend: this.impl.name,
      native: isBackendError(this.impl, e),
      error: e instanceof Error ? e.message : String(e)
    });
  }
}
