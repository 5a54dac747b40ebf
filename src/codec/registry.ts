import { createRequire } from 'module';
import { BackendCandidate, ImplementationHandle } from './types.js';
import { BackendResolutionError } from './errors.js';
import { losslessJsonBackend } from './lossless.js';
import { nativeJsonBackend } from './json.js';
import { JsonlLogger } from '../log/jsonl.js';

/** Preference order: exact big integers first, the runtime's JSON last. */
export const DEFAULT_CANDIDATES: readonly BackendCandidate[] = [losslessJsonBackend, nativeJsonBackend];

export interface ResolverOptions {
  logger?: JsonlLogger | null;
  require?: NodeJS.Require;
}

export class BackendResolver {
  private handle: ImplementationHandle | null = null;
  private failure: BackendResolutionError | null = null;
  private readonly candidates: readonly BackendCandidate[];
  private readonly logger: JsonlLogger | null;
  private readonly req: NodeJS.Require;

  constructor(candidates: readonly BackendCandidate[] = DEFAULT_CANDIDATES, options: ResolverOptions = {}) {
    this.candidates = candidates;
    this.logger = options.logger ?? null;
    this.req = options.require ?? createRequire(import.meta.url);
  }

  get resolved(): boolean {
    return this.handle !== null;
  }

  /**
   * Returns the first candidate that loads, probing only on the first call.
   * A failed resolution is cached too: later calls rethrow the same error.
   */
  resolve(): ImplementationHandle {
    if (this.handle) return this.handle;
    if (this.failure) throw this.failure;

    let lastError: unknown;
    for (const candidate of this.candidates) {
      try {
        const handle = candidate.load(this.req);
        this.logger?.log({ event: 'backend_probe', backend: candidate.name, available: true });
        this.logger?.log({ event: 'backend_resolved', backend: handle.name });
        this.handle = handle;
        return handle;
      } catch (e: unknown) {
        lastError = e;
        this.logger?.log({
          event: 'backend_probe',
          backend: candidate.name,
          available: false,
          reason: e instanceof Error ? e.message : String(e)
        });
      }
    }

    const names = this.candidates.map(c => c.name);
    this.failure = new BackendResolutionError(names, lastError === undefined ? undefined : { cause: lastError });
    this.logger?.log({ event: 'backend_resolution_failed', candidates: names });
    throw this.failure;
  }
}
