import { JsonFacade } from './codec/facade.js';
import { BackendResolver } from './codec/registry.js';
import { DumpsOptions, ImplementationHandle, LoadsInput, LoadsOptions } from './codec/types.js';
import { FacadeSettings, loadSettings } from './config/settings.js';
import { JsonlLogger, openLogFile } from './log/jsonl.js';

export { JsonFacade, type FacadeOptions } from './codec/facade.js';
export { BackendResolver, DEFAULT_CANDIDATES, type ResolverOptions } from './codec/registry.js';
export { EncodeError, DecodeError, BackendResolutionError, isBackendError } from './codec/errors.js';
export { nativeJsonBackend, nativeJsonHandle } from './codec/json.js';
export { losslessJsonBackend, createLosslessHandle } from './codec/lossless.js';
export { checkDecodedPayload, DEFAULT_GUARDRAILS, type DecodedGuardrails } from './codec/guards.js';
export { loadSettings, type FacadeSettings } from './config/settings.js';
export { JsonlLogger, openLogFile, type LogEntry, type LogSink } from './log/jsonl.js';
export type {
  BackendCandidate,
  DumpsOptions,
  ImplementationHandle,
  LoadsInput,
  LoadsOptions
} from './codec/types.js';

interface Defaults {
  resolver: BackendResolver;
  settings: FacadeSettings;
  logger: JsonlLogger | null;
}

let defaults: Defaults | null = null;
let facade: JsonFacade | null = null;

function defaultFacade(): JsonFacade {
  if (facade) return facade;
  if (!defaults) {
    const settings = loadSettings();
    const logger = settings.logPath ? openLogFile(settings.logPath) : null;
    defaults = { resolver: new BackendResolver(undefined, { logger }), settings, logger };
  }
  facade = new JsonFacade(defaults.resolver.resolve(), {
    guardrails: defaults.settings.guardrails,
    logger: defaults.logger
  });
  return facade;
}

/** The process-wide backend, resolved on first use. */
export function getImplementation(): ImplementationHandle {
  return defaultFacade().impl;
}

export function dumps(data: unknown, options?: DumpsOptions): string {
  return defaultFacade().dumps(data, options);
}

export function loads(value: LoadsInput, options?: LoadsOptions): unknown {
  return defaultFacade().loads(value, options);
}

export const serialize = dumps;
export const deserialize = loads;
