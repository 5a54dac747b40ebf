import { BackendCandidate, ImplementationHandle } from './types.js';
import { composeReplacer } from './options.js';
import { decodeJsonBytes, readAll } from './stream.js';

export const nativeJsonHandle: ImplementationHandle = {
  name: 'json',
  errorTypes: [SyntaxError, TypeError],
  encode(data, options): string | undefined {
    return JSON.stringify(data, composeReplacer(options), options.indent);
  },
  decode(value, options): unknown {
    const s = typeof value === 'string' ? value : decodeJsonBytes(value);
    return JSON.parse(s, options.reviver);
  },
  decodeStream(stream, options): unknown {
    return JSON.parse(decodeJsonBytes(readAll(stream)), options.reviver);
  }
};

// Built into the runtime; always loads
export const nativeJsonBackend: BackendCandidate = {
  name: 'json',
  load: () => nativeJsonHandle
};
