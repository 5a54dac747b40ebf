import { BackendCandidate, ImplementationHandle } from './types.js';
import { composeReplacer } from './options.js';
import { decodeJsonBytes } from './stream.js';

type LosslessJson = typeof import('lossless-json');

/**
 * Binds an already loaded `lossless-json` module. An integer literal whose
 * digits a `number` cannot hold decodes to `bigint`; every other number,
 * including large ones a `number` wrote, decodes to a plain `number`.
 */
export function createLosslessHandle(lossless: LosslessJson): ImplementationHandle {
  const parseNumber = (value: string): number | bigint => {
    const n = parseFloat(value);
    if (lossless.isInteger(value) && !lossless.isSafeNumber(value) && String(n) !== value) return BigInt(value);
    return n;
  };

  return {
    name: 'lossless-json',
    errorTypes: [SyntaxError, TypeError],
    encode(data, options): string | undefined {
      return lossless.stringify(data, composeReplacer(options), options.indent);
    },
    decode(value, options): unknown {
      const s = typeof value === 'string' ? value : decodeJsonBytes(value);
      return lossless.parse(s, options.reviver, parseNumber);
    }
  };
}

export const losslessJsonBackend: BackendCandidate = {
  name: 'lossless-json',
  load(req) {
    const lossless: LosslessJson = req('lossless-json');
    return createLosslessHandle(lossless);
  }
};
