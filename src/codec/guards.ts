export interface DecodedGuardrails {
  maxDecodedSize: number;
  maxDepth: number;
}

export const DEFAULT_GUARDRAILS: DecodedGuardrails = {
  maxDecodedSize: 10485760,
  maxDepth: 32
};

export type GuardrailResult =
  | { valid: true }
  | { valid: false; reason: 'decoded_size_exceeded' | 'depth_exceeded'; limit: number; actual: number };

// Both walks keep their own stack: a decoded document can nest deeper
// than the call stack allows.

export function measureDecodedSize(value: unknown): number {
  const visited = new Set<object>();
  const pending: unknown[] = [value];
  let total = 0;

  while (pending.length > 0) {
    const v = pending.pop();
    switch (typeof v) {
      case 'string':
        total += Buffer.byteLength(v, 'utf8');
        break;
      case 'number':
        total += 8; // approximate
        break;
      case 'boolean':
        total += 1;
        break;
      case 'bigint':
        total += Buffer.byteLength(v.toString(), 'utf8');
        break;
      case 'object':
        if (v === null || visited.has(v)) break;
        visited.add(v);
        if (Array.isArray(v)) {
          for (const item of v) pending.push(item);
        } else {
          for (const [key, item] of Object.entries(v)) {
            total += Buffer.byteLength(key, 'utf8');
            pending.push(item);
          }
        }
        break;
      default:
        break;
    }
  }
  return total;
}

export function measureDepth(value: unknown): number {
  const visited = new Set<object>();
  const pending: Array<[unknown, number]> = [[value, 0]];
  let max = 0;

  while (pending.length > 0) {
    const entry = pending.pop();
    if (!entry) break;
    const [v, depth] = entry;
    max = Math.max(max, depth);
    if (v === null || typeof v !== 'object' || visited.has(v)) continue;
    visited.add(v);
    const children: unknown[] = Array.isArray(v) ? v : Object.values(v);
    for (const child of children) pending.push([child, depth + 1]);
  }
  return max;
}

export function checkDecodedPayload(value: unknown, guardrails: DecodedGuardrails): GuardrailResult {
  const depth = measureDepth(value);
  if (depth > guardrails.maxDepth) {
    return {
      valid: false,
      reason: 'depth_exceeded',
      limit: guardrails.maxDepth,
      actual: depth
    };
  }

  const size = measureDecodedSize(value);
  if (size > guardrails.maxDecodedSize) {
    return {
      valid: false,
      reason: 'decoded_size_exceeded',
      limit: guardrails.maxDecodedSize,
      actual: size
    };
  }

  return { valid: true };
}
