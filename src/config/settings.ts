import * as fs from 'fs';
import * as YAML from 'yaml';
import { DecodedGuardrails, DEFAULT_GUARDRAILS } from '../codec/guards.js';

export interface FacadeSettings {
  logPath: string | null;
  guardrails: DecodedGuardrails | null; // null: no caps on decoded values
}

interface SettingsFile {
  log?: string;
  guardrails?: {
    enabled?: boolean;
    maxDecodedSize?: number;
    maxDepth?: number;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(source: Record<string, unknown>, key: string, file: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new Error(`${file}: guardrails.${key} must be a non-negative integer`);
  }
  return value;
}

export function loadSettingsFile(file: string): SettingsFile {
  const content = fs.readFileSync(file, 'utf8');
  const parsed: unknown = YAML.parse(content);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`${file}: settings must be a mapping`);
  }

  const settings: SettingsFile = {};
  if (parsed.log !== undefined) {
    if (typeof parsed.log !== 'string') throw new Error(`${file}: log must be a string`);
    settings.log = parsed.log;
  }
  if (parsed.guardrails !== undefined) {
    const g = parsed.guardrails;
    if (!isRecord(g)) throw new Error(`${file}: guardrails must be a mapping`);
    if (g.enabled !== undefined && typeof g.enabled !== 'boolean') {
      throw new Error(`${file}: guardrails.enabled must be a boolean`);
    }
    settings.guardrails = {
      enabled: g.enabled,
      maxDecodedSize: optionalNumber(g, 'maxDecodedSize', file),
      maxDepth: optionalNumber(g, 'maxDepth', file)
    };
  }
  return settings;
}

function parseLimit(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  return n;
}

/**
 * Reads settings from the optional YAML file named by JSON_FACADE_CONFIG,
 * then applies the JSON_FACADE_* environment overrides on top.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): FacadeSettings {
  const file = env.JSON_FACADE_CONFIG ? loadSettingsFile(env.JSON_FACADE_CONFIG) : {};

  const logPath = env.JSON_FACADE_LOG || file.log || null;

  let enabled = file.guardrails?.enabled ?? file.guardrails !== undefined;
  if (env.JSON_FACADE_GUARDRAILS !== undefined) {
    const flag = env.JSON_FACADE_GUARDRAILS.trim().toLowerCase();
    if (flag !== 'true' && flag !== 'false') {
      throw new Error(`JSON_FACADE_GUARDRAILS must be "true" or "false", got "${env.JSON_FACADE_GUARDRAILS}"`);
    }
    enabled = flag === 'true';
  }

  const maxDecodedSize =
    parseLimit(env.JSON_FACADE_MAX_DECODED_SIZE, 'JSON_FACADE_MAX_DECODED_SIZE') ??
    file.guardrails?.maxDecodedSize ??
    DEFAULT_GUARDRAILS.maxDecodedSize;
  const maxDepth =
    parseLimit(env.JSON_FACADE_MAX_DEPTH, 'JSON_FACADE_MAX_DEPTH') ??
    file.guardrails?.maxDepth ??
    DEFAULT_GUARDRAILS.maxDepth;

  return {
    logPath,
    guardrails: enabled ? { maxDecodedSize, maxDepth } : null
  };
}
