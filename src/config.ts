import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

export interface SproutSettings {
  color: boolean;
  trace: boolean;
  printAst: boolean;
}

export const CONFIG_FILE_NAME = 'sprout.config.json';

export const defaultSettings: SproutSettings = {
  color: true,
  trace: false,
  printAst: false,
};

export type ConfigValidation =
  | { valid: true; config: Partial<SproutSettings> }
  | { valid: false; errors: string[] };

export function validateConfig(raw: unknown): ConfigValidation {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { valid: false, errors: ['config must be a JSON object'] };
  }

  const errors: string[] = [];
  const normalized: Partial<SproutSettings> = {};
  const keys: Array<keyof SproutSettings> = ['color', 'trace', 'printAst'];

  for (const [key, value] of Object.entries(raw)) {
    const known = keys.find((k) => k === key);
    if (!known) {
      errors.push(`unknown option "${key}"`);
      continue;
    }
    if (typeof value !== 'boolean') {
      errors.push(`${known} must be a boolean`);
      continue;
    }
    normalized[known] = value;
  }

  return errors.length > 0 ? { valid: false, errors } : { valid: true, config: normalized };
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(configPath: string, errors: string[]) {
    super(`Invalid ${path.basename(configPath)}:\n${errors.map((err) => `  - ${err}`).join('\n')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/** Reads `sprout.config.json` from `cwd`; a missing file yields `{}`. */
export function loadConfig(cwd = process.cwd()): Partial<SproutSettings> {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(configPath, [`could not parse JSON: ${message}`]);
  }

  const result = validateConfig(raw);
  if (!result.valid) throw new ConfigError(configPath, result.errors);
  return result.config;
}

/**
 * Later sources win: defaults, then the config file, then CLI flags.
 * `NO_COLOR` (any non-empty value) turns colour off unless a flag forces it.
 */
export function resolveSettings(
  fileConfig: Partial<SproutSettings>,
  overrides: Partial<SproutSettings>,
  env: NodeJS.ProcessEnv = process.env
): SproutSettings {
  const settings: SproutSettings = { ...defaultSettings, ...fileConfig };
  if (env.NO_COLOR) settings.color = false;
  return { ...settings, ...overrides };
}
