/**
 * Settings resolution: CLI overrides, then environment, then defaults.
 * Reads ASKDB_MODEL, ASKDB_TEMPERATURE, ASKDB_MAX_OUTPUT_TOKENS and
 * ASKDB_MAX_REVISIONS.
 */

import _Ajv from 'ajv';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { ConfigError } from './errors.js';
import { settingsSchema } from './config_schema.js';
import type { ModelConfig } from './llm/types.js';

const Ajv = _Ajv.default;

export const DEFAULT_MODEL_CONFIG: ModelConfig = {
  model: 'gpt-4o-mini',
  temperature: 0.1,
  maxOutputTokens: 2048,
};

export interface AskDbSettings {
  modelConfig: ModelConfig;
  maxRevisions: number;
}

export interface SettingsOverrides {
  model?: string;
  temperature?: string | number;
  maxOutputTokens?: string | number;
  maxRevisions?: string | number;
}

interface FlatSettings extends ModelConfig {
  maxRevisions: number;
}

const ajv = new Ajv({ allErrors: true, coerceTypes: true });
const validateSettings = ajv.compile<FlatSettings>(settingsSchema);

function pick(...values: Array<string | number | undefined>): string | number | undefined {
  return values.find((v) => v !== undefined && v !== '');
}

export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): AskDbSettings {
  const candidate: Record<string, unknown> = {
    model: pick(overrides.model, env.ASKDB_MODEL, DEFAULT_MODEL_CONFIG.model),
    temperature: pick(overrides.temperature, env.ASKDB_TEMPERATURE, DEFAULT_MODEL_CONFIG.temperature),
    maxOutputTokens: pick(overrides.maxOutputTokens, env.ASKDB_MAX_OUTPUT_TOKENS, DEFAULT_MODEL_CONFIG.maxOutputTokens),
    maxRevisions: pick(overrides.maxRevisions, env.ASKDB_MAX_REVISIONS, SAFE_DEFAULTS.maxRevisions),
  };

  if (!validateSettings(candidate)) {
    const errors = (validateSettings.errors ?? [])
      .map((e) => `${e.instancePath.replace(/^\//, '') || 'settings'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    throw new ConfigError(`Invalid settings: ${errors}`, validateSettings.errors);
  }

  return {
    modelConfig: {
      model: candidate.model,
      temperature: candidate.temperature,
      maxOutputTokens: candidate.maxOutputTokens,
    },
    maxRevisions: candidate.maxRevisions,
  };
}
