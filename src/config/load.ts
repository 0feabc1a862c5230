import { config as loadEnv } from 'dotenv'

import { configSchema, type ParleyConfig } from './schema.js'

/** Reads an env value, treating blank entries (`KEY=` in .env) as unset. */
function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim()
  return value ? value : undefined
}

/** Leaves malformed numbers as NaN for the schema to reject. */
function parseNumber(input: string | undefined, fallback: number): number {
  return input === undefined ? fallback : Number(input)
}

/**
 * Loads runtime configuration from environment and validates shape/types.
 */
export function loadConfig(): ParleyConfig {
  loadEnv()

  return configSchema.parse({
    provider: readEnv('PARLEY_PROVIDER')?.toLowerCase() ?? 'openai',
    model: readEnv('PARLEY_MODEL') ?? 'gpt-4o-mini',
    systemPrompt: readEnv('PARLEY_SYSTEM_PROMPT') ?? 'You are a helpful assistant.',
    onFailure: readEnv('PARLEY_ON_FAILURE') ?? 'rollback',
    openai: {
      apiKey: readEnv('OPENAI_API_KEY') ?? '',
      baseUrl: readEnv('OPENAI_BASE_URL'),
      timeoutMs: parseNumber(readEnv('PARLEY_TIMEOUT_MS'), 60_000),
      maxRetries: parseNumber(readEnv('PARLEY_MAX_RETRIES'), 2)
    },
    logging: {
      enabled: readEnv('PARLEY_LOG_ENABLED') === 'true'
    }
  })
}
