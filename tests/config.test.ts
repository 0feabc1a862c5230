import { afterEach, describe, expect, it, vi } from 'vitest'
import { ZodError } from 'zod'

import { loadConfig } from '../src/config/load.js'

const VARS = [
  'PARLEY_PROVIDER',
  'PARLEY_MODEL',
  'PARLEY_SYSTEM_PROMPT',
  'PARLEY_ON_FAILURE',
  'OPENAI_API_KEY',
  'OPENAI_BASE_URL',
  'PARLEY_TIMEOUT_MS',
  'PARLEY_MAX_RETRIES',
  'PARLEY_LOG_ENABLED'
]

function clearEnv(): void {
  for (const name of VARS) vi.stubEnv(name, '')
}

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('applies defaults around the API key', () => {
    clearEnv()
    vi.stubEnv('OPENAI_API_KEY', 'test-key')

    expect(loadConfig()).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
      systemPrompt: 'You are a helpful assistant.',
      onFailure: 'rollback',
      openai: { apiKey: 'test-key', timeoutMs: 60_000, maxRetries: 2 },
      logging: { enabled: false }
    })
  })

  it('reads overrides from the environment', () => {
    clearEnv()
    vi.stubEnv('PARLEY_PROVIDER', 'Echo')
    vi.stubEnv('PARLEY_MODEL', 'gpt-4o')
    vi.stubEnv('PARLEY_SYSTEM_PROMPT', 'Be brief.')
    vi.stubEnv('PARLEY_ON_FAILURE', 'keep')
    vi.stubEnv('OPENAI_BASE_URL', 'http://localhost:1234/v1')
    vi.stubEnv('PARLEY_TIMEOUT_MS', '5000')
    vi.stubEnv('PARLEY_MAX_RETRIES', '0')
    vi.stubEnv('PARLEY_LOG_ENABLED', 'true')

    expect(loadConfig()).toEqual({
      provider: 'echo',
      model: 'gpt-4o',
      systemPrompt: 'Be brief.',
      onFailure: 'keep',
      openai: { apiKey: '', baseUrl: 'http://localhost:1234/v1', timeoutMs: 5000, maxRetries: 0 },
      logging: { enabled: true }
    })
  })

  it('requires an API key for the openai provider', () => {
    clearEnv()

    expect(() => loadConfig()).toThrow(ZodError)
    try {
      loadConfig()
    } catch (error) {
      expect(error).toBeInstanceOf(ZodError)
      if (!(error instanceof ZodError)) return
      expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['openai.apiKey'])
    }
  })

  it('rejects unknown failure policies and malformed numbers', () => {
    clearEnv()
    vi.stubEnv('OPENAI_API_KEY', 'test-key')
    vi.stubEnv('PARLEY_ON_FAILURE', 'retry')
    vi.stubEnv('PARLEY_TIMEOUT_MS', 'soon')

    expect(() => loadConfig()).toThrow(ZodError)
  })
})
