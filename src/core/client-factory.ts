import OpenAI from 'openai'

import type { ParleyConfig } from '../config/schema.js'
import { EchoProvider } from '../providers/echo-provider.js'
import { OpenAIProvider } from '../providers/openai-provider.js'
import type { CompletionProvider } from './completion-provider.js'
import type { Logger } from './types.js'

export function createCompletionProvider(config: ParleyConfig, logger: Logger): CompletionProvider {
  logger.info('provider.selected', { provider: config.provider, model: config.model })
  if (config.provider === 'echo') {
    return new EchoProvider()
  }
  const client = new OpenAI({
    apiKey: config.openai.apiKey,
    baseURL: config.openai.baseUrl,
    timeout: config.openai.timeoutMs,
    maxRetries: config.openai.maxRetries
  })
  return new OpenAIProvider(client)
}
