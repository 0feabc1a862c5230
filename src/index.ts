#!/usr/bin/env node
import { ZodError } from 'zod'

import { runChatLoop } from './cli/chat-loop.js'
import { loadConfig } from './config/load.js'
import { ChatSession } from './core/chat-session.js'
import { createCompletionProvider } from './core/client-factory.js'
import { errorMessage, logger, setLoggerMuted } from './core/logger.js'

async function main(): Promise<void> {
  const config = loadConfig()
  setLoggerMuted(!config.logging.enabled)

  const session = new ChatSession({
    provider: createCompletionProvider(config, logger),
    model: config.model,
    systemPrompt: config.systemPrompt,
    onFailure: config.onFailure,
    logger
  })

  process.exitCode = await runChatLoop({
    session,
    input: process.stdin,
    output: process.stdout,
    logger
  })
}

main().catch((error: unknown) => {
  if (error instanceof ZodError) {
    for (const issue of error.issues) {
      console.error(`config: ${issue.path.join('.')}: ${issue.message}`)
    }
  } else {
    logger.error('startup.failed', { error: errorMessage(error) })
    console.error(errorMessage(error))
  }
  process.exitCode = 1
})
