import { createInterface } from 'node:readline'

import chalk from 'chalk'

import type { TurnProcessor } from '../core/turn-processor.js'
import type { Logger } from '../core/types.js'

const EXIT_COMMANDS = new Set(['exit', 'quit'])

export const FAREWELL = 'Goodbye!'

export function isExitCommand(line: string): boolean {
  return EXIT_COMMANDS.has(line.trim().toLowerCase())
}

export interface ChatLoopOptions {
  session: TurnProcessor
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
  logger: Logger
  prompt?: string
}

/**
 * Reads one line at a time and answers it through the session until an
 * exit command or end of input. Resolves with the process exit code.
 */
export async function runChatLoop(options: ChatLoopOptions): Promise<number> {
  const { session, input, output, logger } = options
  const prompt = options.prompt ?? chalk.cyan('you: ')
  const lines = createInterface({ input, terminal: false })
  let turns = 0

  logger.info('chat.started')
  output.write(prompt)

  try {
    for await (const line of lines) {
      if (isExitCommand(line)) break

      turns += 1
      const result = await session.processTurn(line)
      if (result.ok) {
        output.write(`${chalk.green('assistant:')} ${result.reply}\n`)
      } else {
        output.write(`${chalk.red('error:')} ${result.error.message}\n`)
      }
      output.write(prompt)
    }
  } finally {
    lines.close()
  }

  output.write(`\n${chalk.gray(FAREWELL)}\n`)
  logger.info('chat.ended', { turns })
  return 0
}
