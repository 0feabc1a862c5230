import type { TurnResult } from './errors.js'

/**
 * Conversation runtime contract consumed by the console loop.
 */
export interface TurnProcessor {
  processTurn(userText: string): Promise<TurnResult>
  reset(): void
}
