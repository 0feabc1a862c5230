import type { CompletionProvider } from './completion-provider.js'
import { TurnError, type TurnResult } from './errors.js'
import { errorMessage } from './logger.js'
import { Transcript } from './transcript.js'
import type { TurnProcessor } from './turn-processor.js'
import type { Logger } from './types.js'

export type FailurePolicy = 'rollback' | 'keep'

export interface ChatSessionOptions {
  provider: CompletionProvider
  model: string
  logger: Logger
  systemPrompt?: string
  /** What happens to the staged user message when a turn fails. Defaults to `rollback`. */
  onFailure?: FailurePolicy
}

/**
 * One conversation: a transcript it owns plus the provider that answers it.
 *
 * Each turn stages the user message, asks the provider, and commits the
 * assistant reply only on success.
 */
export class ChatSession implements TurnProcessor {
  readonly transcript: Transcript
  private readonly provider: CompletionProvider
  private readonly model: string
  private readonly logger: Logger
  private readonly onFailure: FailurePolicy

  constructor(options: ChatSessionOptions) {
    this.transcript = new Transcript(options.systemPrompt)
    this.provider = options.provider
    this.model = options.model
    this.logger = options.logger
    this.onFailure = options.onFailure ?? 'rollback'
  }

  async processTurn(userText: string): Promise<TurnResult> {
    const checkpoint = this.transcript.length
    this.transcript.append('user', userText)
    this.logger.info('turn.started', {
      provider: this.provider.name,
      model: this.model,
      messages: this.transcript.length
    })

    let reply: string
    try {
      const response = await this.provider.complete({
        model: this.model,
        messages: this.transcript.messages
      })
      const candidate = response.candidates[0]
      if (!candidate) {
        return this.fail(checkpoint, new TurnError('no_candidates', 'Provider returned no candidates'))
      }
      if (!candidate.content) {
        return this.fail(checkpoint, new TurnError('empty_reply', 'Provider returned an empty reply'))
      }
      reply = candidate.content
    } catch (error) {
      return this.fail(
        checkpoint,
        new TurnError('provider_failed', `Completion request failed: ${errorMessage(error)}`, {
          cause: error
        })
      )
    }

    this.transcript.append('assistant', reply)
    this.logger.info('turn.completed', { messages: this.transcript.length, replyLength: reply.length })
    return { ok: true, reply }
  }

  reset(): void {
    this.transcript.reset()
  }

  private fail(checkpoint: number, error: TurnError): TurnResult {
    this.logger.warn('turn.failed', { code: error.code, error: error.message })
    if (this.onFailure === 'rollback') {
      this.transcript.truncate(checkpoint)
      this.logger.info('turn.rolled_back', { messages: this.transcript.length })
    }
    return { ok: false, error }
  }
}
