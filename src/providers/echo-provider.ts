import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse
} from '../core/completion-provider.js'

/** Offline provider that repeats the latest user message. */
export class EchoProvider implements CompletionProvider {
  readonly name = 'echo'

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const lastUser = [...request.messages].reverse().find((m) => m.role === 'user')
    return {
      candidates: [{ role: 'assistant', content: `(echo) ${lastUser?.content ?? ''}` }]
    }
  }
}
