import type OpenAI from 'openai'

import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse
} from '../core/completion-provider.js'
import type { ChatMessage } from '../core/types.js'

interface ChatCompletionLike {
  choices: Array<{ message: { content: string | null } }>
}

/** The slice of the `openai` client this provider calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string
        messages: OpenAI.Chat.ChatCompletionMessageParam[]
      }): Promise<ChatCompletionLike>
    }
  }
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content }
    case 'user':
      return { role: 'user', content: message.content }
    case 'assistant':
      return { role: 'assistant', content: message.content }
  }
}

/**
 * Chat-completions provider backed by the official OpenAI SDK.
 */
export class OpenAIProvider implements CompletionProvider {
  readonly name = 'openai'

  constructor(private readonly client: ChatCompletionsClient) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const completion = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toMessageParam)
    })

    return {
      candidates: completion.choices.map((choice) => ({
        role: 'assistant',
        content: choice.message.content
      }))
    }
  }
}
