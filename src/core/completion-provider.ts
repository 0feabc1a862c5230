import type { ChatMessage, Role } from './types.js'

export interface CompletionRequest {
  model: string
  messages: readonly ChatMessage[]
}

export interface CompletionCandidate {
  role: Role
  content: string | null
}

export interface CompletionResponse {
  candidates: CompletionCandidate[]
}

/**
 * External collaborator that turns a transcript into reply candidates.
 * Auth, rate limits and transport retries belong to the implementation.
 */
export interface CompletionProvider {
  readonly name: string
  complete(request: CompletionRequest): Promise<CompletionResponse>
}
