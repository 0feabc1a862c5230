import type { ChatMessage, Role } from './types.js'

/**
 * Ordered, role-tagged conversation history.
 *
 * Insertion order is the order the model sees. The optional seed system
 * message is the first entry and survives `truncate` and `reset`.
 */
export class Transcript {
  private readonly entries: ChatMessage[] = []
  private readonly seedLength: number

  constructor(systemPrompt?: string) {
    if (systemPrompt !== undefined) this.append('system', systemPrompt)
    this.seedLength = this.entries.length
  }

  append(role: Role, content: string): ChatMessage {
    const message: ChatMessage = Object.freeze({ role, content })
    this.entries.push(message)
    return message
  }

  get messages(): readonly ChatMessage[] {
    return [...this.entries]
  }

  get length(): number {
    return this.entries.length
  }

  /** Drops everything after the first `length` messages, keeping the seed. */
  truncate(length: number): void {
    const keep = Math.max(length, this.seedLength)
    if (keep < this.entries.length) this.entries.length = keep
  }

  reset(): void {
    this.truncate(this.seedLength)
  }
}
