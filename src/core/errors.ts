export type TurnErrorCode = 'provider_failed' | 'no_candidates' | 'empty_reply'

/** Failure of a single turn, returned inside a `TurnResult`. */
export class TurnError extends Error {
  readonly code: TurnErrorCode

  constructor(code: TurnErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TurnError'
    this.code = code
  }
}

export type TurnResult = { ok: true; reply: string } | { ok: false; error: TurnError }
