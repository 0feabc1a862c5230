import type { Logger } from './types.js'

let muted = false

export function setLoggerMuted(value: boolean): void {
  muted = value
}

function emit(level: 'INFO' | 'WARN' | 'ERROR', event: string, data?: Record<string, unknown>): void {
  if (muted) return
  const payload = {
    ts: new Date().toISOString(),
    level,
    event,
    ...(data ?? {})
  }
  // stdout belongs to the chat transcript
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(payload))
}

/** JSON-lines logger shared by the session, providers and console loop. */
export const logger: Logger = {
  info(event, data) {
    emit('INFO', event, data)
  },
  warn(event, data) {
    emit('WARN', event, data)
  },
  error(event, data) {
    emit('ERROR', event, data)
  }
}

/** Flattens an unknown thrown value into a loggable message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
