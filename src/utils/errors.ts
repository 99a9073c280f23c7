import type { ZodIssue } from 'zod'

export type RelayErrorCode = 'NOT_INITIALIZED' | 'MALFORMED_PAYLOAD' | 'COMMAND_FAILED'

export class RelayError extends Error {
  readonly code: RelayErrorCode

  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RelayError'
    this.code = code
  }
}

/** The Core connection has not been established (or is gone). */
export class NotInitializedError extends RelayError {
  constructor(what: string) {
    super('NOT_INITIALIZED', `Core connection not initialized: cannot ${what}`)
    this.name = 'NotInitializedError'
  }
}

export class MalformedPayloadError extends RelayError {
  readonly issues: ZodIssue[]

  constructor(kind: string, issues: ZodIssue[]) {
    const summary = issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    super('MALFORMED_PAYLOAD', `Malformed ${kind} payload: ${summary}`)
    this.name = 'MalformedPayloadError'
    this.issues = issues
  }
}

export class CommandSendError extends RelayError {
  constructor(command: string, cause: unknown) {
    super('COMMAND_FAILED', `Core rejected ${command}: ${describeError(cause)}`, { cause })
    this.name = 'CommandSendError'
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
