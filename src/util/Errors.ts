import { AttemptOutcome } from '../interface/Session'

export type KeepAliveErrorCode =
    | 'SESSION_ACQUISITION'
    | 'CHALLENGE_TIMEOUT'
    | 'NO_LOGIN_SURFACE'
    | 'TERMINAL_CREDENTIAL'
    | 'AMBIGUOUS_OUTCOME'
    | 'ATTEMPT_TIMEOUT'
    | 'DIAGNOSTIC_CAPTURE'

/**
 * Base class for every failure the login flow raises on purpose.
 * `retryable` decides whether a fresh session is worth another attempt.
 */
export class KeepAliveError extends Error {
    readonly code: KeepAliveErrorCode
    readonly retryable: boolean

    constructor(message: string, code: KeepAliveErrorCode, retryable: boolean) {
        super(message)
        this.name = 'KeepAliveError'
        this.code = code
        this.retryable = retryable

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target)
        }
    }
}

/** The engine could not launch or the context/page could not be created */
export class SessionAcquisitionError extends KeepAliveError {
    constructor(message: string) {
        super(message, 'SESSION_ACQUISITION', true)
        this.name = 'SessionAcquisitionError'
    }
}

/** The challenge layer was seen but the login form never appeared */
export class ChallengeTimeoutError extends KeepAliveError {
    constructor(message = 'cf-timeout') {
        super(message, 'CHALLENGE_TIMEOUT', true)
        this.name = 'ChallengeTimeoutError'
    }
}

export class NoLoginSurfaceError extends KeepAliveError {
    constructor(message = 'no-login-or-cf') {
        super(message, 'NO_LOGIN_SURFACE', true)
        this.name = 'NoLoginSurfaceError'
    }
}

/** The site rejected the credential. Retrying with the same input cannot help. */
export class TerminalCredentialError extends KeepAliveError {
    constructor(message: string) {
        super(message, 'TERMINAL_CREDENTIAL', false)
        this.name = 'TerminalCredentialError'
    }
}

export class AmbiguousOutcomeError extends KeepAliveError {
    constructor(message = 'unknown-state') {
        super(message, 'AMBIGUOUS_OUTCOME', true)
        this.name = 'AmbiguousOutcomeError'
    }
}

export class AttemptTimeoutError extends KeepAliveError {
    constructor(message: string) {
        super(message, 'ATTEMPT_TIMEOUT', true)
        this.name = 'AttemptTimeoutError'
    }
}

// Logged only; never changes the retry decision
export class DiagnosticCaptureError extends KeepAliveError {
    constructor(message: string) {
        super(message, 'DIAGNOSTIC_CAPTURE', false)
        this.name = 'DiagnosticCaptureError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function toAttemptOutcome(error: unknown): AttemptOutcome {
    if (error instanceof KeepAliveError && !error.retryable) {
        return { kind: 'terminal-failure', reason: error.message }
    }
    return { kind: 'retryable-failure', reason: errorMessage(error) }
}
