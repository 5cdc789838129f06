export type PageState =
    | 'unknown'
    | 'challenge-pending'
    | 'login-form-ready'
    | 'authenticated-success'
    | 'authentication-failed'

export interface ExpiryHint {
    /** Countdown as shown on the page, e.g. `3d 4h 5m 6s` */
    text: string
    ms: number
}

export type AttemptOutcome =
    | { kind: 'success'; detail: string; expiryHint?: ExpiryHint }
    | { kind: 'terminal-failure'; reason: string }
    | { kind: 'retryable-failure'; reason: string }

export interface SessionResult {
    readonly identity: string
    readonly outcome: 'success' | 'failure'
    readonly detail: string
    readonly attempts: number
}

export interface DiagnosticArtifact {
    screenshotPath?: string
    htmlPath?: string
    timestamp: Date
    failures: Error[]
}

export type SubmitStrategy = 'label' | 'css' | 'enter'

export interface SubmissionResult {
    filled: boolean
    submitted: boolean
    strategy?: SubmitStrategy
}

export interface PageSnapshot {
    /** Lower-cased rendered text plus input attribute fragments */
    text: string
    challengeFrame: boolean
}

export interface PollReport {
    state: PageState
    sawChallenge: boolean
    observed: PageState[]
    elapsedMs: number
}

export type AttemptPhase = 'init' | 'navigated' | 'polled' | 'filled' | 'submitted' | 'evaluated'
