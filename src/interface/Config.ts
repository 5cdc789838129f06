export type BrowserEngine = 'chromium' | 'firefox'

export interface ConfigViewport {
    width: number
    height: number
}

export interface ConfigBrowser {
    engine: BrowserEngine
    headless: boolean
    forceDirectConnection: boolean
    userAgent: string
    viewport?: ConfigViewport
    locale?: string
    interactionDelay?: number // ms, passed to the engine as slowMo
    generateFingerprint: boolean
}

// All values in milliseconds
export interface ConfigTimeouts {
    navigation: number
    networkIdle: number
    pollWindow: number
    pollInterval: number
    fieldWait: number
    fillSettle: number
    submitClick: number
    challengeClick: number
    postSubmitNetworkIdle: number
    postSubmitSettle: number
    countdownWait: number
    attempt: number
}

export interface ConfigRetry {
    maxAttempts: number
    backoffBase: number
    backoffStep: number
}

export interface ConfigExecution {
    accountPause: number
}

export interface ConfigSelectors {
    identity: string[]
    secret: string[]
    submit: string[]
    challengeFrame: string[]
    challengeControl: string[]
}

// Site/language variant -> phrase list
export type IndicatorSet = Record<string, string[]>

export interface ConfigIndicators {
    login: IndicatorSet
    challenge: IndicatorSet
    success: IndicatorSet
    successUrl: string[]
    failure: IndicatorSet
    submitLabels: IndicatorSet
    countdownLabel: string
}

export interface ConfigDiagnostics {
    enabled: boolean
    directory: string
}

export interface ConfigLogging {
    excludeFunc: string[]
    redactEmails: boolean
    file: boolean
    directory: string
}

export interface ConfigTelegram {
    enabled: boolean
    botToken: string
    chatId: string
    proxy?: string
}

export interface ConfigNtfy {
    enabled: boolean
    url: string
    topic: string
    authToken?: string
}

export interface ConfigNotifications {
    telegram: ConfigTelegram
    ntfy: ConfigNtfy
}

export interface Config {
    targetUrl: string
    browser: ConfigBrowser
    timeouts: ConfigTimeouts
    retry: ConfigRetry
    execution: ConfigExecution
    selectors: ConfigSelectors
    indicators: ConfigIndicators
    diagnostics: ConfigDiagnostics
    logging: ConfigLogging
    notifications: ConfigNotifications
}
