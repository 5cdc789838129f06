export const DEFAULT_TARGET_URL = ''

export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118.0.0.0 Safari/537.36'

// Most site-specific first, most generic last
export const SELECTORS = {
    identity: [
        'input[placeholder*="邮箱"]',
        'input[placeholder*="输入邮箱"]',
        '#inputEmail',
        '#inputUsername',
        '#username',
        'input[name="username"]',
        'input[name="email"]',
        'input[type="email"]'
    ],
    secret: [
        'input[placeholder*="密码"]',
        '#inputPassword',
        'input[name="password"]',
        'input[type="password"]',
        '#password'
    ],
    submit: [
        'button[type="submit"]',
        'input[type="submit"]',
        'button.btn',
        '.btn-primary',
        '.login-btn',
        'form button'
    ],
    challengeFrame: [
        'iframe[src*="turnstile"]',
        'iframe[src*="challenges.cloudflare.com"]',
        'iframe[src*="cloudflare"]'
    ],
    challengeControl: [
        'input[type="checkbox"]',
        '[role="checkbox"]',
        'label:has-text("Verify")'
    ]
} as const

export const TIMEOUTS = {
    navigation: '90s',
    networkIdle: '45s',
    pollWindow: '240s',
    pollInterval: '3s',
    fieldWait: '3s',
    fillSettle: 800,
    submitClick: '3s',
    challengeClick: '2s',
    postSubmitNetworkIdle: '45s',
    postSubmitSettle: '2s',
    countdownWait: '10s',
    attempt: '10min'
} as const

export const RETRY = {
    maxAttempts: 2,
    backoffBase: '5s',
    backoffStep: '5s'
} as const

export const EXECUTION = {
    accountPause: '5s'
} as const

export const TELEGRAM = {
    API_BASE: 'https://api.telegram.org',
    TIMEOUT: 10000
} as const

export const NTFY = {
    TITLE: 'Session Keep-Alive'
} as const

export const REPORT = {
    TITLE: '*Session keep-alive report*',
    DETAIL_MAX_LENGTH: 300
} as const
