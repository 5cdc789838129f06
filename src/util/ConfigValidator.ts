import { Config, IndicatorSet } from '../interface/Config'
import { Credential } from '../interface/Account'
import { SUPPORTED_PROXY_PROTOCOLS, isSupportedProxyUrl } from './Axios'

export interface ValidationIssue {
  severity: 'error' | 'warning' | 'info'
  field: string
  message: string
  suggestion?: string
}

export interface ValidationResult {
  valid: boolean
  issues: ValidationIssue[]
}

function isEmptySet(set: IndicatorSet): boolean {
  return Object.values(set).every(list => list.every(p => p.trim() === ''))
}

/**
 * Catches configuration and account mistakes before any browser is started.
 */
export class ConfigValidator {
  static validateConfig(config: Config): ValidationResult {
    const issues: ValidationIssue[] = []

    // Target URL
    if (!config.targetUrl || config.targetUrl.trim() === '') {
      issues.push({
        severity: 'error',
        field: 'targetUrl',
        message: 'targetUrl is empty',
        suggestion: 'Set targetUrl in config.json or the TARGET_URL environment variable'
      })
    } else {
      let protocol = ''
      try {
        protocol = new URL(config.targetUrl).protocol
      } catch {
        protocol = ''
      }
      if (protocol !== 'http:' && protocol !== 'https:') {
        issues.push({
          severity: 'error',
          field: 'targetUrl',
          message: `targetUrl is not a valid http(s) URL: ${config.targetUrl}`
        })
      } else if (protocol === 'http:') {
        issues.push({
          severity: 'warning',
          field: 'targetUrl',
          message: 'targetUrl uses plain http, credentials would be sent unencrypted',
          suggestion: 'Use the https:// address of the login page'
        })
      }
    }

    // Timeouts
    const t = config.timeouts
    if (t.pollInterval <= 0) {
      issues.push({
        severity: 'error',
        field: 'timeouts.pollInterval',
        message: 'pollInterval must be greater than 0'
      })
    } else if (t.pollInterval > t.pollWindow) {
      issues.push({
        severity: 'warning',
        field: 'timeouts.pollInterval',
        message: 'pollInterval is longer than pollWindow, the page is classified only once'
      })
    }
    if (t.pollWindow < 60000) {
      issues.push({
        severity: 'warning',
        field: 'timeouts.pollWindow',
        message: 'A short poll window may give up while the verification is still running',
        suggestion: 'Use 120s to 300s'
      })
    }
    if (t.navigation < 10000) {
      issues.push({
        severity: 'warning',
        field: 'timeouts.navigation',
        message: 'Navigation timeout under 10s may fail on slow verification pages'
      })
    }
    if (t.attempt < t.navigation + t.pollWindow) {
      issues.push({
        severity: 'warning',
        field: 'timeouts.attempt',
        message: 'The attempt timeout is shorter than navigation plus poll window',
        suggestion: 'Raise timeouts.attempt or lower timeouts.pollWindow'
      })
    }

    // Retry
    if (config.retry.maxAttempts > 5) {
      issues.push({
        severity: 'warning',
        field: 'retry.maxAttempts',
        message: 'Many attempts per account may get the address rate limited',
        suggestion: 'Use 2 or 3 attempts'
      })
    }

    // Indicators
    for (const key of ['login', 'success', 'failure'] as const) {
      if (isEmptySet(config.indicators[key])) {
        issues.push({
          severity: 'error',
          field: `indicators.${key}`,
          message: `No ${key} indicators configured`
        })
      }
    }
    if (isEmptySet(config.indicators.challenge) && config.selectors.challengeFrame.length === 0) {
      issues.push({
        severity: 'warning',
        field: 'indicators.challenge',
        message: 'No challenge indicators or frame selectors, a verification page will look like an unknown page'
      })
    }

    // Selectors
    if (config.selectors.identity.length === 0 || config.selectors.secret.length === 0) {
      issues.push({
        severity: 'warning',
        field: 'selectors',
        message: 'Identity or secret selectors are empty, credentials will never be entered'
      })
    }

    // Browser
    if (!config.browser.forceDirectConnection) {
      issues.push({
        severity: 'info',
        field: 'browser.forceDirectConnection',
        message: 'System proxy settings will apply to the browser'
      })
    }

    // Telegram
    const telegram = config.notifications.telegram
    if (telegram.enabled) {
      if (!telegram.botToken.trim()) {
        issues.push({
          severity: 'error',
          field: 'notifications.telegram.botToken',
          message: 'Telegram is enabled but botToken is empty',
          suggestion: 'Set TELEGRAM_BOT_TOKEN'
        })
      }
      if (!telegram.chatId.trim()) {
        issues.push({
          severity: 'error',
          field: 'notifications.telegram.chatId',
          message: 'Telegram is enabled but chatId is empty',
          suggestion: 'Set TELEGRAM_CHAT_ID'
        })
      }
      if (telegram.proxy && !isSupportedProxyUrl(telegram.proxy)) {
        issues.push({
          severity: 'error',
          field: 'notifications.telegram.proxy',
          message: 'Unsupported proxy protocol',
          suggestion: `Use one of ${SUPPORTED_PROXY_PROTOCOLS.join(', ')}`
        })
      }
    }

    // Ntfy
    const ntfy = config.notifications.ntfy
    if (ntfy.enabled) {
      if (!ntfy.url.trim()) {
        issues.push({
          severity: 'error',
          field: 'notifications.ntfy.url',
          message: 'ntfy is enabled but url is empty'
        })
      }
      if (!ntfy.topic.trim()) {
        issues.push({
          severity: 'error',
          field: 'notifications.ntfy.topic',
          message: 'ntfy is enabled but topic is empty'
        })
      }
    }

    if (!telegram.enabled && !ntfy.enabled) {
      issues.push({
        severity: 'info',
        field: 'notifications',
        message: 'No notification channel enabled, results are only logged'
      })
    }

    const valid = !issues.some(i => i.severity === 'error')
    return { valid, issues }
  }

  static validateAccounts(accounts: readonly Credential[]): ValidationResult {
    const issues: ValidationIssue[] = []

    if (accounts.length === 0) {
      issues.push({
        severity: 'error',
        field: 'accounts',
        message: 'No accounts found',
        suggestion: 'Set SITE_ACCOUNTS="user:pass" or provide accounts.json'
      })
      return { valid: false, issues }
    }

    const seen = new Set<string>()
    accounts.forEach((acc, i) => {
      const prefix = `accounts[${i}]`

      if (!acc.identity.trim()) {
        issues.push({
          severity: 'error',
          field: `${prefix}.identity`,
          message: 'Account identity is empty'
        })
        return
      }

      if (seen.has(acc.identity)) {
        issues.push({
          severity: 'error',
          field: `${prefix}.identity`,
          message: `Duplicate account: ${acc.identity}`
        })
      }
      seen.add(acc.identity)

      if (!acc.secret) {
        issues.push({
          severity: 'info',
          field: `${prefix}.secret`,
          message: 'No password, the account only gets a keep-alive visit of the login page'
        })
      }
    })

    const valid = !issues.some(i => i.severity === 'error')
    return { valid, issues }
  }

  static validateAll(config: Config, accounts: readonly Credential[]): ValidationResult {
    const configResult = this.validateConfig(config)
    const accountsResult = this.validateAccounts(accounts)

    return {
      valid: configResult.valid && accountsResult.valid,
      issues: [...configResult.issues, ...accountsResult.issues]
    }
  }

  /**
   * Print validation results to console
   * Note: This method intentionally uses console.log for CLI output formatting
   */
  static printResults(result: ValidationResult): void {
    if (result.valid) {
      console.log('✅ Configuration is valid\n')
    } else {
      console.log('❌ Configuration is invalid\n')
    }

    if (result.issues.length === 0) {
      console.log('No issues found.')
      return
    }

    const groups: Array<[string, ValidationIssue[]]> = [
      ['🚫 ERRORS', result.issues.filter(i => i.severity === 'error')],
      ['⚠️  WARNINGS', result.issues.filter(i => i.severity === 'warning')],
      ['ℹ️  INFO', result.issues.filter(i => i.severity === 'info')]
    ]

    for (const [heading, issues] of groups) {
      if (issues.length === 0) continue
      console.log(`\n${heading} (${issues.length}):`)
      for (const issue of issues) {
        console.log(`  ${issue.field}: ${issue.message}`)
        if (issue.suggestion) {
          console.log(`    → ${issue.suggestion}`)
        }
      }
    }

    console.log()
  }
}
