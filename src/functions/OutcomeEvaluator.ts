import { load } from 'cheerio'

import type { KeepAliveBot } from '../index'
import { BrowserPage } from '../interface/Browser'
import { AttemptOutcome, ExpiryHint } from '../interface/Session'
import { AmbiguousOutcomeError, TerminalCredentialError, errorMessage, toAttemptOutcome } from '../util/Errors'
import { classifyOutcome } from './PageStateClassifier'

const COUNTDOWN_PATTERN = /(\d+)d\s+(\d+)h\s+(\d+)m\s+(\d+)s/

export function parseCountdown(text: string): ExpiryHint | undefined {
    const m = COUNTDOWN_PATTERN.exec(text)
    if (!m) return undefined

    const days = Number(m[1] ?? 0)
    const hours = Number(m[2] ?? 0)
    const minutes = Number(m[3] ?? 0)
    const seconds = Number(m[4] ?? 0)

    return {
        text: m[0] ?? '',
        ms: (((days * 24 + hours) * 60 + minutes) * 60 + seconds) * 1000
    }
}

export interface CountdownExtraction {
    hint?: ExpiryHint
    /** Text of the element around the label, when the label was found */
    context?: string
}

/**
 * Looks for the countdown in the parent of the innermost element carrying `label`.
 */
export function extractCountdown(html: string, label: string): CountdownExtraction {
    const needle = label.trim().toLowerCase()
    if (!needle) return {}

    const $ = load(html)
    $('script, style, noscript, template').remove()
    const labelNode = $('body *').filter((_, el) => $(el).text().toLowerCase().includes(needle)).last()
    if (labelNode.length === 0) return {}

    const context = labelNode.parent().text().replace(/\s+/g, ' ').trim()
    const hint = parseCountdown(context)
    return hint ? { hint, context } : { context }
}

export class OutcomeEvaluator {
    private bot: KeepAliveBot

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    async evaluate(page: BrowserPage): Promise<AttemptOutcome> {
        try {
            return await this.assess(page)
        } catch (error) {
            return toAttemptOutcome(error)
        }
    }

    private async assess(page: BrowserPage): Promise<AttemptOutcome> {
        const snapshot = await this.bot.classifier.snapshot(page)
        const url = page.url()
        const result = classifyOutcome(snapshot, url, this.bot.config.indicators)

        switch (result.state) {
            case 'authenticated-success': {
                this.bot.log('LOGIN', `Login success signal detected ("${result.matched}")`)
                const expiryHint = await this.extractExpiry(page)
                return expiryHint
                    ? { kind: 'success', detail: `Login succeeded, time until suspension: ${expiryHint.text}`, expiryHint }
                    : { kind: 'success', detail: 'Login succeeded' }
            }

            case 'authentication-failed':
                this.bot.log('LOGIN', `Login rejected by the site ("${result.matched}")`, 'warn')
                throw new TerminalCredentialError(`Login failed: invalid credentials or error message detected ("${result.matched}")`)

            default:
                this.bot.log('LOGIN', `Neither success nor failure signal after submit (url: ${url})`, 'warn')
                throw new AmbiguousOutcomeError()
        }
    }

    // Never downgrades a success
    private async extractExpiry(page: BrowserPage): Promise<ExpiryHint | undefined> {
        const label = this.bot.config.indicators.countdownLabel
        if (!label) return undefined

        try {
            const present = await page.waitForText(label, this.bot.config.timeouts.countdownWait)
            if (!present) return undefined

            const html = await this.bot.browser.utils.readContent(page)
            const { hint, context } = extractCountdown(html, label)
            if (hint) {
                this.bot.log('LOGIN', `Countdown after login: ${hint.text}`)
            } else if (context) {
                this.bot.log('LOGIN', `Found "${label}" but no countdown in: ${context.slice(0, 100)}`)
            }
            return hint
        } catch (error) {
            this.bot.log('LOGIN', 'Countdown extraction failed: ' + errorMessage(error), 'warn')
            return undefined
        }
    }
}
