import { load } from 'cheerio'

import type { KeepAliveBot } from '../index'
import { BrowserPage } from '../interface/Browser'
import { ConfigIndicators, IndicatorSet } from '../interface/Config'
import { PageSnapshot, PageState } from '../interface/Session'

const ATTRIBUTE_FRAGMENTS = ['type', 'placeholder', 'name'] as const

export function flattenIndicators(set: IndicatorSet): string[] {
    const phrases = new Set<string>()
    for (const list of Object.values(set)) {
        for (const phrase of list) {
            const p = phrase.trim().toLowerCase()
            if (p) phrases.add(p)
        }
    }
    return [...phrases]
}

export function findIndicator(text: string, phrases: readonly string[]): string | undefined {
    return phrases.find(p => text.includes(p))
}

/**
 * Reduces raw HTML to what the indicator sets are matched against: title and body
 * text without scripts, plus `attr="value"` fragments of form controls so that
 * placeholder/type indicators work on pages with little visible text.
 */
export function buildSnapshot(html: string, frameSelectors: readonly string[], liveFrame = false): PageSnapshot {
    const $ = load(html)
    $('script, style, noscript, template').remove()

    const parts = [$('title').text(), $('body').text()]
    $('input, textarea, button').each((_, el) => {
        for (const attr of ATTRIBUTE_FRAGMENTS) {
            const value = $(el).attr(attr)
            if (value) parts.push(`${attr}="${value}"`)
        }
    })

    const challengeFrame = liveFrame || frameSelectors.some(selector => {
        try {
            return $(selector).length > 0
        } catch {
            return false // engine-specific selector syntax
        }
    })

    return {
        text: parts.join('\n').replace(/\s+/g, ' ').toLowerCase(),
        challengeFrame
    }
}

// Login indicators win over challenge indicators: the challenge layer is optional
export function classifyPageState(snapshot: PageSnapshot, indicators: ConfigIndicators): PageState {
    if (findIndicator(snapshot.text, flattenIndicators(indicators.login))) {
        return 'login-form-ready'
    }
    if (snapshot.challengeFrame || findIndicator(snapshot.text, flattenIndicators(indicators.challenge))) {
        return 'challenge-pending'
    }
    return 'unknown'
}

export interface OutcomeClassification {
    state: PageState
    matched?: string
}

export function classifyOutcome(snapshot: PageSnapshot, url: string, indicators: ConfigIndicators): OutcomeClassification {
    const successPhrase = findIndicator(snapshot.text, flattenIndicators(indicators.success))
    if (successPhrase) {
        return { state: 'authenticated-success', matched: successPhrase }
    }

    const lowerUrl = url.toLowerCase()
    const successPath = indicators.successUrl.find(fragment => fragment && lowerUrl.includes(fragment.toLowerCase()))
    if (successPath) {
        return { state: 'authenticated-success', matched: successPath }
    }

    const failurePhrase = findIndicator(snapshot.text, flattenIndicators(indicators.failure))
    if (failurePhrase) {
        return { state: 'authentication-failed', matched: failurePhrase }
    }

    return { state: 'unknown' }
}

export class PageStateClassifier {
    private bot: KeepAliveBot

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    async snapshot(page: BrowserPage): Promise<PageSnapshot> {
        const html = await this.bot.browser.utils.readContent(page)
        const liveFrame = await this.detectChallengeFrame(page)
        return buildSnapshot(html, this.bot.config.selectors.challengeFrame, liveFrame)
    }

    async classify(page: BrowserPage): Promise<PageState> {
        return classifyPageState(await this.snapshot(page), this.bot.config.indicators)
    }

    // The live DOM also sees frames injected into open shadow roots
    private async detectChallengeFrame(page: BrowserPage): Promise<boolean> {
        for (const selector of this.bot.config.selectors.challengeFrame) {
            try {
                if (await page.countElements(selector) > 0) return true
            } catch {
                continue
            }
        }
        return false
    }
}
