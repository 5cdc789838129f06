import type { KeepAliveBot } from '../index'
import { Credential } from '../interface/Account'
import { BrowserPage } from '../interface/Browser'
import { SubmissionResult } from '../interface/Session'
import { errorMessage } from '../util/Errors'
import { flattenIndicators } from './PageStateClassifier'

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

// Whole accessible name, case-insensitive: "Login" must not match "Login with QR code"
export function labelPattern(label: string): RegExp {
    return new RegExp(`^\\s*${escapeRegExp(label.trim())}\\s*$`, 'i')
}

export class CredentialSubmitter {
    private bot: KeepAliveBot

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    async submit(page: BrowserPage, credential: Credential): Promise<SubmissionResult> {
        if (!credential.identity || !credential.secret) {
            this.bot.log('LOGIN', 'No complete credential pair supplied, skipping form entry')
            return { filled: false, submitted: false }
        }

        const { selectors, timeouts } = this.bot.config

        const identityField = await this.fillFirst(page, selectors.identity, credential.identity, 'identity')
        if (!identityField) return { filled: false, submitted: false }

        const secretField = await this.fillFirst(page, selectors.secret, credential.secret, 'password')
        if (!secretField) return { filled: false, submitted: false }

        await this.bot.utils.wait(timeouts.fillSettle)

        if (await this.clickLabeledButton(page)) {
            return { filled: true, submitted: true, strategy: 'label' }
        }
        if (await this.clickCssCandidate(page)) {
            return { filled: true, submitted: true, strategy: 'css' }
        }
        if (await this.pressEnter(page, secretField)) {
            return { filled: true, submitted: true, strategy: 'enter' }
        }

        this.bot.log('LOGIN', 'No submit strategy worked, the login may not have been triggered', 'warn')
        return { filled: true, submitted: false }
    }

    // First visible candidate that accepts the value wins
    private async fillFirst(page: BrowserPage, candidates: readonly string[], value: string, field: string): Promise<string | null> {
        const timeoutMs = this.bot.config.timeouts.fieldWait
        for (const selector of candidates) {
            try {
                if (!await page.waitForVisible(selector, timeoutMs)) continue
                await page.fill(selector, value, timeoutMs)
                this.bot.log('LOGIN', `Filled ${field} field using ${selector}`)
                return selector
            } catch {
                continue
            }
        }
        this.bot.log('LOGIN', `No ${field} field could be located and filled`, 'warn')
        return null
    }

    private async clickLabeledButton(page: BrowserPage): Promise<boolean> {
        const timeoutMs = this.bot.config.timeouts.submitClick
        for (const label of flattenIndicators(this.bot.config.indicators.submitLabels)) {
            try {
                await page.clickByRole('button', labelPattern(label), timeoutMs)
                this.bot.log('LOGIN', `Clicked button "${label}" to submit`)
                return true
            } catch {
                continue
            }
        }
        return false
    }

    private async clickCssCandidate(page: BrowserPage): Promise<boolean> {
        const timeoutMs = this.bot.config.timeouts.submitClick
        for (const selector of this.bot.config.selectors.submit) {
            try {
                if (!await page.isVisible(selector)) continue
                await page.click(selector, { timeoutMs })
                this.bot.log('LOGIN', `Clicked CSS submit candidate ${selector}`)
                return true
            } catch {
                continue
            }
        }
        return false
    }

    private async pressEnter(page: BrowserPage, secretField: string): Promise<boolean> {
        try {
            await page.press(secretField, 'Enter', this.bot.config.timeouts.submitClick)
            this.bot.log('LOGIN', 'Submitted with Enter in the password field')
            return true
        } catch (error) {
            this.bot.log('LOGIN', 'Enter key submit failed: ' + errorMessage(error), 'warn')
            return false
        }
    }
}
