import type { KeepAliveBot } from '../index'
import { Credential } from '../interface/Account'
import { SessionHandle } from '../interface/Browser'
import { AttemptOutcome, SessionResult } from '../interface/Session'
import { errorMessage, toAttemptOutcome } from '../util/Errors'

export function createResult(identity: string, outcome: SessionResult['outcome'], detail: string, attempts: number): SessionResult {
    return Object.freeze({ identity, outcome, detail, attempts })
}

/**
 * Turns flaky single attempts into exactly one SessionResult per account.
 * Every attempt gets a fresh browser session that is released before the next
 * attempt starts or the result is returned.
 */
export class RetryController {
    private bot: KeepAliveBot

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    async run(credential: Credential, maxAttempts: number = this.bot.config.retry.maxAttempts): Promise<SessionResult> {
        const total = Math.max(1, Math.floor(maxAttempts))
        const { backoffBase, backoffStep } = this.bot.config.retry
        let lastReason = ''

        for (let attempt = 1; attempt <= total; attempt++) {
            this.bot.log('RETRY', `Logging in ${credential.identity} (attempt ${attempt}/${total})`)
            const outcome = await this.runAttempt(credential)

            if (outcome.kind === 'success') {
                this.bot.log('RETRY', `Account ${credential.identity} kept alive: ${outcome.detail}`)
                return createResult(credential.identity, 'success', outcome.detail, attempt)
            }

            if (outcome.kind === 'terminal-failure') {
                // Same credential, same rejection: no point retrying
                this.bot.log('RETRY', `Account ${credential.identity} failed permanently: ${outcome.reason}`, 'error')
                return createResult(credential.identity, 'failure', outcome.reason, attempt)
            }

            lastReason = outcome.reason
            this.bot.log('RETRY', `Attempt ${attempt}/${total} for ${credential.identity} failed: ${outcome.reason}`, 'warn')

            if (attempt < total) {
                const backoff = backoffBase + backoffStep * attempt
                this.bot.log('RETRY', `Waiting ${Math.round(backoff / 1000)}s before retrying`)
                await this.bot.utils.wait(backoff)
            }
        }

        this.bot.log('RETRY', `Account ${credential.identity} failed after ${total} attempt(s)`, 'error')
        return createResult(credential.identity, 'failure', `All ${total} attempts failed, last error: ${lastReason}`, total)
    }

    private async runAttempt(credential: Credential): Promise<AttemptOutcome> {
        const { config, utils } = this.bot
        const controller = new AbortController()
        let handle: SessionHandle | undefined
        let running: Promise<AttemptOutcome> | undefined

        try {
            let outcome: AttemptOutcome
            try {
                handle = await this.bot.browser.sessions.acquire(config.browser)
                running = this.bot.login.run(handle.page, credential, controller.signal)
                outcome = await utils.withTimeout(running, config.timeouts.attempt, 'Login attempt', error => controller.abort(error))
            } catch (error) {
                outcome = toAttemptOutcome(error)
            }

            // A timed-out run stops at its next step boundary; nothing may touch the page after that
            if (controller.signal.aborted && running) {
                await this.drain(running)
            }

            if (outcome.kind !== 'success' && handle && config.diagnostics.enabled) {
                await this.bot.browser.utils.captureDiagnostics(handle.page, credential.identity)
            }
            return outcome
        } finally {
            if (handle) await this.releaseSession(handle)
        }
    }

    private async drain(running: Promise<AttemptOutcome>): Promise<void> {
        try {
            const late = await running
            this.bot.log('RETRY', `Abandoned attempt stopped: ${late.kind === 'success' ? late.detail : late.reason}`)
        } catch (error) {
            this.bot.log('RETRY', `Abandoned attempt stopped with an error: ${errorMessage(error)}`, 'warn')
        }
    }

    private async releaseSession(handle: SessionHandle): Promise<void> {
        try {
            await this.bot.browser.sessions.release(handle)
        } catch (error) {
            this.bot.log('BROWSER', `Error releasing session #${handle.id}: ${errorMessage(error)}`, 'warn')
        }
    }
}
