import type { KeepAliveBot } from '../index'
import { Credential } from '../interface/Account'
import { BrowserPage } from '../interface/Browser'
import { AttemptOutcome, AttemptPhase, PageState, PollReport } from '../interface/Session'
import { ChallengeTimeoutError, NoLoginSurfaceError, errorMessage, toAttemptOutcome } from '../util/Errors'

export interface AttemptRunner {
    /** `signal` aborts when the caller stops waiting; the run must stop touching the page. */
    run(page: BrowserPage, credential: Credential, signal?: AbortSignal): Promise<AttemptOutcome>
}

interface AttemptProgress {
    phase: AttemptPhase
    signal?: AbortSignal
}

/**
 * Drives one login attempt on an already acquired page:
 * init -> navigated -> polled -> filled -> submitted -> evaluated.
 * Never throws; every failure comes back as an AttemptOutcome. An aborted
 * signal ends the run at the next step boundary with the abort reason.
 */
export class LoginAttempt implements AttemptRunner {
    private bot: KeepAliveBot
    private lastPhase: AttemptPhase = 'init'

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    // Phase the most recently finished run ended in
    get phase(): AttemptPhase {
        return this.lastPhase
    }

    async run(page: BrowserPage, credential: Credential, signal?: AbortSignal): Promise<AttemptOutcome> {
        const progress: AttemptProgress = { phase: 'init', signal }
        try {
            return await this.execute(page, credential, progress)
        } catch (error) {
            this.bot.log('LOGIN', `Attempt stopped in phase "${progress.phase}": ${errorMessage(error)}`, 'warn')
            return toAttemptOutcome(error)
        } finally {
            this.lastPhase = progress.phase
        }
    }

    /**
     * Polls until the login form shows up. Throws ChallengeTimeoutError when a
     * challenge was seen but never cleared, NoLoginSurfaceError when nothing
     * recognisable appeared at all.
     */
    async pollForLoginSurface(page: BrowserPage, signal?: AbortSignal): Promise<PollReport> {
        const { pollWindow, pollInterval } = this.bot.config.timeouts
        const start = Date.now()
        const observed: PageState[] = []
        let sawChallenge = false
        let state: PageState = 'unknown'

        for (;;) {
            signal?.throwIfAborted()
            state = await this.bot.classifier.classify(page)
            signal?.throwIfAborted()
            if (observed[observed.length - 1] !== state) observed.push(state)

            if (state === 'login-form-ready') break

            if (state === 'challenge-pending') {
                if (!sawChallenge) {
                    sawChallenge = true
                    this.bot.log('CHALLENGE', `Verification page detected, waiting up to ${Math.round(pollWindow / 1000)}s for it to clear`, 'warn')
                }
                await this.bot.challenge.attempt(page)
            }

            const elapsed = Date.now() - start
            if (elapsed >= pollWindow) break
            await this.bot.utils.wait(Math.min(pollInterval, pollWindow - elapsed), signal)
        }

        const report: PollReport = { state, sawChallenge, observed, elapsedMs: Date.now() - start }

        if (state === 'login-form-ready') {
            this.bot.log('LOGIN', sawChallenge
                ? 'Verification passed, login page reached'
                : 'Login page reached directly (no verification seen)')
            return report
        }
        if (sawChallenge) {
            this.bot.log('CHALLENGE', 'Timed out waiting for the verification to clear', 'warn')
            throw new ChallengeTimeoutError()
        }
        this.bot.log('LOGIN', 'Neither a login page nor a verification page was detected', 'warn')
        throw new NoLoginSurfaceError()
    }

    private async execute(page: BrowserPage, credential: Credential, progress: AttemptProgress): Promise<AttemptOutcome> {
        const { targetUrl, timeouts } = this.bot.config
        const browserUtils = this.bot.browser.utils
        const { signal } = progress

        signal?.throwIfAborted()
        await page.goto(targetUrl, timeouts.navigation)
        this.enter(progress, 'navigated')
        // The challenge may redirect on its own once the network settles
        await browserUtils.settleNetwork(page, timeouts.networkIdle, 'navigation')

        await this.pollForLoginSurface(page, signal)
        this.enter(progress, 'polled')

        const submission = await this.bot.submitter.submit(page, credential)
        signal?.throwIfAborted()
        if (!submission.filled) {
            this.bot.log('LOGIN', 'Keep-alive goal met: login page reached without credential entry')
            return { kind: 'success', detail: 'Keep-alive: login page reached' }
        }
        this.enter(progress, 'filled')

        if (!submission.submitted) {
            this.bot.log('LOGIN', 'Form filled but not submitted, evaluating the page anyway', 'warn')
        }
        this.enter(progress, 'submitted')

        await browserUtils.settleNetwork(page, timeouts.postSubmitNetworkIdle, 'submit')
        await this.bot.utils.wait(timeouts.postSubmitSettle, signal)
        signal?.throwIfAborted()

        const outcome = await this.bot.evaluator.evaluate(page)
        this.enter(progress, 'evaluated')
        return outcome
    }

    private enter(progress: AttemptProgress, phase: AttemptPhase): void {
        progress.signal?.throwIfAborted()
        progress.phase = phase
    }
}
