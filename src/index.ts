import Browser from './browser/Browser'
import BrowserUtil from './browser/BrowserUtil'

import { configureLogging, log } from './util/Logger'
import Util from './util/Utils'
import { loadAccounts, loadConfig, getConfigPath } from './util/Load'
import { ConfigValidator } from './util/ConfigValidator'
import { sendConclusion, summarize } from './util/ConclusionReport'
import { errorMessage } from './util/Errors'

import { PageStateClassifier } from './functions/PageStateClassifier'
import { ChallengeInteractor } from './functions/ChallengeInteractor'
import { CredentialSubmitter } from './functions/CredentialSubmitter'
import { OutcomeEvaluator } from './functions/OutcomeEvaluator'
import { AttemptRunner, LoginAttempt } from './functions/LoginAttempt'
import { RetryController, createResult } from './functions/RetryController'

import { Credential } from './interface/Account'
import { SessionProvider } from './interface/Browser'
import { Config } from './interface/Config'
import { SessionResult } from './interface/Session'

/**
 * Wires the login pipeline together and runs it over a batch of accounts.
 * Components reach each other through this object, so tests can swap
 * `browser.sessions` or `login` for in-process fakes.
 */
export class KeepAliveBot {
    public log: typeof log
    public config: Config
    public utils: Util
    public browser: {
        sessions: SessionProvider
        utils: BrowserUtil
    }
    public classifier: PageStateClassifier
    public challenge: ChallengeInteractor
    public submitter: CredentialSubmitter
    public evaluator: OutcomeEvaluator
    public login: AttemptRunner
    public retry: RetryController

    private accounts: Credential[]

    constructor(config: Config = loadConfig()) {
        this.log = log
        this.config = config
        this.utils = new Util()
        this.accounts = []

        this.browser = {
            sessions: new Browser(this),
            utils: new BrowserUtil(this)
        }
        this.classifier = new PageStateClassifier(this)
        this.challenge = new ChallengeInteractor(this)
        this.submitter = new CredentialSubmitter(this)
        this.evaluator = new OutcomeEvaluator(this)
        this.login = new LoginAttempt(this)
        this.retry = new RetryController(this)
    }

    async initialize(): Promise<void> {
        this.accounts = loadAccounts()
    }

    getAccounts(): readonly Credential[] {
        return this.accounts
    }

    // Strictly sequential: one browser at a time, one account at a time
    async run(accounts: readonly Credential[] = this.accounts): Promise<SessionResult[]> {
        this.log('MAIN', `Keep-alive started for ${accounts.length} account(s), target: ${this.config.targetUrl}`)

        const results: SessionResult[] = []
        for (const [index, credential] of accounts.entries()) {
            this.log('MAIN', `Processing account ${index + 1}/${accounts.length}: ${credential.identity}`)
            results.push(await this.runAccount(credential))

            if (index < accounts.length - 1) {
                this.log('MAIN', `Pausing ${Math.round(this.config.execution.accountPause / 1000)}s before the next account`)
                await this.utils.wait(this.config.execution.accountPause)
            }
        }

        const { succeeded, failed } = summarize(results)
        this.log('MAIN', `Keep-alive finished: ${succeeded} succeeded, ${failed} failed`, failed > 0 ? 'warn' : 'log')
        return results
    }

    private async runAccount(credential: Credential): Promise<SessionResult> {
        try {
            return await this.retry.run(credential)
        } catch (error) {
            // RetryController reports failures as values; this only guards the batch against defects
            this.log('MAIN', `Unexpected error for ${credential.identity}: ${errorMessage(error)}`, 'error')
            return createResult(credential.identity, 'failure', errorMessage(error).substring(0, 120), 0)
        }
    }
}

async function main(): Promise<void> {
    const config = loadConfig()
    configureLogging(config.logging)

    const gracefulExit = (code: number) => {
        process.exit(code)
    }

    process.on('unhandledRejection', (reason) => {
        log('MAIN', 'Unhandled rejection: ' + errorMessage(reason), 'error')
        gracefulExit(1)
    })
    process.on('uncaughtException', (err) => {
        log('MAIN', 'Uncaught exception: ' + err.message, 'error')
        gracefulExit(1)
    })
    process.on('SIGTERM', () => gracefulExit(0))
    process.on('SIGINT', () => gracefulExit(0))

    log('MAIN', getConfigPath() ? `Config loaded from ${getConfigPath()}` : 'No config.json found, using defaults')

    const bot = new KeepAliveBot(config)
    await bot.initialize()

    const validation = ConfigValidator.validateAll(config, bot.getAccounts())
    if (validation.issues.length > 0) {
        ConfigValidator.printResults(validation)
    }
    if (!validation.valid) {
        log('MAIN', 'Configuration errors found, aborting before any browser starts', 'error')
        process.exitCode = 1
        return
    }

    const results = await bot.run()
    await sendConclusion(config, results)
}

if (require.main === module) {
    main().catch(error => {
        log('MAIN', `Error running keep-alive: ${errorMessage(error)}`, 'error')
        process.exit(1)
    })
}
