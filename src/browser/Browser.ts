import { chromium, firefox, Browser as EngineBrowser, BrowserContext, LaunchOptions } from 'rebrowser-playwright'
import { FingerprintGenerator } from 'fingerprint-generator'

import type { KeepAliveBot } from '../index'
import PlaywrightPage from './PlaywrightPage'
import { SessionAcquisitionError, errorMessage } from '../util/Errors'

import { SessionHandle, SessionProvider } from '../interface/Browser'
import { ConfigBrowser, ConfigViewport } from '../interface/Config'

const CHROMIUM_ARGS = [
    '--no-sandbox',
    '--mute-audio',
    '--disable-setuid-sandbox',
    '--disable-quic',
    '--disable-blink-features=AutomationControlled'
]

interface LiveSession {
    browser?: EngineBrowser
    context?: BrowserContext
    closed: boolean
}

interface BrowserProfile {
    userAgent: string
    viewport?: ConfigViewport
    locale?: string
}

export function buildLaunchOptions(options: ConfigBrowser): LaunchOptions {
    const launch: LaunchOptions = { headless: options.headless }

    if (options.interactionDelay && options.interactionDelay > 0) {
        launch.slowMo = options.interactionDelay
    }

    if (options.engine === 'chromium') {
        // --no-proxy-server ignores system/environment proxy settings entirely
        launch.args = options.forceDirectConnection ? [...CHROMIUM_ARGS, '--no-proxy-server'] : [...CHROMIUM_ARGS]
    } else if (options.forceDirectConnection) {
        launch.firefoxUserPrefs = { 'network.proxy.type': 0 }
    }

    return launch
}

/**
 * One browser process plus one isolated context per session. Sessions are never
 * shared between attempts.
 */
class Browser implements SessionProvider {
    private bot: KeepAliveBot
    private live = new Map<SessionHandle, LiveSession>()
    private nextId = 1

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    get openSessions(): number {
        return this.live.size
    }

    async acquire(options: ConfigBrowser): Promise<SessionHandle> {
        const session: LiveSession = { closed: false }
        try {
            const engine = options.engine === 'firefox' ? firefox : chromium
            this.bot.log('BROWSER', `Launching ${options.engine} (headless=${options.headless}, direct=${options.forceDirectConnection})`)
            session.browser = await engine.launch(buildLaunchOptions(options))

            const profile = this.resolveProfile(options)
            session.context = await session.browser.newContext({
                userAgent: profile.userAgent,
                ...(profile.viewport ? { viewport: profile.viewport } : {}),
                ...(profile.locale ? { locale: profile.locale } : {})
            })
            const page = await session.context.newPage()

            const handle: SessionHandle = { id: this.nextId++, page: new PlaywrightPage(page) }
            this.live.set(handle, session)
            this.bot.log('BROWSER', `Session #${handle.id} ready, User-Agent: "${profile.userAgent}"`)
            return handle
        } catch (e) {
            await this.teardown(session)
            const msg = errorMessage(e)
            if (/Executable doesn't exist/i.test(msg)) {
                this.bot.log('BROWSER', `The ${options.engine} executable is missing. Run "npx rebrowser-playwright install ${options.engine}".`, 'error')
            } else {
                this.bot.log('BROWSER', 'Failed to start browser: ' + msg, 'error')
            }
            throw new SessionAcquisitionError(msg)
        }
    }

    async release(handle: SessionHandle): Promise<void> {
        const session = this.live.get(handle)
        if (!session) return
        this.live.delete(handle)
        await this.teardown(session)
        this.bot.log('BROWSER', `Session #${handle.id} closed`)
    }

    // Safe on half-built sessions and on repeated calls
    private async teardown(session: LiveSession): Promise<void> {
        if (session.closed) return
        session.closed = true

        if (session.context) {
            try {
                await session.context.close()
            } catch (e) {
                this.bot.log('BROWSER', 'Error closing context: ' + errorMessage(e), 'warn')
            }
        }
        if (session.browser) {
            try {
                await session.browser.close()
            } catch (e) {
                this.bot.log('BROWSER', 'Error closing browser: ' + errorMessage(e), 'warn')
            }
        }
    }

    private resolveProfile(options: ConfigBrowser): BrowserProfile {
        if (!options.generateFingerprint) {
            return { userAgent: options.userAgent, viewport: options.viewport, locale: options.locale }
        }

        const { fingerprint } = new FingerprintGenerator().getFingerprint({
            devices: ['desktop'],
            operatingSystems: ['windows'],
            browsers: [{ name: options.engine === 'firefox' ? 'firefox' : 'chrome' }]
        })

        return {
            userAgent: fingerprint.navigator.userAgent,
            viewport: options.viewport ?? {
                width: Math.min(fingerprint.screen.width, 1920),
                height: Math.min(fingerprint.screen.height, 1080)
            },
            locale: options.locale ?? fingerprint.navigator.language
        }
    }
}

export default Browser
