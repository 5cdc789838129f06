import type { KeepAliveBot } from '../index'
import { BrowserPage } from '../interface/Browser'
import { errorMessage } from '../util/Errors'

/**
 * Best-effort click on the anti-bot widget. The challenge often clears on its own,
 * so nothing here may abort the polling loop: every failure is logged and dropped.
 * At most one click is dispatched per call.
 */
export class ChallengeInteractor {
    private bot: KeepAliveBot

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    async attempt(page: BrowserPage): Promise<void> {
        try {
            const frame = await this.findFrame(page)
            if (!frame) {
                this.bot.log('CHALLENGE', 'No verification frame found, waiting for the challenge to clear')
                return
            }

            const timeoutMs = this.bot.config.timeouts.challengeClick
            const control = await this.findControl(page, frame)
            if (control) {
                await page.clickInFrame(frame, control, { timeoutMs, force: true })
                this.bot.log('CHALLENGE', `Clicked verification control ${control} inside ${frame}`)
            } else {
                // Clicking the frame box itself sometimes triggers the widget
                await page.click(frame, { timeoutMs, force: true })
                this.bot.log('CHALLENGE', `Clicked verification frame ${frame}`)
            }
        } catch (error) {
            this.bot.log('CHALLENGE', 'Automatic challenge click failed: ' + errorMessage(error))
        }
    }

    private async findFrame(page: BrowserPage): Promise<string | null> {
        for (const selector of this.bot.config.selectors.challengeFrame) {
            const count = await page.countElements(selector).catch(() => 0)
            if (count > 0) return selector
        }
        return null
    }

    private async findControl(page: BrowserPage, frame: string): Promise<string | null> {
        for (const selector of this.bot.config.selectors.challengeControl) {
            const count = await page.countInFrame(frame, selector).catch(() => 0)
            if (count > 0) return selector
        }
        return null
    }
}
