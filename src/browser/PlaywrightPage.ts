import { Page } from 'rebrowser-playwright'

import { BrowserPage, ClickOptions } from '../interface/Browser'

export default class PlaywrightPage implements BrowserPage {
    private page: Page

    constructor(page: Page) {
        this.page = page
    }

    async goto(url: string, timeoutMs: number): Promise<void> {
        await this.page.goto(url, { timeout: timeoutMs })
    }

    async waitForNetworkIdle(timeoutMs: number): Promise<void> {
        await this.page.waitForLoadState('networkidle', { timeout: timeoutMs })
    }

    async content(): Promise<string> {
        return this.page.content()
    }

    url(): string {
        return this.page.url()
    }

    async countElements(selector: string): Promise<number> {
        return this.page.locator(selector).count()
    }

    async countInFrame(frameSelector: string, selector: string): Promise<number> {
        return this.page.frameLocator(frameSelector).first().locator(selector).count()
    }

    async waitForVisible(selector: string, timeoutMs: number): Promise<boolean> {
        return this.page.waitForSelector(selector, { state: 'visible', timeout: timeoutMs }).then(() => true).catch(() => false)
    }

    async isVisible(selector: string): Promise<boolean> {
        return this.page.locator(selector).first().isVisible().catch(() => false)
    }

    async fill(selector: string, value: string, timeoutMs: number): Promise<void> {
        await this.page.fill(selector, value, { timeout: timeoutMs })
    }

    async click(selector: string, options: ClickOptions): Promise<void> {
        await this.page.locator(selector).first().click({ timeout: options.timeoutMs, force: options.force ?? false })
    }

    async clickInFrame(frameSelector: string, selector: string, options: ClickOptions): Promise<void> {
        await this.page.frameLocator(frameSelector).first().locator(selector).first()
            .click({ timeout: options.timeoutMs, force: options.force ?? false })
    }

    async clickByRole(role: 'button' | 'link', name: RegExp, timeoutMs: number): Promise<void> {
        await this.page.getByRole(role, { name }).first().click({ timeout: timeoutMs })
    }

    async press(selector: string, key: string, timeoutMs: number): Promise<void> {
        await this.page.press(selector, key, { timeout: timeoutMs })
    }

    async waitForText(text: string, timeoutMs: number): Promise<boolean> {
        return this.page.getByText(text).first().waitFor({ state: 'attached', timeout: timeoutMs }).then(() => true).catch(() => false)
    }

    async screenshot(path: string): Promise<void> {
        await this.page.screenshot({ path, fullPage: true })
    }
}
