import { ConfigBrowser } from './Config'

export interface ClickOptions {
    timeoutMs: number
    /** Skip actionability checks; verification widgets often sit under overlays */
    force?: boolean
}

/**
 * What the login flow needs from the browser engine. `PlaywrightPage` is the
 * production implementation; tests script their own.
 */
export interface BrowserPage {
    goto(url: string, timeoutMs: number): Promise<void>
    waitForNetworkIdle(timeoutMs: number): Promise<void>
    content(): Promise<string>
    url(): string
    countElements(selector: string): Promise<number>
    countInFrame(frameSelector: string, selector: string): Promise<number>
    waitForVisible(selector: string, timeoutMs: number): Promise<boolean>
    isVisible(selector: string): Promise<boolean>
    fill(selector: string, value: string, timeoutMs: number): Promise<void>
    click(selector: string, options: ClickOptions): Promise<void>
    clickInFrame(frameSelector: string, selector: string, options: ClickOptions): Promise<void>
    clickByRole(role: 'button' | 'link', name: RegExp, timeoutMs: number): Promise<void>
    press(selector: string, key: string, timeoutMs: number): Promise<void>
    waitForText(text: string, timeoutMs: number): Promise<boolean>
    screenshot(path: string): Promise<void>
}

export interface SessionHandle {
    readonly id: number
    readonly page: BrowserPage
}

export interface SessionProvider {
    acquire(options: ConfigBrowser): Promise<SessionHandle>
    release(handle: SessionHandle): Promise<void>
}
