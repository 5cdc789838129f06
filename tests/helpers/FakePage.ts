import { load } from 'cheerio'

import { BrowserPage, ClickOptions } from '../../src/interface/Browser'

export interface FakePageOptions {
    /** Pages served by successive content() calls; the last one stays */
    html: string | string[]
    url?: string
    /** frame selector -> control selectors that exist inside that frame */
    frames?: Record<string, string[]>
    /** What the page turns into once the form is submitted */
    afterSubmit?: { html: string; url?: string }
    /** Methods that throw instead of doing their work */
    failOn?: Partial<Record<keyof BrowserPage, Error>>
    /** Whether pressing Enter in a field submits the form */
    submitOnEnter?: boolean
}

/**
 * In-process BrowserPage that answers every query from its current HTML.
 */
export class FakePage implements BrowserPage {
    readonly actions: string[] = []
    readonly filled = new Map<string, string>()
    submitCount = 0

    private queue: string[]
    private current: string
    private currentUrl: string
    private served = false
    private options: FakePageOptions

    constructor(options: FakePageOptions) {
        this.options = options
        this.queue = Array.isArray(options.html) ? [...options.html] : [options.html]
        this.current = this.queue.shift() ?? ''
        this.currentUrl = options.url ?? 'about:blank'
    }

    get html(): string {
        return this.current
    }

    async goto(url: string): Promise<void> {
        this.fault('goto')
        this.actions.push(`goto ${url}`)
        if (!this.options.url) this.currentUrl = url
    }

    async waitForNetworkIdle(): Promise<void> {
        this.fault('waitForNetworkIdle')
    }

    async content(): Promise<string> {
        this.fault('content')
        if (this.served) {
            const next = this.queue.shift()
            if (next !== undefined) this.current = next
        }
        this.served = true
        return this.current
    }

    url(): string {
        return this.currentUrl
    }

    async countElements(selector: string): Promise<number> {
        this.fault('countElements')
        return this.safeQuery(selector)
    }

    async countInFrame(frameSelector: string, selector: string): Promise<number> {
        this.fault('countInFrame')
        const controls = this.options.frames?.[frameSelector] ?? []
        return this.safeQuery(frameSelector) > 0 && controls.includes(selector) ? 1 : 0
    }

    async waitForVisible(selector: string): Promise<boolean> {
        this.fault('waitForVisible')
        return this.visible(selector)
    }

    async isVisible(selector: string): Promise<boolean> {
        this.fault('isVisible')
        return this.visible(selector)
    }

    async fill(selector: string, value: string): Promise<void> {
        this.fault('fill')
        if (!this.visible(selector)) throw new Error(`fill: ${selector} not found`)
        this.filled.set(selector, value)
        this.actions.push(`fill ${selector}`)
    }

    async click(selector: string, options: ClickOptions): Promise<void> {
        this.fault('click')
        if (this.safeQuery(selector) === 0) throw new Error(`click: ${selector} not found`)
        this.actions.push(`${options.force ? 'click!' : 'click'} ${selector}`)
        if (load(this.current)(selector).first().is('button, input[type="submit"]')) this.submitForm()
    }

    async clickInFrame(frameSelector: string, selector: string, options: ClickOptions): Promise<void> {
        this.fault('clickInFrame')
        if (await this.countInFrame(frameSelector, selector) === 0) {
            throw new Error(`clickInFrame: ${selector} not found in ${frameSelector}`)
        }
        this.actions.push(`${options.force ? 'click!' : 'click'} ${frameSelector} >> ${selector}`)
    }

    async clickByRole(role: 'button' | 'link', name: RegExp): Promise<void> {
        this.fault('clickByRole')
        const $ = load(this.current)
        const candidates = role === 'button' ? $('button, input[type="submit"], input[type="button"]') : $('a')
        const match = candidates.filter((_, el) => {
            const label = $(el).is('input') ? ($(el).attr('value') ?? '') : $(el).text()
            return name.test(label.trim())
        })
        if (match.length === 0) throw new Error(`clickByRole: no ${role} named ${name}`)
        this.actions.push(`role ${role} ${name.source}`)
        this.submitForm()
    }

    async press(selector: string, key: string): Promise<void> {
        this.fault('press')
        if (!this.visible(selector)) throw new Error(`press: ${selector} not found`)
        this.actions.push(`press ${selector} ${key}`)
        if (key === 'Enter' && this.options.submitOnEnter !== false) this.submitForm()
    }

    async waitForText(text: string): Promise<boolean> {
        this.fault('waitForText')
        return load(this.current)('body').text().toLowerCase().includes(text.toLowerCase())
    }

    async screenshot(path: string): Promise<void> {
        this.fault('screenshot')
        this.actions.push(`screenshot ${path}`)
    }

    private submitForm(): void {
        this.submitCount++
        const next = this.options.afterSubmit
        if (!next) return
        this.queue = []
        this.current = next.html
        if (next.url) this.currentUrl = next.url
    }

    private visible(selector: string): boolean {
        const $ = load(this.current)
        try {
            return $(selector).filter(':not([type="hidden"])').length > 0
        } catch {
            return false
        }
    }

    private safeQuery(selector: string): number {
        try {
            return load(this.current)(selector).length
        } catch {
            return 0 // engine-only selector syntax such as :has-text()
        }
    }

    private fault(method: keyof BrowserPage): void {
        const error = this.options.failOn?.[method]
        if (error) throw error
    }
}
