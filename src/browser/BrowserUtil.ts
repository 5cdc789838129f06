import fs from 'fs'
import path from 'path'

import type { KeepAliveBot } from '../index'
import { DiagnosticCaptureError, errorMessage } from '../util/Errors'

import { BrowserPage } from '../interface/Browser'
import { DiagnosticArtifact } from '../interface/Session'

// a@b.com -> a_b.com
export function sanitizeIdentity(identity: string): string {
    return identity.replace(/[^A-Za-z0-9._-]/g, '_') || 'account'
}

export default class BrowserUtil {
    private bot: KeepAliveBot

    constructor(bot: KeepAliveBot) {
        this.bot = bot
    }

    async readContent(page: BrowserPage): Promise<string> {
        try {
            return await page.content()
        } catch (error) {
            // Happens mid-navigation; callers treat it as an empty page
            this.bot.log('PAGE', 'Could not read page content: ' + errorMessage(error), 'warn')
            return ''
        }
    }

    /**
     * Network-idle waits never fail an attempt. Returns false when the wait timed out.
     */
    async settleNetwork(page: BrowserPage, timeoutMs: number, phase: string): Promise<boolean> {
        try {
            await page.waitForNetworkIdle(timeoutMs)
            return true
        } catch {
            this.bot.log('PAGE', `networkidle timed out after ${phase}, continuing`, 'warn')
            return false
        }
    }

    /**
     * Screenshot and HTML dump for postmortem. Each half is independent: one failing
     * never stops the other, and nothing here throws.
     */
    async captureDiagnostics(page: BrowserPage, identity: string): Promise<DiagnosticArtifact> {
        const timestamp = new Date()
        const stamp = this.bot.utils.compactTimestamp(timestamp)
        const stem = `${sanitizeIdentity(identity)}_${stamp}`
        const dir = path.resolve(this.bot.config.diagnostics.directory)
        const artifact: DiagnosticArtifact = { timestamp, failures: [] }

        try {
            await fs.promises.mkdir(dir, { recursive: true })
        } catch (error) {
            this.bot.log('DIAGNOSTICS', `Cannot create ${dir}: ${errorMessage(error)}`, 'warn')
        }

        artifact.screenshotPath = await this.captureStep(artifact, 'screenshot', async () => {
            const screenshotPath = path.join(dir, `screenshot_${stem}.png`)
            await page.screenshot(screenshotPath)
            return screenshotPath
        })

        artifact.htmlPath = await this.captureStep(artifact, 'html', async () => {
            const htmlPath = path.join(dir, `page_${stem}.html`)
            const html = await page.content()
            await fs.promises.writeFile(htmlPath, html, 'utf-8')
            return htmlPath
        })

        return artifact
    }

    private async captureStep(artifact: DiagnosticArtifact, label: string, capture: () => Promise<string>): Promise<string | undefined> {
        try {
            const file = await capture()
            this.bot.log('DIAGNOSTICS', `Saved ${label}: ${file}`)
            return file
        } catch (error) {
            const failure = new DiagnosticCaptureError(`${label} capture failed: ${errorMessage(error)}`)
            artifact.failures.push(failure)
            this.bot.log('DIAGNOSTICS', failure.message, 'warn')
            return undefined
        }
    }
}
