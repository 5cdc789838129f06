import { REPORT } from '../constants'
import { Config } from '../interface/Config'
import { SessionResult } from '../interface/Session'
import { HttpClient } from './Axios'
import { log } from './Logger'
import { Ntfy } from './Ntfy'
import { escapeMarkdown, sendTelegramMessage } from './Telegram'

export interface ReportTotals {
    total: number
    succeeded: number
    failed: number
}

export function summarize(results: readonly SessionResult[]): ReportTotals {
    const succeeded = results.filter(r => r.outcome === 'success').length
    return { total: results.length, succeeded, failed: results.length - succeeded }
}

function truncate(text: string, max: number): string {
    return text.length > max ? text.slice(0, max - 3) + '...' : text
}

/**
 * One line per account plus totals. With `markdown: false` the same report comes
 * out without Markdown markup, for channels that show text verbatim.
 */
export function buildReport(results: readonly SessionResult[], markdown = true): string {
    const code = (s: string) => markdown ? `\`${s}\`` : s
    const lines = [markdown ? REPORT.TITLE : REPORT.TITLE.replace(/\*/g, '')]

    for (const result of results) {
        if (result.outcome === 'success') {
            lines.push(`✅ Account: ${code(result.identity)} - success`)
        } else {
            const detail = truncate(result.detail, REPORT.DETAIL_MAX_LENGTH)
            lines.push(`❌ Account: ${code(result.identity)} - failure: ${markdown ? escapeMarkdown(detail) : detail}`)
        }
    }

    const { total, succeeded, failed } = summarize(results)
    lines.push('', `Total: ${total}, succeeded: ${succeeded}, failed: ${failed}`)
    return lines.join('\n')
}

export interface ConclusionClients {
    telegram?: HttpClient
    ntfy?: HttpClient
}

export async function sendConclusion(config: Config, results: readonly SessionResult[], clients: ConclusionClients = {}): Promise<void> {
    const { telegram, ntfy } = config.notifications

    if (!telegram.enabled && !ntfy.enabled) {
        log('REPORT', 'No notification channel enabled, report not sent')
        return
    }

    if (telegram.enabled) {
        await sendTelegramMessage(telegram, buildReport(results), clients.telegram)
    }

    if (ntfy.enabled) {
        const { failed } = summarize(results)
        await Ntfy(ntfy, buildReport(results, false), failed > 0 ? 'warn' : 'log', clients.ntfy)
    }
}
