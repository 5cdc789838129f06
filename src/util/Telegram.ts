import { TELEGRAM } from '../constants'
import { ConfigTelegram } from '../interface/Config'
import AxiosClient, { HttpClient, describeProxy } from './Axios'
import { errorMessage } from './Errors'
import { log } from './Logger'

// Telegram legacy Markdown only reserves these
export function escapeMarkdown(text: string): string {
    return text.replace(/([_*[`])/g, '\\$1')
}

function createClient(config: ConfigTelegram): HttpClient {
    if (config.proxy) {
        log('TELEGRAM', `Sending through proxy ${describeProxy(config.proxy)}`)
    }
    return new AxiosClient(config.proxy)
}

/**
 * Delivers `text` with `parse_mode: Markdown`. Returns whether Telegram accepted it;
 * delivery problems are logged and never thrown.
 */
export async function sendTelegramMessage(config: ConfigTelegram, text: string, client?: HttpClient): Promise<boolean> {
    if (!config.botToken || !config.chatId) {
        log('TELEGRAM', 'Bot token or chat id missing, skipping Telegram report', 'warn')
        return false
    }

    try {
        const http = client ?? createClient(config)
        const response = await http.request({
            url: `${TELEGRAM.API_BASE}/bot${config.botToken}/sendMessage`,
            method: 'POST',
            data: { chat_id: config.chatId, text, parse_mode: 'Markdown' },
            timeout: TELEGRAM.TIMEOUT,
            validateStatus: () => true
        })

        if (response.status === 200) {
            log('TELEGRAM', 'Report sent')
            return true
        }

        log('TELEGRAM', `Telegram rejected the report: ${response.status} - ${JSON.stringify(response.data)}`, 'error')
        return false
    } catch (error) {
        log('TELEGRAM', 'Failed to send report: ' + errorMessage(error), 'error')
        return false
    }
}
