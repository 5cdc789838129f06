import axios from 'axios'

import { NTFY } from '../constants'
import { ConfigNtfy } from '../interface/Config'
import { HttpClient } from './Axios'
import { log } from './Logger'
import { errorMessage } from './Errors'

const NOTIFICATION_TYPES = {
    error: { priority: 'max', tags: 'rotating_light' }, // icons: https://docs.ntfy.sh/emojis/
    warn: { priority: 'high', tags: 'warning' },
    log: { priority: 'default', tags: 'white_check_mark' }
}

export type NtfyType = keyof typeof NOTIFICATION_TYPES

export async function Ntfy(config: ConfigNtfy, message: string, type: NtfyType = 'log', client: HttpClient = axios): Promise<boolean> {
    if (!config.enabled || !config.url || !config.topic) return false

    try {
        const { priority, tags } = NOTIFICATION_TYPES[type]
        const headers = {
            Title: NTFY.TITLE,
            Priority: priority,
            Tags: tags,
            ...(config.authToken ? { Authorization: `Bearer ${config.authToken}` } : {})
        }

        await client.request({
            url: `${config.url.replace(/\/+$/, '')}/${config.topic}`,
            method: 'POST',
            data: message,
            headers
        })
        return true
    } catch (error) {
        // ntfy is best effort
        log('NTFY', 'Failed to send notification: ' + errorMessage(error), 'warn')
        return false
    }
}
