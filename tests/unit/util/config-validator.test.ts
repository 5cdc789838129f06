import { describe, expect, it, vi } from 'vitest'

import { Config } from '../../../src/interface/Config'
import { ConfigValidator } from '../../../src/util/ConfigValidator'
import { SUPPORTED_PROXY_PROTOCOLS, getAgentForProxy } from '../../../src/util/Axios'
import { normalizeConfig } from '../../../src/util/Load'

function config(mutate?: (c: Config) => void): Config {
    const c = normalizeConfig({ targetUrl: 'https://portal.example.test/login' })
    mutate?.(c)
    return c
}

function fields(c: Config, severity: 'error' | 'warning' | 'info'): string[] {
    return ConfigValidator.validateConfig(c).issues.filter(i => i.severity === severity).map(i => i.field)
}

describe('ConfigValidator.validateConfig', () => {
    it('accepts the defaults with a target URL', () => {
        const result = ConfigValidator.validateConfig(config())
        expect(result.valid).toBe(true)
        expect(result.issues.map(i => i.field)).toEqual(['notifications'])
    })

    it('requires a target URL', () => {
        const result = ConfigValidator.validateConfig(config(c => { c.targetUrl = '' }))
        expect(result.valid).toBe(false)
        expect(result.issues[0]).toMatchObject({ severity: 'error', field: 'targetUrl', message: 'targetUrl is empty' })
    })

    it('rejects a non-http target', () => {
        expect(fields(config(c => { c.targetUrl = 'ftp://portal.example.test' }), 'error')).toEqual(['targetUrl'])
    })

    it('warns about plain http', () => {
        expect(fields(config(c => { c.targetUrl = 'http://portal.example.test/login' }), 'warning')).toEqual(['targetUrl'])
    })

    it('flags timing that cannot work', () => {
        const c = config(c => {
            c.timeouts.pollInterval = 0
            c.timeouts.pollWindow = 30000
        })
        expect(fields(c, 'error')).toEqual(['timeouts.pollInterval'])
        expect(fields(c, 'warning')).toEqual(['timeouts.pollWindow'])
    })

    it('warns when the attempt timeout cannot cover navigation and polling', () => {
        expect(fields(config(c => { c.timeouts.attempt = 60000 }), 'warning')).toEqual(['timeouts.attempt'])
    })

    it('requires success indicators', () => {
        expect(fields(config(c => { c.indicators.success = {} }), 'error')).toEqual(['indicators.success'])
    })

    it('requires Telegram credentials when Telegram is enabled', () => {
        const c = config(c => {
            c.notifications.telegram.enabled = true
            c.notifications.telegram.proxy = 'ftp://proxy.example.test'
        })
        expect(fields(c, 'error')).toEqual([
            'notifications.telegram.botToken',
            'notifications.telegram.chatId',
            'notifications.telegram.proxy'
        ])
    })

    it('accepts a complete Telegram setup', () => {
        const c = config(c => {
            c.notifications.telegram = { enabled: true, botToken: 'test-token', chatId: '42', proxy: 'socks5://127.0.0.1:1080' }
        })
        expect(ConfigValidator.validateConfig(c).issues).toEqual([])
    })

    it('rejects proxy protocols the HTTP client cannot use', () => {
        for (const proxy of ['socksh://127.0.0.1:1080', 'socks4h://127.0.0.1:1080']) {
            const c = config(c => {
                c.notifications.telegram = { enabled: true, botToken: 'test-token', chatId: '42', proxy }
            })
            expect(fields(c, 'error')).toEqual(['notifications.telegram.proxy'])
            expect(() => getAgentForProxy(proxy)).toThrow(/Unsupported proxy protocol/)
        }
    })

    it('accepts every protocol the HTTP client supports', () => {
        for (const protocol of SUPPORTED_PROXY_PROTOCOLS) {
            const c = config(c => {
                c.notifications.telegram = { enabled: true, botToken: 'test-token', chatId: '42', proxy: `${protocol}127.0.0.1:1080` }
            })
            expect(ConfigValidator.validateConfig(c).issues).toEqual([])
        }
    })

    it('requires ntfy url and topic', () => {
        const c = config(c => { c.notifications.ntfy.enabled = true })
        expect(fields(c, 'error')).toEqual(['notifications.ntfy.url', 'notifications.ntfy.topic'])
    })
})

describe('ConfigValidator.validateAccounts', () => {
    it('requires at least one account', () => {
        expect(ConfigValidator.validateAccounts([]).valid).toBe(false)
    })

    it('rejects duplicates', () => {
        const result = ConfigValidator.validateAccounts([
            { identity: 'a@example.test', secret: 'test-secret' },
            { identity: 'a@example.test', secret: 'test-secret' }
        ])
        expect(result.valid).toBe(false)
        expect(result.issues).toEqual([{ severity: 'error', field: 'accounts[1].identity', message: 'Duplicate account: a@example.test' }])
    })

    it('notes accounts without a password', () => {
        const result = ConfigValidator.validateAccounts([{ identity: 'a@example.test', secret: '' }])
        expect(result.valid).toBe(true)
        expect(result.issues.map(i => i.severity)).toEqual(['info'])
    })
})

describe('ConfigValidator.validateAll', () => {
    it('combines both results', () => {
        const result = ConfigValidator.validateAll(config(c => { c.targetUrl = '' }), [])
        expect(result.valid).toBe(false)
        expect(result.issues.filter(i => i.severity === 'error').map(i => i.field)).toEqual(['targetUrl', 'accounts'])
    })

    it('prints every issue with its suggestion', () => {
        ConfigValidator.printResults(ConfigValidator.validateAll(config(c => { c.targetUrl = '' }), [{ identity: 'a@example.test', secret: 'test-secret' }]))

        const lines = vi.mocked(console.log).mock.calls.map(call => call[0])
        expect(lines).toContain('  targetUrl: targetUrl is empty')
        expect(lines).toContain('    → Set targetUrl in config.json or the TARGET_URL environment variable')
    })
})
