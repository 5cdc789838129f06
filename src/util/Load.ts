import fs from 'fs'
import path from 'path'

import defaultIndicators from '../data/indicators.json'
import { DEFAULT_TARGET_URL, DEFAULT_USER_AGENT, EXECUTION, RETRY, SELECTORS, TIMEOUTS } from '../constants'
import { Account, Credential } from '../interface/Account'
import { BrowserEngine, Config, ConfigIndicators, ConfigViewport, IndicatorSet } from '../interface/Config'
import Util from './Utils'

let configCache: Config | undefined
let configSourcePath = ''

const util = new Util()

type RawObject = Record<string, unknown>

function isObject(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(raw: RawObject, key: string): RawObject {
    const value = raw[key]
    return isObject(value) ? value : {}
}

function str(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback
}

function bool(value: unknown, fallback: boolean): boolean {
    return typeof value === 'boolean' ? value : fallback
}

function num(value: unknown, fallback: number): number {
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value
    return typeof n === 'number' && Number.isFinite(n) ? n : fallback
}

function duration(value: unknown, fallback: string | number): number {
    if (typeof value === 'string' || typeof value === 'number') {
        return util.stringToMs(value)
    }
    return util.stringToMs(fallback)
}

function strList(value: unknown, fallback: readonly string[]): string[] {
    if (!Array.isArray(value)) return [...fallback]
    return value.filter((x): x is string => typeof x === 'string' && x.trim() !== '')
}

function indicatorSet(value: unknown, fallback: IndicatorSet): IndicatorSet {
    if (Array.isArray(value)) {
        return { custom: strList(value, []) }
    }
    if (!isObject(value)) {
        return Object.fromEntries(Object.entries(fallback).map(([k, v]) => [k, [...v]]))
    }
    const set: IndicatorSet = {}
    for (const [variant, phrases] of Object.entries(value)) {
        set[variant] = strList(phrases, [])
    }
    return set
}

function viewport(value: unknown): ConfigViewport | undefined {
    if (!isObject(value)) return undefined
    const width = num(value.width, 0)
    const height = num(value.height, 0)
    return width > 0 && height > 0 ? { width, height } : undefined
}

function engine(value: unknown): BrowserEngine {
    return value === 'firefox' ? 'firefox' : 'chromium'
}

function normalizeIndicators(raw: RawObject): ConfigIndicators {
    const d = defaultIndicators
    return {
        login: indicatorSet(raw.login, d.login),
        challenge: indicatorSet(raw.challenge, d.challenge),
        success: indicatorSet(raw.success, d.success),
        successUrl: strList(raw.successUrl, d.successUrl),
        failure: indicatorSet(raw.failure, d.failure),
        submitLabels: indicatorSet(raw.submitLabels, d.submitLabels),
        countdownLabel: str(raw.countdownLabel, d.countdownLabel)
    }
}

// Fills every missing field with its default and converts durations to ms
export function normalizeConfig(rawInput: unknown): Config {
    const n = isObject(rawInput) ? rawInput : {}

    const browser = section(n, 'browser')
    const timeouts = section(n, 'timeouts')
    const retry = section(n, 'retry')
    const execution = section(n, 'execution')
    const selectors = section(n, 'selectors')
    const diagnostics = section(n, 'diagnostics')
    const logging = section(n, 'logging')
    const notifications = section(n, 'notifications')
    const telegram = section(notifications, 'telegram')
    const ntfy = section(notifications, 'ntfy')

    const interactionDelay = browser.interactionDelay === undefined ? undefined : duration(browser.interactionDelay, 0)
    const locale = typeof browser.locale === 'string' && browser.locale.trim() ? browser.locale : undefined
    const telegramProxy = str(telegram.proxy, '').trim()
    const ntfyToken = str(ntfy.authToken, '').trim()

    return {
        targetUrl: str(n.targetUrl, DEFAULT_TARGET_URL),
        browser: {
            engine: engine(browser.engine),
            headless: bool(browser.headless, true),
            forceDirectConnection: bool(browser.forceDirectConnection, true),
            userAgent: str(browser.userAgent, DEFAULT_USER_AGENT),
            viewport: viewport(browser.viewport),
            locale,
            interactionDelay,
            generateFingerprint: bool(browser.generateFingerprint, false)
        },
        timeouts: {
            navigation: duration(timeouts.navigation, TIMEOUTS.navigation),
            networkIdle: duration(timeouts.networkIdle, TIMEOUTS.networkIdle),
            pollWindow: duration(timeouts.pollWindow, TIMEOUTS.pollWindow),
            pollInterval: duration(timeouts.pollInterval, TIMEOUTS.pollInterval),
            fieldWait: duration(timeouts.fieldWait, TIMEOUTS.fieldWait),
            fillSettle: duration(timeouts.fillSettle, TIMEOUTS.fillSettle),
            submitClick: duration(timeouts.submitClick, TIMEOUTS.submitClick),
            challengeClick: duration(timeouts.challengeClick, TIMEOUTS.challengeClick),
            postSubmitNetworkIdle: duration(timeouts.postSubmitNetworkIdle, TIMEOUTS.postSubmitNetworkIdle),
            postSubmitSettle: duration(timeouts.postSubmitSettle, TIMEOUTS.postSubmitSettle),
            countdownWait: duration(timeouts.countdownWait, TIMEOUTS.countdownWait),
            attempt: duration(timeouts.attempt, TIMEOUTS.attempt)
        },
        retry: {
            maxAttempts: Math.max(1, Math.floor(num(retry.maxAttempts, RETRY.maxAttempts))),
            backoffBase: duration(retry.backoffBase, RETRY.backoffBase),
            backoffStep: duration(retry.backoffStep, RETRY.backoffStep)
        },
        execution: {
            accountPause: duration(execution.accountPause, EXECUTION.accountPause)
        },
        selectors: {
            identity: strList(selectors.identity, SELECTORS.identity),
            secret: strList(selectors.secret, SELECTORS.secret),
            submit: strList(selectors.submit, SELECTORS.submit),
            challengeFrame: strList(selectors.challengeFrame, SELECTORS.challengeFrame),
            challengeControl: strList(selectors.challengeControl, SELECTORS.challengeControl)
        },
        indicators: normalizeIndicators(section(n, 'indicators')),
        diagnostics: {
            enabled: bool(diagnostics.enabled, true),
            directory: str(diagnostics.directory, '.')
        },
        logging: {
            excludeFunc: strList(logging.excludeFunc, []),
            redactEmails: bool(logging.redactEmails, true),
            file: bool(logging.file, true),
            directory: str(logging.directory, 'logs')
        },
        notifications: {
            telegram: {
                enabled: bool(telegram.enabled, false),
                botToken: str(telegram.botToken, ''),
                chatId: str(telegram.chatId, ''),
                ...(telegramProxy ? { proxy: telegramProxy } : {})
            },
            ntfy: {
                enabled: bool(ntfy.enabled, false),
                url: str(ntfy.url, ''),
                topic: str(ntfy.topic, ''),
                ...(ntfyToken ? { authToken: ntfyToken } : {})
            }
        }
    }
}

// Deployment secrets come from the environment (CI secrets, Docker env)
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
    const targetUrl = env.TARGET_URL?.trim()
    const botToken = env.TELEGRAM_BOT_TOKEN?.trim()
    const chatId = env.TELEGRAM_CHAT_ID?.trim()
    const proxy = env.TELEGRAM_PROXY?.trim()
    const telegram = config.notifications.telegram

    return {
        ...config,
        targetUrl: targetUrl || config.targetUrl,
        browser: {
            ...config.browser,
            headless: env.FORCE_HEADLESS === '1' ? true : config.browser.headless
        },
        notifications: {
            ...config.notifications,
            telegram: {
                ...telegram,
                enabled: telegram.enabled || Boolean(botToken && chatId),
                botToken: botToken || telegram.botToken,
                chatId: chatId || telegram.chatId,
                ...(proxy || telegram.proxy ? { proxy: proxy || telegram.proxy } : {})
            }
        }
    }
}

/**
 * Parses `"user1:pass1,user2:pass2"`. Splits on the first colon only so secrets may
 * contain colons; entries without a colon are skipped.
 */
export function parseAccountList(value: string): Credential[] {
    const credentials: Credential[] = []
    for (const pair of value.split(',')) {
        const idx = pair.indexOf(':')
        if (idx === -1) continue
        const identity = pair.slice(0, idx).trim()
        const secret = pair.slice(idx + 1).trim()
        if (!identity) continue
        credentials.push(Object.freeze({ identity, secret }))
    }
    return credentials
}

function isAccount(value: unknown): value is Account {
    return isObject(value) && typeof value.email === 'string' && typeof value.password === 'string'
}

export function parseAccountsJson(json: string): Credential[] {
    const parsedUnknown: unknown = JSON.parse(json.replace(/^\uFEFF/, ''))
    // Accept either a root array or an object with an `accounts` array
    const parsed = Array.isArray(parsedUnknown)
        ? parsedUnknown
        : (isObject(parsedUnknown) && Array.isArray(parsedUnknown.accounts) ? parsedUnknown.accounts : null)
    if (!parsed) throw new Error('Accounts file must be an array')

    const accounts: Account[] = []
    for (const a of parsed) {
        if (!isAccount(a)) {
            throw new Error('Every account needs "email" and "password" strings')
        }
        accounts.push(a)
    }

    return accounts
        .filter(acc => acc.enabled !== false)
        .map(acc => Object.freeze({ identity: acc.email.trim(), secret: acc.password }))
}

export function loadAccounts(env: NodeJS.ProcessEnv = process.env): Credential[] {
    const siteAccounts = env.SITE_ACCOUNTS
    if (siteAccounts && siteAccounts.trim()) {
        return parseAccountList(siteAccounts)
    }

    const envJson = env.ACCOUNTS_JSON
    if (envJson && envJson.trim().startsWith('[')) {
        return parseAccountsJson(envJson)
    }

    const envFile = env.ACCOUNTS_FILE
    if (envFile && envFile.trim()) {
        const full = path.isAbsolute(envFile) ? envFile : path.join(process.cwd(), envFile)
        if (!fs.existsSync(full)) {
            throw new Error(`Accounts file not found: ${full}`)
        }
        return parseAccountsJson(fs.readFileSync(full, 'utf-8'))
    }

    const file = process.argv.includes('-dev') ? 'accounts.dev.json' : 'accounts.json'
    const chosen = findFile(file)
    if (!chosen) {
        throw new Error(`No accounts found: set SITE_ACCOUNTS or provide ${file}`)
    }
    return parseAccountsJson(fs.readFileSync(chosen, 'utf-8'))
}

// Supports running from dist/, from src/ and from the repo root
function findFile(name: string): string | null {
    const bases = [
        path.join(__dirname, '../'),
        path.join(__dirname, '../src'),
        process.cwd(),
        path.join(process.cwd(), 'src')
    ]
    for (const base of bases) {
        const candidate = path.join(base, name)
        if (fs.existsSync(candidate)) return candidate
    }
    return null
}

export function getConfigPath(): string { return configSourcePath }

export function loadConfig(): Config {
    if (configCache) {
        return configCache
    }

    const cfgPath = findFile('config.json')
    let raw: unknown = {}
    if (cfgPath) {
        const json = fs.readFileSync(cfgPath, 'utf-8').replace(/^\uFEFF/, '')
        try {
            raw = JSON.parse(json)
        } catch (error) {
            throw new Error(`Invalid JSON in ${cfgPath}: ${error instanceof Error ? error.message : String(error)}`)
        }
        configSourcePath = cfgPath
    }

    configCache = applyEnvOverrides(normalizeConfig(raw))
    return configCache
}
