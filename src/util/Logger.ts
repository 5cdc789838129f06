import chalk from 'chalk'
import fs from 'fs'
import path from 'path'

import { ConfigLogging } from '../interface/Config'

export type LogType = 'log' | 'warn' | 'error'

let settings: ConfigLogging = {
    excludeFunc: [],
    redactEmails: true,
    file: false,
    directory: 'logs'
}

export function configureLogging(logging: ConfigLogging): void {
    settings = { ...logging, excludeFunc: [...logging.excludeFunc] }
}

function ensureLogDirectory(): string {
    const logDir = path.isAbsolute(settings.directory) ? settings.directory : path.join(process.cwd(), settings.directory)
    if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true })
    }
    return logDir
}

function getLogFilePath(): string {
    const logDir = ensureLogDirectory()
    const today = new Date().toISOString().split('T')[0] // YYYY-MM-DD
    return path.join(logDir, `${today}.log`)
}

function writeLogToFile(logContent: string): void {
    try {
        fs.appendFileSync(getLogFilePath(), `${logContent}\n`, 'utf8')
    } catch (error) {
        console.error('Failed to write log to file:', error)
    }
}

export function redactEmails(s: string): string {
    return s.replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/ig, (m) => {
        const [u, d] = m.split('@')
        return `${(u || '').slice(0, 2)}***@${d || ''}`
    })
}

// ASCII-safe icons so the output stays readable in Windows PowerShell
const ICON_MAP: Array<[RegExp, string]> = [
    [/error/i, '[ERROR]'],
    [/warn/i, '[WARN]'],
    [/challenge|turnstile/i, '[CHALLENGE]'],
    [/success|complet/i, '[OK]'],
    [/login|submit|credential/i, '[LOGIN]'],
    [/retry|attempt/i, '[RETRY]'],
    [/diagnostic|screenshot/i, '[DIAG]'],
    [/browser/i, '[BROWSER]'],
    [/report|telegram|ntfy/i, '[REPORT]'],
    [/main/i, '[MAIN]']
]

// Synchronous logger. Returns an Error when type === 'error' so callers can `throw log(...)`.
export function log(title: string, message: string, type: LogType = 'log', color?: keyof typeof chalk): Error | void {
    if (settings.excludeFunc.some(x => x.toLowerCase() === title.toLowerCase())) {
        return
    }

    const currentTime = new Date().toLocaleString()
    const redact = (s: string) => settings.redactEmails ? redactEmails(s) : s
    const cleanStr = redact(`[${currentTime}] [PID: ${process.pid}] [${type.toUpperCase()}] [${title}] ${message}`)

    if (settings.file) {
        writeLogToFile(`${new Date().toISOString()} ${cleanStr}`)
    }

    const typeIndicator = type === 'error' ? '✗' : type === 'warn' ? '⚠' : '✓'
    const typeColor = type === 'error' ? chalk.red : type === 'warn' ? chalk.yellow : chalk.green

    let icon = ''
    for (const [pattern, symbol] of ICON_MAP) {
        if (pattern.test(title) || pattern.test(message)) {
            icon = chalk.dim(symbol)
            break
        }
    }

    const formattedStr = [
        chalk.gray(`[${currentTime}]`),
        chalk.gray(`[${process.pid}]`),
        typeColor(typeIndicator),
        chalk.bold(`[${title}]`),
        (icon ? icon + ' ' : '') + redact(message)
    ].join(' ')

    const candidate = color ? chalk[color] : undefined
    const output = typeof candidate === 'function' ? (candidate as (msg: string) => string)(formattedStr) : formattedStr

    switch (type) {
        case 'warn':
            console.warn(output)
            break

        case 'error':
            console.error(output)
            break

        default:
            console.log(output)
            break
    }

    if (type === 'error') {
        return new Error(cleanStr)
    }
}
