import ms from 'ms'

import { AttemptTimeoutError } from './Errors'

export default class Util {

    /**
     * Resolves after `ms`, or as soon as `signal` aborts. Never rejects; callers
     * check the signal themselves.
     */
    async wait(ms: number, signal?: AbortSignal): Promise<void> {
        // Safety check: prevent extremely long or negative waits
        const MAX_WAIT_MS = 3600000 // 1 hour max
        const safeMs = Math.min(Math.max(0, ms), MAX_WAIT_MS)

        if (ms !== safeMs) {
            console.warn(`[Utils] wait() clamped from ${ms}ms to ${safeMs}ms (max: ${MAX_WAIT_MS}ms)`)
        }

        if (!signal) {
            return new Promise<void>((resolve) => {
                setTimeout(resolve, safeMs)
            })
        }
        if (signal.aborted) return

        const abortSignal = signal
        return new Promise<void>((resolve) => {
            const onAbort = () => {
                clearTimeout(timer)
                resolve()
            }
            const timer = setTimeout(() => {
                abortSignal.removeEventListener('abort', onAbort)
                resolve()
            }, safeMs)
            abortSignal.addEventListener('abort', onAbort, { once: true })
        })
    }

    /**
     * Races `promise` against a timer. The timer is always cleared; a late rejection
     * of the losing promise is already observed by the race. `onTimeout` runs before
     * the rejection so the caller can cancel the work it gave up on.
     */
    async withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string, onTimeout?: (error: AttemptTimeoutError) => void): Promise<T> {
        let timer: NodeJS.Timeout | undefined
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const error = new AttemptTimeoutError(`${label} exceeded ${timeoutMs}ms`)
                onTimeout?.(error)
                reject(error)
            }, timeoutMs)
        })
        try {
            return await Promise.race([promise, timeout])
        } finally {
            if (timer) clearTimeout(timer)
        }
    }

    // 20260131T080910Z
    compactTimestamp(date = new Date()): string {
        return date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z')
    }

    stringToMs(input: string | number): number {
        if (typeof input === 'number') {
            if (!Number.isFinite(input) || input < 0) {
                throw new Error(`Invalid duration: ${input}`)
            }
            return input
        }
        const milisec = ms(input.trim())
        if (typeof milisec !== 'number' || Number.isNaN(milisec) || milisec < 0) {
            throw new Error('The string provided cannot be parsed to a valid time! Use a format like "1 min", "1m" or "1 minutes"')
        }
        return milisec
    }

}
