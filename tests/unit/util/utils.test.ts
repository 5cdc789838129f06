import { describe, expect, it } from 'vitest'

import Util from '../../../src/util/Utils'

const util = new Util()

describe('Util.withTimeout', () => {
    it('returns the value when the promise settles in time', async () => {
        await expect(util.withTimeout(Promise.resolve('done'), 1000, 'fast')).resolves.toBe('done')
    })

    it('passes through the original rejection', async () => {
        await expect(util.withTimeout(Promise.reject(new Error('inner')), 1000, 'fast')).rejects.toThrow('inner')
    })

    it('rejects with an AttemptTimeoutError when time runs out', async () => {
        const never = new Promise<string>(() => undefined)
        await expect(util.withTimeout(never, 10, 'slow')).rejects.toMatchObject({
            name: 'AttemptTimeoutError',
            message: 'slow exceeded 10ms',
            retryable: true
        })
    })

    it('reports the timeout before rejecting', async () => {
        const never = new Promise<string>(() => undefined)
        const seen: string[] = []

        await expect(util.withTimeout(never, 10, 'slow', error => seen.push(error.message))).rejects.toThrow('slow exceeded 10ms')
        expect(seen).toEqual(['slow exceeded 10ms'])
    })
})

describe('Util.compactTimestamp', () => {
    it('formats UTC time without separators', () => {
        expect(util.compactTimestamp(new Date('2026-01-31T08:09:10.123Z'))).toBe('20260131T080910Z')
    })
})

describe('Util.stringToMs', () => {
    it('parses ms-style strings and plain numbers', () => {
        expect(util.stringToMs('90s')).toBe(90000)
        expect(util.stringToMs('4min')).toBe(240000)
        expect(util.stringToMs(0)).toBe(0)
    })

    it('rejects negative and unreadable values', () => {
        expect(() => util.stringToMs(-5)).toThrow('Invalid duration: -5')
        expect(() => util.stringToMs('-1s')).toThrow(/cannot be parsed/)
        expect(() => util.stringToMs('later')).toThrow(/cannot be parsed/)
    })
})

describe('Util.wait', () => {
    it('resolves after a zero wait', async () => {
        await expect(util.wait(0)).resolves.toBeUndefined()
    })

    it('resolves early when the signal aborts', async () => {
        const controller = new AbortController()
        const started = Date.now()
        const waiting = util.wait(60000, controller.signal)
        controller.abort()

        await expect(waiting).resolves.toBeUndefined()
        expect(Date.now() - started).toBeLessThan(1000)
    })
})
