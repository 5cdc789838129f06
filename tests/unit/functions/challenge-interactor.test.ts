import { describe, expect, it } from 'vitest'

import { FakePage } from '../../helpers/FakePage'
import { BLANK_HTML, CHALLENGE_HTML, makeBot } from '../../helpers/fixtures'

const FRAME = 'iframe[src*="turnstile"]'

describe('ChallengeInteractor', () => {
    it('clicks the control inside the verification frame', async () => {
        const bot = makeBot()
        const fake = new FakePage({ html: CHALLENGE_HTML, frames: { [FRAME]: ['input[type="checkbox"]'] } })

        await bot.challenge.attempt(fake)

        expect(fake.actions).toEqual([`click! ${FRAME} >> input[type="checkbox"]`])
    })

    it('falls back to clicking the frame itself', async () => {
        const bot = makeBot()
        const fake = new FakePage({ html: CHALLENGE_HTML })

        await bot.challenge.attempt(fake)

        expect(fake.actions).toEqual([`click! ${FRAME}`])
    })

    it('does nothing without a frame', async () => {
        const bot = makeBot()
        const fake = new FakePage({ html: BLANK_HTML })

        await bot.challenge.attempt(fake)

        expect(fake.actions).toEqual([])
    })

    it('swallows click failures', async () => {
        const bot = makeBot()
        const fake = new FakePage({
            html: CHALLENGE_HTML,
            frames: { [FRAME]: ['input[type="checkbox"]'] },
            failOn: { clickInFrame: new Error('Element is outside of the viewport') }
        })

        await expect(bot.challenge.attempt(fake)).resolves.toBeUndefined()
        expect(fake.actions).toEqual([])
    })

    it('survives a page that fails every query', async () => {
        const bot = makeBot()
        const fake = new FakePage({
            html: CHALLENGE_HTML,
            failOn: { countElements: new Error('Target closed'), click: new Error('Target closed') }
        })

        await expect(bot.challenge.attempt(fake)).resolves.toBeUndefined()
    })
})
