/**
 * Global test setup file
 * Runs before all tests
 */

import { afterEach, beforeEach, vi } from 'vitest'

// Keep the console quiet; tests that assert on output install their own spies
beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
})

afterEach(() => {
    vi.restoreAllMocks()
})
