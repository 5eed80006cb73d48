import { describe, expect, it } from 'vitest'

import { backoffBounds, computeBackoffDelay, nominalBackoffDelay, type BackoffPolicy } from '../src/core/engine/backoff.js'

const linear: BackoffPolicy = { baseDelayMs: 250, maxDelayMs: 5000, jitterFraction: 0.1, strategy: 'linear' }

describe('backoff', () => {
    it('grows linearly by default', () => {
        expect([1, 2, 3].map((k) => nominalBackoffDelay(linear, k))).toEqual([250, 500, 750])
    })

    it('doubles under the exponential strategy and caps at maxDelayMs', () => {
        const exp: BackoffPolicy = { ...linear, strategy: 'exponential', maxDelayMs: 1500 }
        expect([1, 2, 3, 4, 5].map((k) => nominalBackoffDelay(exp, k))).toEqual([250, 500, 1000, 1500, 1500])
    })

    it('stays inside the jitter bounds', () => {
        for (const k of [1, 2, 3]) {
            const { min, max } = backoffBounds(linear, k)
            expect(min).toBeCloseTo(250 * k * 0.9)
            expect(max).toBeCloseTo(250 * k * 1.1)

            for (const u of [0, 0.25, 0.5, 0.75, 0.999]) {
                const delay = computeBackoffDelay(linear, k, () => u)
                expect(delay).toBeGreaterThanOrEqual(min)
                expect(delay).toBeLessThanOrEqual(max)
            }
        }
    })

    it('maps the random source onto the jitter range', () => {
        expect(computeBackoffDelay(linear, 2, () => 0)).toBeCloseTo(450)
        expect(computeBackoffDelay(linear, 2, () => 0.5)).toBeCloseTo(500)
    })

    it('is exact without jitter', () => {
        expect(computeBackoffDelay({ ...linear, jitterFraction: 0 }, 3, () => 0.9)).toBe(750)
    })
})
