// services/transport/src/core/engine/backoff.ts

export type BackoffStrategy = 'linear' | 'exponential'

export const BACKOFF_STRATEGIES: readonly BackoffStrategy[] = ['linear', 'exponential']

export interface BackoffPolicy {
    baseDelayMs: number
    maxDelayMs: number
    /** Fraction of the nominal delay added or removed at random, 0 ≤ j < 1. */
    jitterFraction: number
    strategy: BackoffStrategy
}

/**
 * Un-jittered delay after failed attempt `attempt` (1-based):
 * `base * k` (linear) or `base * 2^(k-1)` (exponential), capped at maxDelayMs.
 */
export function nominalBackoffDelay(policy: BackoffPolicy, attempt: number): number {
    const k = Math.max(1, Math.floor(attempt))
    const candidate = policy.strategy === 'exponential'
        ? policy.baseDelayMs * Math.pow(2, k - 1)
        : policy.baseDelayMs * k

    return Math.min(candidate, Math.max(policy.maxDelayMs, policy.baseDelayMs))
}

/** Smallest and largest delay `computeBackoffDelay` can return for this attempt. */
export function backoffBounds(policy: BackoffPolicy, attempt: number): { min: number; max: number } {
    const nominal = nominalBackoffDelay(policy, attempt)
    return {
        min: nominal * (1 - policy.jitterFraction),
        max: nominal * (1 + policy.jitterFraction),
    }
}

/**
 * Jittered delay: `nominal * (1 + u)`, u uniform in [-jitter, +jitter].
 * `random` must return values in [0, 1), like Math.random.
 */
export function computeBackoffDelay(
    policy: BackoffPolicy,
    attempt: number,
    random: () => number = Math.random
): number {
    const nominal = nominalBackoffDelay(policy, attempt)
    const u = policy.jitterFraction * (2 * random() - 1)
    return Math.max(0, nominal * (1 + u))
}
