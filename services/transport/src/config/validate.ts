// services/transport/src/config/validate.ts

import { ConfigError, type TransportConfig } from './types.js'

const MIN_FRAME_BYTES = 64
const MAX_FRAME_BYTES = 16 * 1024 * 1024
const MAX_ATTEMPTS_LIMIT = 10
const MAX_QUEUE_DEPTH = 4096

function positive(issues: string[], name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) issues.push(`${name} must be > 0 (got ${value})`)
}

function intInRange(issues: string[], name: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        issues.push(`${name} must be an integer in ${min}..${max} (got ${value})`)
    }
}

/** Every rule the config breaks; empty when valid. */
export function validateTransportConfig(cfg: TransportConfig): string[] {
    const issues: string[] = []
    const { session, retry, queue, idempotency } = cfg

    positive(issues, 'session.connectTimeoutMs', session.connectTimeoutMs)
    positive(issues, 'session.sendTimeoutMs', session.sendTimeoutMs)
    positive(issues, 'session.recvTimeoutMs', session.recvTimeoutMs)
    intInRange(issues, 'session.maxFrameBytes', session.maxFrameBytes, MIN_FRAME_BYTES, MAX_FRAME_BYTES)

    intInRange(issues, 'retry.maxAttempts', retry.maxAttempts, 1, MAX_ATTEMPTS_LIMIT)
    if (!Number.isFinite(retry.baseDelayMs) || retry.baseDelayMs < 0) {
        issues.push(`retry.baseDelayMs must be >= 0 (got ${retry.baseDelayMs})`)
    }
    if (!Number.isFinite(retry.maxDelayMs) || retry.maxDelayMs < retry.baseDelayMs) {
        issues.push(`retry.maxDelayMs must be >= retry.baseDelayMs (got ${retry.maxDelayMs})`)
    }
    if (!Number.isFinite(retry.jitterFraction) || retry.jitterFraction < 0 || retry.jitterFraction >= 1) {
        issues.push(`retry.jitterFraction must be in [0, 1) (got ${retry.jitterFraction})`)
    }

    intInRange(issues, 'queue.maxDepth', queue.maxDepth, 1, MAX_QUEUE_DEPTH)
    if (queue.overflowPolicy === 'block-with-timeout') {
        positive(issues, 'queue.blockTimeoutMs', queue.blockTimeoutMs)
    }

    if (!Number.isInteger(idempotency.capacity) || idempotency.capacity < 1) {
        issues.push(`idempotency.capacity must be a positive integer (got ${idempotency.capacity})`)
    }
    positive(issues, 'idempotency.ttlMs', idempotency.ttlMs)

    const floor = session.connectTimeoutMs + session.recvTimeoutMs
    if (!Number.isFinite(cfg.commandDeadlineMs) || cfg.commandDeadlineMs < floor) {
        issues.push(`commandDeadlineMs must be >= connect + recv timeout (${floor}ms, got ${cfg.commandDeadlineMs})`)
    }

    return issues
}

export function assertValidTransportConfig(cfg: TransportConfig): TransportConfig {
    const issues = validateTransportConfig(cfg)
    if (issues.length > 0) throw new ConfigError(issues)
    return cfg
}
