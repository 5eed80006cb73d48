// services/transport/src/config/env.ts

import { BACKOFF_STRATEGIES, type BackoffStrategy } from '../core/engine/backoff.js'
import { OVERFLOW_POLICIES, type OverflowPolicy } from '../core/queue/index.js'
import { DEFAULT_TRANSPORT_CONFIG } from './defaults.js'
import type { TransportConfig } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Env parsing helpers                                                        */
/* -------------------------------------------------------------------------- */

function envInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name]
    if (raw == null || raw === '') return fallback
    const n = Number.parseInt(String(raw), 10)
    return Number.isFinite(n) ? n : fallback
}

function envFloat(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name]
    if (raw == null || raw === '') return fallback
    const n = Number.parseFloat(String(raw))
    return Number.isFinite(n) ? n : fallback
}

function envBool(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name]
    if (raw == null || raw === '') return fallback
    const v = String(raw).trim().toLowerCase()
    return v === '1' || v === 'true' || v === 'yes' || v === 'on'
}

function envOneOf<T extends string>(
    env: NodeJS.ProcessEnv,
    name: string,
    allowed: readonly T[],
    fallback: T
): T {
    const raw = env[name]
    if (raw == null || raw === '') return fallback
    const v = String(raw).trim().toLowerCase()
    return allowed.find((a) => a === v) ?? fallback
}

/* -------------------------------------------------------------------------- */
/*  Transport config builder                                                   */
/* -------------------------------------------------------------------------- */

/**
 * Build transport config from LANCTL_* variables.
 *
 * Missing or unparseable values fall back to the defaults. Range checks are
 * left to validateTransportConfig so bad values are reported, not hidden.
 */
export function buildTransportConfigFromEnv(env: NodeJS.ProcessEnv): TransportConfig {
    const d = DEFAULT_TRANSPORT_CONFIG

    const strategy: BackoffStrategy = envOneOf(env, 'LANCTL_RETRY_STRATEGY', BACKOFF_STRATEGIES, d.retry.strategy)
    const overflowPolicy: OverflowPolicy = envOneOf(env, 'LANCTL_QUEUE_OVERFLOW', OVERFLOW_POLICIES, d.queue.overflowPolicy)

    return {
        session: {
            connectTimeoutMs: envInt(env, 'LANCTL_CONNECT_TIMEOUT_MS', d.session.connectTimeoutMs),
            sendTimeoutMs: envInt(env, 'LANCTL_SEND_TIMEOUT_MS', d.session.sendTimeoutMs),
            recvTimeoutMs: envInt(env, 'LANCTL_RECV_TIMEOUT_MS', d.session.recvTimeoutMs),
            maxFrameBytes: envInt(env, 'LANCTL_MAX_FRAME_BYTES', d.session.maxFrameBytes),
        },
        retry: {
            maxAttempts: envInt(env, 'LANCTL_MAX_ATTEMPTS', d.retry.maxAttempts),
            baseDelayMs: envInt(env, 'LANCTL_RETRY_BASE_DELAY_MS', d.retry.baseDelayMs),
            maxDelayMs: envInt(env, 'LANCTL_RETRY_MAX_DELAY_MS', d.retry.maxDelayMs),
            jitterFraction: envFloat(env, 'LANCTL_RETRY_JITTER', d.retry.jitterFraction),
            strategy,
        },
        queue: {
            maxDepth: envInt(env, 'LANCTL_QUEUE_MAX_DEPTH', d.queue.maxDepth),
            overflowPolicy,
            blockTimeoutMs: envInt(env, 'LANCTL_QUEUE_BLOCK_TIMEOUT_MS', d.queue.blockTimeoutMs),
        },
        idempotency: {
            capacity: envInt(env, 'LANCTL_IDEMPOTENCY_CAPACITY', d.idempotency.capacity),
            ttlMs: envInt(env, 'LANCTL_IDEMPOTENCY_TTL_MS', d.idempotency.ttlMs),
        },
        commandDeadlineMs: envInt(env, 'LANCTL_COMMAND_DEADLINE_MS', d.commandDeadlineMs),
        reuseConnection: envBool(env, 'LANCTL_REUSE_CONNECTION', d.reuseConnection),
    }
}
