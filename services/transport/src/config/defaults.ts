// services/transport/src/config/defaults.ts

import { DEFAULT_IDEMPOTENCY_CONFIG } from '../core/idempotency/index.js'
import { DEFAULT_QUEUE_CONFIG } from '../core/queue/index.js'
import { DEFAULT_SESSION_CONFIG } from '../core/session/index.js'
import type { TransportConfig } from './types.js'

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
    session: { ...DEFAULT_SESSION_CONFIG },
    retry: {
        maxAttempts: 2,
        baseDelayMs: 250,
        maxDelayMs: 5000,
        jitterFraction: 0.1,
        strategy: 'linear',
    },
    queue: { ...DEFAULT_QUEUE_CONFIG },
    idempotency: { ...DEFAULT_IDEMPOTENCY_CONFIG },
    commandDeadlineMs: 10_000,
    reuseConnection: false,
}

/** Per-section overrides on top of the defaults. */
export type TransportConfigOverrides = {
    [K in keyof TransportConfig]?: TransportConfig[K] extends object ? Partial<TransportConfig[K]> : TransportConfig[K]
}

export function mergeTransportConfig(
    overrides: TransportConfigOverrides = {},
    base: TransportConfig = DEFAULT_TRANSPORT_CONFIG
): TransportConfig {
    return {
        session: { ...base.session, ...overrides.session },
        retry: { ...base.retry, ...overrides.retry },
        queue: { ...base.queue, ...overrides.queue },
        idempotency: { ...base.idempotency, ...overrides.idempotency },
        commandDeadlineMs: overrides.commandDeadlineMs ?? base.commandDeadlineMs,
        reuseConnection: overrides.reuseConnection ?? base.reuseConnection,
    }
}
