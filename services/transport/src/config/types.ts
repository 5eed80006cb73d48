// services/transport/src/config/types.ts

import type { BackoffPolicy } from '../core/engine/backoff.js'
import type { IdempotencyCacheConfig } from '../core/idempotency/index.js'
import type { CommandQueueConfig } from '../core/queue/index.js'
import type { DeviceSessionConfig } from '../core/session/index.js'

export interface RetryConfig extends BackoffPolicy {
    /** Frames sent per command at most, first attempt included. */
    maxAttempts: number
}

export interface TransportConfig {
    session: DeviceSessionConfig
    retry: RetryConfig
    queue: CommandQueueConfig
    idempotency: IdempotencyCacheConfig
    /** Measured from submission; covers queueing, every attempt and backoff. */
    commandDeadlineMs: number
    /** Keep a session connected after a command ends and use it for the next one. */
    reuseConnection: boolean
}

export class ConfigError extends Error {
    public readonly issues: string[]

    constructor(issues: string[]) {
        super(`invalid transport config: ${issues.join('; ')}`)
        this.name = 'ConfigError'
        this.issues = issues
    }
}
