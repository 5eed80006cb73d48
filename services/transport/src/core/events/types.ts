// services/transport/src/core/events/types.ts

import type { FrameErrorCode } from '../codec/index.js'
import type { SessionErrorCode } from '../session/errors.js'
import type { SessionState } from '../session/types.js'
import type { AttemptOutcome, CommandState, FailureReason } from '../engine/types.js'

/* -------------------------------------------------------------------------- */
/*  Event sink + event union                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Observability sink injected into the session and the engine.
 * `publish` is synchronous and never awaited; a sink must not block.
 */
export interface TransportEventSink {
    publish(evt: TransportEvent): void
}

export type TransportEvent =
    | {
        kind: 'session-state'
        at: number
        deviceId: string
        from: SessionState
        to: SessionState
        error?: SessionErrorCode | FrameErrorCode
    }
    | {
        kind: 'packet-sent'
        at: number
        deviceId: string
        bytes: number
        hex: string
        elapsedMs: number
    }
    | {
        kind: 'packet-received'
        at: number
        deviceId: string
        bytes: number
        hex: string
        elapsedMs: number
    }
    | {
        kind: 'frame-error'
        at: number
        deviceId: string
        code: FrameErrorCode
        message: string
    }
    | {
        kind: 'command-queued'
        at: number
        msgId: string
        deviceId: string
        depth: number
    }
    | {
        kind: 'command-rejected'
        at: number
        msgId: string
        deviceId: string
        reason: 'queue-full' | 'closed'
    }
    | {
        kind: 'command-dropped'
        at: number
        msgId: string
        deviceId: string
        /** The command whose admission evicted this one. */
        replacedBy: string
    }
    | {
        kind: 'command-state'
        at: number
        msgId: string
        deviceId: string
        from: CommandState
        to: CommandState
    }
    | {
        // one per attempt; the exporter derives its counters from these
        kind: 'attempt'
        at: number
        msgId: string
        deviceId: string
        attemptNumber: number
        outcome: AttemptOutcome
        elapsedMs: number
        error?: FailureReason
    }
    | {
        kind: 'retry-scheduled'
        at: number
        msgId: string
        deviceId: string
        nextAttempt: number
        delayMs: number
        reason: FailureReason
    }
    | {
        kind: 'dedup-hit'
        at: number
        msgId: string
        deviceId: string
        beforeAttempt: number
    }
    | {
        kind: 'late-response'
        at: number
        msgId: string
        deviceId: string
    }
    | {
        kind: 'duplicate-response'
        at: number
        msgId: string
        deviceId: string
    }
    | {
        kind: 'uncorrelated-response'
        at: number
        msgId: string
        deviceId: string
        expectedMsgId?: string
        opcode: string
    }
    | {
        kind: 'command-completed'
        at: number
        msgId: string
        deviceId: string
        status: 'success' | 'failed'
        reason?: FailureReason
        detail?: string
        attempts: number
        deduplicated: boolean
        elapsedMs: number
    }
    | {
        // housekeeping failures that do not belong to one command (e.g. a close that threw)
        kind: 'engine-error'
        at: number
        deviceId: string
        message: string
    }
    | {
        kind: 'sink-error'
        at: number
        error: string
    }

export type TransportEventKind = TransportEvent['kind']

/** Sink that drops everything; the default when nothing is injected. */
export const NoopEventSink: TransportEventSink = {
    publish(): void {
        /* intentionally empty */
    },
}
