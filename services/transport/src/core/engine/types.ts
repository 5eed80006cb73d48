// services/transport/src/core/engine/types.ts

import type { Opcode, ResponsePayload } from '../codec/index.js'
import type { DeviceEndpoint } from '../session/types.js'

/* -------------------------------------------------------------------------- */
/*  Command lifecycle                                                          */
/* -------------------------------------------------------------------------- */

/**
 *   created → queued → sent → awaiting-response → success | retry | failed
 *   retry → sent
 */
export type CommandState =
    | 'created'
    | 'queued'
    | 'sent'
    | 'awaiting-response'
    | 'retry'
    | 'success'
    | 'failed'

export type FailureReason =
    | 'QueueFull'
    | 'Dropped'
    | 'AllAttemptsTimedOut'
    | 'ConnectTimeout'
    | 'ConnectRefused'
    | 'SendTimeout'
    | 'RecvTimeout'
    | 'PeerClosed'
    | 'IOError'
    | 'BadMagic'
    | 'UnsupportedVersion'
    | 'FrameTooLarge'
    | 'MalformedPayload'
    | 'Nack'
    | 'DeadlineExceeded'
    | 'Cancelled'

export type AttemptOutcome =
    | 'pending'
    | 'success'
    | 'nack'
    | 'timeout'
    | 'error'
    | 'deduplicated'
    | 'cancelled'

export interface AttemptRecord {
    attemptNumber: number
    /** When the frame went out; null if the attempt failed before sending. */
    sentAt: number | null
    outcome: AttemptOutcome
    elapsedMs: number
    error?: FailureReason
}

/* -------------------------------------------------------------------------- */
/*  Caller-facing API                                                          */
/* -------------------------------------------------------------------------- */

export interface CommandRequest {
    device: DeviceEndpoint
    opcode: Opcode
    desiredState: boolean
    /**
     * Reuse an idempotency key from an earlier submission of the same logical
     * command. A fresh key is generated when omitted.
     */
    msgId?: string
    /** Observability only. */
    requestedBy?: string
}

interface OutcomeBase {
    msgId: string
    deviceId: string
    opcode: Opcode
    desiredState: boolean
    attempts: AttemptRecord[]
    submittedAt: number
    completedAt: number
}

export type CommandOutcome =
    | (OutcomeBase & {
        status: 'success'
        /** True when the idempotency cache already held a SUCCESS and nothing was re-sent. */
        deduplicated: boolean
        response?: ResponsePayload
    })
    | (OutcomeBase & {
        status: 'failed'
        reason: FailureReason
        detail?: string
        response?: ResponsePayload
    })

export interface CommandHandle {
    msgId: string
    deviceId: string
    submittedAt: number
    /** Always resolves; a failed command resolves with status 'failed'. */
    done: Promise<CommandOutcome>
    /** Cancels a queued or in-flight command. Returns false once the command is terminal. */
    cancel: (reason?: string) => boolean
}
