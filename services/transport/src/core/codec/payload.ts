// services/transport/src/core/codec/payload.ts

import { OPCODES, type Opcode } from './constants.js'
import { FrameError } from './errors.js'

/* -------------------------------------------------------------------------- */
/*  Wire payloads (JSON inside the frame envelope)                             */
/* -------------------------------------------------------------------------- */

export interface CommandPayload {
    opcode: Opcode
    device_id: string
    /** Hex idempotency key, identical on every attempt of one command. */
    msg_id: string
    state: boolean
}

export type ResponseStatus = 'ack' | 'nack'

export interface ResponsePayload {
    /** Echo of the request opcode; kept as a string so foreign opcodes still parse and simply never correlate. */
    opcode: string
    msg_id: string
    device_id?: string
    status: ResponseStatus
    /** Device-reported state after applying the command, when it sends one. */
    state?: boolean
    /** Device-supplied explanation, mostly for NACKs. */
    reason?: string
}

const MSG_ID_PATTERN = /^[0-9a-f]{1,64}$/i

export function isOpcode(value: unknown): value is Opcode {
    return typeof value === 'string' && OPCODES.some((op) => op === value)
}

export function isMsgId(value: unknown): value is string {
    return typeof value === 'string' && MSG_ID_PATTERN.test(value)
}

export function encodeCommandPayload(cmd: CommandPayload): Buffer {
    // explicit key order keeps captures diffable
    const body = {
        opcode: cmd.opcode,
        device_id: cmd.device_id,
        msg_id: cmd.msg_id,
        state: cmd.state,
    }
    return Buffer.from(JSON.stringify(body), 'utf8')
}

export function encodeResponsePayload(res: ResponsePayload): Buffer {
    return Buffer.from(JSON.stringify(res), 'utf8')
}

function malformed(message: string, data: Uint8Array): FrameError {
    return new FrameError({ code: 'MALFORMED_PAYLOAD', message, data })
}

/**
 * Parse and validate a response payload.
 *
 * @throws FrameError MALFORMED_PAYLOAD on invalid JSON or a missing/invalid field.
 */
export function parseResponsePayload(bytes: Uint8Array): ResponsePayload {
    let parsed: unknown
    try {
        parsed = JSON.parse(Buffer.from(bytes).toString('utf8'))
    } catch (err) {
        throw malformed(`response payload is not JSON: ${err instanceof Error ? err.message : String(err)}`, bytes)
    }

    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
        throw malformed('response payload must be a JSON object', bytes)
    }

    const { opcode, msg_id, device_id, status, state, reason }: Record<string, unknown> = { ...parsed }

    if (typeof opcode !== 'string' || opcode.length === 0) {
        throw malformed('response payload is missing opcode', bytes)
    }
    if (!isMsgId(msg_id)) {
        throw malformed('response payload has no valid msg_id', bytes)
    }
    if (status !== 'ack' && status !== 'nack') {
        throw malformed('response payload status must be "ack" or "nack"', bytes)
    }
    if (device_id !== undefined && typeof device_id !== 'string') {
        throw malformed('response payload device_id must be a string', bytes)
    }
    if (state !== undefined && typeof state !== 'boolean') {
        throw malformed('response payload state must be a boolean', bytes)
    }
    if (reason !== undefined && typeof reason !== 'string') {
        throw malformed('response payload reason must be a string', bytes)
    }

    return {
        opcode,
        msg_id: msg_id.toLowerCase(),
        device_id,
        status,
        state,
        reason,
    }
}
