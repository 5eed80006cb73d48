// services/transport/src/core/codec/frame.ts

import {
    DEFAULT_MAX_PAYLOAD_BYTES,
    FRAME_HEADER_LENGTH,
    FRAME_LENGTH_OFFSET,
    FRAME_MAGIC,
    FRAME_VERSION,
} from './constants.js'
import { FrameError } from './errors.js'

export interface DecodedFrame {
    payload: Buffer
    /** Header plus payload; the caller drops this many bytes from its buffer. */
    bytesConsumed: number
}

export interface ExtractedFrames {
    payloads: Buffer[]
    remainder: Buffer
}

function asBuffer(bytes: Uint8Array): Buffer {
    return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
}

/**
 * Wrap a payload in `[F0 0D][01][len:u32be][payload]`.
 *
 * @throws FrameError FRAME_TOO_LARGE when the payload is over `maxPayloadBytes`.
 */
export function encodeFrame(payload: Uint8Array, maxPayloadBytes = DEFAULT_MAX_PAYLOAD_BYTES): Buffer {
    if (payload.byteLength > maxPayloadBytes) {
        throw new FrameError({
            code: 'FRAME_TOO_LARGE',
            message: `payload of ${payload.byteLength} bytes exceeds limit of ${maxPayloadBytes}`,
            details: { length: payload.byteLength, max: maxPayloadBytes },
        })
    }

    const header = Buffer.alloc(FRAME_HEADER_LENGTH)
    FRAME_MAGIC.copy(header, 0)
    header.writeUInt8(FRAME_VERSION, FRAME_MAGIC.length)
    header.writeUInt32BE(payload.byteLength, FRAME_LENGTH_OFFSET)

    return Buffer.concat([header, asBuffer(payload)])
}

/**
 * Decode one frame from the start of `bytes`.
 *
 * Stateless: the caller owns the accumulation buffer and calls again after
 * a TRUNCATED_FRAME once more bytes have arrived. Magic and version are
 * checked on whatever prefix is present so garbage fails fast, and an
 * oversized length field fails before any payload is buffered.
 */
export function decodeFrame(bytes: Uint8Array, maxPayloadBytes = DEFAULT_MAX_PAYLOAD_BYTES): DecodedFrame {
    const buf = asBuffer(bytes)

    const magicAvailable = Math.min(buf.length, FRAME_MAGIC.length)
    for (let i = 0; i < magicAvailable; i++) {
        if (buf[i] !== FRAME_MAGIC[i]) {
            throw new FrameError({
                code: 'BAD_MAGIC',
                message: `bad frame magic at byte ${i}: 0x${(buf[i] ?? 0).toString(16).padStart(2, '0')}`,
                data: buf,
            })
        }
    }

    if (buf.length > FRAME_MAGIC.length) {
        const version = buf.readUInt8(FRAME_MAGIC.length)
        if (version !== FRAME_VERSION) {
            throw new FrameError({
                code: 'UNSUPPORTED_VERSION',
                message: `unsupported frame version ${version}`,
                data: buf,
                details: { version },
            })
        }
    }

    if (buf.length < FRAME_HEADER_LENGTH) {
        throw new FrameError({
            code: 'TRUNCATED_FRAME',
            message: `need ${FRAME_HEADER_LENGTH} header bytes, have ${buf.length}`,
            details: { have: buf.length, need: FRAME_HEADER_LENGTH },
        })
    }

    const length = buf.readUInt32BE(FRAME_LENGTH_OFFSET)
    if (length > maxPayloadBytes) {
        throw new FrameError({
            code: 'FRAME_TOO_LARGE',
            message: `frame declares ${length} payload bytes, limit is ${maxPayloadBytes}`,
            data: buf,
            details: { length, max: maxPayloadBytes },
        })
    }

    const total = FRAME_HEADER_LENGTH + length
    if (buf.length < total) {
        throw new FrameError({
            code: 'TRUNCATED_FRAME',
            message: `need ${total} bytes for frame, have ${buf.length}`,
            details: { have: buf.length, need: total },
        })
    }

    return {
        payload: Buffer.from(buf.subarray(FRAME_HEADER_LENGTH, total)),
        bytesConsumed: total,
    }
}

/**
 * Split a stream buffer into complete payloads and the unconsumed remainder.
 * Fatal framing errors propagate.
 */
export function extractFrames(stream: Uint8Array, maxPayloadBytes = DEFAULT_MAX_PAYLOAD_BYTES): ExtractedFrames {
    const payloads: Buffer[] = []
    let rest = asBuffer(stream)

    while (rest.length > 0) {
        try {
            const { payload, bytesConsumed } = decodeFrame(rest, maxPayloadBytes)
            payloads.push(payload)
            rest = rest.subarray(bytesConsumed)
        } catch (err) {
            if (err instanceof FrameError && err.recoverable) break
            throw err
        }
    }

    return { payloads, remainder: Buffer.from(rest) }
}

/** Space-separated hex (`f0 0d 01 ...`) for packet logs. */
export function toHex(bytes: Uint8Array): string {
    return asBuffer(bytes).toString('hex').replace(/(..)(?!$)/g, '$1 ')
}
