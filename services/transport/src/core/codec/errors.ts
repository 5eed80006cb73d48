/**
 * Framing error taxonomy.
 *
 * TRUNCATED_FRAME is the only recoverable code: the caller has not buffered
 * enough bytes yet and should read more before decoding again. Every other
 * code is fatal for the connection that produced the bytes.
 */

export type FrameErrorCode =
    | 'BAD_MAGIC'
    | 'UNSUPPORTED_VERSION'
    | 'TRUNCATED_FRAME'
    | 'FRAME_TOO_LARGE'
    | 'MALFORMED_PAYLOAD'

const PREVIEW_BYTES = 16

export class FrameError extends Error {
    public readonly code: FrameErrorCode
    public readonly recoverable: boolean
    /** At most the first 16 bytes of the offending data, so payloads never leak into logs whole. */
    public readonly preview: Buffer
    public readonly details?: Record<string, unknown>

    constructor(params: {
        code: FrameErrorCode
        message: string
        data?: Uint8Array
        details?: Record<string, unknown>
    }) {
        super(params.message)
        this.name = 'FrameError'
        this.code = params.code
        this.recoverable = params.code === 'TRUNCATED_FRAME'
        this.preview = params.data ? Buffer.from(params.data.subarray(0, PREVIEW_BYTES)) : Buffer.alloc(0)
        this.details = params.details
    }
}

export function isFrameError(err: unknown): err is FrameError {
    return err instanceof FrameError
}
