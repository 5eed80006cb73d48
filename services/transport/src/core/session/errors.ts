export type SessionErrorCode =
    | 'CONNECT_TIMEOUT'
    | 'CONNECT_REFUSED'
    | 'SEND_TIMEOUT'
    | 'RECV_TIMEOUT'
    | 'PEER_CLOSED'
    | 'IO_ERROR'

export class SessionError extends Error {
    public readonly code: SessionErrorCode
    public readonly deviceId: string
    /** errno-style code from the socket layer, e.g. ECONNRESET. */
    public readonly sysCode?: string

    constructor(params: { code: SessionErrorCode; message: string; deviceId: string; sysCode?: string; cause?: unknown }) {
        super(params.message, params.cause === undefined ? undefined : { cause: params.cause })
        this.name = 'SessionError'
        this.code = params.code
        this.deviceId = params.deviceId
        this.sysCode = params.sysCode
    }
}

export function isSessionError(err: unknown): err is SessionError {
    return err instanceof SessionError
}

/** Pull `code` off a Node system error without trusting its shape. */
export function systemErrorCode(err: unknown): string | undefined {
    if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
    return typeof err.code === 'string' ? err.code : undefined
}
