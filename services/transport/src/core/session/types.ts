// services/transport/src/core/session/types.ts

/* -------------------------------------------------------------------------- */
/*  Device session contracts (types only)                                      */
/* -------------------------------------------------------------------------- */

/**
 * Connection lifecycle of one session.
 *
 *   disconnected → connecting → connected → (sending ⇄ receiving) → closing → disconnected
 *
 * Any I/O error or timeout drops straight back to `disconnected`.
 */
export type SessionState =
    | 'disconnected'
    | 'connecting'
    | 'connected'
    | 'sending'
    | 'receiving'
    | 'closing'

export interface DeviceEndpoint {
    deviceId: string
    host: string
    port: number
}

export interface DeviceSessionConfig {
    connectTimeoutMs: number
    sendTimeoutMs: number
    recvTimeoutMs: number
    /** Largest payload accepted from the peer; bounds the read buffer. */
    maxFrameBytes: number
}

/**
 * What the command engine drives. `DeviceSession` is the TCP implementation;
 * tests substitute scripted links.
 */
export interface DeviceLink {
    readonly endpoint: DeviceEndpoint
    readonly state: SessionState
    readonly isConnected: boolean

    connect(timeoutMs?: number): Promise<void>
    send(frame: Buffer, timeoutMs?: number): Promise<void>
    /** Resolves with the payload of the next complete frame. */
    receive(timeoutMs?: number): Promise<Buffer>
    close(): Promise<void>
}
