/* -------------------------------------------------------------------------- */
/*  DeviceSession                                                             */
/*                                                                            */
/*  Responsibilities:                                                         */
/*  - Own exactly one TCP connection to one device                            */
/*  - Enforce a timeout on connect, write and read                            */
/*  - Accumulate inbound bytes and hand back whole frames                     */
/*  - Emit session events (state changes, packet hex) to the injected sink    */
/*                                                                            */
/*  Non-responsibilities:                                                     */
/*  - No reconnect: a failed session stays disconnected until the caller      */
/*    connects it again                                                       */
/*  - No correlation or retries                                               */
/* -------------------------------------------------------------------------- */

import { createConnection, type Socket } from 'node:net'

import {
    DEFAULT_MAX_PAYLOAD_BYTES,
    FRAME_HEADER_LENGTH,
    FrameError,
    decodeFrame,
    toHex,
} from '../codec/index.js'
import { NoopEventSink, type TransportEventSink } from '../events/types.js'
import { SessionError, systemErrorCode, type SessionErrorCode } from './errors.js'
import type { DeviceEndpoint, DeviceLink, DeviceSessionConfig, SessionState } from './types.js'

export const DEFAULT_SESSION_CONFIG: DeviceSessionConfig = {
    connectTimeoutMs: 1000,
    sendTimeoutMs: 1500,
    recvTimeoutMs: 1500,
    maxFrameBytes: DEFAULT_MAX_PAYLOAD_BYTES,
}

/** How long a graceful close waits for the peer before destroying the socket. */
const CLOSE_GRACE_MS = 250

type SessionFailure = SessionError | FrameError

interface PendingOp {
    kind: 'connect' | 'send' | 'receive'
    reject: (err: SessionFailure) => void
    /** receive only: new bytes arrived. */
    wake?: () => void
}

export class DeviceSession implements DeviceLink {
    public readonly endpoint: DeviceEndpoint
    private readonly cfg: DeviceSessionConfig
    private readonly events: TransportEventSink

    private socket: Socket | null = null
    private _state: SessionState = 'disconnected'
    private readBuffer: Buffer = Buffer.alloc(0)
    private pending: PendingOp | null = null

    /** A failure seen while nothing was pending; thrown by the next call. */
    private deferredFailure: SessionFailure | null = null

    constructor(
        endpoint: DeviceEndpoint,
        cfg: Partial<DeviceSessionConfig> = {},
        deps: { events?: TransportEventSink } = {}
    ) {
        this.endpoint = endpoint
        this.cfg = { ...DEFAULT_SESSION_CONFIG, ...cfg }
        this.events = deps.events ?? NoopEventSink
    }

    public get state(): SessionState {
        return this._state
    }

    public get isConnected(): boolean {
        return this._state === 'connected' || this._state === 'sending' || this._state === 'receiving'
    }

    /** Pipelined frames may sit in the buffer, but never more than two maximum frames' worth. */
    private get maxBufferedBytes(): number {
        return 2 * (FRAME_HEADER_LENGTH + this.cfg.maxFrameBytes)
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    public async connect(timeoutMs = this.cfg.connectTimeoutMs): Promise<void> {
        if (this._state !== 'disconnected') {
            throw this.error('IO_ERROR', `connect() called while ${this._state}`)
        }

        const { host, port } = this.endpoint
        this.readBuffer = Buffer.alloc(0)
        this.deferredFailure = null
        this.transition('connecting')

        await new Promise<void>((resolve, reject) => {
            const socket = createConnection({ host, port })
            this.socket = socket

            let settled = false
            const settle = (err?: SessionFailure) => {
                if (settled) return
                settled = true
                clearTimeout(timer)
                socket.off('connect', onConnect)
                socket.off('error', onError)
                if (this.pending?.kind === 'connect') this.pending = null
                if (err) reject(err)
                else resolve()
            }

            const onConnect = () => {
                this.attach(socket)
                this.transition('connected')
                settle()
            }

            const onError = (err: Error) => {
                const code: SessionErrorCode =
                    systemErrorCode(err) === 'ECONNREFUSED' ? 'CONNECT_REFUSED'
                        : systemErrorCode(err) === 'ETIMEDOUT' ? 'CONNECT_TIMEOUT'
                        : 'IO_ERROR'
                const failure = this.error(code, `connect to ${host}:${port} failed: ${err.message}`, err)
                this.abandon(socket, code)
                settle(failure)
            }

            const timer = setTimeout(() => {
                const failure = this.error('CONNECT_TIMEOUT', `connect to ${host}:${port} timed out after ${timeoutMs}ms`)
                this.abandon(socket, 'CONNECT_TIMEOUT')
                settle(failure)
            }, timeoutMs)

            this.pending = { kind: 'connect', reject: (err) => settle(err) }
            socket.once('connect', onConnect)
            socket.once('error', onError)
        })
    }

    public async send(frame: Buffer, timeoutMs = this.cfg.sendTimeoutMs): Promise<void> {
        const socket = this.requireIdle()
        const started = Date.now()
        this.transition('sending')

        await new Promise<void>((resolve, reject) => {
            let settled = false
            const settle = (err?: SessionFailure) => {
                if (settled) return
                settled = true
                clearTimeout(timer)
                if (this.pending?.kind === 'send') this.pending = null
                if (err) reject(err)
                else resolve()
            }

            const timer = setTimeout(() => {
                const failure = this.error('SEND_TIMEOUT', `write of ${frame.length} bytes timed out after ${timeoutMs}ms`)
                this.abandon(socket, 'SEND_TIMEOUT')
                settle(failure)
            }, timeoutMs)

            this.pending = { kind: 'send', reject: (err) => settle(err) }

            socket.write(frame, (err?: Error | null) => {
                if (settled) return
                if (err) {
                    const failure = this.error(this.socketErrorCode(err), `write failed: ${err.message}`, err)
                    this.abandon(socket, failure.code)
                    settle(failure)
                    return
                }
                settle()
            })
        })

        if (this._state === 'sending') this.transition('connected')

        this.events.publish({
            kind: 'packet-sent',
            at: Date.now(),
            deviceId: this.endpoint.deviceId,
            bytes: frame.length,
            hex: toHex(frame),
            elapsedMs: Date.now() - started,
        })
    }

    /**
     * Resolve with the payload of the next complete frame.
     *
     * Frames already buffered are returned even if the peer has since closed.
     * A fatal framing error tears the connection down and is rethrown.
     */
    public async receive(timeoutMs = this.cfg.recvTimeoutMs): Promise<Buffer> {
        const started = Date.now()

        const buffered = this.takeFrame(started)
        if (buffered) return buffered

        this.requireIdle()
        this.transition('receiving')

        const deadline = started + timeoutMs
        for (;;) {
            await this.waitForData(deadline - Date.now())
            const payload = this.takeFrame(started)
            if (payload) {
                if (this._state === 'receiving') this.transition('connected')
                return payload
            }
        }
    }

    public async close(): Promise<void> {
        if (this._state === 'disconnected' || this._state === 'closing') return

        const wasConnecting = this._state === 'connecting'
        const socket = this.socket
        this.socket = null
        this.transition('closing')

        const pending = this.pending
        this.pending = null
        pending?.reject(this.error('IO_ERROR', 'session closed locally'))

        if (socket && !socket.destroyed) {
            if (wasConnecting) {
                socket.destroy()
            } else {
                await new Promise<void>((resolve) => {
                    const timer = setTimeout(() => {
                        socket.destroy()
                        resolve()
                    }, CLOSE_GRACE_MS)
                    socket.once('close', () => {
                        clearTimeout(timer)
                        resolve()
                    })
                    socket.end()
                })
            }
        }

        this.transition('disconnected')
    }

    /* ---------------------------------------------------------------------- */
    /*  Socket wiring                                                         */
    /* ---------------------------------------------------------------------- */

    private attach(socket: Socket): void {
        socket.on('data', (chunk: Buffer) => this.onData(socket, chunk))
        socket.on('error', (err: Error) => this.onSocketError(socket, err))
        socket.on('close', () => this.onSocketClose(socket))
    }

    private onData(socket: Socket, chunk: Buffer): void {
        if (socket !== this.socket) return

        this.readBuffer = this.readBuffer.length === 0 ? chunk : Buffer.concat([this.readBuffer, chunk])

        if (this.readBuffer.length > this.maxBufferedBytes) {
            this.fail(new FrameError({
                code: 'FRAME_TOO_LARGE',
                message: `read buffer exceeded ${this.maxBufferedBytes} bytes`,
                data: this.readBuffer,
            }))
            return
        }

        this.pending?.wake?.()
    }

    private onSocketError(socket: Socket, err: Error): void {
        if (socket !== this.socket) return
        this.fail(this.error(this.socketErrorCode(err), `socket error: ${err.message}`, err))
    }

    private onSocketClose(socket: Socket): void {
        if (socket !== this.socket) return
        this.fail(this.error('PEER_CLOSED', 'peer closed the connection'))
    }

    /** Tear down after an asynchronous failure and hand it to whoever is waiting. */
    private fail(failure: SessionFailure): void {
        const socket = this.socket
        this.socket = null
        if (socket && !socket.destroyed) socket.destroy()
        this.transition('disconnected', failure.code)

        const pending = this.pending
        this.pending = null
        if (pending) pending.reject(failure)
        else this.deferredFailure = failure
    }

    /** Drop a socket we have given up on (timeouts, write errors, connect errors). */
    private abandon(socket: Socket, code: SessionFailure['code']): void {
        // late 'error' events from a destroyed socket have nowhere to go
        socket.on('error', () => undefined)
        if (this.socket === socket) this.socket = null
        if (!socket.destroyed) socket.destroy()
        this.transition('disconnected', code)
    }

    /* ---------------------------------------------------------------------- */
    /*  Read path                                                             */
    /* ---------------------------------------------------------------------- */

    private waitForData(timeoutMs: number): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            let settled = false
            const settle = (err?: SessionFailure) => {
                if (settled) return
                settled = true
                clearTimeout(timer)
                if (this.pending?.kind === 'receive') this.pending = null
                if (err) reject(err)
                else resolve()
            }

            const timer = setTimeout(() => {
                const failure = this.error('RECV_TIMEOUT', `no complete frame within ${timeoutMs}ms`)
                const socket = this.socket
                if (socket) this.abandon(socket, 'RECV_TIMEOUT')
                else this.transition('disconnected', 'RECV_TIMEOUT')
                settle(failure)
            }, Math.max(0, timeoutMs))

            this.pending = {
                kind: 'receive',
                reject: (err) => settle(err),
                wake: () => settle(),
            }
        })
    }

    /** Decode one buffered frame, or return null if more bytes are needed. */
    private takeFrame(started: number): Buffer | null {
        if (this.readBuffer.length === 0) return null

        let decoded: { payload: Buffer; bytesConsumed: number }
        try {
            decoded = decodeFrame(this.readBuffer, this.cfg.maxFrameBytes)
        } catch (err) {
            if (err instanceof FrameError && err.recoverable) return null
            if (err instanceof FrameError) {
                this.events.publish({
                    kind: 'frame-error',
                    at: Date.now(),
                    deviceId: this.endpoint.deviceId,
                    code: err.code,
                    message: err.message,
                })
                const socket = this.socket
                if (socket) this.abandon(socket, err.code)
                else this.transition('disconnected', err.code)
                this.readBuffer = Buffer.alloc(0)
            }
            throw err
        }

        const raw = this.readBuffer.subarray(0, decoded.bytesConsumed)
        this.events.publish({
            kind: 'packet-received',
            at: Date.now(),
            deviceId: this.endpoint.deviceId,
            bytes: raw.length,
            hex: toHex(raw),
            elapsedMs: Date.now() - started,
        })

        this.readBuffer = Buffer.from(this.readBuffer.subarray(decoded.bytesConsumed))
        return decoded.payload
    }

    /* ---------------------------------------------------------------------- */
    /*  Helpers                                                               */
    /* ---------------------------------------------------------------------- */

    private requireIdle(): Socket {
        if (this.socket && this._state === 'connected') return this.socket

        const failure = this.deferredFailure
        if (failure) {
            this.deferredFailure = null
            throw failure
        }
        throw this.error('IO_ERROR', `session for ${this.endpoint.deviceId} is ${this._state}`)
    }

    private transition(to: SessionState, error?: SessionFailure['code']): void {
        const from = this._state
        if (from === to) return
        this._state = to
        this.events.publish({
            kind: 'session-state',
            at: Date.now(),
            deviceId: this.endpoint.deviceId,
            from,
            to,
            error,
        })
    }

    private socketErrorCode(err: Error): SessionErrorCode {
        const sys = systemErrorCode(err)
        return sys === 'ECONNRESET' || sys === 'EPIPE' ? 'PEER_CLOSED' : 'IO_ERROR'
    }

    private error(code: SessionErrorCode, message: string, cause?: unknown): SessionError {
        return new SessionError({
            code,
            message,
            deviceId: this.endpoint.deviceId,
            sysCode: systemErrorCode(cause),
            cause,
        })
    }
}
