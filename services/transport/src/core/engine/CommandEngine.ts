/* -------------------------------------------------------------------------- */
/*  CommandEngine                                                             */
/*                                                                            */
/*  Responsibilities:                                                         */
/*  - Admit commands into per-device bounded queues                           */
/*  - Run one command at a time per device, devices in parallel               */
/*  - Send, await the correlated ACK/NACK, retry recoverable failures with    */
/*    backoff, consult the idempotency cache before every attempt             */
/*  - Resolve every handle with exactly one terminal outcome                  */
/*                                                                            */
/*  The engine never throws for a device failure: callers only ever see a     */
/*  CommandOutcome.                                                           */
/* -------------------------------------------------------------------------- */

import {
    FrameError,
    encodeCommandPayload,
    encodeFrame,
    isMsgId,
    isOpcode,
    parseResponsePayload,
    type FrameErrorCode,
    type ResponsePayload,
} from '../codec/index.js'
import { NoopEventSink, type TransportEvent, type TransportEventSink } from '../events/types.js'
import { IdempotencyCache } from '../idempotency/index.js'
import { CommandQueues, type CommandQueue } from '../queue/index.js'
import {
    DeviceSession,
    SessionError,
    type DeviceEndpoint,
    type DeviceLink,
    type DeviceSessionConfig,
    type SessionErrorCode,
} from '../session/index.js'
import { assertValidTransportConfig } from '../../config/validate.js'
import { mergeTransportConfig, type TransportConfigOverrides } from '../../config/defaults.js'
import type { TransportConfig } from '../../config/types.js'
import { computeBackoffDelay } from './backoff.js'
import type {
    AttemptOutcome,
    AttemptRecord,
    CommandHandle,
    CommandOutcome,
    CommandRequest,
    CommandState,
    FailureReason,
} from './types.js'
import { makeMsgId, sleep } from './utils.js'

export type SessionFactory = (
    endpoint: DeviceEndpoint,
    cfg: DeviceSessionConfig,
    events: TransportEventSink
) => DeviceLink

export interface CommandEngineDeps {
    events?: TransportEventSink
    cache?: IdempotencyCache
    createSession?: SessionFactory
    /** [0, 1) source for backoff jitter. */
    random?: () => number
}

export type ResponseDisposition = 'late' | 'duplicate' | 'uncorrelated'

/* -------------------------------------------------------------------------- */
/*  Classification tables                                                      */
/* -------------------------------------------------------------------------- */

const SESSION_REASONS: Record<SessionErrorCode, FailureReason> = {
    CONNECT_TIMEOUT: 'ConnectTimeout',
    CONNECT_REFUSED: 'ConnectRefused',
    SEND_TIMEOUT: 'SendTimeout',
    RECV_TIMEOUT: 'RecvTimeout',
    PEER_CLOSED: 'PeerClosed',
    IO_ERROR: 'IOError',
}

const FRAME_REASONS: Record<FrameErrorCode, FailureReason> = {
    BAD_MAGIC: 'BadMagic',
    UNSUPPORTED_VERSION: 'UnsupportedVersion',
    FRAME_TOO_LARGE: 'FrameTooLarge',
    MALFORMED_PAYLOAD: 'MalformedPayload',
    // never escapes a session; treated like any other I/O fault if it does
    TRUNCATED_FRAME: 'IOError',
}

const RECOVERABLE: ReadonlySet<FailureReason> = new Set<FailureReason>([
    'ConnectTimeout',
    'ConnectRefused',
    'SendTimeout',
    'RecvTimeout',
    'PeerClosed',
    'IOError',
])

const TIMEOUTS: ReadonlySet<FailureReason> = new Set<FailureReason>([
    'ConnectTimeout',
    'SendTimeout',
    'RecvTimeout',
])

/** Terminal states kept for getState() after a command is released. */
const COMPLETED_HISTORY = 1000

/* -------------------------------------------------------------------------- */
/*  Internal bookkeeping                                                       */
/* -------------------------------------------------------------------------- */

interface ActiveCommand {
    msgId: string
    deviceId: string
    request: CommandRequest
    frame: Buffer
    submittedAt: number
    state: CommandState
    attempts: AttemptRecord[]
    abort: AbortController
    abortReason?: 'Cancelled' | 'DeadlineExceeded'
    abortDetail?: string
    /** Session carrying the current attempt, if any. */
    session: DeviceLink | null
    /** A response that arrived outside the attempt that sent it. */
    lateResponse?: ResponsePayload
    deadlineTimer: NodeJS.Timeout | null
    settled: boolean
    resolve: (outcome: CommandOutcome) => void
}

interface DeviceLane {
    deviceId: string
    queue: CommandQueue<ActiveCommand>
    current: ActiveCommand | null
    /** Connected session kept between commands when reuseConnection is on. */
    session: DeviceLink | null
    pumping: Promise<void> | null
}

type AttemptResult =
    | { kind: 'ack'; response: ResponsePayload }
    | { kind: 'nack'; response: ResponsePayload }
    | { kind: 'failure'; reason: FailureReason; detail: string }

type Verdict =
    | { status: 'success'; deduplicated: boolean; response?: ResponsePayload }
    | { status: 'failed'; reason: FailureReason; detail?: string; response?: ResponsePayload }

/* -------------------------------------------------------------------------- */
/*  Engine                                                                     */
/* -------------------------------------------------------------------------- */

export class CommandEngine {
    public readonly config: TransportConfig

    private readonly events: TransportEventSink
    private readonly cache: IdempotencyCache
    private readonly createSession: SessionFactory
    private readonly random: () => number

    private readonly queues: CommandQueues<ActiveCommand>
    private readonly lanes = new Map<string, DeviceLane>()
    private readonly commands = new Map<string, ActiveCommand>()
    private readonly completed = new Map<string, CommandState>()
    private stopped = false
    private sinkFailures = 0

    /** Sessions publish through the engine so their sink failures are counted too. */
    private readonly sessionEvents: TransportEventSink = {
        publish: (evt) => this.publish(evt),
    }

    /**
     * @throws ConfigError when the merged config is invalid; nothing is
     * validated after construction.
     */
    constructor(config: TransportConfigOverrides = {}, deps: CommandEngineDeps = {}) {
        this.config = assertValidTransportConfig(mergeTransportConfig(config))
        this.events = deps.events ?? NoopEventSink
        this.cache = deps.cache ?? new IdempotencyCache(this.config.idempotency)
        this.createSession = deps.createSession
            ?? ((endpoint, cfg, events) => new DeviceSession(endpoint, cfg, { events }))
        this.random = deps.random ?? Math.random
        this.queues = new CommandQueues<ActiveCommand>(this.config.queue)
    }

    get idempotency(): IdempotencyCache {
        return this.cache
    }

    /** Events the injected sink threw on; wrap sinks in FanoutEventSink to see why. */
    get droppedEvents(): number {
        return this.sinkFailures
    }

    /* ---------------------------------------------------------------------- */
    /*  Public API                                                            */
    /* ---------------------------------------------------------------------- */

    /**
     * Admit a command. The handle's `done` promise always resolves, with
     * `status: 'failed'` for every failure including a full queue.
     *
     * @throws TypeError on an unknown opcode or a malformed caller-supplied msgId.
     * @throws Error when the msgId belongs to a command still in flight.
     */
    submit(request: CommandRequest): CommandHandle {
        if (!isOpcode(request.opcode)) {
            throw new TypeError(`unknown opcode "${String(request.opcode)}"`)
        }
        if (request.msgId !== undefined && !isMsgId(request.msgId)) {
            throw new TypeError(`msgId must be 1-64 hex chars (got "${request.msgId}")`)
        }

        const msgId = request.msgId?.toLowerCase() ?? makeMsgId()
        if (this.commands.has(msgId)) {
            throw new Error(`msgId ${msgId} is already in flight`)
        }

        const deviceId = request.device.deviceId
        const submittedAt = Date.now()

        let resolveDone: (outcome: CommandOutcome) => void = () => undefined
        const done = new Promise<CommandOutcome>((resolve) => {
            resolveDone = resolve
        })

        const cmd: ActiveCommand = {
            msgId,
            deviceId,
            request,
            frame: Buffer.alloc(0),
            submittedAt,
            state: 'created',
            attempts: [],
            abort: new AbortController(),
            session: null,
            deadlineTimer: null,
            settled: false,
            resolve: resolveDone,
        }
        this.commands.set(msgId, cmd)

        const handle: CommandHandle = {
            msgId,
            deviceId,
            submittedAt,
            done,
            cancel: (reason?: string) => this.abortCommand(cmd, 'Cancelled', reason ?? 'cancelled by caller'),
        }

        if (this.stopped) {
            this.finish(cmd, { status: 'failed', reason: 'Cancelled', detail: 'engine stopped' })
            return handle
        }

        try {
            cmd.frame = encodeFrame(
                encodeCommandPayload({
                    opcode: request.opcode,
                    device_id: deviceId,
                    msg_id: msgId,
                    state: request.desiredState,
                }),
                this.config.session.maxFrameBytes
            )
        } catch (err) {
            this.finish(cmd, this.failureVerdict(this.classify(err)))
            return handle
        }

        cmd.deadlineTimer = setTimeout(() => {
            this.abortCommand(cmd, 'DeadlineExceeded', `no outcome within ${this.config.commandDeadlineMs}ms`)
        }, this.config.commandDeadlineMs)

        void this.admit(this.lane(deviceId), cmd)
        return handle
    }

    /**
     * Hand the engine a response that arrived outside the attempt that sent
     * it. An ACK or NACK for a command that has already put a frame on the
     * wire and is awaiting a response or a retry is recorded in the
     * idempotency cache, where the next pre-attempt lookup finds it. Anything
     * else, including a response for a command still queued, is discarded.
     *
     * @throws FrameError MALFORMED_PAYLOAD when given raw bytes that do not parse.
     */
    acceptResponse(deviceId: string, payload: ResponsePayload | Uint8Array): ResponseDisposition {
        const response = payload instanceof Uint8Array ? parseResponsePayload(payload) : payload
        const msgId = response.msg_id.toLowerCase()
        const cmd = this.commands.get(msgId)

        if (
            cmd
            && !cmd.settled
            && (cmd.state === 'awaiting-response' || cmd.state === 'retry')
            && cmd.attempts.some((a) => a.sentAt !== null)
            && cmd.deviceId === deviceId
            && response.opcode === cmd.request.opcode
            && !this.cache.has(msgId)
        ) {
            this.cache.record(msgId, response.status === 'ack' ? 'SUCCESS' : 'NACK')
            cmd.lateResponse = response
            this.publish({ kind: 'late-response', at: Date.now(), msgId, deviceId })
            return 'late'
        }

        return this.discard(deviceId, response, this.lanes.get(deviceId)?.current?.msgId)
    }

    /** Current state of a command; terminal states stay visible for a while after release. */
    getState(msgId: string): CommandState | undefined {
        const key = msgId.toLowerCase()
        return this.commands.get(key)?.state ?? this.completed.get(key)
    }

    /** Commands submitted and not yet terminal. */
    pendingCount(): number {
        return this.commands.size
    }

    /** Cancel every command, close every queue and session. Safe to call twice. */
    async stop(): Promise<void> {
        this.stopped = true

        for (const cmd of [...this.commands.values()]) {
            this.abortCommand(cmd, 'Cancelled', 'engine stopped')
        }
        this.queues.closeAll()

        const lanes = [...this.lanes.values()]
        await Promise.all(lanes.map((lane) => lane.pumping ?? Promise.resolve()))
        await Promise.all(lanes.map((lane) => this.dropLaneSession(lane)))
        this.lanes.clear()
    }

    /* ---------------------------------------------------------------------- */
    /*  Admission + per-device pump                                           */
    /* ---------------------------------------------------------------------- */

    private lane(deviceId: string): DeviceLane {
        let lane = this.lanes.get(deviceId)
        if (!lane) {
            lane = {
                deviceId,
                queue: this.queues.get(deviceId),
                current: null,
                session: null,
                pumping: null,
            }
            this.lanes.set(deviceId, lane)
        }
        return lane
    }

    private async admit(lane: DeviceLane, cmd: ActiveCommand): Promise<void> {
        const result = await lane.queue.enqueue(cmd)

        if (cmd.settled) {
            // cancelled or expired while parked on a full queue
            if (result.accepted) lane.queue.remove((c) => c === cmd)
            return
        }

        if (!result.accepted) {
            this.publish({
                kind: 'command-rejected',
                at: Date.now(),
                msgId: cmd.msgId,
                deviceId: cmd.deviceId,
                reason: result.reason,
            })
            this.finish(cmd, result.reason === 'queue-full'
                ? { status: 'failed', reason: 'QueueFull', detail: `queue for ${cmd.deviceId} is full` }
                : { status: 'failed', reason: 'Cancelled', detail: 'queue closed' })
            return
        }

        if (result.dropped) {
            this.publish({
                kind: 'command-dropped',
                at: Date.now(),
                msgId: result.dropped.msgId,
                deviceId: cmd.deviceId,
                replacedBy: cmd.msgId,
            })
            this.finish(result.dropped, {
                status: 'failed',
                reason: 'Dropped',
                detail: `evicted from a full queue by ${cmd.msgId}`,
            })
        }

        this.markQueued(lane, cmd)
        this.pump(lane)
    }

    private markQueued(lane: DeviceLane, cmd: ActiveCommand): void {
        if (cmd.state !== 'created') return
        this.transition(cmd, 'queued')
        this.publish({
            kind: 'command-queued',
            at: Date.now(),
            msgId: cmd.msgId,
            deviceId: cmd.deviceId,
            depth: lane.queue.size,
        })
    }

    private pump(lane: DeviceLane): void {
        if (lane.pumping) return

        lane.pumping = (async () => {
            for (;;) {
                const cmd = lane.queue.tryDequeue()
                if (!cmd) break
                if (cmd.settled) continue

                this.markQueued(lane, cmd)
                lane.current = cmd
                const verdict = await this.runCommand(lane, cmd)
                    .catch((err: unknown) => this.failureVerdict(this.classify(err)))
                lane.current = null
                this.finish(cmd, verdict)
            }
        })().finally(() => {
            lane.pumping = null
        })
    }

    /* ---------------------------------------------------------------------- */
    /*  Attempt loop                                                          */
    /* ---------------------------------------------------------------------- */

    private async runCommand(lane: DeviceLane, cmd: ActiveCommand): Promise<Verdict> {
        const { retry } = this.config
        let last: { reason: FailureReason; detail: string } | null = null
        let allTimeouts = true

        for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
            if (cmd.abort.signal.aborted) return this.abortedVerdict(cmd)

            const recorded = this.cache.lookup(cmd.msgId)
            if (recorded === 'SUCCESS') {
                this.publish({
                    kind: 'dedup-hit',
                    at: Date.now(),
                    msgId: cmd.msgId,
                    deviceId: cmd.deviceId,
                    beforeAttempt: attempt,
                })
                this.recordAttempt(cmd, { attemptNumber: attempt, sentAt: null, outcome: 'deduplicated', elapsedMs: 0 })
                return { status: 'success', deduplicated: true, response: cmd.lateResponse }
            }
            if (recorded === 'NACK') {
                return {
                    status: 'failed',
                    reason: 'Nack',
                    detail: cmd.lateResponse?.reason ?? 'device already rejected this msgId',
                    response: cmd.lateResponse,
                }
            }

            const result = await this.runAttempt(lane, cmd, attempt)

            if (result.kind === 'ack') {
                this.cache.record(cmd.msgId, 'SUCCESS')
                return { status: 'success', deduplicated: false, response: result.response }
            }
            if (result.kind === 'nack') {
                this.cache.record(cmd.msgId, 'NACK')
                return {
                    status: 'failed',
                    reason: 'Nack',
                    detail: result.response.reason ?? 'device rejected the command',
                    response: result.response,
                }
            }

            if (cmd.abort.signal.aborted) return this.abortedVerdict(cmd)
            if (!RECOVERABLE.has(result.reason)) {
                return { status: 'failed', reason: result.reason, detail: result.detail }
            }

            last = result
            if (!TIMEOUTS.has(result.reason)) allTimeouts = false

            if (attempt < retry.maxAttempts) {
                const delayMs = computeBackoffDelay(retry, attempt, this.random)
                this.transition(cmd, 'retry')
                this.publish({
                    kind: 'retry-scheduled',
                    at: Date.now(),
                    msgId: cmd.msgId,
                    deviceId: cmd.deviceId,
                    nextAttempt: attempt + 1,
                    delayMs,
                    reason: result.reason,
                })
                await sleep(delayMs, cmd.abort.signal)
            }
        }

        if (cmd.abort.signal.aborted) return this.abortedVerdict(cmd)

        // one last look: a late ACK may have landed after the final attempt gave up
        if (this.cache.has(cmd.msgId) && this.cache.lookup(cmd.msgId) === 'SUCCESS') {
            this.publish({
                kind: 'dedup-hit',
                at: Date.now(),
                msgId: cmd.msgId,
                deviceId: cmd.deviceId,
                beforeAttempt: retry.maxAttempts + 1,
            })
            return { status: 'success', deduplicated: true, response: cmd.lateResponse }
        }

        const attempts = cmd.attempts.length
        if (allTimeouts) {
            return {
                status: 'failed',
                reason: 'AllAttemptsTimedOut',
                detail: `${attempts} attempt(s) timed out${last ? `; last: ${last.detail}` : ''}`,
            }
        }
        return {
            status: 'failed',
            reason: last?.reason ?? 'IOError',
            detail: last?.detail,
        }
    }

    private async runAttempt(lane: DeviceLane, cmd: ActiveCommand, attemptNumber: number): Promise<AttemptResult> {
        const started = Date.now()
        let sentAt: number | null = null
        let result: AttemptResult

        try {
            const session = await this.acquireSession(lane, cmd)

            await session.send(cmd.frame, this.config.session.sendTimeoutMs)
            sentAt = Date.now()
            this.transition(cmd, 'sent')
            this.transition(cmd, 'awaiting-response')

            const response = await this.awaitResponse(session, cmd, sentAt)
            result = response.status === 'ack'
                ? { kind: 'ack', response }
                : { kind: 'nack', response }
        } catch (err) {
            result = this.classify(err)
        }

        const keep = result.kind !== 'failure' && this.config.reuseConnection && !cmd.abort.signal.aborted
        if (!keep) await this.dropLaneSession(lane)
        cmd.session = null

        this.recordAttempt(cmd, {
            attemptNumber,
            sentAt,
            outcome: this.attemptOutcome(cmd, result),
            elapsedMs: Date.now() - started,
            error: result.kind === 'failure' ? result.reason : undefined,
        })

        return result
    }

    /** Read frames until the one correlated with `cmd`; everything else is discarded. */
    private async awaitResponse(session: DeviceLink, cmd: ActiveCommand, sentAt: number): Promise<ResponsePayload> {
        const { recvTimeoutMs } = this.config.session

        for (;;) {
            const remaining = recvTimeoutMs - (Date.now() - sentAt)
            if (remaining <= 0) {
                // stray frames used up the window; same as hearing nothing
                await session.close()
                throw new SessionError({
                    code: 'RECV_TIMEOUT',
                    message: `no correlated response within ${recvTimeoutMs}ms`,
                    deviceId: cmd.deviceId,
                })
            }

            const response = parseResponsePayload(await session.receive(remaining))

            const sameDevice = response.device_id === undefined || response.device_id === cmd.deviceId
            if (response.msg_id === cmd.msgId && response.opcode === cmd.request.opcode && sameDevice) {
                return response
            }

            this.discard(cmd.deviceId, response, cmd.msgId)
        }
    }

    private async acquireSession(lane: DeviceLane, cmd: ActiveCommand): Promise<DeviceLink> {
        const endpoint = cmd.request.device
        const kept = lane.session

        if (
            kept
            && kept.isConnected
            && kept.endpoint.host === endpoint.host
            && kept.endpoint.port === endpoint.port
        ) {
            cmd.session = kept
            return kept
        }

        await this.dropLaneSession(lane)

        const session = this.createSession(endpoint, this.config.session, this.sessionEvents)
        lane.session = session
        cmd.session = session
        await session.connect(this.config.session.connectTimeoutMs)
        return session
    }

    /* ---------------------------------------------------------------------- */
    /*  Termination                                                           */
    /* ---------------------------------------------------------------------- */

    private abortCommand(cmd: ActiveCommand, reason: 'Cancelled' | 'DeadlineExceeded', detail: string): boolean {
        if (cmd.settled || cmd.abort.signal.aborted) return false

        cmd.abortReason = reason
        cmd.abortDetail = detail
        cmd.abort.abort()

        const lane = this.lanes.get(cmd.deviceId)
        if (lane?.current !== cmd) {
            // not dequeued yet: nothing on the wire to unwind
            lane?.queue.remove((c) => c === cmd)
            this.finish(cmd, { status: 'failed', reason, detail })
            return true
        }

        const session = cmd.session
        if (session) void this.closeSession(session, cmd.deviceId)
        return true
    }

    private abortedVerdict(cmd: ActiveCommand): Verdict {
        return {
            status: 'failed',
            reason: cmd.abortReason ?? 'Cancelled',
            detail: cmd.abortDetail,
        }
    }

    private finish(cmd: ActiveCommand, verdict: Verdict): void {
        if (cmd.settled) return
        cmd.settled = true

        if (cmd.deadlineTimer) clearTimeout(cmd.deadlineTimer)
        cmd.deadlineTimer = null
        if (this.commands.get(cmd.msgId) === cmd) this.commands.delete(cmd.msgId)

        this.transition(cmd, verdict.status)
        this.completed.set(cmd.msgId, verdict.status)
        if (this.completed.size > COMPLETED_HISTORY) {
            const oldest = this.completed.keys().next()
            if (!oldest.done) this.completed.delete(oldest.value)
        }

        const completedAt = Date.now()
        const base = {
            msgId: cmd.msgId,
            deviceId: cmd.deviceId,
            opcode: cmd.request.opcode,
            desiredState: cmd.request.desiredState,
            attempts: cmd.attempts,
            submittedAt: cmd.submittedAt,
            completedAt,
        }

        const outcome: CommandOutcome = verdict.status === 'success'
            ? { ...base, status: 'success', deduplicated: verdict.deduplicated, response: verdict.response }
            : { ...base, status: 'failed', reason: verdict.reason, detail: verdict.detail, response: verdict.response }

        this.publish({
            kind: 'command-completed',
            at: completedAt,
            msgId: cmd.msgId,
            deviceId: cmd.deviceId,
            status: verdict.status,
            reason: verdict.status === 'failed' ? verdict.reason : undefined,
            detail: verdict.status === 'failed' ? verdict.detail : undefined,
            attempts: cmd.attempts.filter((a) => a.sentAt !== null).length,
            deduplicated: verdict.status === 'success' && verdict.deduplicated,
            elapsedMs: completedAt - cmd.submittedAt,
        })

        cmd.resolve(outcome)
    }

    /* ---------------------------------------------------------------------- */
    /*  Helpers                                                               */
    /* ---------------------------------------------------------------------- */

    private discard(deviceId: string, response: ResponsePayload, expectedMsgId: string | undefined): ResponseDisposition {
        const msgId = response.msg_id.toLowerCase()
        if (this.cache.has(msgId)) {
            this.publish({ kind: 'duplicate-response', at: Date.now(), msgId, deviceId })
            return 'duplicate'
        }
        this.publish({
            kind: 'uncorrelated-response',
            at: Date.now(),
            msgId,
            deviceId,
            expectedMsgId,
            opcode: response.opcode,
        })
        return 'uncorrelated'
    }

    private classify(err: unknown): { kind: 'failure'; reason: FailureReason; detail: string } {
        if (err instanceof SessionError) {
            return { kind: 'failure', reason: SESSION_REASONS[err.code], detail: err.message }
        }
        if (err instanceof FrameError) {
            return { kind: 'failure', reason: FRAME_REASONS[err.code], detail: err.message }
        }
        return { kind: 'failure', reason: 'IOError', detail: err instanceof Error ? err.message : String(err) }
    }

    private failureVerdict(failure: { reason: FailureReason; detail: string }): Verdict {
        return { status: 'failed', reason: failure.reason, detail: failure.detail }
    }

    private attemptOutcome(cmd: ActiveCommand, result: AttemptResult): AttemptOutcome {
        if (result.kind === 'ack') return 'success'
        if (result.kind === 'nack') return 'nack'
        if (cmd.abort.signal.aborted) return 'cancelled'
        return TIMEOUTS.has(result.reason) ? 'timeout' : 'error'
    }

    private recordAttempt(cmd: ActiveCommand, record: AttemptRecord): void {
        cmd.attempts.push(record)
        this.publish({
            kind: 'attempt',
            at: Date.now(),
            msgId: cmd.msgId,
            deviceId: cmd.deviceId,
            attemptNumber: record.attemptNumber,
            outcome: record.outcome,
            elapsedMs: record.elapsedMs,
            error: record.error,
        })
    }

    private transition(cmd: ActiveCommand, to: CommandState): void {
        const from = cmd.state
        if (from === to) return
        cmd.state = to
        this.publish({ kind: 'command-state', at: Date.now(), msgId: cmd.msgId, deviceId: cmd.deviceId, from, to })
    }

    private async dropLaneSession(lane: DeviceLane): Promise<void> {
        const session = lane.session
        lane.session = null
        if (session) await this.closeSession(session, lane.deviceId)
    }

    private async closeSession(session: DeviceLink, deviceId: string): Promise<void> {
        try {
            await session.close()
        } catch (err) {
            this.publish({
                kind: 'engine-error',
                at: Date.now(),
                deviceId,
                message: `session close failed: ${err instanceof Error ? err.message : String(err)}`,
            })
        }
    }

    private publish(evt: TransportEvent): void {
        try {
            this.events.publish(evt)
        } catch {
            this.sinkFailures += 1
        }
    }
}
