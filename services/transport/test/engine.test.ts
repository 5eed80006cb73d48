import { afterEach, describe, expect, it } from 'vitest'

import type { TransportConfigOverrides } from '../src/config/index.js'
import { encodeResponsePayload } from '../src/core/codec/index.js'
import { CommandEngine, type ResponseDisposition } from '../src/core/engine/index.js'
import type { DeviceEndpoint } from '../src/core/session/index.js'
import { EventRecorder, FakeDevice, ack, fakeSessions, nack, silent } from './helpers/fakeDevice.js'

const FAST = {
    session: { connectTimeoutMs: 50, sendTimeoutMs: 50, recvTimeoutMs: 30 },
    retry: { maxAttempts: 2, baseDelayMs: 5, maxDelayMs: 20, jitterFraction: 0.1 },
    commandDeadlineMs: 2000,
} satisfies TransportConfigOverrides

const engines: CommandEngine[] = []

function setup(devices: Record<string, FakeDevice>, overrides: TransportConfigOverrides = {}) {
    const recorder = new EventRecorder()
    const engine = new CommandEngine(
        {
            ...FAST,
            ...overrides,
            session: { ...FAST.session, ...overrides.session },
            retry: { ...FAST.retry, ...overrides.retry },
        },
        // 0.5 puts the jitter term at zero
        { events: recorder, createSession: fakeSessions(devices), random: () => 0.5 }
    )
    engines.push(engine)
    return { engine, recorder }
}

const endpoint = (deviceId = 'lamp-1'): DeviceEndpoint => ({ deviceId, host: '10.0.0.5', port: 9000 })

afterEach(async () => {
    await Promise.all(engines.splice(0).map((e) => e.stop()))
})

describe('CommandEngine delivery', () => {
    it('delivers on the first attempt', async () => {
        const device = new FakeDevice()
        const { engine, recorder } = setup({ 'lamp-1': device })

        const handle = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const outcome = await handle.done

        expect(outcome).toMatchObject({ status: 'success', deduplicated: false, deviceId: 'lamp-1' })
        expect(outcome.response).toMatchObject({ status: 'ack', state: true })
        expect(outcome.attempts.map((a) => a.outcome)).toEqual(['success'])
        expect(device.frames).toEqual([
            { opcode: 'toggle', device_id: 'lamp-1', msg_id: handle.msgId, state: true },
        ])
        expect(recorder.of('command-state').map((e) => e.to)).toEqual([
            'queued',
            'sent',
            'awaiting-response',
            'success',
        ])
        expect(engine.getState(handle.msgId)).toBe('success')
        expect(engine.idempotency.has(handle.msgId)).toBe(true)
        expect(engine.pendingCount()).toBe(0)
        expect(device.closes).toBe(1)
    })

    it('retries a timed-out attempt with the same msgId', async () => {
        const device = new FakeDevice(silent, ack)
        const { engine, recorder } = setup({ 'lamp-1': device })

        const handle = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false })
        const outcome = await handle.done

        expect(outcome.status).toBe('success')
        expect(outcome.attempts.map((a) => [a.outcome, a.error])).toEqual([
            ['timeout', 'RecvTimeout'],
            ['success', undefined],
        ])
        expect(device.frames.map((f) => f.msg_id)).toEqual([handle.msgId, handle.msgId])
        expect(device.connects).toBe(2)
        expect(recorder.of('retry-scheduled')).toMatchObject([
            { nextAttempt: 2, delayMs: 5, reason: 'RecvTimeout' },
        ])
        expect(recorder.of('command-state').map((e) => e.to)).toEqual([
            'queued',
            'sent',
            'awaiting-response',
            'retry',
            'sent',
            'awaiting-response',
            'success',
        ])
    })

    it('gives up with AllAttemptsTimedOut after maxAttempts frames', async () => {
        const device = new FakeDevice(silent, silent, silent, silent)
        const { engine, recorder } = setup({ 'lamp-1': device }, { retry: { maxAttempts: 3 } })

        const handle = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const outcome = await handle.done

        expect(outcome).toMatchObject({ status: 'failed', reason: 'AllAttemptsTimedOut' })
        expect(outcome.status === 'failed' && outcome.detail).toMatch(/^3 attempt\(s\) timed out; last: /)
        expect(device.frames).toHaveLength(3)
        expect(recorder.of('retry-scheduled').map((e) => e.delayMs)).toEqual([5, 10])
        expect(engine.idempotency.has(handle.msgId)).toBe(false)
        expect(engine.getState(handle.msgId)).toBe('failed')
    })

    it('retries a refused connection', async () => {
        const device = new FakeDevice()
        device.refuseConnects = 1
        const { engine, recorder } = setup({ 'lamp-1': device })

        const outcome = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done

        expect(outcome.status).toBe('success')
        expect(outcome.attempts[0]).toMatchObject({ sentAt: null, outcome: 'error', error: 'ConnectRefused' })
        expect(device.frames).toHaveLength(1)
        expect(recorder.of('command-completed')[0]?.attempts).toBe(1)
    })

    it('reports the last failure when not every attempt timed out', async () => {
        const device = new FakeDevice()
        device.refuseConnects = 2
        const { engine } = setup({ 'lamp-1': device })

        const outcome = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done

        expect(outcome).toMatchObject({ status: 'failed', reason: 'ConnectRefused', detail: 'connection refused' })
        expect(device.frames).toHaveLength(0)
    })

    it('fails on NACK without retrying and remembers it', async () => {
        const device = new FakeDevice(nack('busy'))
        const { engine } = setup({ 'lamp-1': device })

        const handle = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const outcome = await handle.done

        expect(outcome).toMatchObject({ status: 'failed', reason: 'Nack', detail: 'busy' })
        expect(outcome.attempts.map((a) => a.outcome)).toEqual(['nack'])
        expect(device.frames).toHaveLength(1)
        expect(engine.idempotency.lookup(handle.msgId)).toBe('NACK')
    })

    it('fails fast on a malformed response', async () => {
        const device = new FakeDevice(() => [Buffer.from('not json')])
        const { engine } = setup({ 'lamp-1': device })

        const outcome = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done

        expect(outcome).toMatchObject({ status: 'failed', reason: 'MalformedPayload' })
        expect(device.frames).toHaveLength(1)
    })

    it('skips responses that belong to another msgId', async () => {
        const stray = { opcode: 'toggle', msg_id: '0badc0de', status: 'ack' } as const
        const device = new FakeDevice((req) => [stray, ...ack(req)])
        const { engine, recorder } = setup({ 'lamp-1': device })

        const handle = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const outcome = await handle.done

        expect(outcome.status).toBe('success')
        expect(recorder.of('uncorrelated-response')).toMatchObject([
            { msgId: '0badc0de', deviceId: 'lamp-1', expectedMsgId: handle.msgId },
        ])
    })
})

describe('CommandEngine idempotency', () => {
    it('does not resend a msgId that already succeeded', async () => {
        const device = new FakeDevice()
        const { engine, recorder } = setup({ 'lamp-1': device })

        const first = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true, msgId: 'abc123' }).done
        const second = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true, msgId: 'ABC123' }).done

        expect(first).toMatchObject({ status: 'success', deduplicated: false, msgId: 'abc123' })
        expect(second).toMatchObject({ status: 'success', deduplicated: true, msgId: 'abc123' })
        expect(second.attempts).toEqual([{ attemptNumber: 1, sentAt: null, outcome: 'deduplicated', elapsedMs: 0 }])
        expect(device.frames).toHaveLength(1)
        expect(recorder.of('dedup-hit')).toMatchObject([{ msgId: 'abc123', beforeAttempt: 1 }])
    })

    it('fails a msgId the device already rejected without sending', async () => {
        const device = new FakeDevice()
        const { engine } = setup({ 'lamp-1': device })
        engine.idempotency.record('beef', 'NACK')

        const outcome = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true, msgId: 'beef' }).done

        expect(outcome).toMatchObject({ status: 'failed', reason: 'Nack', detail: 'device already rejected this msgId' })
        expect(device.connects).toBe(0)
    })

    it('uses a late ACK to skip the retry', async () => {
        const device = new FakeDevice(silent)
        const { engine, recorder } = setup({ 'lamp-1': device })

        let disposition: ResponseDisposition | undefined
        recorder.onEvent = (evt) => {
            if (evt.kind !== 'retry-scheduled') return
            disposition = engine.acceptResponse('lamp-1', {
                opcode: 'toggle',
                msg_id: evt.msgId.toUpperCase(),
                device_id: 'lamp-1',
                status: 'ack',
                state: true,
            })
        }

        const outcome = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done

        expect(disposition).toBe('late')
        expect(outcome).toMatchObject({ status: 'success', deduplicated: true })
        expect(outcome.response).toMatchObject({ status: 'ack', state: true })
        expect(outcome.attempts.map((a) => a.outcome)).toEqual(['timeout', 'deduplicated'])
        expect(device.frames).toHaveLength(1)
        expect(recorder.of('late-response')).toHaveLength(1)
    })

    it('discards a response for a command that is still queued', async () => {
        const device = new FakeDevice(silent)
        const { engine, recorder } = setup({ 'lamp-1': device }, { retry: { maxAttempts: 1 } })

        const a = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const b = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false })
        await new Promise((resolve) => setTimeout(resolve, 5))

        expect(engine.getState(b.msgId)).toBe('queued')
        const disposition = engine.acceptResponse('lamp-1', { opcode: 'toggle', msg_id: b.msgId, status: 'ack' })

        expect(disposition).toBe('uncorrelated')
        expect(engine.idempotency.has(b.msgId)).toBe(false)
        expect(recorder.of('uncorrelated-response')).toMatchObject([{ msgId: b.msgId, expectedMsgId: a.msgId }])

        expect(await b.done).toMatchObject({ status: 'success', deduplicated: false })
        expect(device.frames.map((f) => f.msg_id)).toEqual([a.msgId, b.msgId])
    })

    it('classifies responses with nothing waiting for them', async () => {
        const { engine, recorder } = setup({ 'lamp-1': new FakeDevice() })
        await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true, msgId: 'abc123' }).done

        const duplicate = engine.acceptResponse(
            'lamp-1',
            encodeResponsePayload({ opcode: 'toggle', msg_id: 'abc123', status: 'ack' })
        )
        const unknown = engine.acceptResponse('lamp-1', { opcode: 'toggle', msg_id: 'ffff', status: 'ack' })

        expect(duplicate).toBe('duplicate')
        expect(unknown).toBe('uncorrelated')
        expect(engine.idempotency.has('ffff')).toBe(false)
        expect(recorder.of('duplicate-response')).toMatchObject([{ msgId: 'abc123' }])
    })
})

describe('CommandEngine queueing', () => {
    it('rejects a command when the device queue is full', async () => {
        const device = new FakeDevice()
        const { engine, recorder } = setup({ 'lamp-1': device }, { queue: { maxDepth: 1, overflowPolicy: 'reject-new' } })

        const a = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const b = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false })

        expect(await b.done).toMatchObject({ status: 'failed', reason: 'QueueFull', attempts: [] })
        expect((await a.done).status).toBe('success')
        expect(device.frames.map((f) => f.msg_id)).toEqual([a.msgId])
        expect(recorder.of('command-rejected')).toMatchObject([{ msgId: b.msgId, reason: 'queue-full' }])
    })

    it('evicts the oldest queued command under drop-oldest', async () => {
        const device = new FakeDevice()
        const { engine, recorder } = setup({ 'lamp-1': device }, { queue: { maxDepth: 1, overflowPolicy: 'drop-oldest' } })

        const a = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const b = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false })

        expect(await a.done).toMatchObject({
            status: 'failed',
            reason: 'Dropped',
            detail: `evicted from a full queue by ${b.msgId}`,
        })
        expect((await b.done).status).toBe('success')
        expect(device.frames.map((f) => f.msg_id)).toEqual([b.msgId])
        expect(recorder.of('command-dropped')).toMatchObject([{ msgId: a.msgId, replacedBy: b.msgId }])
    })

    it('parks producers under block-with-timeout and admits them in order', async () => {
        const device = new FakeDevice(silent)
        const { engine } = setup({ 'lamp-1': device }, {
            retry: { maxAttempts: 1 },
            queue: { maxDepth: 1, overflowPolicy: 'block-with-timeout', blockTimeoutMs: 1000 },
        })

        const handles = [true, false, true].map((desiredState) =>
            engine.submit({ device: endpoint(), opcode: 'toggle', desiredState })
        )
        const outcomes = await Promise.all(handles.map((h) => h.done))

        expect(outcomes.map((o) => o.status)).toEqual(['failed', 'success', 'success'])
        expect(device.frames.map((f) => f.msg_id)).toEqual(handles.map((h) => h.msgId))
    })

    it('rejects a parked producer once its wait runs out', async () => {
        const device = new FakeDevice(silent)
        const { engine, recorder } = setup({ 'lamp-1': device }, {
            retry: { maxAttempts: 1 },
            queue: { maxDepth: 1, overflowPolicy: 'block-with-timeout', blockTimeoutMs: 10 },
        })

        const a = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const b = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false })
        const c = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })

        expect(await c.done).toMatchObject({ status: 'failed', reason: 'QueueFull', attempts: [] })
        expect((await b.done).status).toBe('success')
        await a.done
        expect(recorder.of('command-rejected')).toMatchObject([{ msgId: c.msgId, reason: 'queue-full' }])
    })

    it('finishes a cancelled parked producer exactly once', async () => {
        const device = new FakeDevice(silent)
        const { engine, recorder } = setup({ 'lamp-1': device }, {
            retry: { maxAttempts: 1 },
            queue: { maxDepth: 1, overflowPolicy: 'block-with-timeout', blockTimeoutMs: 50 },
        })

        const a = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const b = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false })
        const c = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })

        expect(c.cancel()).toBe(true)
        expect(await c.done).toMatchObject({ status: 'failed', reason: 'Cancelled', attempts: [] })
        await Promise.all([a.done, b.done])
        await new Promise((resolve) => setTimeout(resolve, 60))

        expect(recorder.events.filter((e) => 'msgId' in e && e.msgId === c.msgId).map((e) => e.kind)).toEqual([
            'command-state',
            'command-completed',
        ])
        expect(recorder.of('command-rejected')).toEqual([])
        expect(device.frames.map((f) => f.msg_id)).toEqual([a.msgId, b.msgId])
    })

    it('runs one command at a time per device, in submission order', async () => {
        const device = new FakeDevice()
        const { engine } = setup({ 'lamp-1': device })

        const handles = [true, false, true].map((desiredState) =>
            engine.submit({ device: endpoint(), opcode: 'toggle', desiredState })
        )
        await Promise.all(handles.map((h) => h.done))

        expect(device.frames.map((f) => [f.msg_id, f.state])).toEqual([
            [handles[0]?.msgId, true],
            [handles[1]?.msgId, false],
            [handles[2]?.msgId, true],
        ])
        expect(device.maxOpen).toBe(1)
    })

    it('does not hold one device up behind another', async () => {
        const { engine } = setup({ 'lamp-1': new FakeDevice(silent), 'lamp-2': new FakeDevice() })

        const slow = engine.submit({ device: endpoint('lamp-1'), opcode: 'toggle', desiredState: true })
        const fast = engine.submit({ device: endpoint('lamp-2'), opcode: 'toggle', desiredState: true })

        const first = await Promise.race([slow.done.then(() => 'lamp-1'), fast.done.then(() => 'lamp-2')])
        expect(first).toBe('lamp-2')
        await slow.done
    })

    it('keeps the connection between commands with reuseConnection', async () => {
        const device = new FakeDevice()
        const { engine } = setup({ 'lamp-1': device }, { reuseConnection: true })

        await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done
        await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false }).done

        expect(device.connects).toBe(1)
        expect(device.frames).toHaveLength(2)
        await engine.stop()
        expect(device.open).toBe(0)
    })
})

describe('CommandEngine termination', () => {
    it('cancels a queued command before it is sent', async () => {
        const device = new FakeDevice(silent)
        const { engine } = setup({ 'lamp-1': device }, { retry: { maxAttempts: 1 } })

        const a = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        const b = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: false })

        expect(b.cancel()).toBe(true)
        expect(b.cancel()).toBe(false)
        expect(await b.done).toMatchObject({ status: 'failed', reason: 'Cancelled', detail: 'cancelled by caller', attempts: [] })
        expect(await a.done).toMatchObject({ status: 'failed', reason: 'AllAttemptsTimedOut' })
        expect(device.frames.map((f) => f.msg_id)).toEqual([a.msgId])
    })

    it('cancels an in-flight command by closing its session', async () => {
        const device = new FakeDevice(silent)
        const { engine } = setup({ 'lamp-1': device }, { session: { recvTimeoutMs: 1000 } })

        const handle = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        setTimeout(() => handle.cancel('operator abort'), 20)
        const outcome = await handle.done

        expect(outcome).toMatchObject({ status: 'failed', reason: 'Cancelled', detail: 'operator abort' })
        expect(outcome.attempts.map((a) => a.outcome)).toEqual(['cancelled'])
        expect(outcome.completedAt - outcome.submittedAt).toBeLessThan(500)
    })

    it('stops at the command deadline', async () => {
        const device = new FakeDevice(silent, silent, silent)
        const { engine } = setup({ 'lamp-1': device }, {
            session: { recvTimeoutMs: 200 },
            retry: { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 200, jitterFraction: 0 },
            commandDeadlineMs: 250,
        })

        const outcome = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done

        expect(outcome).toMatchObject({ status: 'failed', reason: 'DeadlineExceeded', detail: 'no outcome within 250ms' })
        expect(device.frames).toHaveLength(1)
    })

    it('cancels everything on stop and refuses new work', async () => {
        const device = new FakeDevice(silent)
        const { engine } = setup({ 'lamp-1': device }, { session: { recvTimeoutMs: 1000 } })

        const handle = engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true })
        await new Promise((resolve) => setTimeout(resolve, 20))
        await engine.stop()

        expect(await handle.done).toMatchObject({ status: 'failed', reason: 'Cancelled', detail: 'engine stopped' })
        const late = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done
        expect(late).toMatchObject({ status: 'failed', reason: 'Cancelled', detail: 'engine stopped' })
    })

    it('rejects malformed and in-flight msgIds at submission', () => {
        const { engine } = setup({ 'lamp-1': new FakeDevice() })

        expect(() => engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true, msgId: 'xyz!' })).toThrow(TypeError)

        engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true, msgId: 'aa' })
        expect(() => engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true, msgId: 'AA' })).toThrow(
            'msgId aa is already in flight'
        )
    })

    it('counts events a throwing sink refused', async () => {
        const engine = new CommandEngine(FAST, {
            events: {
                publish: () => {
                    throw new Error('sink down')
                },
            },
            createSession: fakeSessions({ 'lamp-1': new FakeDevice() }),
        })
        engines.push(engine)

        const outcome = await engine.submit({ device: endpoint(), opcode: 'toggle', desiredState: true }).done

        expect(outcome.status).toBe('success')
        expect(engine.droppedEvents).toBeGreaterThan(0)
    })
})
