import { describe, expect, it } from 'vitest'

import { ConfigError } from '../src/config/index.js'
import {
    EXIT_FAILURE,
    EXIT_SUCCESS,
    EXIT_USAGE,
    parseState,
    parseToggleArgs,
    resolveToggleConfig,
    runToggle,
    type ToggleOptions,
} from '../src/cli/toggle.js'
import { FakeDevice, fakeSessions, nack } from './helpers/fakeDevice.js'

const BASE_ARGS = ['--device-id', 'lamp-1', '--host', '10.0.0.5']

const options = (overrides: Partial<ToggleOptions> = {}): ToggleOptions => ({
    deviceId: 'lamp-1',
    host: '10.0.0.5',
    port: 9000,
    state: true,
    maxAttempts: 2,
    metricsPort: 0,
    logLevel: 'info',
    ...overrides,
})

const capture = () => {
    const lines: string[] = []
    return {
        destination: { write: (msg: string) => void lines.push(msg) },
        records: () => lines.map((l): Record<string, unknown> => JSON.parse(l)),
    }
}

describe('parseState', () => {
    it.each([
        ['on', true],
        ['TRUE', true],
        ['1', true],
        ['off', false],
        [' False ', false],
        ['0', false],
    ])('parses %j', (input, expected) => {
        expect(parseState(input)).toBe(expected)
    })

    it('rejects anything else', () => {
        expect(() => parseState('maybe')).toThrow('expected on or off.')
    })
})

describe('parseToggleArgs', () => {
    it('fills in defaults', () => {
        expect(parseToggleArgs(BASE_ARGS)).toEqual({
            ok: true,
            options: {
                deviceId: 'lamp-1',
                host: '10.0.0.5',
                port: 9000,
                state: true,
                maxAttempts: undefined,
                timeoutMs: undefined,
                metricsPort: 9400,
                logLevel: 'info',
            },
        })
    })

    it('reads every flag', () => {
        const parsed = parseToggleArgs([
            ...BASE_ARGS,
            '--port', '8081',
            '--state', 'off',
            '--max-attempts', '3',
            '--timeout-ms', '500',
            '--metrics-port', '0',
            '--log-level', 'debug',
        ])

        expect(parsed).toEqual({
            ok: true,
            options: {
                deviceId: 'lamp-1',
                host: '10.0.0.5',
                port: 8081,
                state: false,
                maxAttempts: 3,
                timeoutMs: 500,
                metricsPort: 0,
                logLevel: 'debug',
            },
        })
    })

    it('fails with a usage exit code on a missing required flag', () => {
        const parsed = parseToggleArgs(['--device-id', 'lamp-1'])

        expect(parsed).toMatchObject({ ok: false, exitCode: EXIT_USAGE })
        expect(parsed.ok ? '' : parsed.message).toContain('--host')
    })

    it.each([
        [['--state', 'maybe'], 'expected on or off.'],
        [['--max-attempts', '11'], 'expected an integer in 1..10.'],
        [['--port', '0'], 'expected an integer in 1..65535.'],
    ])('rejects %j', (extra, message) => {
        const parsed = parseToggleArgs([...BASE_ARGS, ...extra])

        expect(parsed).toMatchObject({ ok: false, exitCode: EXIT_USAGE })
        expect(parsed.ok ? '' : parsed.message).toContain(message)
    })

    it('prints help and exits 0', () => {
        let out = ''
        const parsed = parseToggleArgs(['--help'], (text) => {
            out += text
        })

        expect(parsed).toMatchObject({ ok: false, exitCode: EXIT_SUCCESS })
        expect(out).toContain('Usage: lanctl-toggle')
    })
})

describe('resolveToggleConfig', () => {
    it('applies the flags and widens the deadline to fit every attempt', () => {
        const cfg = resolveToggleConfig(options({ maxAttempts: 3, timeoutMs: 500 }), {})

        expect(cfg.session.recvTimeoutMs).toBe(500)
        expect(cfg.retry.maxAttempts).toBe(3)
        // 3 * (1000 + 1500 + 500) + 2 * 5000
        expect(cfg.commandDeadlineMs).toBe(19_000)
    })

    it('takes maxAttempts from the environment when the flag is absent', () => {
        const fromEnv = resolveToggleConfig(options({ maxAttempts: undefined }), { LANCTL_MAX_ATTEMPTS: '4' })
        const fromFlag = resolveToggleConfig(options({ maxAttempts: 3 }), { LANCTL_MAX_ATTEMPTS: '4' })

        expect(fromEnv.retry.maxAttempts).toBe(4)
        // 4 * (1000 + 1500 + 1500) + 3 * 5000
        expect(fromEnv.commandDeadlineMs).toBe(31_000)
        expect(fromFlag.retry.maxAttempts).toBe(3)
    })

    it('keeps a longer deadline from the environment', () => {
        const cfg = resolveToggleConfig(options(), { LANCTL_COMMAND_DEADLINE_MS: '60000' })
        expect(cfg.commandDeadlineMs).toBe(60_000)
    })

    it('throws on an invalid environment', () => {
        expect(() => resolveToggleConfig(options(), { LANCTL_RETRY_JITTER: '2' })).toThrow(ConfigError)
    })
})

describe('runToggle', () => {
    it('exits 0 when the device acknowledges', async () => {
        const device = new FakeDevice()
        const log = capture()

        const code = await runToggle(options({ state: false }), {
            env: {},
            createSession: fakeSessions({ 'lamp-1': device }),
            logDestination: log.destination,
        })

        expect(code).toBe(EXIT_SUCCESS)
        expect(device.frames).toMatchObject([{ opcode: 'toggle', device_id: 'lamp-1', state: false }])
        const done = log.records().find((r) => r.channel === 'harness' && String(r.msg).startsWith('device toggle succeeded'))
        expect(done?.msg).toBe(`device toggle succeeded msgId=${device.frames[0]?.msg_id} attempts=1 deduplicated=false`)
    })

    it('exits 1 when the device refuses', async () => {
        const device = new FakeDevice(nack('locked'))
        const log = capture()

        const code = await runToggle(options(), {
            env: {},
            createSession: fakeSessions({ 'lamp-1': device }),
            logDestination: log.destination,
        })

        expect(code).toBe(EXIT_FAILURE)
        const failed = log.records().find((r) => r.channel === 'harness' && r.level === 'error')
        expect(failed).toMatchObject({
            msg: `device toggle failed msgId=${device.frames[0]?.msg_id} reason=Nack attempts=1`,
            detail: 'locked',
        })
    })

    it('exits 2 on invalid configuration', async () => {
        const log = capture()

        const code = await runToggle(options(), {
            env: { LANCTL_MAX_FRAME_BYTES: '8' },
            logDestination: log.destination,
        })

        expect(code).toBe(EXIT_USAGE)
        expect(log.records()).toMatchObject([
            {
                level: 'error',
                channel: 'harness',
                msg: 'invalid configuration',
                issues: ['session.maxFrameBytes must be an integer in 64..16777216 (got 8)'],
            },
        ])
    })
})
