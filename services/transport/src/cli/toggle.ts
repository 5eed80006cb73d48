/**
 * lanctl-toggle
 *
 * Toggle one device through the command engine and report the terminal
 * outcome through the exit status: 0 success, 1 failure, 2 bad arguments
 * or configuration.
 */

import fs from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'

import { createLogger, LogChannel, makeClientBuffer, type CreateLoggerOptions } from '@lanctl/logging'
import { TransportLoggerEventSink } from '../adapters/transportLog.adapter.js'
import { buildMetricsApp } from '../app.js'
import {
    ConfigError,
    assertValidTransportConfig,
    buildTransportConfigFromEnv,
    mergeTransportConfig,
    type TransportConfig,
} from '../config/index.js'
import { CommandEngine, type SessionFactory } from '../core/engine/index.js'
import { FanoutEventSink } from '../core/events/index.js'
import { IdempotencyCache } from '../core/idempotency/index.js'
import { createTransportMetrics } from '../metrics/index.js'

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
type ToggleLogLevel = (typeof LOG_LEVELS)[number]

export interface ToggleOptions {
    deviceId: string
    host: string
    port: number
    state: boolean
    /** LANCTL_MAX_ATTEMPTS when omitted. */
    maxAttempts?: number
    /** Per-attempt response timeout; LANCTL_RECV_TIMEOUT_MS when omitted. */
    timeoutMs?: number
    /** 0 disables the exporter. */
    metricsPort: number
    logLevel: ToggleLogLevel
}

export interface ToggleDeps {
    env?: NodeJS.ProcessEnv
    createSession?: SessionFactory
    /** JSON log lines go here instead of stdout. */
    logDestination?: CreateLoggerOptions['destination']
    metricsHost?: string
}

export type ParsedToggleArgs =
    | { ok: true; options: ToggleOptions }
    | { ok: false; exitCode: number; message: string }

/* -------------------------------------------------------------------------- */
/*  Argument parsing                                                           */
/* -------------------------------------------------------------------------- */

/** on/true/1 and off/false/0, case-insensitive. */
export function parseState(value: string): boolean {
    const v = value.trim().toLowerCase()
    if (v === 'on' || v === 'true' || v === '1') return true
    if (v === 'off' || v === 'false' || v === '0') return false
    throw new InvalidArgumentError('expected on or off.')
}

function parseIntArg(min: number, max: number) {
    return (value: string): number => {
        const n = Number(value)
        if (!Number.isInteger(n) || n < min || n > max) {
            throw new InvalidArgumentError(`expected an integer in ${min}..${max}.`)
        }
        return n
    }
}

function isLogLevel(value: unknown): value is ToggleLogLevel {
    return LOG_LEVELS.some((l) => l === value)
}

export function buildToggleProgram(): Command {
    return new Command()
        .name('lanctl-toggle')
        .description('Toggle a LAN device with retries, idempotency and metrics')
        .requiredOption('--device-id <id>', 'device identifier')
        .requiredOption('--host <host>', 'device IP address or hostname')
        .option('--port <port>', 'device TCP port', parseIntArg(1, 65535), 9000)
        .option('--state <state>', 'desired state: on or off', parseState, true)
        .option('--max-attempts <n>', 'frames to send at most (default: LANCTL_MAX_ATTEMPTS or 2)', parseIntArg(1, 10))
        .option('--timeout-ms <ms>', 'response timeout per attempt', parseIntArg(1, 600_000))
        .option('--metrics-port <port>', 'Prometheus exporter port, 0 to disable', parseIntArg(0, 65535), 9400)
        .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS).default('info'))
}

/**
 * Parse argv (without the node/script prefix). Never exits the process:
 * usage errors come back with exit code 2, --help and --version with 0.
 */
export function parseToggleArgs(argv: string[], write: (text: string) => void = () => undefined): ParsedToggleArgs {
    const program = buildToggleProgram()
        .exitOverride()
        .configureOutput({ writeOut: write, writeErr: write })

    try {
        program.parse(argv, { from: 'user' })
    } catch (err) {
        if (err instanceof CommanderError) {
            const exitCode = err.exitCode === 0 ? EXIT_SUCCESS : EXIT_USAGE
            return { ok: false, exitCode, message: err.message }
        }
        throw err
    }

    const raw = program.opts<{
        deviceId: string
        host: string
        port: number
        state: boolean
        maxAttempts?: number
        timeoutMs?: number
        metricsPort: number
        logLevel: string
    }>()

    if (!isLogLevel(raw.logLevel)) {
        return { ok: false, exitCode: EXIT_USAGE, message: `unsupported log level ${raw.logLevel}` }
    }

    return {
        ok: true,
        options: {
            deviceId: raw.deviceId,
            host: raw.host,
            port: raw.port,
            state: raw.state,
            maxAttempts: raw.maxAttempts,
            timeoutMs: raw.timeoutMs,
            metricsPort: raw.metricsPort,
            logLevel: raw.logLevel,
        },
    }
}

/* -------------------------------------------------------------------------- */
/*  Run                                                                        */
/* -------------------------------------------------------------------------- */

/** Env config with the CLI flags applied; the deadline grows to fit every attempt. */
export function resolveToggleConfig(opts: ToggleOptions, env: NodeJS.ProcessEnv): TransportConfig {
    const base = buildTransportConfigFromEnv(env)
    const session = {
        ...base.session,
        recvTimeoutMs: opts.timeoutMs ?? base.session.recvTimeoutMs,
    }
    const maxAttempts = opts.maxAttempts ?? base.retry.maxAttempts
    const perAttempt = session.connectTimeoutMs + session.sendTimeoutMs + session.recvTimeoutMs
    const worstCase = maxAttempts * perAttempt + (maxAttempts - 1) * base.retry.maxDelayMs

    return assertValidTransportConfig(mergeTransportConfig({
        session,
        retry: { maxAttempts },
        commandDeadlineMs: Math.max(base.commandDeadlineMs, worstCase),
    }, base))
}

export async function runToggle(opts: ToggleOptions, deps: ToggleDeps = {}): Promise<number> {
    const env = deps.env ?? process.env
    const clientBuf = makeClientBuffer()
    const logger = createLogger('lanctl-toggle', clientBuf, {
        level: opts.logLevel,
        destination: deps.logDestination,
    })
    const log = logger.channel(LogChannel.harness)

    let cfg: TransportConfig
    try {
        cfg = resolveToggleConfig(opts, env)
    } catch (err) {
        if (err instanceof ConfigError) {
            log.error('invalid configuration', { issues: err.issues })
            return EXIT_USAGE
        }
        throw err
    }

    const cache = new IdempotencyCache(cfg.idempotency)
    const metrics = createTransportMetrics({ cache })
    const events = new FanoutEventSink(new TransportLoggerEventSink(logger.channel), metrics.sink)
    const engine = new CommandEngine(cfg, { events, cache, createSession: deps.createSession })

    let app: FastifyInstance | null = null
    if (opts.metricsPort > 0) {
        const host = deps.metricsHost ?? '0.0.0.0'
        try {
            app = buildMetricsApp({ metrics, engine, clientBuf })
            await app.listen({ port: opts.metricsPort, host })
            log.info(`metrics exporter listening host=${host} port=${opts.metricsPort}`)
        } catch (err) {
            log.error('failed to start metrics exporter', {
                port: opts.metricsPort,
                err: err instanceof Error ? err.message : String(err),
            })
            await engine.stop()
            return EXIT_FAILURE
        }
    }

    try {
        const handle = engine.submit({
            device: { deviceId: opts.deviceId, host: opts.host, port: opts.port },
            opcode: 'toggle',
            desiredState: opts.state,
            requestedBy: 'cli',
        })
        log.info(`toggling device=${opts.deviceId} host=${opts.host}:${opts.port} state=${opts.state ? 'on' : 'off'} msgId=${handle.msgId}`)

        const outcome = await handle.done
        const sent = outcome.attempts.filter((a) => a.sentAt !== null).length

        if (outcome.status === 'success') {
            log.info(`device toggle succeeded msgId=${outcome.msgId} attempts=${sent} deduplicated=${outcome.deduplicated}`)
            return EXIT_SUCCESS
        }
        log.error(`device toggle failed msgId=${outcome.msgId} reason=${outcome.reason} attempts=${sent}`, {
            detail: outcome.detail,
        })
        return EXIT_FAILURE
    } finally {
        if (app) await app.close()
        else await engine.stop()
    }
}

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
export function loadEnv(cwd: string = process.cwd()): void {
    const nodeEnv = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${nodeEnv}`),
        path.resolve(cwd, '.env.local'),
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
}

export async function main(argv: string[]): Promise<number> {
    const parsed = parseToggleArgs(argv, (text) => process.stderr.write(text))
    if (!parsed.ok) return parsed.exitCode
    return runToggle(parsed.options)
}

const entry = process.argv[1]
if (entry !== undefined && import.meta.url === pathToFileURL(path.resolve(entry)).href) {
    loadEnv()
    main(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code
        },
        (err: unknown) => {
            process.stderr.write(`lanctl-toggle: ${err instanceof Error ? err.message : String(err)}\n`)
            process.exitCode = EXIT_FAILURE
        }
    )
}
