import { pino, type DestinationStream, type Logger, type LoggerOptions, type LogFn } from 'pino'
import { PinoPretty } from 'pino-pretty'
import {
    type ClientLogLevel,
    type LoggerBundle,
    type ChannelLogger,
    type ClientLogBuffer,
    LogChannel
} from './types.js'
import { CHANNELS, ANSI, RESET, isLogChannel } from './channels.js'

export interface CreateLoggerOptions {
    /** Overrides LOG_LEVEL. */
    level?: string
    /** Overrides PRETTY_LOGS. Ignored when a destination is given. */
    pretty?: boolean
    /** Raw JSON lines are written here instead of stdout. */
    destination?: DestinationStream
}

export function createLogger(
    service: string,
    clientBuf?: ClientLogBuffer,
    opts: CreateLoggerOptions = {}
): LoggerBundle {
    const PRETTY = opts.destination
        ? false
        : opts.pretty ?? String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true'
    const LOG_LEVEL = opts.level ?? process.env.LOG_LEVEL ?? 'info'

    let base: Logger

    const options: LoggerOptions = {
        level: LOG_LEVEL,
        base: { service },
        formatters: {
            level(label) { return { level: label } },
            log(obj) { return obj }
        },
        hooks: {
            logMethod(args: unknown[], method: LogFn): void {
                let ch: LogChannel | undefined

                const first = args[0]
                if (typeof first === 'object' && first !== null && 'channel' in first) {
                    if (isLogChannel(first.channel)) ch = first.channel
                }

                // colour prefixes only make sense on a terminal
                if (PRETTY && ch) {
                    const meta = CHANNELS[ch]
                    const prefix = `${ANSI[meta.color]}${meta.emoji} [${ch}]:${RESET}`

                    if (args.length >= 2 && typeof args[1] === 'string') {
                        args[1] = `${prefix} ${args[1]}`
                    } else if (args.length >= 1 && typeof args[0] === 'string') {
                        args[0] = `${prefix} ${args[0]}`
                    } else {
                        args.push(prefix)
                    }
                }

                Reflect.apply(method, base, args)
            }
        }
    }

    if (opts.destination) {
        base = pino(options, opts.destination)
    } else if (PRETTY) {
        base = pino(options, PinoPretty({
            translateTime: 'SYS:standard', // [YYYY-MM-DD HH:mm:ss.SSS +0000]
            colorize: true,
            singleLine: false,
            ignore: 'pid,hostname,service,channel'
        }))
    } else {
        base = pino(options)
    }

    const fanout = (channel: LogChannel, level: ClientLogLevel, message: string): void => {
        if (!clientBuf) return
        const meta = CHANNELS[channel]
        clientBuf.push({
            ts: Date.now(),
            channel,
            emoji: meta.emoji,
            color: meta.color,
            level,
            message
        })
    }

    const channel = (ch: LogChannel): ChannelLogger => {
        const bindings = (extra?: Record<string, unknown>) => (extra ? { channel: ch, ...extra } : { channel: ch })
        return {
            debug: (msg: string, extra?: Record<string, unknown>): void => {
                base.debug(bindings(extra), msg)
                fanout(ch, 'debug', msg)
            },
            info: (msg: string, extra?: Record<string, unknown>): void => {
                base.info(bindings(extra), msg)
                fanout(ch, 'info', msg)
            },
            warn: (msg: string, extra?: Record<string, unknown>): void => {
                base.warn(bindings(extra), msg)
                fanout(ch, 'warn', msg)
            },
            error: (msg: string, extra?: Record<string, unknown>): void => {
                base.error(bindings(extra), msg)
                fanout(ch, 'error', msg)
            },
            fatal: (msg: string, extra?: Record<string, unknown>): void => {
                base.fatal(bindings(extra), msg)
                fanout(ch, 'fatal', msg)
            }
        }
    }

    return { base, channel }
}
