// services/transport/src/core/codec/constants.ts

/** Frame preamble. */
export const FRAME_MAGIC = Buffer.from([0xf0, 0x0d])

export const FRAME_VERSION = 0x01

/** magic(2) + version(1) + length(4) */
export const FRAME_HEADER_LENGTH = 7

export const FRAME_LENGTH_OFFSET = 3

/** Default cap for a single payload; also the per-read memory bound of a session. */
export const DEFAULT_MAX_PAYLOAD_BYTES = 64 * 1024

/** The length field is a u32; nothing larger can be framed at all. */
export const ABSOLUTE_MAX_PAYLOAD_BYTES = 0xffff_ffff

export const OPCODES = ['toggle'] as const

export type Opcode = (typeof OPCODES)[number]
