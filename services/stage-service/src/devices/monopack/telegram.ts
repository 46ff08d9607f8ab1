// services/stage-service/src/devices/monopack/telegram.ts
//
// 9-byte command telegram:
//
//   | 0       | 1       | 2  | 3  | 4  | 5  | 6  | 7  | 8  |
//   | address | command | P0 | P1 | P2 | P3 | P4 | P5 | P6 |
//
// Multi-byte parameters are little-endian. Responses use the same layout and
// echo the command byte of the request.

import { InvalidParameterError, MalformedFrameError } from './errors.js'

export const TELEGRAM_LENGTH = 9
export const PARAM_COUNT = 7

export interface Telegram {
    address: number
    command: number
    /** Always exactly PARAM_COUNT bytes (P0..P6). */
    params: Buffer
}

/* -------------------------------------------------------------------------- */
/*  Encode / decode                                                           */
/* -------------------------------------------------------------------------- */

export function encodeTelegram(address: number, command: number, params: ArrayLike<number> = []): Buffer {
    assertByte('address', address)
    assertByte('command', command)
    if (params.length > PARAM_COUNT) {
        throw new InvalidParameterError('params.length', params.length, `0..${PARAM_COUNT}`)
    }

    const frame = Buffer.alloc(TELEGRAM_LENGTH)
    frame[0] = address
    frame[1] = command
    for (let i = 0; i < params.length; i++) {
        const b = params[i]
        assertByte(`P${i}`, b)
        frame[2 + i] = b
    }
    return frame
}

export function decodeTelegram(frame: Uint8Array): Telegram {
    if (frame.length !== TELEGRAM_LENGTH) {
        throw new MalformedFrameError(frame.length)
    }
    return {
        address: frame[0],
        command: frame[1],
        params: Buffer.from(frame.subarray(2, TELEGRAM_LENGTH)),
    }
}

/** Hex dump used in debug events, e.g. "07 43 00 00 00 00 00 00 00". */
export function formatTelegram(frame: Uint8Array): string {
    return Array.from(frame, (b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' ')
}

/* -------------------------------------------------------------------------- */
/*  Field packing (parameter byte slots)                                      */
/* -------------------------------------------------------------------------- */

/** Signed byte, two's complement (e.g. waveform -127 → 0x81). */
export function packInt8(value: number): number[] {
    return [value & 0xff]
}

export function packInt16LE(value: number): number[] {
    const b = Buffer.alloc(2)
    b.writeInt16LE(value)
    return [...b]
}

export function packUInt16LE(value: number): number[] {
    const b = Buffer.alloc(2)
    b.writeUInt16LE(value)
    return [...b]
}

export function packInt32LE(value: number): number[] {
    const b = Buffer.alloc(4)
    b.writeInt32LE(value)
    return [...b]
}

export function packUInt32LE(value: number): number[] {
    const b = Buffer.alloc(4)
    b.writeUInt32LE(value)
    return [...b]
}

/* -------------------------------------------------------------------------- */
/*  Field readers                                                             */
/* -------------------------------------------------------------------------- */

function slot(bytes: Uint8Array, offset: number, width: number): Buffer {
    if (offset < 0 || offset + width > bytes.length) {
        throw new MalformedFrameError(bytes.length, `field at ${offset} (+${width}) out of bounds`)
    }
    return Buffer.from(bytes.buffer, bytes.byteOffset + offset, width)
}

/** 12-bit two's complement value stored in a 2-byte little-endian slot. */
export function readInt12LE(bytes: Uint8Array, offset: number): number {
    const raw = slot(bytes, offset, 2).readUInt16LE(0) & 0x0fff
    return raw & 0x0800 ? raw - 0x1000 : raw
}

export function readInt16LE(bytes: Uint8Array, offset: number): number {
    return slot(bytes, offset, 2).readInt16LE(0)
}

export function readUInt16LE(bytes: Uint8Array, offset: number): number {
    return slot(bytes, offset, 2).readUInt16LE(0)
}

export function readUInt24LE(bytes: Uint8Array, offset: number): number {
    return slot(bytes, offset, 3).readUIntLE(0, 3)
}

export function readInt24LE(bytes: Uint8Array, offset: number): number {
    return slot(bytes, offset, 3).readIntLE(0, 3)
}

export function readInt32LE(bytes: Uint8Array, offset: number): number {
    return slot(bytes, offset, 4).readInt32LE(0)
}

export function readUInt32LE(bytes: Uint8Array, offset: number): number {
    return slot(bytes, offset, 4).readUInt32LE(0)
}

/* -------------------------------------------------------------------------- */

function assertByte(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
        throw new InvalidParameterError(name, value, '0..255')
    }
}
