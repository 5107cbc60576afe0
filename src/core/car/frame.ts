/**
 * Length-prefixed framing shared by the header, block records and index
 * records: `varint(len) payload`, with the varint in minimal unsigned LEB128.
 */

import varint from 'varint'
import { CarError } from '../errors.js'

/**
 * Longest varint the decoder accepts. Eight groups of seven bits cover every
 * safe integer, and anything past that cannot be represented exactly anyway.
 */
export const MAX_VARINT_LENGTH = 8

export interface DecodedVarint {
  value: number
  /** Number of bytes the varint occupied */
  bytes: number
}

export interface DecodedFrame {
  payload: Uint8Array
  /** Total span of the frame: prefix plus payload */
  length: number
}

export function encodeVarint(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Cannot encode ${value} as an unsigned varint`)
  }
  return Uint8Array.from(varint.encode(value))
}

export function varintLength(value: number): number {
  return varint.encodingLength(value)
}

/**
 * Decode the varint starting at `offset`.
 *
 * `TruncatedInput` when the bytes run out before the final group,
 * `MalformedFraming` when the encoding is longer than necessary or too long to
 * be a safe integer. `position` is only used for error reporting.
 */
export function decodeVarint(bytes: Uint8Array, offset = 0, position = offset): DecodedVarint {
  const available = Math.min(bytes.length - offset, MAX_VARINT_LENGTH)
  let terminated = false
  for (let i = 0; i < available; i++) {
    if (((bytes[offset + i] ?? 0) & 0x80) === 0) {
      terminated = true
      break
    }
  }

  if (!terminated) {
    if (available >= MAX_VARINT_LENGTH) {
      throw new CarError('ERR_MALFORMED_FRAMING', `Varint longer than ${MAX_VARINT_LENGTH} bytes`, {
        offset: position,
      })
    }
    throw new CarError('ERR_TRUNCATED_INPUT', 'Unexpected end of input inside a varint', { offset: position })
  }

  const value = varint.decode(bytes, offset)
  const consumed = varint.decode.bytes ?? 0

  if (!Number.isSafeInteger(value)) {
    throw new CarError('ERR_MALFORMED_FRAMING', `Varint value ${value} exceeds the safe integer range`, {
      offset: position,
    })
  }
  if (varint.encodingLength(value) !== consumed) {
    throw new CarError('ERR_MALFORMED_FRAMING', `Non-canonical varint encoding of ${value} (${consumed} bytes)`, {
      offset: position,
    })
  }

  return { value, bytes: consumed }
}

/**
 * Prefix the concatenation of `parts` with its length.
 */
export function encodeFrame(...parts: Uint8Array[]): Uint8Array {
  const payloadLength = parts.reduce((sum, part) => sum + part.length, 0)
  const prefix = encodeVarint(payloadLength)
  const frame = new Uint8Array(prefix.length + payloadLength)
  frame.set(prefix, 0)
  let cursor = prefix.length
  for (const part of parts) {
    frame.set(part, cursor)
    cursor += part.length
  }
  return frame
}

/**
 * Decode the frame starting at `offset` of an in-memory buffer.
 */
export function decodeFrame(bytes: Uint8Array, offset = 0): DecodedFrame {
  const { value, bytes: prefixLength } = decodeVarint(bytes, offset)
  const start = offset + prefixLength
  if (bytes.length - start < value) {
    throw new CarError(
      'ERR_TRUNCATED_INPUT',
      `Frame declares ${value} bytes but only ${bytes.length - start} remain`,
      { offset }
    )
  }
  return {
    payload: bytes.subarray(start, start + value),
    length: prefixLength + value,
  }
}
