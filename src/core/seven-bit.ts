/**
 * 8-bit data <-> 7-bit MIDI-safe transport bytes.
 *
 * Data is carried in groups of up to 7 bytes, each group preceded by one
 * byte holding their top bits: bit i of that prefix is bit 7 of data byte i.
 *
 *   [msbits, d0 & 0x7f, d1 & 0x7f, ..., d6 & 0x7f]
 *
 * A trailing group of 1-6 bytes gets its own prefix.
 */

import type { ByteSource } from "../types.js";

const GROUP_SIZE = 7;

/** Number of 7-bit bytes needed to carry `length` data bytes. */
export function encodedLength(length: number): number {
  return length + Math.ceil(length / GROUP_SIZE);
}

/** Number of data bytes carried by `length` 7-bit bytes. */
export function decodedLength(length: number): number {
  const groups = Math.ceil(length / (GROUP_SIZE + 1));
  return Math.max(0, length - groups);
}

/**
 * Pack 8-bit data into 7-bit transport bytes.
 */
export function encode8to7(data: ByteSource): Uint8Array {
  const result = new Uint8Array(encodedLength(data.length));
  let out = 0;

  for (let groupStart = 0; groupStart < data.length; groupStart += GROUP_SIZE) {
    const groupEnd = Math.min(groupStart + GROUP_SIZE, data.length);
    const prefixIndex = out++;
    let msbits = 0;
    for (let i = groupStart; i < groupEnd; i++) {
      const byte = data[i] & 0xff;
      msbits |= (byte >> 7) << (i - groupStart);
      result[out++] = byte & 0x7f;
    }
    result[prefixIndex] = msbits;
  }

  return result;
}

/**
 * Unpack 7-bit transport bytes into 8-bit data. A group consisting of a
 * prefix byte only produces no output.
 */
export function decode7to8(sysex: ByteSource): Uint8Array {
  const result = new Uint8Array(decodedLength(sysex.length));
  let out = 0;

  for (let groupStart = 0; groupStart < sysex.length; groupStart += GROUP_SIZE + 1) {
    const msbits = sysex[groupStart];
    const groupEnd = Math.min(groupStart + GROUP_SIZE + 1, sysex.length);
    for (let i = groupStart + 1; i < groupEnd; i++) {
      const bit = (msbits >> (i - groupStart - 1)) & 1;
      result[out++] = (sysex[i] & 0x7f) | (bit << 7);
    }
  }

  return result;
}
