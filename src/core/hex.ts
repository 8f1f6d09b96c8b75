/**
 * Hex text <-> bytes, for tool I/O, fixtures and log lines.
 */

import type { ByteSource } from "../types.js";

/**
 * Render bytes as upper-case hex pairs: `[0xf0, 0x7e]` → `"F0 7E"`.
 */
export function bytesToHexString(bytes: ByteSource, separator: string = " "): string {
  return Array.from(bytes, (byte) => ("0" + (byte & 0xff).toString(16)).slice(-2))
    .join(separator)
    .toUpperCase();
}

/**
 * Parse hex text into bytes.
 *
 * Accepts "F0 00 21", "f00021", "0xF0,0x00" and line breaks between bytes.
 * @throws {Error} on characters that are not hex digits or an odd digit count.
 */
export function hexStringToBytes(text: string): Uint8Array {
  const digits = text.replaceAll(/0x/gi, "").replaceAll(/[\s,]/g, "");
  if (!/^[0-9a-fA-F]*$/.test(digits)) {
    throw new Error(`Invalid hex string: "${text}"`);
  }
  if (digits.length % 2 !== 0) {
    throw new Error(`Hex string has an odd number of digits (${digits.length})`);
  }
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(digits.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/** Copy any byte source into a fresh Uint8Array. */
export function toBytes(source: ByteSource): Uint8Array {
  return Uint8Array.from(source);
}

/** Byte-wise equality of two byte sources. */
export function bytesEqual(a: ByteSource, b: ByteSource): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}
