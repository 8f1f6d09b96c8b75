/**
 * SysEx message classification.
 *
 * `isMessageType` is the only type-discrimination primitive; device-level
 * predicates (edit buffer, program dump, ...) are built from it plus exact
 * length and end-marker checks.
 */

import { SYSEX_END } from "../constants.js";
import type { ByteSource, DeviceSignature } from "../types.js";

/**
 * True if `message` comes from the device described by `signature` and its
 * type selector equals `type`.
 *
 * Requires a message longer than the header plus type and end marker, the
 * exact header, the selector at `signature.typeOffset` and a trailing F7.
 */
export function isMessageType(
  signature: DeviceSignature,
  message: ByteSource,
  type: number,
): boolean {
  return (
    message.length > signature.header.length + 2 &&
    hasHeader(signature, message) &&
    message[signature.typeOffset] === type &&
    message[message.length - 1] === SYSEX_END
  );
}

/**
 * Return the type selector of a message from this device, or undefined if
 * the message does not carry the device's header and end marker.
 */
export function messageType(
  signature: DeviceSignature,
  message: ByteSource,
): number | undefined {
  if (
    message.length > signature.header.length + 2 &&
    hasHeader(signature, message) &&
    message[message.length - 1] === SYSEX_END
  ) {
    return message[signature.typeOffset];
  }
  return undefined;
}

/** True if the message starts with the device header. */
export function hasHeader(signature: DeviceSignature, message: ByteSource): boolean {
  const { header } = signature;
  if (message.length < header.length) {
    return false;
  }
  for (let i = 0; i < header.length; i++) {
    if (message[i] !== header[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Count F7 bytes. A multi-packet dump that was concatenated naively contains
 * one end marker per packet.
 */
export function countEndMarkers(message: ByteSource): number {
  let count = 0;
  for (let i = 0; i < message.length; i++) {
    if (message[i] === SYSEX_END) {
      count++;
    }
  }
  return count;
}
