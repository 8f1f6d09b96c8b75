/**
 * Fixed-size packet framing.
 *
 * Devices of this family split a patch into several SysEx packets:
 *
 *   header... type [address...] index payload(<= maxPayload) checksum F7
 *
 * The checksum is the XOR of the payload bytes only; address bytes (bank and
 * patch of address-bearing subtypes) are repeated in every packet and not
 * covered by it.
 */

import { SYSEX_END } from "../constants.js";
import { MalformedFramingError } from "../errors.js";
import type { ByteSource, SysExMessage } from "../types.js";

export interface PacketLayout {
  /** Device header including F0. */
  header: readonly number[];
  /** Maximum payload bytes per packet. */
  maxPayload: number;
}

export interface UnpackOptions {
  /** Address bytes between the type selector and the packet index. Default 0. */
  addressLength?: number;
  /** Fail on a checksum mismatch instead of ignoring it. Default false. */
  verifyChecksums?: boolean;
}

// ---------------------------------------------------------------------------
// Checksums and sizes
// ---------------------------------------------------------------------------

/** XOR-fold of a byte run. */
export function xorChecksum(bytes: ByteSource): number {
  let sum = 0;
  for (let i = 0; i < bytes.length; i++) {
    sum ^= bytes[i];
  }
  return sum;
}

/** Bytes in front of the payload: header, type, address and packet index. */
function leadLength(layout: PacketLayout, addressLength: number): number {
  return layout.header.length + 1 + addressLength + 1;
}

/** Length of one full packet carrying `maxPayload` bytes. */
export function fullPacketLength(layout: PacketLayout, addressLength: number = 0): number {
  return leadLength(layout, addressLength) + layout.maxPayload + 2;
}

/** Number of packets needed for a payload. */
export function packetCount(layout: PacketLayout, payloadLength: number): number {
  return Math.ceil(payloadLength / layout.maxPayload);
}

/** Total message length after packing `payloadLength` bytes. */
export function packedLength(
  layout: PacketLayout,
  payloadLength: number,
  addressLength: number = 0,
): number {
  return payloadLength + packetCount(layout, payloadLength) * (leadLength(layout, addressLength) + 2);
}

// ---------------------------------------------------------------------------
// Pack / unpack
// ---------------------------------------------------------------------------

/**
 * Split `payload` into packets of `type`, numbering them from 0.
 * `address` is written into every packet right after the type selector.
 */
export function packPackets(
  layout: PacketLayout,
  type: number,
  payload: ByteSource,
  address: readonly number[] = [],
): SysExMessage {
  const data = Uint8Array.from(payload);
  const message = new Uint8Array(packedLength(layout, data.length, address.length));
  let pos = 0;
  let packetIndex = 0;

  for (let start = 0; start < data.length; start += layout.maxPayload) {
    const chunk = data.subarray(start, start + layout.maxPayload);
    message.set(layout.header, pos);
    pos += layout.header.length;
    message[pos++] = type;
    message.set(address, pos);
    pos += address.length;
    message[pos++] = packetIndex++;
    message.set(chunk, pos);
    pos += chunk.length;
    message[pos++] = xorChecksum(chunk);
    message[pos++] = SYSEX_END;
  }

  return message;
}

/**
 * Concatenate the payloads of all packets in `message`, in packet order.
 *
 * Packets are cut at fixed full-packet boundaries; only the last one may be
 * shorter. Checksums are recomputed on re-packing, so by default they are
 * not checked here.
 * @throws {MalformedFramingError} on a truncated packet, a missing end
 *   marker, an out-of-order packet index, an address that differs from the
 *   first packet's, or (strict mode) a bad checksum.
 */
export function unpackPackets(
  layout: PacketLayout,
  message: ByteSource,
  options: UnpackOptions = {},
): Uint8Array {
  const bytes = Uint8Array.from(message);
  const addressLength = options.addressLength ?? 0;
  const lead = leadLength(layout, addressLength);
  const packetLength = fullPacketLength(layout, addressLength);
  const indexOffset = lead - 1;
  const addressOffset = layout.header.length + 1;
  const address = bytes.subarray(addressOffset, addressOffset + addressLength);
  const payload: number[] = [];

  let expectedIndex = 0;
  for (let start = 0; start < bytes.length; start += packetLength) {
    const end = Math.min(start + packetLength, bytes.length);
    if (end - start < lead + 3) {
      throw new MalformedFramingError(
        `Packet ${expectedIndex} is truncated: ${end - start} bytes`,
      );
    }
    if (bytes[end - 1] !== SYSEX_END) {
      throw new MalformedFramingError(`Packet ${expectedIndex} does not end with F7`);
    }
    if (bytes[start + indexOffset] !== expectedIndex) {
      throw new MalformedFramingError(
        `Expected packet ${expectedIndex}, found packet ${bytes[start + indexOffset]}`,
      );
    }
    const packetAddress = bytes.subarray(start + addressOffset, start + addressOffset + addressLength);
    if (!packetAddress.every((byte, i) => byte === address[i])) {
      throw new MalformedFramingError(`Packet ${expectedIndex} address differs from packet 0`);
    }

    const chunk = bytes.subarray(start + lead, end - 2);
    if (options.verifyChecksums) {
      const expected = xorChecksum(chunk);
      const actual = bytes[end - 2];
      if (expected !== actual) {
        throw new MalformedFramingError(
          `Checksum mismatch in packet ${expectedIndex}: expected ${expected}, found ${actual}`,
        );
      }
    }
    payload.push(...chunk);
    expectedIndex++;
  }

  return Uint8Array.from(payload);
}

/**
 * The address bytes of an address-bearing message.
 * @throws {MalformedFramingError} if a later packet carries another address.
 */
export function packetAddress(
  layout: PacketLayout,
  message: ByteSource,
  addressLength: number,
): number[] {
  const offset = layout.header.length + 1;
  const bytes = Array.from(message);
  const address = bytes.slice(offset, offset + addressLength);
  const packetLength = fullPacketLength(layout, addressLength);
  let index = 1;
  for (let start = packetLength; start + offset + addressLength <= bytes.length; start += packetLength) {
    if (!address.every((byte, i) => bytes[start + offset + i] === byte)) {
      throw new MalformedFramingError(`Packet ${index} address differs from packet 0`);
    }
    index++;
  }
  return address;
}
