/**
 * Channel-message helpers used next to the SysEx codec.
 */

import {
  CC_BANK_SELECT_LSB,
  CONTROL_CHANGE,
  MAX_DATA_BYTE,
  MIDI_CHANNEL_COUNT,
} from "../constants.js";

/**
 * @throws {RangeError} unless `channel` is a wire channel 0-15.
 */
export function assertChannel(channel: number): void {
  if (!Number.isInteger(channel) || channel < 0 || channel >= MIDI_CHANNEL_COUNT) {
    throw new RangeError(`MIDI channel ${channel} out of range 0..${MIDI_CHANNEL_COUNT - 1}`);
  }
}

/**
 * @throws {RangeError} unless `value` fits into a 7-bit data byte.
 */
export function assertDataByte(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_DATA_BYTE) {
    throw new RangeError(`${what} ${value} does not fit into a MIDI data byte`);
  }
}

/** CC#32 bank select on `channel`. */
export function bankSelectMessage(channel: number, bank: number): Uint8Array {
  assertChannel(channel);
  assertDataByte(bank, "Bank");
  return Uint8Array.of(CONTROL_CHANGE | channel, CC_BANK_SELECT_LSB, bank);
}
