/**
 * MIDI System-Exclusive framing constants shared by every device adaptation.
 */

/** Start of a System-Exclusive message. */
export const SYSEX_START = 0xf0;

/** End of a System-Exclusive message (EOX). */
export const SYSEX_END = 0xf7;

/** Status nibble of a Control Change message. */
export const CONTROL_CHANGE = 0xb0;

/** CC#32, bank select LSB. */
export const CC_BANK_SELECT_LSB = 32;

/** Number of MIDI channels; channels are addressed 0-15 on the wire. */
export const MIDI_CHANNEL_COUNT = 16;

/** Highest value a data byte may carry inside a SysEx message. */
export const MAX_DATA_BYTE = 0x7f;
