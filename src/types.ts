/**
 * Shared value types for the SysEx codec layer.
 *
 * Every buffer handed to or returned from the codec is treated as immutable:
 * operations build new arrays instead of editing their input.
 */

// ---------------------------------------------------------------------------
// Messages and patch data
// ---------------------------------------------------------------------------

/** A complete SysEx message, F0 ... F7 (possibly several concatenated packets). */
export type SysExMessage = Uint8Array;

/**
 * Device parameters in native layout: de-framed and, where the device packs
 * them, already converted from 7-bit transport bytes to 8-bit data.
 */
export type PatchData = Uint8Array;

/** Anything byte-like the codec accepts as input. */
export type ByteSource = Uint8Array | readonly number[];

// ---------------------------------------------------------------------------
// Device identity
// ---------------------------------------------------------------------------

export interface DeviceSignature {
  /** Leading bytes every message of the device starts with, including F0. */
  header: readonly number[];
  /** Index of the message-type selector byte (normally `header.length`). */
  typeOffset: number;
}

// ---------------------------------------------------------------------------
// Addressing
// ---------------------------------------------------------------------------

export interface ProgramLocation {
  /** 0-based bank index. */
  bank: number;
  /** 0-based patch index inside the bank. */
  patch: number;
}

export interface BankDescriptor {
  /** 0-based bank index. */
  index: number;
  /** Label as shown on the device: "A", "U.1", "F.3" */
  label: string;
  /** Number of patches in this bank. */
  size: number;
  /** What the bank stores, e.g. "Patch". */
  kind: string;
  /** True if patches can be read from but not written to this bank. */
  readOnly: boolean;
}
