/**
 * Device adaptation interfaces.
 *
 * Every adaptation implements the core `Adaptation` surface. Optional
 * capabilities are separate interfaces; an adaptation lists the ones it
 * implements in `capabilities` and the host narrows with the guards below.
 * A missing capability means "not supported", never an error.
 */

import type { BankDescriptor, SysExMessage } from "../types.js";

export type Capability = "editBuffer" | "programDump" | "bankDump" | "fingerprint";

/** Answer to "is this message one packet of a multi-message dump?" */
export interface DumpPart {
  partOf: boolean;
  /** Message the host must send back before the device continues, if any. */
  handshake?: SysExMessage;
}

export interface Adaptation {
  /** Registry identifier: "modor-nf1" */
  readonly id: string;
  /** Short lookup aliases: "nf1" */
  readonly aliases: readonly string[];
  readonly capabilities: readonly Capability[];

  /** Human-readable device name: "Modor NF-1(m)" */
  name(): string;
  bankDescriptors(): BankDescriptor[];

  // ---- Detection ----------------------------------------------------------

  createDeviceDetectMessage(channel: number): SysExMessage;
  /** Milliseconds the host waits for a detection reply. */
  deviceDetectWaitMilliseconds?(): number;
  /** True if detection must be repeated for each of the 16 channels. */
  needsChannelSpecificDetection(): boolean;
  /** MIDI channel (0-15) the device answered on, or undefined if it is not this device. */
  channelIfValidDeviceResponse(message: SysExMessage): number | undefined;

  // ---- Names and labels ---------------------------------------------------

  nameFromDump(message: SysExMessage): string;
  renamePatch(message: SysExMessage, name: string): SysExMessage;
  /** True if the name is the device's factory default, i.e. never set by a user. */
  isDefaultName(name: string): boolean;
  friendlyBankName(bank: number): string;
  friendlyProgramName(programNumber: number): string;

  // ---- Hints --------------------------------------------------------------

  /** Pause in milliseconds between two consecutive messages to the device. */
  generalMessageDelay?(): number;
  /** Setup instructions for the user. */
  setupHelp?(): string;
  /** Channel message that selects a bank. */
  bankSelect?(channel: number, bank: number): SysExMessage;
}

export interface EditBufferCapable {
  createEditBufferRequest(channel: number): SysExMessage;
  isEditBufferDump(message: SysExMessage): boolean;
  /** Message that loads the patch into the edit buffer. Identity for edit-buffer dumps. */
  convertToEditBuffer(channel: number, message: SysExMessage): SysExMessage;
  isPartOfEditBufferDump?(message: SysExMessage): DumpPart;
}

export interface ProgramDumpCapable {
  createProgramDumpRequest(channel: number, programNumber: number): SysExMessage;
  isSingleProgramDump(message: SysExMessage): boolean;
  /** Message that stores the patch at `programNumber`. */
  convertToProgramDump(channel: number, message: SysExMessage, programNumber: number): SysExMessage;
  /** Program number stored in an address-bearing dump. */
  numberFromDump(message: SysExMessage): number;
  isPartOfSingleProgramDump?(message: SysExMessage): DumpPart;
}

export interface BankDumpCapable {
  createBankDumpRequest(channel: number, bank: number): SysExMessage;
  isPartOfBankDump(message: SysExMessage): DumpPart;
  isBankDumpFinished(messages: readonly SysExMessage[]): boolean;
  extractPatchesFromBank(message: SysExMessage): SysExMessage[];
}

export interface Fingerprintable {
  /** Duplicate-detection key, independent of name and storage location. */
  calculateFingerprint(message: SysExMessage): string;
}

// ---------------------------------------------------------------------------
// Capability guards
// ---------------------------------------------------------------------------

export function hasEditBuffer(
  adaptation: Adaptation,
): adaptation is Adaptation & EditBufferCapable {
  return adaptation.capabilities.includes("editBuffer");
}

export function hasProgramDump(
  adaptation: Adaptation,
): adaptation is Adaptation & ProgramDumpCapable {
  return adaptation.capabilities.includes("programDump");
}

export function hasBankDump(
  adaptation: Adaptation,
): adaptation is Adaptation & BankDumpCapable {
  return adaptation.capabilities.includes("bankDump");
}

export function hasFingerprint(
  adaptation: Adaptation,
): adaptation is Adaptation & Fingerprintable {
  return adaptation.capabilities.includes("fingerprint");
}
