/**
 * Program number <-> (bank, patch) arithmetic and location labels.
 *
 * The host addresses patches by a flat program number; devices by bank and
 * patch-in-bank. Label formats differ per device and are described by an
 * AddressingScheme instead of being hard-coded here.
 */

import type { BankDescriptor, ProgramLocation } from "../types.js";

/** One run of banks sharing a label prefix, e.g. user banks "U.1".."U.5". */
export interface BankSegment {
  /** Number of banks in this segment. */
  count: number;
  /** Label prefix: "U." gives "U.1", "U.2", ... */
  prefix: string;
  /** Banks of this segment cannot be written to. */
  readOnly: boolean;
}

export type BankLabels =
  /** "A", "B", "C", ... starting at `first`. */
  | { kind: "letters"; first: string }
  /** Consecutive segments, each numbered from 1. */
  | { kind: "segments"; segments: readonly BankSegment[] };

export interface ProgramLabel {
  /** Text between bank label and patch number: "-" gives "C-03". */
  separator: string;
  /** Number shown for the first patch of a bank (0 or 1). */
  patchBase: number;
  /** Zero-padded width of the patch number. */
  digits: number;
}

export interface AddressingScheme {
  bankSize: number;
  bankCount: number;
  bankLabels: BankLabels;
  programLabel: ProgramLabel;
  /** What the banks store, e.g. "Patch". */
  kind: string;
}

/** Total number of addressable programs. */
export function programCount(scheme: AddressingScheme): number {
  return scheme.bankSize * scheme.bankCount;
}

/**
 * Decompose a flat program number.
 * @throws {RangeError} if the number is not a valid program of this scheme.
 */
export function splitProgramNumber(scheme: AddressingScheme, programNumber: number): ProgramLocation {
  assertProgramNumber(scheme, programNumber);
  return {
    bank: Math.floor(programNumber / scheme.bankSize),
    patch: programNumber % scheme.bankSize,
  };
}

/**
 * Compose a flat program number from a location.
 * @throws {RangeError} if bank or patch are out of range.
 */
export function joinProgramNumber(scheme: AddressingScheme, location: ProgramLocation): number {
  const { bank, patch } = location;
  if (!Number.isInteger(bank) || bank < 0 || bank >= scheme.bankCount) {
    throw new RangeError(`Bank ${bank} out of range 0..${scheme.bankCount - 1}`);
  }
  if (!Number.isInteger(patch) || patch < 0 || patch >= scheme.bankSize) {
    throw new RangeError(`Patch ${patch} out of range 0..${scheme.bankSize - 1}`);
  }
  return bank * scheme.bankSize + patch;
}

export function assertProgramNumber(scheme: AddressingScheme, programNumber: number): void {
  const count = programCount(scheme);
  if (!Number.isInteger(programNumber) || programNumber < 0 || programNumber >= count) {
    throw new RangeError(`Program number ${programNumber} out of range 0..${count - 1}`);
  }
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

/** Bank label as shown on the device. */
export function friendlyBankName(scheme: AddressingScheme, bank: number): string {
  if (!Number.isInteger(bank) || bank < 0 || bank >= scheme.bankCount) {
    throw new RangeError(`Bank ${bank} out of range 0..${scheme.bankCount - 1}`);
  }
  const labels = scheme.bankLabels;
  if (labels.kind === "letters") {
    return String.fromCharCode(labels.first.charCodeAt(0) + bank);
  }
  const { segment, local } = findSegment(labels.segments, bank);
  return `${segment.prefix}${local + 1}`;
}

/** Location label as shown on the device, e.g. "C-03" or "U.1 P.01". */
export function friendlyProgramName(scheme: AddressingScheme, programNumber: number): string {
  const { bank, patch } = splitProgramNumber(scheme, programNumber);
  const { separator, patchBase, digits } = scheme.programLabel;
  const number = String(patch + patchBase).padStart(digits, "0");
  return `${friendlyBankName(scheme, bank)}${separator}${number}`;
}

/** One descriptor per bank, in bank order. */
export function bankDescriptors(scheme: AddressingScheme): BankDescriptor[] {
  return Array.from({ length: scheme.bankCount }, (_, index) => ({
    index,
    label: friendlyBankName(scheme, index),
    size: scheme.bankSize,
    kind: scheme.kind,
    readOnly: isReadOnlyBank(scheme, index),
  }));
}

function isReadOnlyBank(scheme: AddressingScheme, bank: number): boolean {
  const labels = scheme.bankLabels;
  return labels.kind === "segments" && findSegment(labels.segments, bank).segment.readOnly;
}

function findSegment(
  segments: readonly BankSegment[],
  bank: number,
): { segment: BankSegment; local: number } {
  let first = 0;
  for (const segment of segments) {
    if (bank < first + segment.count) {
      return { segment, local: bank - first };
    }
    first += segment.count;
  }
  throw new RangeError(`Bank ${bank} out of range 0..${first - 1}`);
}
