/**
 * convert_dump tool implementation.
 */

import { bytesToHexString, hexStringToBytes } from "../core/hex.js";
import { getDevice } from "../devices/index.js";
import { hasEditBuffer, hasProgramDump } from "../devices/types.js";

export type ConvertTarget = "edit-buffer" | "program-dump";

export interface ConvertDumpInput {
  device: string;
  message: string;
  target: ConvertTarget;
  programNumber?: number;
  channel?: number;
}

export function executeConvertDump(input: ConvertDumpInput): string {
  const { target, programNumber, channel = 0 } = input;
  const adaptation = getDevice(input.device);
  const message = hexStringToBytes(input.message);

  if (target === "edit-buffer") {
    if (!hasEditBuffer(adaptation)) {
      throw new Error(`${adaptation.name()} has no edit buffer`);
    }
    const converted = adaptation.convertToEditBuffer(channel, message);
    return `Converted to edit buffer dump (${converted.length} bytes).\n\n${bytesToHexString(converted)}`;
  }

  if (!hasProgramDump(adaptation)) {
    throw new Error(`${adaptation.name()} has no program dumps`);
  }
  if (programNumber === undefined) {
    throw new Error("programNumber is required for target program-dump");
  }
  const converted = adaptation.convertToProgramDump(channel, message, programNumber);
  return (
    `Converted to program dump at ${adaptation.friendlyProgramName(programNumber)} ` +
    `(program ${programNumber}, ${converted.length} bytes).\n\n${bytesToHexString(converted)}`
  );
}
