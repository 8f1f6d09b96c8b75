/**
 * rename_patch tool implementation.
 */

import { bytesToHexString, hexStringToBytes } from "../core/hex.js";
import { getDevice } from "../devices/index.js";

export interface RenamePatchInput {
  device: string;
  message: string;
  name: string;
}

export function executeRenamePatch(input: RenamePatchInput): string {
  const adaptation = getDevice(input.device);
  const renamed = adaptation.renamePatch(hexStringToBytes(input.message), input.name);
  return (
    `Renamed patch to "${adaptation.nameFromDump(renamed)}" (${renamed.length} bytes).\n\n` +
    bytesToHexString(renamed)
  );
}
