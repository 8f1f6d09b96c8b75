/**
 * inspect_dump tool implementation.
 */

import { hexStringToBytes } from "../core/hex.js";
import { getDevice } from "../devices/index.js";
import { hasEditBuffer, hasFingerprint, hasProgramDump } from "../devices/types.js";
import { InvalidMessageTypeError, UnknownAddressError } from "../errors.js";

export interface InspectDumpInput {
  device: string;
  message: string;
}

export function executeInspectDump(input: InspectDumpInput): string {
  const adaptation = getDevice(input.device);
  const message = hexStringToBytes(input.message);

  const kinds: string[] = [];
  if (hasEditBuffer(adaptation) && adaptation.isEditBufferDump(message)) {
    kinds.push("edit buffer dump");
  }
  const isProgramDump = hasProgramDump(adaptation) && adaptation.isSingleProgramDump(message);
  if (isProgramDump) {
    kinds.push("program dump");
  }
  if (kinds.length === 0) {
    throw new InvalidMessageTypeError(`not a patch dump of the ${adaptation.name()}`);
  }

  const name = adaptation.nameFromDump(message);
  const lines = [
    `Device: ${adaptation.name()}`,
    `Kind: ${kinds.join(", ")}`,
    `Length: ${message.length} bytes`,
    `Name: "${name}"`,
    `Default name: ${adaptation.isDefaultName(name) ? "yes" : "no"}`,
  ];

  let location = "none";
  if (isProgramDump && hasProgramDump(adaptation)) {
    try {
      const number = adaptation.numberFromDump(message);
      location = `${adaptation.friendlyProgramName(number)} (program ${number})`;
    } catch (err) {
      if (!(err instanceof UnknownAddressError)) {
        throw err;
      }
    }
  }
  lines.push(`Location: ${location}`);

  if (hasFingerprint(adaptation)) {
    lines.push(`Fingerprint: ${adaptation.calculateFingerprint(message)}`);
  }
  return lines.join("\n");
}
