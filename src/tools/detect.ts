/**
 * check_detect_response tool implementation.
 */

import { hexStringToBytes } from "../core/hex.js";
import { getDevice } from "../devices/index.js";

export interface CheckDetectResponseInput {
  device: string;
  message: string;
}

export function executeCheckDetectResponse(input: CheckDetectResponseInput): string {
  const adaptation = getDevice(input.device);
  const channel = adaptation.channelIfValidDeviceResponse(hexStringToBytes(input.message));
  if (channel === undefined) {
    return `Not a detection response from the ${adaptation.name()}.`;
  }
  return `${adaptation.name()} detected on MIDI channel ${channel + 1} (channel ${channel}).`;
}
