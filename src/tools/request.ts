/**
 * create_request tool implementation.
 */

import { bytesToHexString } from "../core/hex.js";
import { getDevice } from "../devices/index.js";
import { hasEditBuffer, hasProgramDump, type Adaptation } from "../devices/types.js";
import type { SysExMessage } from "../types.js";

export type RequestKind = "detect" | "edit-buffer" | "program" | "bank-select";

export interface CreateRequestInput {
  device: string;
  kind: RequestKind;
  channel?: number;
  programNumber?: number;
  bank?: number;
}

interface Request {
  label: string;
  message: SysExMessage;
}

function buildRequest(adaptation: Adaptation, input: CreateRequestInput, channel: number): Request {
  switch (input.kind) {
    case "detect":
      return { label: "Device detection message", message: adaptation.createDeviceDetectMessage(channel) };

    case "edit-buffer":
      if (!hasEditBuffer(adaptation)) {
        throw new Error(`${adaptation.name()} has no edit buffer`);
      }
      return { label: "Edit buffer request", message: adaptation.createEditBufferRequest(channel) };

    case "program": {
      if (!hasProgramDump(adaptation)) {
        throw new Error(`${adaptation.name()} has no program dumps`);
      }
      const { programNumber } = input;
      if (programNumber === undefined) {
        throw new Error("programNumber is required for kind program");
      }
      return {
        label: `Program request for ${adaptation.friendlyProgramName(programNumber)}`,
        message: adaptation.createProgramDumpRequest(channel, programNumber),
      };
    }

    case "bank-select": {
      if (!adaptation.bankSelect) {
        throw new Error(`${adaptation.name()} has no bank select`);
      }
      const { bank } = input;
      if (bank === undefined) {
        throw new Error("bank is required for kind bank-select");
      }
      return {
        label: `Bank select for bank ${adaptation.friendlyBankName(bank)}`,
        message: adaptation.bankSelect(channel, bank),
      };
    }
  }
}

export function executeCreateRequest(input: CreateRequestInput): string {
  const adaptation = getDevice(input.device);
  const channel = input.channel ?? 0;
  const { label, message } = buildRequest(adaptation, input, channel);
  return `${label} on channel ${channel} (${message.length} bytes):\n\n${bytesToHexString(message)}`;
}
