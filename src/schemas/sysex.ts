/**
 * Zod schemas for the SysEx tool parameters.
 */

import { z } from "zod";
import { MIDI_CHANNEL_COUNT } from "../constants.js";

const device = z
  .string()
  .min(1)
  .describe('Device id or alias, e.g. "modor-nf1", "nf1", "toraiz-as1", "as1".');

const message = z
  .string()
  .min(1)
  .describe(
    'SysEx message as hex, e.g. "F0 00 21 1C 01 05 F7". Spaces, commas and 0x prefixes are ignored. ' +
      "Multi-packet dumps are passed as one string.",
  );

const channel = z
  .number()
  .int()
  .min(0)
  .max(MIDI_CHANNEL_COUNT - 1)
  .default(0)
  .describe("MIDI channel 0-15 (0 = channel 1). Defaults to 0.");

const programNumber = z
  .number()
  .int()
  .min(0)
  .describe("Flat 0-based program number: bank * bank size + patch.");

export const inspectDumpSchema = {
  device,
  message,
};

export const renamePatchSchema = {
  device,
  message,
  name: z
    .string()
    .describe("New patch name. Truncated or padded to the device's name length."),
};

export const convertDumpSchema = {
  device,
  message,
  target: z
    .enum(["edit-buffer", "program-dump"])
    .describe("edit-buffer: load into the edit buffer. program-dump: store at programNumber."),
  programNumber: programNumber
    .optional()
    .describe("Target location; required for program-dump."),
  channel,
};

export const createRequestSchema = {
  device,
  kind: z
    .enum(["detect", "edit-buffer", "program", "bank-select"])
    .describe(
      "detect: device detection message. edit-buffer: edit buffer request. " +
        "program: request for programNumber. bank-select: CC#32 bank change.",
    ),
  channel,
  programNumber: programNumber.optional().describe("Required for kind=program."),
  bank: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("0-based bank; required for kind=bank-select."),
};

export const checkDetectResponseSchema = {
  device,
  message,
};
