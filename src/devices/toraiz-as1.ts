/**
 * Pioneer Toraiz AS-1 adaptation.
 *
 * Wire format (Toraiz AS-1 manual, SysEx section):
 *   - Header F0 00 40 05 00 00 01 08 10: Pioneer ID, Toraiz ID and a device
 *     ID that cannot be changed on the unit. Message type at offset 9.
 *   - Edit buffer dump:  <header> 03 <packed data...> F7
 *   - Program dump:      <header> 02 <bank> <program> <packed data...> F7
 *   - Patch data is 8-bit, carried in 7-bit groups (see core/seven-bit).
 *   - Name: 20 ASCII bytes at offset 107 of the unpacked data, space padded.
 *
 * Detection asks for the global parameters; the 59-byte reply holds the
 * MIDI channel (1-16, 0 = omni) at offset 12.
 *
 * Banks: 10 banks of 99 programs, U.1-U.5 (user) and F.1-F.5 (factory).
 */

import { MIDI_CHANNEL_COUNT, SYSEX_END } from "../constants.js";
import {
  bankDescriptors,
  friendlyBankName,
  friendlyProgramName,
  splitProgramNumber,
  type AddressingScheme,
} from "../core/addressing.js";
import { isMessageType } from "../core/classifier.js";
import { fingerprintPatch } from "../core/fingerprint.js";
import { bytesToHexString } from "../core/hex.js";
import { assertChannel } from "../core/midi.js";
import { NameCodec, type NameField } from "../core/name-codec.js";
import { decode7to8, encode8to7 } from "../core/seven-bit.js";
import {
  IncompatibleConversionError,
  InvalidMessageTypeError,
  MalformedFramingError,
  UnknownAddressError,
} from "../errors.js";
import { LogLevel, shouldLog } from "../logger.js";
import type { BankDescriptor, DeviceSignature, PatchData, SysExMessage } from "../types.js";
import type {
  Adaptation,
  Capability,
  EditBufferCapable,
  Fingerprintable,
  ProgramDumpCapable,
} from "./types.js";

/** SysEx message types. */
export const AS1_MESSAGE = {
  programDump: 0x02,
  editBufferDump: 0x03,
  programDumpRequest: 0x05,
  editBufferRequest: 0x06,
  globalParameterRequest: 0x0e,
  globalParameterDump: 0x0f,
} as const;

export interface ToraizAs1Config {
  signature: DeviceSignature;
  /** Offset of the packed data block in an edit buffer dump. */
  editBufferDataOffset: number;
  /** Offset of the packed data block in a program dump (after bank and program). */
  programDataOffset: number;
  /** Exact length of the global parameter dump sent in reply to detection. */
  globalDumpLength: number;
  /** Offset of the 1-based MIDI channel inside the global parameter dump. */
  globalChannelOffset: number;
  name: NameField;
  addressing: AddressingScheme;
  defaultName: string;
}

const HEADER = [0xf0, 0x00, 0x40, 0x05, 0x00, 0x00, 0x01, 0x08, 0x10] as const;

export const TORAIZ_AS1_CONFIG: Readonly<ToraizAs1Config> = {
  signature: { header: HEADER, typeOffset: HEADER.length },
  editBufferDataOffset: HEADER.length + 1,
  programDataOffset: HEADER.length + 3,
  globalDumpLength: 59,
  globalChannelOffset: 12,
  name: {
    offset: 107,
    length: 20,
    table: { kind: "ascii", blank: " " },
    trim: true,
  },
  addressing: {
    bankSize: 99,
    bankCount: 10,
    bankLabels: {
      kind: "segments",
      segments: [
        { count: 5, prefix: "U.", readOnly: false },
        { count: 5, prefix: "F.", readOnly: true },
      ],
    },
    programLabel: { separator: " P.", patchBase: 1, digits: 2 },
    kind: "Patch",
  },
  defaultName: "Basic Program",
};

export class ToraizAs1Adaptation
  implements Adaptation, EditBufferCapable, ProgramDumpCapable, Fingerprintable
{
  readonly id = "toraiz-as1";
  readonly aliases = ["as1", "as-1", "toraiz"] as const;
  readonly capabilities: readonly Capability[] = ["editBuffer", "programDump", "fingerprint"];

  readonly config: Readonly<ToraizAs1Config>;
  private readonly names: NameCodec;

  constructor(config: Readonly<ToraizAs1Config> = TORAIZ_AS1_CONFIG) {
    this.config = config;
    this.names = new NameCodec(config.name);
  }

  name(): string {
    return "Pioneer Toraiz AS-1";
  }

  bankDescriptors(): BankDescriptor[] {
    return bankDescriptors(this.config.addressing);
  }

  // ---- Detection ----------------------------------------------------------

  createDeviceDetectMessage(channel: number): SysExMessage {
    return this.request(channel, AS1_MESSAGE.globalParameterRequest);
  }

  needsChannelSpecificDetection(): boolean {
    return false;
  }

  /** The device stores channels 1-based with 0 meaning omni; omni maps to channel 0. */
  channelIfValidDeviceResponse(message: SysExMessage): number | undefined {
    const { signature, globalDumpLength, globalChannelOffset } = this.config;
    if (
      message.length !== globalDumpLength ||
      !isMessageType(signature, message, AS1_MESSAGE.globalParameterDump)
    ) {
      return undefined;
    }
    const channel = message[globalChannelOffset];
    if (channel > MIDI_CHANNEL_COUNT) {
      return undefined;
    }
    shouldLog(LogLevel.Info) && console.error(`${this.id}: found device on channel byte ${channel}`);
    return channel === 0 ? 0 : channel - 1;
  }

  // ---- Edit buffer --------------------------------------------------------

  createEditBufferRequest(channel: number): SysExMessage {
    return this.request(channel, AS1_MESSAGE.editBufferRequest);
  }

  isEditBufferDump(message: SysExMessage): boolean {
    return isMessageType(this.config.signature, message, AS1_MESSAGE.editBufferDump);
  }

  convertToEditBuffer(channel: number, message: SysExMessage): SysExMessage {
    assertChannel(channel);
    this.assertDump(message);
    const { dataBlock } = this.frame(message);
    if (this.isEditBufferDump(message)) {
      return message;
    }
    // drop bank and program, switch the type
    return Uint8Array.of(...this.config.signature.header, AS1_MESSAGE.editBufferDump, ...dataBlock, SYSEX_END);
  }

  // ---- Program dump -------------------------------------------------------

  createProgramDumpRequest(channel: number, programNumber: number): SysExMessage {
    assertChannel(channel);
    const { bank, patch } = splitProgramNumber(this.config.addressing, programNumber);
    return Uint8Array.of(
      ...this.config.signature.header,
      AS1_MESSAGE.programDumpRequest,
      bank,
      patch,
      SYSEX_END,
    );
  }

  isSingleProgramDump(message: SysExMessage): boolean {
    return isMessageType(this.config.signature, message, AS1_MESSAGE.programDump);
  }

  convertToProgramDump(channel: number, message: SysExMessage, programNumber: number): SysExMessage {
    assertChannel(channel);
    this.assertDump(message);
    const { dataBlock } = this.frame(message);
    const { bank, patch } = splitProgramNumber(this.config.addressing, programNumber);
    shouldLog(LogLevel.Debug) && console.error(`${this.id}: storing patch at ${this.friendlyProgramName(programNumber)}`);
    return Uint8Array.of(
      ...this.config.signature.header,
      AS1_MESSAGE.programDump,
      bank,
      patch,
      ...dataBlock,
      SYSEX_END,
    );
  }

  numberFromDump(message: SysExMessage): number {
    if (!this.isSingleProgramDump(message)) {
      throw new UnknownAddressError(`${this.name()}: only program dumps carry a location`);
    }
    const bankOffset = this.config.signature.typeOffset + 1;
    const bank = message[bankOffset];
    const patch = message[bankOffset + 1];
    const { bankSize, bankCount } = this.config.addressing;
    if (bank >= bankCount || patch >= bankSize) {
      throw new MalformedFramingError(`${this.name()}: invalid location bank ${bank}, program ${patch}`);
    }
    return bank * bankSize + patch;
  }

  // ---- Names and fingerprint ----------------------------------------------

  nameFromDump(message: SysExMessage): string {
    return this.names.decode(this.split(message).patchData);
  }

  /** Renamed copy of the dump; kind and location are kept. */
  renamePatch(message: SysExMessage, name: string): SysExMessage {
    const { prefix, patchData } = this.split(message);
    const renamed = this.names.update(patchData, name);
    return Uint8Array.of(...prefix, ...encode8to7(renamed), SYSEX_END);
  }

  isDefaultName(name: string): boolean {
    return name === this.config.defaultName;
  }

  calculateFingerprint(message: SysExMessage): string {
    return fingerprintPatch(this.split(message).patchData, this.names);
  }

  friendlyBankName(bank: number): string {
    return friendlyBankName(this.config.addressing, bank);
  }

  friendlyProgramName(programNumber: number): string {
    return friendlyProgramName(this.config.addressing, programNumber);
  }

  // ---- Internals ----------------------------------------------------------

  private request(channel: number, type: number): SysExMessage {
    assertChannel(channel);
    return Uint8Array.of(...this.config.signature.header, type, SYSEX_END);
  }

  private assertDump(message: SysExMessage): void {
    if (!this.isEditBufferDump(message) && !this.isSingleProgramDump(message)) {
      throw new IncompatibleConversionError(
        `${this.name()}: message is neither an edit buffer dump nor a program dump`,
      );
    }
  }

  /** Message bytes in front of the data block, and the packed data block itself. */
  private frame(message: SysExMessage): { prefix: Uint8Array; dataBlock: Uint8Array } {
    let dataStart: number;
    if (this.isSingleProgramDump(message)) {
      dataStart = this.config.programDataOffset;
    } else if (this.isEditBufferDump(message)) {
      dataStart = this.config.editBufferDataOffset;
    } else {
      throw new InvalidMessageTypeError(
        `${this.name()}: not an edit buffer or program dump (${bytesToHexString(message.subarray(0, 12))}...)`,
      );
    }

    const dataBlock = message.subarray(dataStart, message.length - 1);
    if (dataBlock.length === 0) {
      throw new MalformedFramingError(`${this.name()}: data block is empty`);
    }
    return { prefix: message.subarray(0, dataStart), dataBlock };
  }

  /** Message bytes in front of the data block, and the unpacked data block. */
  private split(message: SysExMessage): { prefix: Uint8Array; patchData: PatchData } {
    const { prefix, dataBlock } = this.frame(message);
    const patchData = decode7to8(dataBlock);
    shouldLog(LogLevel.Midi) && console.error(`${this.id}: patch data ${bytesToHexString(patchData)}`);
    return { prefix, patchData };
  }
}

export const toraizAs1 = new ToraizAs1Adaptation();
