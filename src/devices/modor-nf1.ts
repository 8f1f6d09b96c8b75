/**
 * Modor NF-1 / NF-1m adaptation.
 *
 * Wire format:
 *   - Header F0 00 21 1C 01, message type at offset 5.
 *   - A patch is 144 data bytes, sent as 3 packets of at most 55 bytes:
 *       F0 00 21 1C 01 <type> [bank patch] <packet#> <data...> <xor> F7
 *     Bank and patch appear only in save-to-memory dumps (type 10h), where
 *     they are repeated in every packet. The checksum covers the data only.
 *   - Name: 10 bytes at offset 128 of the patch data, each an index into the
 *     device alphabet (digits, Latin and Cyrillic letters).
 *
 * Every write goes to the edit buffer: 05h requests it, 09h replaces it.
 * 0Fh/10h read and write memory locations without touching the edit buffer.
 * Plain 09h dumps (no location) are the storage format.
 *
 * The NF-1m has no device inquiry; detection requests the edit buffer, and
 * the reply carries no channel, so detection reports a fixed one.
 *
 * Bank dumps (0Ah) exist on the device but their layout is not documented;
 * the bank-dump capability is not offered.
 */

import { SYSEX_END, SYSEX_START } from "../constants.js";
import { countEndMarkers, isMessageType } from "../core/classifier.js";
import {
  bankDescriptors,
  friendlyBankName,
  friendlyProgramName,
  splitProgramNumber,
  type AddressingScheme,
} from "../core/addressing.js";
import { fingerprintPatch } from "../core/fingerprint.js";
import { bytesToHexString } from "../core/hex.js";
import { assertChannel, bankSelectMessage } from "../core/midi.js";
import { NameCodec, type NameField } from "../core/name-codec.js";
import {
  packPackets,
  packedLength,
  packetAddress,
  packetCount,
  unpackPackets,
  type PacketLayout,
} from "../core/packets.js";
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
  DumpPart,
  EditBufferCapable,
  Fingerprintable,
  ProgramDumpCapable,
} from "./types.js";

/** SysEx message types. */
export const NF1_MESSAGE = {
  editBufferRequest: 0x05,
  patchDump: 0x09,
  bankDump: 0x0a,
  memoryDump: 0x0b,
  memoryDumpRequest: 0x0e,
  patchMemoryRequest: 0x0f,
  saveToMemory: 0x10,
} as const;

/**
 * Name alphabet; the byte value is the index. Space appears more than once,
 * index 0 is used when encoding.
 */
export const NF1_ALPHABET =
  " 0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ abcdefghijklmnopqrstuvwxyz " +
  "БВГДЕЁЖЗИЙКЛМНОПРСТУФХЦЧШЩЪЫЬЭЮЯ абвгдеёжзийклмнопрстуфхцчшщэюя";

export interface ModorNf1Config {
  signature: DeviceSignature;
  /** Payload bytes per packet; packets carry `signature.header`. */
  maxPayload: number;
  /** Patch data bytes per patch. */
  patchSize: number;
  name: NameField;
  addressing: AddressingScheme;
  defaultName: string;
  /** Channel reported on detection; the reply does not reveal the real one. */
  detectedChannel: number;
  detectWaitMilliseconds: number;
  messageDelayMilliseconds: number;
  /** Sent back to the device after each packet of a multi-packet dump. */
  acknowledge: readonly number[];
}

const HEADER = [SYSEX_START, 0x00, 0x21, 0x1c, 0x01] as const;

export const MODOR_NF1_CONFIG: Readonly<ModorNf1Config> = {
  signature: { header: HEADER, typeOffset: HEADER.length },
  maxPayload: 55,
  patchSize: 144,
  name: {
    offset: 128,
    length: 10,
    table: { kind: "alphabet", characters: NF1_ALPHABET, blank: " ", placeholder: "_" },
  },
  addressing: {
    bankSize: 32,
    bankCount: 14,
    bankLabels: { kind: "letters", first: "A" },
    programLabel: { separator: "-", patchBase: 0, digits: 2 },
    kind: "Patch",
  },
  defaultName: "Init",
  detectedChannel: 9,
  detectWaitMilliseconds: 200,
  messageDelayMilliseconds: 10,
  acknowledge: [SYSEX_START, 0x42, 0x30, 0x04, 0x41, SYSEX_END],
};

/** Bank and patch bytes carried by save-to-memory dumps. */
const ADDRESS_LENGTH = 2;

export class ModorNf1Adaptation
  implements Adaptation, EditBufferCapable, ProgramDumpCapable, Fingerprintable
{
  readonly id = "modor-nf1";
  readonly aliases = ["nf1", "nf-1", "nf1m", "nf-1m"] as const;
  readonly capabilities: readonly Capability[] = ["editBuffer", "programDump", "fingerprint"];

  readonly config: Readonly<ModorNf1Config>;
  private readonly names: NameCodec;
  private readonly layout: PacketLayout;
  private readonly plainDumpLength: number;
  private readonly storeDumpLength: number;
  private readonly packets: number;

  constructor(config: Readonly<ModorNf1Config> = MODOR_NF1_CONFIG) {
    this.config = config;
    this.names = new NameCodec(config.name);
    this.layout = { header: config.signature.header, maxPayload: config.maxPayload };
    this.plainDumpLength = packedLength(this.layout, config.patchSize);
    this.storeDumpLength = packedLength(this.layout, config.patchSize, ADDRESS_LENGTH);
    this.packets = packetCount(this.layout, config.patchSize);
  }

  name(): string {
    return "Modor NF-1(m)";
  }

  bankDescriptors(): BankDescriptor[] {
    return bankDescriptors(this.config.addressing);
  }

  bankSelect(channel: number, bank: number): SysExMessage {
    return bankSelectMessage(channel, bank);
  }

  setupHelp(): string {
    return [
      `${this.name()} setup:`,
      "In SYSTEM SETTINGS set ProgChangeRx to ON and SysexRx to ON.",
      "The MIDI channel cannot be detected; set it manually if it is not 10.",
    ].join("\n");
  }

  // ---- Detection ----------------------------------------------------------

  createDeviceDetectMessage(channel: number): SysExMessage {
    return this.createEditBufferRequest(channel);
  }

  deviceDetectWaitMilliseconds(): number {
    return this.config.detectWaitMilliseconds;
  }

  needsChannelSpecificDetection(): boolean {
    return false;
  }

  channelIfValidDeviceResponse(message: SysExMessage): number | undefined {
    if (isMessageType(this.config.signature, message, NF1_MESSAGE.patchDump)) {
      return this.config.detectedChannel;
    }
    return undefined;
  }

  generalMessageDelay(): number {
    return this.config.messageDelayMilliseconds;
  }

  // ---- Edit buffer --------------------------------------------------------

  createEditBufferRequest(channel: number): SysExMessage {
    assertChannel(channel);
    return Uint8Array.of(...this.config.signature.header, NF1_MESSAGE.editBufferRequest, SYSEX_END);
  }

  /** A complete plain patch dump; the device answers edit-buffer requests with one. */
  isEditBufferDump(message: SysExMessage): boolean {
    return this.isPlainDump(message);
  }

  convertToEditBuffer(channel: number, message: SysExMessage): SysExMessage {
    assertChannel(channel);
    if (this.isPlainDump(message)) {
      return message;
    }
    if (this.isStoreDump(message)) {
      shouldLog(LogLevel.Debug) && console.error(`${this.id}: repacking save-to-memory dump as edit buffer`);
      return packPackets(this.layout, NF1_MESSAGE.patchDump, this.patchData(message));
    }
    throw new IncompatibleConversionError(
      `${this.name()}: message is neither a patch dump nor a save-to-memory dump`,
    );
  }

  isPartOfEditBufferDump(message: SysExMessage): DumpPart {
    return this.dumpPart(message, [NF1_MESSAGE.patchDump]);
  }

  // ---- Program dump -------------------------------------------------------

  createProgramDumpRequest(channel: number, programNumber: number): SysExMessage {
    assertChannel(channel);
    const { bank, patch } = splitProgramNumber(this.config.addressing, programNumber);
    return Uint8Array.of(...this.config.signature.header, NF1_MESSAGE.patchMemoryRequest, bank, patch, SYSEX_END);
  }

  /** A complete patch dump, with or without memory location. */
  isSingleProgramDump(message: SysExMessage): boolean {
    return this.isPlainDump(message) || this.isStoreDump(message);
  }

  convertToProgramDump(channel: number, message: SysExMessage, programNumber: number): SysExMessage {
    assertChannel(channel);
    if (!this.isSingleProgramDump(message)) {
      throw new IncompatibleConversionError(
        `${this.name()}: message is neither a patch dump nor a save-to-memory dump`,
      );
    }
    const { bank, patch } = splitProgramNumber(this.config.addressing, programNumber);
    shouldLog(LogLevel.Debug) && console.error(`${this.id}: storing patch at bank ${bank}, patch ${patch}`);
    return packPackets(this.layout, NF1_MESSAGE.saveToMemory, this.patchData(message), [bank, patch]);
  }

  numberFromDump(message: SysExMessage): number {
    if (!this.isStoreDump(message)) {
      throw new UnknownAddressError(`${this.name()}: only save-to-memory dumps carry a location`);
    }
    const [bank, patch] = packetAddress(this.layout, message, ADDRESS_LENGTH);
    const { bankSize, bankCount } = this.config.addressing;
    if (bank >= bankCount || patch >= bankSize) {
      throw new MalformedFramingError(`${this.name()}: invalid location bank ${bank}, patch ${patch}`);
    }
    return bank * bankSize + patch;
  }

  isPartOfSingleProgramDump(message: SysExMessage): DumpPart {
    return this.dumpPart(message, [NF1_MESSAGE.patchDump, NF1_MESSAGE.saveToMemory]);
  }

  // ---- Names and fingerprint ----------------------------------------------

  nameFromDump(message: SysExMessage): string {
    return this.names.decode(this.patchData(message));
  }

  /** Renamed copy of the dump; save-to-memory dumps keep their location. */
  renamePatch(message: SysExMessage, name: string): SysExMessage {
    const patchData = this.names.update(this.patchData(message), name);
    if (this.isStoreDump(message)) {
      const address = packetAddress(this.layout, message, ADDRESS_LENGTH);
      return packPackets(this.layout, NF1_MESSAGE.saveToMemory, patchData, address);
    }
    return packPackets(this.layout, NF1_MESSAGE.patchDump, patchData);
  }

  /** Decoded names keep their padding; trailing blanks are ignored here. */
  isDefaultName(name: string): boolean {
    return name.trimEnd() === this.config.defaultName;
  }

  calculateFingerprint(message: SysExMessage): string {
    return fingerprintPatch(this.patchData(message), this.names);
  }

  friendlyBankName(bank: number): string {
    return friendlyBankName(this.config.addressing, bank);
  }

  friendlyProgramName(programNumber: number): string {
    return friendlyProgramName(this.config.addressing, programNumber);
  }

  // ---- Internals ----------------------------------------------------------

  /** Plain patch dump of the exact length with one end marker per packet. */
  private isPlainDump(message: SysExMessage): boolean {
    return (
      isMessageType(this.config.signature, message, NF1_MESSAGE.patchDump) &&
      message.length === this.plainDumpLength &&
      countEndMarkers(message) === this.packets
    );
  }

  /** Save-to-memory dump of the exact length with one end marker per packet. */
  private isStoreDump(message: SysExMessage): boolean {
    return (
      isMessageType(this.config.signature, message, NF1_MESSAGE.saveToMemory) &&
      message.length === this.storeDumpLength &&
      countEndMarkers(message) === this.packets
    );
  }

  /** The 144 patch bytes of either dump form. */
  private patchData(message: SysExMessage): PatchData {
    let patchData: PatchData;
    if (this.isPlainDump(message)) {
      patchData = unpackPackets(this.layout, message);
    } else if (this.isStoreDump(message)) {
      patchData = unpackPackets(this.layout, message, { addressLength: ADDRESS_LENGTH });
    } else {
      throw new InvalidMessageTypeError(
        `${this.name()}: not a patch dump (${message.length} bytes, ${bytesToHexString(message.subarray(0, 8))}...)`,
      );
    }
    shouldLog(LogLevel.Midi) && console.error(`${this.id}: patch data ${bytesToHexString(patchData)}`);
    return patchData;
  }

  private dumpPart(message: SysExMessage, types: readonly number[]): DumpPart {
    const isPart = types.some((type) => isMessageType(this.config.signature, message, type));
    return isPart
      ? { partOf: true, handshake: Uint8Array.from(this.config.acknowledge) }
      : { partOf: false };
  }
}

export const modorNf1 = new ModorNf1Adaptation();
