import { describe, it, expect } from "vitest";
import { ModorNf1Adaptation, modorNf1 } from "../../src/devices/modor-nf1.js";
import { hasBankDump, hasEditBuffer, hasFingerprint, hasProgramDump } from "../../src/devices/types.js";
import {
  IncompatibleConversionError,
  InvalidMessageTypeError,
  MalformedFramingError,
  UnknownAddressError,
  UnsupportedCharacterError,
} from "../../src/errors.js";
import { loadFixture } from "../helpers/fixtures.js";

const editBuffer = loadFixture("nf1-edit-buffer.syx");
const programC03 = loadFixture("nf1-program-c03.syx");
const ACK = [0xf0, 0x42, 0x30, 0x04, 0x41, 0xf7];
const FINGERPRINT = "a0e95db84da438e58818e7557884acd7";

describe("ModorNf1Adaptation", () => {
  it("identifies itself", () => {
    expect(modorNf1.name()).toBe("Modor NF-1(m)");
    expect(modorNf1.id).toBe("modor-nf1");
    expect(modorNf1.bankDescriptors()).toHaveLength(14);
    expect(modorNf1.bankDescriptors()[2].label).toBe("C");
  });

  it("declares edit buffer, program dump and fingerprint capabilities", () => {
    expect(hasEditBuffer(modorNf1)).toBe(true);
    expect(hasProgramDump(modorNf1)).toBe(true);
    expect(hasFingerprint(modorNf1)).toBe(true);
    expect(hasBankDump(modorNf1)).toBe(false);
  });

  describe("classification", () => {
    it("treats the 171-byte three-packet dump as edit buffer and program dump", () => {
      expect(editBuffer.length).toBe(171);
      expect(modorNf1.isEditBufferDump(editBuffer)).toBe(true);
      expect(modorNf1.isSingleProgramDump(editBuffer)).toBe(true);
    });

    it("treats the 177-byte save-to-memory dump as program dump only", () => {
      expect(programC03.length).toBe(177);
      expect(modorNf1.isSingleProgramDump(programC03)).toBe(true);
      expect(modorNf1.isEditBufferDump(programC03)).toBe(false);
    });

    it("rejects a dump with a missing packet end marker", () => {
      const broken = Uint8Array.from(editBuffer);
      broken[63] = 0x00;
      expect(modorNf1.isSingleProgramDump(broken)).toBe(false);
    });

    it("rejects a single packet", () => {
      expect(modorNf1.isEditBufferDump(editBuffer.subarray(0, 64))).toBe(false);
    });
  });

  describe("names", () => {
    it("reads the name from both dump forms", () => {
      expect(modorNf1.nameFromDump(editBuffer)).toBe("VeloNoizPS");
      expect(modorNf1.nameFromDump(programC03)).toBe("VeloNoizPS");
    });

    it("re-packs to identical bytes when the name is unchanged", () => {
      expect(modorNf1.renamePatch(editBuffer, "VeloNoizPS")).toEqual(editBuffer);
      expect(modorNf1.renamePatch(programC03, "VeloNoizPS")).toEqual(programC03);
    });

    it("pads short names and truncates long ones", () => {
      expect(modorNf1.nameFromDump(modorNf1.renamePatch(editBuffer, "Pad"))).toBe("Pad       ");
      expect(modorNf1.nameFromDump(modorNf1.renamePatch(editBuffer, "Brass Section 2"))).toBe("Brass Sect");
      expect(modorNf1.nameFromDump(modorNf1.renamePatch(editBuffer, ""))).toBe("          ");
    });

    it("stores Cyrillic names", () => {
      expect(modorNf1.nameFromDump(modorNf1.renamePatch(editBuffer, "Пад"))).toBe("Пад       ");
    });

    it("rejects characters outside the device alphabet", () => {
      expect(() => modorNf1.renamePatch(editBuffer, "Lead@1")).toThrow(UnsupportedCharacterError);
    });

    it("keeps kind and location when renaming", () => {
      const renamed = modorNf1.renamePatch(programC03, "Bass");
      expect(renamed.length).toBe(177);
      expect(modorNf1.numberFromDump(renamed)).toBe(67);
      expect(modorNf1.isEditBufferDump(modorNf1.renamePatch(editBuffer, "Bass"))).toBe(true);
    });

    it("knows the default name", () => {
      expect(modorNf1.isDefaultName("Init")).toBe(true);
      expect(modorNf1.isDefaultName("Init      ")).toBe(true);
      expect(modorNf1.isDefaultName("Initial")).toBe(false);
    });

    it("fails on messages that are not patch dumps", () => {
      expect(() => modorNf1.nameFromDump(modorNf1.createEditBufferRequest(0))).toThrow(InvalidMessageTypeError);
    });
  });

  describe("addressing", () => {
    it("reads the location of a save-to-memory dump", () => {
      expect(modorNf1.numberFromDump(programC03)).toBe(67);
      expect(modorNf1.friendlyProgramName(67)).toBe("C-03");
      expect(modorNf1.friendlyBankName(2)).toBe("C");
    });

    it("has no location for plain dumps", () => {
      expect(() => modorNf1.numberFromDump(editBuffer)).toThrow(UnknownAddressError);
    });
  });

  describe("conversion", () => {
    it("stores an edit buffer at a location", () => {
      expect(modorNf1.convertToProgramDump(0, editBuffer, 67)).toEqual(programC03);
    });

    it("relocates a save-to-memory dump", () => {
      const moved = modorNf1.convertToProgramDump(0, programC03, 0);
      expect(modorNf1.numberFromDump(moved)).toBe(0);
      expect(Array.from(moved.subarray(0, 9))).toEqual([0xf0, 0x00, 0x21, 0x1c, 0x01, 0x10, 0x00, 0x00, 0x00]);
    });

    it("converts a save-to-memory dump into an edit buffer", () => {
      expect(modorNf1.convertToEditBuffer(0, programC03)).toEqual(editBuffer);
    });

    it("returns edit buffer dumps unchanged", () => {
      expect(modorNf1.convertToEditBuffer(0, editBuffer)).toBe(editBuffer);
    });

    it("refuses other messages", () => {
      const request = modorNf1.createEditBufferRequest(0);
      expect(() => modorNf1.convertToEditBuffer(0, request)).toThrow(IncompatibleConversionError);
      expect(() => modorNf1.convertToProgramDump(0, request, 1)).toThrow(IncompatibleConversionError);
    });

    it("rejects locations outside the device", () => {
      expect(() => modorNf1.convertToProgramDump(0, editBuffer, 448)).toThrow(RangeError);
    });
  });

  describe("fingerprint", () => {
    it("hashes the patch data with the name blanked", () => {
      expect(modorNf1.calculateFingerprint(editBuffer)).toBe(FINGERPRINT);
    });

    it("ignores name and location", () => {
      expect(modorNf1.calculateFingerprint(programC03)).toBe(FINGERPRINT);
      expect(modorNf1.calculateFingerprint(modorNf1.renamePatch(editBuffer, "Other"))).toBe(FINGERPRINT);
      expect(modorNf1.calculateFingerprint(modorNf1.convertToProgramDump(0, editBuffer, 300))).toBe(FINGERPRINT);
    });

    it("changes with any parameter byte", () => {
      const changed = Uint8Array.from(editBuffer);
      changed[7] = 12;
      expect(modorNf1.calculateFingerprint(changed)).not.toBe(FINGERPRINT);
    });
  });

  describe("requests and detection", () => {
    it("builds the edit buffer request", () => {
      expect(Array.from(modorNf1.createEditBufferRequest(0))).toEqual([0xf0, 0x00, 0x21, 0x1c, 0x01, 0x05, 0xf7]);
      expect(modorNf1.createDeviceDetectMessage(3)).toEqual(modorNf1.createEditBufferRequest(3));
    });

    it("builds the patch memory request", () => {
      expect(Array.from(modorNf1.createProgramDumpRequest(0, 67))).toEqual([
        0xf0, 0x00, 0x21, 0x1c, 0x01, 0x0f, 0x02, 0x03, 0xf7,
      ]);
    });

    it("rejects bad channels and program numbers", () => {
      expect(() => modorNf1.createEditBufferRequest(16)).toThrow(RangeError);
      expect(() => modorNf1.createProgramDumpRequest(0, -1)).toThrow(RangeError);
    });

    it("accepts any patch dump as detection reply on the fixed channel", () => {
      expect(modorNf1.needsChannelSpecificDetection()).toBe(false);
      expect(modorNf1.channelIfValidDeviceResponse(editBuffer)).toBe(9);
      expect(modorNf1.channelIfValidDeviceResponse(editBuffer.subarray(0, 64))).toBe(9);
      expect(modorNf1.channelIfValidDeviceResponse(programC03)).toBeUndefined();
    });

    it("provides timing hints", () => {
      expect(modorNf1.deviceDetectWaitMilliseconds()).toBe(200);
      expect(modorNf1.generalMessageDelay()).toBe(10);
    });

    it("acknowledges every packet of a dump", () => {
      expect(modorNf1.isPartOfEditBufferDump(editBuffer.subarray(0, 64))).toEqual({
        partOf: true,
        handshake: Uint8Array.from(ACK),
      });
      expect(modorNf1.isPartOfSingleProgramDump(programC03.subarray(0, 66)).partOf).toBe(true);
      expect(modorNf1.isPartOfEditBufferDump(programC03.subarray(0, 66))).toEqual({ partOf: false });
    });

    it("selects banks with CC#32", () => {
      expect(Array.from(modorNf1.bankSelect(9, 2))).toEqual([0xb9, 32, 2]);
    });

    it("explains the setup", () => {
      expect(modorNf1.setupHelp().split("\n")[0]).toBe("Modor NF-1(m) setup:");
    });
  });

  it("uses the header of an injected configuration", () => {
    const custom = new ModorNf1Adaptation({
      ...modorNf1.config,
      signature: { header: [0xf0, 0x00, 0x21, 0x1c, 0x02], typeOffset: 5 },
    });
    expect(Array.from(custom.createEditBufferRequest(0))).toEqual([0xf0, 0x00, 0x21, 0x1c, 0x02, 0x05, 0xf7]);
  });

  it("writes dumps the injected configuration recognizes", () => {
    const custom = new ModorNf1Adaptation({
      ...modorNf1.config,
      signature: { header: [0xf0, 0x00, 0x21, 0x1c, 0x02], typeOffset: 5 },
    });
    const input = Uint8Array.from(editBuffer);
    for (const packetStart of [0, 64, 128]) {
      input[packetStart + 4] = 0x02;
    }
    expect(custom.isEditBufferDump(input)).toBe(true);
    expect(modorNf1.isEditBufferDump(input)).toBe(false);

    const renamed = custom.renamePatch(input, "Bass");
    expect(Array.from(renamed.subarray(0, 5))).toEqual([0xf0, 0x00, 0x21, 0x1c, 0x02]);
    expect(custom.isEditBufferDump(renamed)).toBe(true);
    expect(custom.nameFromDump(renamed)).toBe("Bass      ");

    const stored = custom.convertToProgramDump(0, input, 67);
    expect(custom.numberFromDump(stored)).toBe(67);
  });

  it("keeps every location through a conversion", () => {
    for (let n = 0; n < 448; n++) {
      expect(modorNf1.numberFromDump(modorNf1.convertToProgramDump(0, editBuffer, n))).toBe(n);
    }
  });

  it("rejects a save-to-memory dump whose packets disagree on the location", () => {
    const stored = Uint8Array.from(programC03);
    stored[66 + 6] = 5;
    expect(() => modorNf1.numberFromDump(stored)).toThrow(MalformedFramingError);
    expect(() => modorNf1.nameFromDump(stored)).toThrow("Packet 1 address differs from packet 0");
  });
});
