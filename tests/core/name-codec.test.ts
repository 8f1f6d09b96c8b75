import { describe, it, expect } from "vitest";
import { NameCodec, type NameField } from "../../src/core/name-codec.js";
import { MalformedFramingError, UnsupportedCharacterError } from "../../src/errors.js";

const alphabetField: NameField = {
  offset: 1,
  length: 4,
  table: { kind: "alphabet", characters: " ABC D", blank: " ", placeholder: "_" },
};

const asciiField: NameField = {
  offset: 0,
  length: 5,
  table: { kind: "ascii", blank: " " },
  trim: true,
};

describe("NameCodec with an alphabet", () => {
  const codec = new NameCodec(alphabetField);

  it("decodes indices into the alphabet", () => {
    expect(codec.decode(Uint8Array.of(9, 1, 2, 3, 0, 9))).toBe("ABC ");
  });

  it("shows the placeholder for bytes past the alphabet", () => {
    expect(codec.decode(Uint8Array.of(0, 1, 9, 2, 3))).toBe("A_BC");
  });

  it("pads short names with the blank", () => {
    expect(Array.from(codec.encode("AB"))).toEqual([1, 2, 0, 0]);
    expect(Array.from(codec.encode(""))).toEqual([0, 0, 0, 0]);
  });

  it("truncates long names", () => {
    expect(Array.from(codec.encode("ABCAB"))).toEqual([1, 2, 3, 1]);
  });

  it("uses the first occurrence of a repeated character", () => {
    expect(Array.from(codec.encode("D  "))).toEqual([5, 0, 0, 0]);
  });

  it("rejects characters outside the alphabet", () => {
    let caught: unknown;
    try {
      codec.encode("AZ");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnsupportedCharacterError);
    if (caught instanceof UnsupportedCharacterError) {
      expect(caught.kind).toBe("UnsupportedCharacter");
      expect(caught.character).toBe("Z");
    }
  });

  it("rejects the placeholder itself", () => {
    expect(codec.supports("A_")).toBe(false);
    expect(codec.supports("CAB D")).toBe(true);
  });

  it("updates a copy and leaves the input untouched", () => {
    const patch = Uint8Array.of(9, 1, 2, 3, 0, 9);
    const updated = codec.update(patch, "DC");
    expect(Array.from(updated)).toEqual([9, 5, 3, 0, 0, 9]);
    expect(Array.from(patch)).toEqual([9, 1, 2, 3, 0, 9]);
  });

  it("blanks the name field only", () => {
    expect(Array.from(codec.blank(Uint8Array.of(9, 1, 2, 3, 4, 9)))).toEqual([9, 0, 0, 0, 0, 9]);
  });

  it("fails on patch data too short for the field", () => {
    expect(() => codec.decode(Uint8Array.of(0, 1, 2))).toThrow(MalformedFramingError);
    expect(() => codec.update(Uint8Array.of(0, 1, 2), "A")).toThrow(MalformedFramingError);
  });

  it("requires the blank to be part of the alphabet", () => {
    expect(
      () => new NameCodec({ offset: 0, length: 2, table: { kind: "alphabet", characters: "AB", blank: " ", placeholder: "?" } }),
    ).toThrow('Blank character " " is not part of the character table');
  });
});

describe("NameCodec with ASCII", () => {
  const codec = new NameCodec(asciiField);

  it("decodes and trims", () => {
    expect(codec.decode(Uint8Array.of(0x48, 0x69, 0x20, 0x20, 0x20, 0x41))).toBe("Hi");
  });

  it("reads bytes outside printable ASCII as the blank", () => {
    expect(codec.decode(Uint8Array.of(0x41, 0xdc, 0x42, 0x20, 0x20))).toBe("A B");
    expect(codec.decode(Uint8Array.of(0x41, 0x7f, 0x1b, 0x42, 0x43))).toBe("A  BC");
  });

  it("reads a NUL-padded field and writes it back", () => {
    const stored = Uint8Array.of(0x41, 0x63, 0x00, 0x00, 0x00);
    const name = codec.decode(stored);
    expect(name).toBe("Ac");
    expect(Array.from(codec.update(stored, name))).toEqual([0x41, 0x63, 0x20, 0x20, 0x20]);
  });

  it("encodes printable characters only", () => {
    expect(Array.from(codec.encode("Hi"))).toEqual([0x48, 0x69, 0x20, 0x20, 0x20]);
    expect(() => codec.encode("Über")).toThrow('Unsupported character "Ü" in name "Über"');
    expect(() => codec.encode("a\tb")).toThrow(UnsupportedCharacterError);
  });

  it("re-encoding a decoded name is byte-identical", () => {
    const patch = Uint8Array.of(0x4c, 0x65, 0x61, 0x64, 0x20);
    expect(codec.update(patch, codec.decode(patch))).toEqual(patch);
  });
});
