/**
 * Fixed-width patch name fields.
 *
 * A device stores its patch name as `length` bytes at `offset` inside the
 * patch data, each byte mapped through a character table: either an explicit
 * alphabet (byte = index into the alphabet) or plain ASCII (byte = char code).
 * Every character `decode` returns can be passed back to `encode`.
 */

import { MalformedFramingError, UnsupportedCharacterError } from "../errors.js";
import type { PatchData } from "../types.js";

export type CharacterTable =
  | {
      kind: "alphabet";
      /** Ordered characters; the byte value is the index. First occurrence wins on encode. */
      characters: string;
      /** Padding character, must be part of the alphabet. */
      blank: string;
      /** Shown for byte values past the end of the alphabet. */
      placeholder: string;
    }
  | {
      kind: "ascii";
      /** Padding character, printable ASCII. */
      blank: string;
    };

export interface NameField {
  /** Byte offset of the name inside the patch data. */
  offset: number;
  /** Field width in bytes (= characters). */
  length: number;
  table: CharacterTable;
  /** Strip surrounding blanks when decoding. */
  trim?: boolean;
}

const ASCII_PRINTABLE_FIRST = 0x20;
const ASCII_PRINTABLE_LAST = 0x7e;

export class NameCodec {
  readonly field: NameField;
  private readonly decodeTable: readonly string[];
  private readonly encodeTable: ReadonlyMap<string, number>;

  constructor(field: NameField) {
    this.field = field;
    this.decodeTable = decodeCharacters(field.table);
    const encodeTable = new Map<string, number>();
    this.decodeTable.forEach((ch, code) => {
      if (!encodeTable.has(ch) && isEncodable(field.table, code)) {
        encodeTable.set(ch, code);
      }
    });
    this.encodeTable = encodeTable;
    if (!encodeTable.has(field.table.blank)) {
      throw new Error(`Blank character "${field.table.blank}" is not part of the character table`);
    }
  }

  /**
   * Read the name stored in `patchData`.
   * @throws {MalformedFramingError} if the patch data is too short to hold the field.
   */
  decode(patchData: PatchData): string {
    const { offset, length, table } = this.field;
    if (patchData.length < offset + length) {
      throw new MalformedFramingError(
        `Patch data of ${patchData.length} bytes cannot hold a name at ${offset}..${offset + length}`,
      );
    }
    let name = "";
    for (const byte of patchData.subarray(offset, offset + length)) {
      name += byte < this.decodeTable.length ? this.decodeTable[byte] : placeholderFor(table);
    }
    return this.field.trim ? name.trim() : name;
  }

  /**
   * Encode `text` into exactly `length` bytes: truncate, pad with the blank
   * character, map through the table.
   * @throws {UnsupportedCharacterError} for a character outside the table.
   */
  encode(text: string): Uint8Array {
    const { length, table } = this.field;
    const characters = Array.from(text).slice(0, length);
    while (characters.length < length) {
      characters.push(table.blank);
    }
    return Uint8Array.from(characters, (ch) => {
      const code = this.encodeTable.get(ch);
      if (code === undefined) {
        throw new UnsupportedCharacterError(ch, text);
      }
      return code;
    });
  }

  /** Copy of `patchData` with the name field replaced; all other bytes unchanged. */
  update(patchData: PatchData, text: string): PatchData {
    const encoded = this.encode(text);
    const { offset, length } = this.field;
    if (patchData.length < offset + length) {
      throw new MalformedFramingError(
        `Patch data of ${patchData.length} bytes cannot hold a name at ${offset}..${offset + length}`,
      );
    }
    const updated = Uint8Array.from(patchData);
    updated.set(encoded, offset);
    return updated;
  }

  /** Copy of `patchData` with the name field filled with the blank character. */
  blank(patchData: PatchData): PatchData {
    return this.update(patchData, "");
  }

  /** True if every character of `text` can be stored. */
  supports(text: string): boolean {
    return Array.from(text).every((ch) => this.encodeTable.has(ch));
  }
}

/**
 * Character for every byte value the table defines. ASCII covers 0-255 on
 * decode; bytes it cannot write back (NUL padding, controls, 0x7F and up)
 * read as the blank.
 */
function decodeCharacters(table: CharacterTable): string[] {
  if (table.kind === "alphabet") {
    return Array.from(table.characters);
  }
  return Array.from({ length: 256 }, (_, code) =>
    isPrintableAscii(code) ? String.fromCharCode(code) : table.blank,
  );
}

function isPrintableAscii(code: number): boolean {
  return code >= ASCII_PRINTABLE_FIRST && code <= ASCII_PRINTABLE_LAST;
}

/** ASCII tables only write printable characters. */
function isEncodable(table: CharacterTable, code: number): boolean {
  return table.kind === "alphabet" || isPrintableAscii(code);
}

function placeholderFor(table: CharacterTable): string {
  return table.kind === "alphabet" ? table.placeholder : table.blank;
}
