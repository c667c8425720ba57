/**
 * Encoding of the variable-size payloads stored in the field-data heap.
 */
import { NO_STRING_REF, RESREF_MAX_LENGTH } from '../constants/gff-layout.js';
import { GffError, GffLookupError, GffParseError, GffWriteError } from '../errors.js';
import type { ExoLocString, LocalizedSubstring } from '../field-value.js';
import type { StringResolver } from '../string-resolver.js';
import { isLanguage, packStringId, unpackStringId } from '../types/locale.js';
import { BinaryReader } from './binary-reader.js';
import { BinaryWriter } from './binary-writer.js';
import { decodeLegacy, encodeLegacy } from './legacy-text.js';

/** u32 length followed by the text. */
export function readExoString(reader: BinaryReader): string {
  const length = reader.readUint32();
  return decodeLegacy(reader.readBytes(length));
}

export function writeExoString(writer: BinaryWriter, text: string): void {
  const bytes = encodeLegacy(text);
  writer.writeUint32(bytes.length);
  writer.writeBytes(bytes);
}

/** u8 length (at most 16 bytes are read) followed by the name. */
export function readResRef(reader: BinaryReader): string {
  const length = Math.min(reader.readUint8(), RESREF_MAX_LENGTH);
  return decodeLegacy(reader.readBytes(length));
}

export function writeResRef(writer: BinaryWriter, name: string): void {
  const bytes = encodeLegacy(name);
  if (bytes.length > RESREF_MAX_LENGTH) {
    throw new GffWriteError(`ResRef "${name}" is ${bytes.length} bytes, at most ${RESREF_MAX_LENGTH} allowed`);
  }
  writer.writeUint8(bytes.length);
  writer.writeBytes(bytes);
}

/** u32 length followed by opaque bytes. The result is a copy. */
export function readVoid(reader: BinaryReader): Buffer {
  const length = reader.readUint32();
  return Buffer.from(reader.readBytes(length));
}

export function writeVoid(writer: BinaryWriter, bytes: Uint8Array): void {
  writer.writeUint32(bytes.length);
  writer.writeBytes(bytes);
}

/**
 * Reads a localized string: u32 size of the rest, u32 string reference,
 * u32 substring count, then per substring u32 packed language/gender id,
 * u32 length and the text.
 *
 * @param resolver - Consulted for the string reference unless it is `NO_STRING_REF`
 * @throws {GffLookupError} If the resolver does not know the reference
 */
export function readExoLocString(reader: BinaryReader, resolver?: StringResolver): ExoLocString {
  reader.readUint32();
  const stringRef = reader.readUint32();
  const substringCount = reader.readUint32();

  const substrings: LocalizedSubstring[] = [];
  for (let index = 0; index < substringCount; index++) {
    const stringId = reader.readUint32();
    const { language, gender } = unpackStringId(stringId);
    if (!isLanguage(language)) {
      throw new GffParseError(`Unknown language id ${language} in localized string (string id ${stringId})`);
    }
    const text = readExoString(reader);
    substrings.push({ language, gender, text });
  }

  if (resolver === undefined || stringRef === NO_STRING_REF) {
    return { stringRef, substrings };
  }
  return { stringRef, substrings, resolvedText: lookup(resolver, stringRef) };
}

function lookup(resolver: StringResolver, stringRef: number): string {
  try {
    return resolver.resolve(stringRef);
  } catch (error) {
    if (error instanceof GffError) {
      throw error;
    }
    throw new GffLookupError(stringRef, error);
  }
}

export function writeExoLocString(writer: BinaryWriter, locString: ExoLocString): void {
  const encoded = locString.substrings.map((substring: LocalizedSubstring) => ({
    stringId: packStringId(substring.language, substring.gender),
    bytes: encodeLegacy(substring.text),
  }));
  const bodySize = 8 + encoded.reduce((total, { bytes }) => total + 8 + bytes.length, 0);

  writer.writeUint32(bodySize);
  writer.writeUint32(locString.stringRef);
  writer.writeUint32(encoded.length);
  for (const { stringId, bytes } of encoded) {
    writer.writeUint32(stringId);
    writer.writeUint32(bytes.length);
    writer.writeBytes(bytes);
  }
}
