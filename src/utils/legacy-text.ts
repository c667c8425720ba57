/**
 * Text codecs for the game's single-byte Windows-1252 strings and the
 * fixed-width slots (labels, header tags) that hold them.
 */
import iconv from 'iconv-lite';
import { TextDecoder } from 'node:util';
import { LABEL_SIZE, TAG_SIZE } from '../constants/gff-layout.js';
import { GffParseError, GffWriteError } from '../errors.js';

const LEGACY_ENCODING = 'windows1252';

const tagDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Bytes the code page leaves undefined. They decode to the C1 control with the
 * same value and encode back from it, so every byte value survives a round trip.
 */
const UNDEFINED_BYTES: ReadonlySet<number> = new Set([0x81, 0x8d, 0x8f, 0x90, 0x9d]);

function codePointLabel(char: string): string {
  return `U+${(char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')}`;
}

export function decodeLegacy(bytes: Uint8Array): string {
  const text = iconv.decode(Buffer.from(bytes), LEGACY_ENCODING);
  if (!bytes.some((byte) => UNDEFINED_BYTES.has(byte))) {
    return text;
  }
  // Single-byte code page: character i comes from byte i.
  return Array.from(bytes, (byte, index) => (UNDEFINED_BYTES.has(byte) ? String.fromCharCode(byte) : text[index])).join('');
}

/**
 * @throws {GffWriteError} If a character has no Windows-1252 byte
 */
export function encodeLegacy(text: string): Buffer {
  const bytes: number[] = [];
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (UNDEFINED_BYTES.has(code)) {
      bytes.push(code);
      continue;
    }
    const encoded = iconv.encode(char, LEGACY_ENCODING);
    if (
      encoded.length !== 1
      || UNDEFINED_BYTES.has(encoded[0])
      || iconv.decode(encoded, LEGACY_ENCODING) !== char
    ) {
      throw new GffWriteError(`Character "${char}" (${codePointLabel(char)}) has no Windows-1252 encoding`);
    }
    bytes.push(encoded[0]);
  }
  return Buffer.from(bytes);
}

/**
 * Decodes a 16-byte label slot. The label ends at the first NUL byte, or
 * fills the whole slot when there is none.
 */
export function decodeLabel(slot: Uint8Array): string {
  const end: number = slot.indexOf(0);
  return decodeLegacy(end === -1 ? slot : slot.subarray(0, end));
}

/**
 * Encodes a label into a zero-padded 16-byte slot. Bytes past the slot width
 * are dropped.
 * @throws {GffWriteError} If a character has no Windows-1252 byte
 */
export function encodeLabel(label: string): Buffer {
  const slot: Buffer = Buffer.alloc(LABEL_SIZE);
  encodeLegacy(label).copy(slot, 0, 0, LABEL_SIZE);
  return slot;
}

/** Byte width of a label once encoded, before truncation. */
export function encodedLabelLength(label: string): number {
  return encodeLegacy(label).length;
}

export function decodeTag(bytes: Uint8Array): string {
  try {
    return tagDecoder.decode(bytes);
  } catch (error) {
    throw new GffParseError(`Header tag is not valid UTF-8: ${Buffer.from(bytes).toString('hex')}`, error);
  }
}

export function encodeTag(tag: string): Buffer {
  const bytes: Buffer = Buffer.from(tag, 'utf8');
  if (bytes.length !== TAG_SIZE) {
    throw new GffWriteError(`Header tag "${tag}" must encode to ${TAG_SIZE} bytes, got ${bytes.length}`);
  }
  return bytes;
}
