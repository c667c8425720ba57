/**
 * GFF binary helpers: the flat header/record/heap layer.
 */
import { readFile, writeFile } from 'node:fs/promises';
import {
  FIELD_SIZE,
  HEADER_SIZE,
  INDEX_SIZE,
  LABEL_SIZE,
  STRUCT_SIZE,
  TAG_SIZE,
} from './constants/gff-layout.js';
import { describeError, GffAlignmentError, GffError, GffParseError, GffWriteError } from './errors.js';
import { FieldType, isComplexFieldType, isFieldType } from './types/field-type.js';
import type {
  BinaryField,
  BinaryStruct,
  FieldData,
  GffBinaryStructure,
  GffHeader,
  StructLayout,
} from './types/gff-binary-structure.js';
import { BinaryReader } from './utils/binary-reader.js';
import { decodeLabel, decodeTag, encodeLabel, encodeTag } from './utils/legacy-text.js';

/**
 * Reads the 56-byte header.
 * @throws {GffParseError} If a tag is not valid UTF-8
 */
function readHeader(reader: BinaryReader): GffHeader {
  return {
    fileType: decodeTag(reader.readBytes(TAG_SIZE)),
    fileVersion: decodeTag(reader.readBytes(TAG_SIZE)),
    structOffset: reader.readUint32(),
    structCount: reader.readUint32(),
    fieldOffset: reader.readUint32(),
    fieldCount: reader.readUint32(),
    labelOffset: reader.readUint32(),
    labelCount: reader.readUint32(),
    fieldDataOffset: reader.readUint32(),
    fieldDataCount: reader.readUint32(),
    fieldIndicesOffset: reader.readUint32(),
    fieldIndicesCount: reader.readUint32(),
    listIndicesOffset: reader.readUint32(),
    listIndicesCount: reader.readUint32(),
  };
}

function readStructs(reader: BinaryReader, header: GffHeader): BinaryStruct[] {
  reader.seek(header.structOffset);
  const structs: BinaryStruct[] = [];
  for (let index = 0; index < header.structCount; index++) {
    const typeId = reader.readUint32();
    const dataOrOffset = reader.readUint32();
    const fieldCount = reader.readUint32();
    structs.push({ typeId, dataOrOffset, fieldCount });
  }
  return structs;
}

function readFields(reader: BinaryReader, header: GffHeader): BinaryField[] {
  reader.seek(header.fieldOffset);
  const fields: BinaryField[] = [];
  for (let index = 0; index < header.fieldCount; index++) {
    const fieldType = reader.readUint32();
    if (!isFieldType(fieldType)) {
      throw new GffParseError(`Invalid field type ${fieldType} for field ${index}`);
    }
    const labelIndex = reader.readUint32();
    const dataOrOffset = reader.readUint32();
    fields.push({ fieldType, labelIndex, dataOrOffset });
  }
  return fields;
}

function readLabels(reader: BinaryReader, header: GffHeader): string[] {
  reader.seek(header.labelOffset);
  const labels: string[] = [];
  for (let index = 0; index < header.labelCount; index++) {
    labels.push(decodeLabel(reader.readBytes(LABEL_SIZE)));
  }
  return labels;
}

/** `byteCount / 4` little-endian u32 entries; a partial trailing entry is ignored. */
function readIndexArray(reader: BinaryReader, offset: number, byteCount: number): number[] {
  reader.seek(offset);
  const entries: number[] = [];
  const entryCount = Math.floor(byteCount / INDEX_SIZE);
  for (let index = 0; index < entryCount; index++) {
    entries.push(reader.readUint32());
  }
  return entries;
}

function sectionEnd(header: GffHeader): number {
  return Math.max(
    HEADER_SIZE,
    header.structOffset + header.structCount * STRUCT_SIZE,
    header.fieldOffset + header.fieldCount * FIELD_SIZE,
    header.labelOffset + header.labelCount * LABEL_SIZE,
    header.fieldDataOffset + header.fieldDataCount,
    header.fieldIndicesOffset + header.fieldIndicesCount,
    header.listIndicesOffset + header.listIndicesCount
  );
}

/**
 * Checks that the header describes the arrays it is stored with.
 * @throws {GffWriteError} On any mismatch
 */
function ensureConsistent(structure: GffBinaryStructure): void {
  const { header } = structure;
  const expectations: [string, number, number][] = [
    ['struct count', header.structCount, structure.structs.length],
    ['field count', header.fieldCount, structure.fields.length],
    ['label count', header.labelCount, structure.labels.length],
    ['field data size', header.fieldDataCount, structure.fieldData.length],
    ['field indices size', header.fieldIndicesCount, structure.fieldIndices.length * INDEX_SIZE],
    ['list indices size', header.listIndicesCount, structure.listIndices.length * INDEX_SIZE],
  ];
  for (const [name, declared, actual] of expectations) {
    if (declared !== actual) {
      throw new GffWriteError(`Header ${name} ${declared} does not match the stored ${actual}`);
    }
  }
}

function readFieldIndicesEntry(structure: GffBinaryStructure, entry: number): number {
  if (entry >= structure.fieldIndices.length) {
    throw new GffParseError(`Field indices entry ${entry} is out of range (${structure.fieldIndices.length} entries)`);
  }
  return structure.fieldIndices[entry];
}

function writeHeader(buffer: Buffer, header: GffHeader): void {
  encodeTag(header.fileType).copy(buffer, 0);
  encodeTag(header.fileVersion).copy(buffer, TAG_SIZE);
  const values: number[] = [
    header.structOffset, header.structCount,
    header.fieldOffset, header.fieldCount,
    header.labelOffset, header.labelCount,
    header.fieldDataOffset, header.fieldDataCount,
    header.fieldIndicesOffset, header.fieldIndicesCount,
    header.listIndicesOffset, header.listIndicesCount,
  ];
  values.forEach((value: number, index: number) => {
    buffer.writeUInt32LE(value, TAG_SIZE * 2 + index * 4);
  });
}

function writeIndexArray(buffer: Buffer, offset: number, entries: readonly number[]): void {
  entries.forEach((entry: number, index: number) => {
    buffer.writeUInt32LE(entry, offset + index * INDEX_SIZE);
  });
}

/**
 * GFF (Generic File Format) binary processing utilities.
 * Reads the header and the six sections into flat arrays and writes them back.
 */
export class GffBinary {
  /**
   * Parses a GFF file held in memory.
   *
   * @param buffer - Complete file contents
   * @returns Header, records, labels, heap and index arrays
   * @throws {GffParseError} If the data is truncated, a header tag is not valid
   * UTF-8, or a field carries an unknown type
   */
  static parse(buffer: Buffer): GffBinaryStructure {
    if (buffer.length < HEADER_SIZE) {
      throw new GffParseError(`Data too small to be GFF: ${buffer.length} bytes, header needs ${HEADER_SIZE}`);
    }
    const reader = new BinaryReader(buffer);
    const header = readHeader(reader);
    const structs = readStructs(reader, header);
    const fields = readFields(reader, header);
    const labels = readLabels(reader, header);

    reader.seek(header.fieldDataOffset);
    const fieldData = Buffer.from(reader.readBytes(header.fieldDataCount));

    const fieldIndices = readIndexArray(reader, header.fieldIndicesOffset, header.fieldIndicesCount);
    const listIndices = readIndexArray(reader, header.listIndicesOffset, header.listIndicesCount);

    const end = sectionEnd(header);
    if (buffer.length > end) {
      console.warn(`GFF data has ${buffer.length - end} trailing bytes after the last section`);
    }

    return { header, structs, fields, labels, fieldData, fieldIndices, listIndices };
  }

  /**
   * Reads and parses a GFF file from disk.
   * @throws {GffError} If the file cannot be read
   * @throws {GffParseError} If the contents are not valid GFF
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<GffBinaryStructure> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new GffError(`Failed to read "${filePath}": ${describeError(error)}`, error);
    }
    return GffBinary.parse(buffer);
  }

  /**
   * Lays out the header and sections at the offsets the header declares.
   * @throws {GffWriteError} If the header disagrees with the arrays or a tag is not 4 bytes
   */
  static serialize(structure: GffBinaryStructure): Buffer {
    ensureConsistent(structure);
    const { header } = structure;
    const buffer: Buffer = Buffer.alloc(sectionEnd(header));

    writeHeader(buffer, header);

    structure.structs.forEach((struct: BinaryStruct, index: number) => {
      const offset = header.structOffset + index * STRUCT_SIZE;
      buffer.writeUInt32LE(struct.typeId, offset);
      buffer.writeUInt32LE(struct.dataOrOffset, offset + 4);
      buffer.writeUInt32LE(struct.fieldCount, offset + 8);
    });

    structure.fields.forEach((field: BinaryField, index: number) => {
      const offset = header.fieldOffset + index * FIELD_SIZE;
      buffer.writeUInt32LE(field.fieldType, offset);
      buffer.writeUInt32LE(field.labelIndex, offset + 4);
      buffer.writeUInt32LE(field.dataOrOffset, offset + 8);
    });

    structure.labels.forEach((label: string, index: number) => {
      encodeLabel(label).copy(buffer, header.labelOffset + index * LABEL_SIZE);
    });

    structure.fieldData.copy(buffer, header.fieldDataOffset);
    writeIndexArray(buffer, header.fieldIndicesOffset, structure.fieldIndices);
    writeIndexArray(buffer, header.listIndicesOffset, structure.listIndices);

    return buffer;
  }

  /**
   * Serializes a structure and writes it to disk. The whole file is built in
   * memory before anything is written.
   * @throws {GffWriteError} If serializing or writing fails
   */
  static async write({ structure, outputPath }: { readonly structure: GffBinaryStructure; readonly outputPath: string }): Promise<void> {
    const buffer = GffBinary.serialize(structure);
    try {
      await writeFile(outputPath, buffer);
    } catch (error) {
      throw new GffWriteError(`Failed to write "${outputPath}": ${describeError(error)}`, error);
    }
  }

  /**
   * Decodes where a struct's fields live.
   * @throws {GffAlignmentError} If a multi-field struct's offset is not 4-byte aligned
   */
  static decodeStructLayout(struct: BinaryStruct): StructLayout {
    if (struct.fieldCount === 0) {
      return { kind: 'empty', literal: struct.dataOrOffset };
    }
    if (struct.fieldCount === 1) {
      return { kind: 'single', fieldIndex: struct.dataOrOffset };
    }
    if (struct.dataOrOffset % INDEX_SIZE !== 0) {
      throw new GffAlignmentError(struct.dataOrOffset);
    }
    return { kind: 'indices', entryIndex: struct.dataOrOffset / INDEX_SIZE };
  }

  /**
   * Decodes where a field's value lives.
   * @throws {GffAlignmentError} If a list field's offset is not 4-byte aligned
   */
  static decodeFieldData(field: BinaryField): FieldData {
    if (!isComplexFieldType(field.fieldType)) {
      return { kind: 'inline', raw: field.dataOrOffset };
    }
    switch (field.fieldType) {
      case FieldType.Struct:
        return { kind: 'struct', structIndex: field.dataOrOffset };
      case FieldType.List:
        if (field.dataOrOffset % INDEX_SIZE !== 0) {
          throw new GffAlignmentError(field.dataOrOffset, 'list indices');
        }
        return { kind: 'list', entryIndex: field.dataOrOffset / INDEX_SIZE };
      default:
        return { kind: 'heap', offset: field.dataOrOffset };
    }
  }

  /**
   * Looks up the `index`-th field of a struct.
   *
   * @returns The field record, or undefined when `index` is not below the struct's field count
   * @throws {GffAlignmentError} If a multi-field struct's offset is not 4-byte aligned
   * @throws {GffParseError} If the struct points outside the field or field-indices arrays
   */
  static getField(structure: GffBinaryStructure, struct: BinaryStruct, index: number): BinaryField | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= struct.fieldCount) {
      return undefined;
    }
    const layout = GffBinary.decodeStructLayout(struct);
    if (layout.kind === 'empty') {
      return undefined;
    }
    const fieldIndex: number = layout.kind === 'single'
      ? layout.fieldIndex
      : readFieldIndicesEntry(structure, layout.entryIndex + index);
    if (fieldIndex >= structure.fields.length) {
      throw new GffParseError(`Field index ${fieldIndex} is out of range (${structure.fields.length} fields)`);
    }
    return structure.fields[fieldIndex];
  }
}
