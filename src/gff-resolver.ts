/**
 * Turns the flat binary records into the resolved, editable tree.
 */
import { INDEX_SIZE } from './constants/gff-layout.js';
import { GffParseError } from './errors.js';
import { FieldCell } from './field-cell.js';
import type { GffValue } from './field-value.js';
import { GffBinary } from './gff-binary.js';
import { GffStruct } from './gff-struct.js';
import type { StringResolver } from './string-resolver.js';
import { FieldType } from './types/field-type.js';
import type { BinaryField, GffBinaryStructure } from './types/gff-binary-structure.js';
import { BinaryReader } from './utils/binary-reader.js';
import { readExoLocString, readExoString, readResRef, readVoid } from './utils/heap-codec.js';

const floatScratch: Buffer = Buffer.alloc(4);

function reinterpretFloat(raw: number): number {
  floatScratch.writeUInt32LE(raw >>> 0, 0);
  return floatScratch.readFloatLE(0);
}

class TreeResolver {
  /** Structs currently being resolved, to reject self-containing structs. */
  private readonly ancestors = new Set<number>();

  constructor(
    private readonly structure: GffBinaryStructure,
    private readonly resolver: StringResolver | undefined
  ) {}

  resolveStruct(structIndex: number): GffStruct {
    const { structs, labels } = this.structure;
    if (structIndex >= structs.length) {
      throw new GffParseError(`Struct index ${structIndex} is out of range (${structs.length} structs)`);
    }
    if (this.ancestors.has(structIndex)) {
      throw new GffParseError(`Struct ${structIndex} contains itself`);
    }
    this.ancestors.add(structIndex);

    const struct = structs[structIndex];
    const cells: FieldCell[] = [];
    for (let index = 0; index < struct.fieldCount; index++) {
      const field = GffBinary.getField(this.structure, struct, index);
      if (field === undefined) {
        throw new GffParseError(`Struct ${structIndex} has no field ${index}`);
      }
      if (field.labelIndex >= labels.length) {
        throw new GffParseError(`Label index ${field.labelIndex} is out of range (${labels.length} labels)`);
      }
      cells.push(new FieldCell(labels[field.labelIndex], this.resolveField(field)));
    }

    this.ancestors.delete(structIndex);
    return new GffStruct(struct.typeId, cells, { kind: 'file', dataOrOffset: struct.dataOrOffset });
  }

  resolveField(field: BinaryField): GffValue {
    const data = GffBinary.decodeFieldData(field);
    switch (data.kind) {
      case 'inline':
        return this.resolveInline(field.fieldType, data.raw);
      case 'heap':
        return this.resolveHeap(field.fieldType, data.offset);
      case 'struct':
        return { type: 'Struct', value: this.resolveStruct(data.structIndex) };
      case 'list':
        return { type: 'List', value: this.resolveList(data.entryIndex) };
    }
  }

  private resolveInline(fieldType: FieldType, raw: number): GffValue {
    switch (fieldType) {
      case FieldType.Byte:
        return { type: 'Byte', value: raw & 0xff };
      case FieldType.Char:
        return { type: 'Char', value: raw >>> 0 };
      case FieldType.Word:
        return { type: 'Word', value: raw & 0xffff };
      case FieldType.Short:
        return { type: 'Short', value: (raw << 16) >> 16 };
      case FieldType.DWord:
        return { type: 'DWord', value: raw >>> 0 };
      case FieldType.Int:
        return { type: 'Int', value: raw | 0 };
      case FieldType.Float: {
        const value = reinterpretFloat(raw);
        // NaN payloads do not survive a trip through a JS number.
        return Number.isNaN(value) ? { type: 'Float', value, bits: raw >>> 0 } : { type: 'Float', value };
      }
      default:
        throw new GffParseError(`Field type ${FieldType[fieldType]} is not stored inline`);
    }
  }

  private resolveHeap(fieldType: FieldType, offset: number): GffValue {
    const reader = new BinaryReader(this.structure.fieldData, 0, 'field data');
    reader.seek(offset);
    switch (fieldType) {
      case FieldType.DWord64:
        return { type: 'DWord64', value: reader.readUint64() };
      case FieldType.Int64:
        return { type: 'Int64', value: reader.readInt64() };
      case FieldType.Double:
        return { type: 'Double', value: reader.readDouble() };
      case FieldType.ExoString:
        return { type: 'ExoString', value: readExoString(reader) };
      case FieldType.ResRef:
        return { type: 'ResRef', value: readResRef(reader) };
      case FieldType.ExoLocString:
        return { type: 'ExoLocString', value: readExoLocString(reader, this.resolver) };
      case FieldType.Void:
        return { type: 'Void', value: readVoid(reader) };
      default:
        throw new GffParseError(`Field type ${FieldType[fieldType]} is not stored in field data`);
    }
  }

  /** The entry holds the struct count; the struct indices follow it. */
  private resolveList(entryIndex: number): GffStruct[] {
    const { listIndices } = this.structure;
    if (entryIndex >= listIndices.length) {
      throw new GffParseError(`List offset ${entryIndex * INDEX_SIZE} is out of range (${listIndices.length} entries)`);
    }
    const structCount = listIndices[entryIndex];
    const start = entryIndex + 1;
    if (start + structCount > listIndices.length) {
      throw new GffParseError(`List at entry ${entryIndex} declares ${structCount} structs beyond the list indices`);
    }
    return listIndices
      .slice(start, start + structCount)
      .map((structIndex: number) => this.resolveStruct(structIndex));
  }
}

/**
 * Resolves the root struct (index 0) and everything below it.
 *
 * @param resolver - Consulted for localized strings with a string reference; without one no lookups happen
 * @throws {GffParseError} If the records are malformed
 * @throws {GffAlignmentError} If an index-array offset is misaligned
 * @throws {GffLookupError} If the resolver does not know a string reference
 */
export function resolveStructure(structure: GffBinaryStructure, resolver?: StringResolver): GffStruct {
  if (structure.structs.length === 0) {
    throw new GffParseError('GFF data has no root struct');
  }
  return new TreeResolver(structure, resolver).resolveStruct(0);
}

/**
 * Resolves a single field record.
 */
export function resolveField(structure: GffBinaryStructure, field: BinaryField, resolver?: StringResolver): GffValue {
  return new TreeResolver(structure, resolver).resolveField(field);
}
