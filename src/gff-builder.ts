/**
 * Builds fresh binary records from a resolved tree.
 *
 * Structs and fields take their array slot before their children are stored,
 * and payloads are appended to the heap in visiting order, which reproduces
 * the layout of files written by the game.
 */
import {
  FIELD_SIZE,
  HEADER_SIZE,
  INDEX_SIZE,
  LABEL_SIZE,
  STRUCT_SIZE,
  SYNTHESIZED_STRUCT_OFFSET,
} from './constants/gff-layout.js';
import { describeError, GffWriteError } from './errors.js';
import type { FieldCell } from './field-cell.js';
import { checkValueRange, fieldTypeOf, type GffValue } from './field-value.js';
import type { GffStruct } from './gff-struct.js';
import type { BinaryField, BinaryStruct, GffBinaryStructure, GffHeader } from './types/gff-binary-structure.js';
import { BinaryWriter } from './utils/binary-writer.js';
import { writeExoLocString, writeExoString, writeResRef, writeVoid } from './utils/heap-codec.js';
import { encodedLabelLength } from './utils/legacy-text.js';

const floatScratch: Buffer = Buffer.alloc(4);

function floatBits(value: number): number {
  floatScratch.writeFloatLE(value, 0);
  return floatScratch.readUInt32LE(0);
}

/** Section sizes in bytes, in file order. */
interface SectionSizes {
  readonly structs: number;
  readonly fields: number;
  readonly labels: number;
  readonly fieldData: number;
  readonly fieldIndices: number;
  readonly listIndices: number;
}

/**
 * Places the six sections back to back after the header.
 */
export function layoutHeader(fileType: string, fileVersion: string, counts: {
  readonly structCount: number;
  readonly fieldCount: number;
  readonly labelCount: number;
  readonly fieldDataCount: number;
  readonly fieldIndicesCount: number;
  readonly listIndicesCount: number;
}): GffHeader {
  const sizes: SectionSizes = {
    structs: counts.structCount * STRUCT_SIZE,
    fields: counts.fieldCount * FIELD_SIZE,
    labels: counts.labelCount * LABEL_SIZE,
    fieldData: counts.fieldDataCount,
    fieldIndices: counts.fieldIndicesCount,
    listIndices: counts.listIndicesCount,
  };
  const structOffset = HEADER_SIZE;
  const fieldOffset = structOffset + sizes.structs;
  const labelOffset = fieldOffset + sizes.fields;
  const fieldDataOffset = labelOffset + sizes.labels;
  const fieldIndicesOffset = fieldDataOffset + sizes.fieldData;
  const listIndicesOffset = fieldIndicesOffset + sizes.fieldIndices;

  return {
    fileType,
    fileVersion,
    structOffset,
    structCount: counts.structCount,
    fieldOffset,
    fieldCount: counts.fieldCount,
    labelOffset,
    labelCount: counts.labelCount,
    fieldDataOffset,
    fieldDataCount: counts.fieldDataCount,
    fieldIndicesOffset,
    fieldIndicesCount: counts.fieldIndicesCount,
    listIndicesOffset,
    listIndicesCount: counts.listIndicesCount,
  };
}

export class GffStructureBuilder {
  private readonly structs: BinaryStruct[] = [];
  private readonly fields: BinaryField[] = [];
  /** label -> label index; iteration order is index order. */
  private readonly labelMap = new Map<string, number>();
  private readonly fieldData = new BinaryWriter();
  private readonly fieldIndices: number[] = [];
  private readonly listIndices: number[] = [];
  private readonly active = new Set<GffStruct>();

  get labels(): string[] {
    return [...this.labelMap.keys()];
  }

  /**
   * Interns a label.
   * @returns The label's index, assigned in first-seen order
   * @throws {GffWriteError} If the label does not fit its 16-byte slot
   */
  registerLabel(label: string): number {
    const existing = this.labelMap.get(label);
    if (existing !== undefined) {
      return existing;
    }
    if (encodedLabelLength(label) > LABEL_SIZE) {
      throw new GffWriteError(`Label "${label}" is longer than ${LABEL_SIZE} bytes`);
    }
    const index = this.labelMap.size;
    this.labelMap.set(label, index);
    return index;
  }

  /**
   * Stores a struct and, recursively, its fields.
   * @returns The struct's index in the struct array
   */
  storeStruct(struct: GffStruct): number {
    if (this.active.has(struct)) {
      throw new GffWriteError(`Struct ${struct.id} contains itself`);
    }
    this.active.add(struct);

    const structIndex = this.structs.length;
    const record: BinaryStruct = { typeId: struct.id >>> 0, dataOrOffset: 0, fieldCount: struct.fields.length };
    this.structs.push(record);

    let dataOrOffset: number;
    if (struct.fields.length === 0) {
      dataOrOffset = struct.origin.kind === 'file' ? struct.origin.dataOrOffset : SYNTHESIZED_STRUCT_OFFSET;
    } else if (struct.fields.length === 1) {
      dataOrOffset = this.storeCell(struct.fields[0]);
    } else {
      const blockStart = this.fieldIndices.length;
      for (let index = 0; index < struct.fields.length; index++) {
        this.fieldIndices.push(0);
      }
      struct.fields.forEach((cell: FieldCell, index: number) => {
        this.fieldIndices[blockStart + index] = this.storeCell(cell);
      });
      dataOrOffset = blockStart * INDEX_SIZE;
    }

    this.structs[structIndex] = { ...record, dataOrOffset };
    this.active.delete(struct);
    return structIndex;
  }

  /**
   * Stores one labeled value.
   * @returns The field's index in the field array
   * @throws {GffWriteError} If the value does not fit its kind
   */
  storeField(label: string, value: GffValue): number {
    const problem = checkValueRange(value);
    if (problem !== undefined) {
      throw new GffWriteError(`Field "${label}": ${problem}`);
    }

    const labelIndex = this.registerLabel(label);
    const fieldIndex = this.fields.length;
    const record: BinaryField = { fieldType: fieldTypeOf(value), labelIndex, dataOrOffset: 0 };
    this.fields.push(record);

    let dataOrOffset: number;
    try {
      dataOrOffset = this.encodeData(value);
    } catch (error) {
      if (error instanceof GffWriteError) {
        throw error;
      }
      throw new GffWriteError(`Field "${label}": ${describeError(error)}`, error);
    }

    this.fields[fieldIndex] = { ...record, dataOrOffset };
    return fieldIndex;
  }

  /**
   * Computes the sizes and offsets and returns the finished structure.
   */
  finish(fileType: string, fileVersion: string): GffBinaryStructure {
    const fieldData = this.fieldData.toBuffer();
    const header = layoutHeader(fileType, fileVersion, {
      structCount: this.structs.length,
      fieldCount: this.fields.length,
      labelCount: this.labelMap.size,
      fieldDataCount: fieldData.length,
      fieldIndicesCount: this.fieldIndices.length * INDEX_SIZE,
      listIndicesCount: this.listIndices.length * INDEX_SIZE,
    });
    return {
      header,
      structs: [...this.structs],
      fields: [...this.fields],
      labels: this.labels,
      fieldData,
      fieldIndices: [...this.fieldIndices],
      listIndices: [...this.listIndices],
    };
  }

  private storeCell(cell: FieldCell): number {
    return this.storeField(cell.label, cell.value);
  }

  /** Heap payloads start at the heap length before the append. */
  private encodeData(value: GffValue): number {
    const heap = this.fieldData;
    const heapOffset = heap.length;
    switch (value.type) {
      case 'Byte':
      case 'Char':
      case 'Word':
      case 'DWord':
        return value.value >>> 0;
      case 'Short':
      case 'Int':
        // Negative values are stored sign-extended to 32 bits.
        return value.value >>> 0;
      case 'Float':
        return value.bits !== undefined && Number.isNaN(value.value) ? value.bits >>> 0 : floatBits(value.value);
      case 'DWord64':
        heap.writeUint64(value.value);
        return heapOffset;
      case 'Int64':
        heap.writeInt64(value.value);
        return heapOffset;
      case 'Double':
        heap.writeDouble(value.value);
        return heapOffset;
      case 'ExoString':
        writeExoString(heap, value.value);
        return heapOffset;
      case 'ResRef':
        writeResRef(heap, value.value);
        return heapOffset;
      case 'ExoLocString':
        writeExoLocString(heap, value.value);
        return heapOffset;
      case 'Void':
        writeVoid(heap, value.value);
        return heapOffset;
      case 'Struct':
        return this.storeStruct(value.value);
      case 'List':
        return this.storeList(value.value);
    }
  }

  /** Reserves `[count, index...]` in the list indices and stores each element. */
  private storeList(structs: readonly GffStruct[]): number {
    const blockStart = this.listIndices.length;
    this.listIndices.push(structs.length);
    for (let index = 0; index < structs.length; index++) {
      this.listIndices.push(0);
    }
    structs.forEach((struct: GffStruct, index: number) => {
      this.listIndices[blockStart + 1 + index] = this.storeStruct(struct);
    });
    return blockStart * INDEX_SIZE;
  }
}

/**
 * Builds the binary representation of a tree rooted at `root`.
 */
export function buildStructure({ fileType, fileVersion, root }: {
  readonly fileType: string;
  readonly fileVersion: string;
  readonly root: GffStruct;
}): GffBinaryStructure {
  const builder = new GffStructureBuilder();
  builder.storeStruct(root);
  return builder.finish(fileType, fileVersion);
}
