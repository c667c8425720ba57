import { afterEach, describe, expect, it, vi } from 'vitest';
import { GffAlignmentError, GffParseError, GffWriteError } from '../src/errors.js';
import { GffBinary } from '../src/gff-binary.js';
import { FieldType } from '../src/types/field-type.js';
import { assembleGff, playerBytes } from './helpers/gff-bytes.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('GffBinary.parse', () => {
  it('reads the header and every section', () => {
    const structure = GffBinary.parse(playerBytes());

    expect(structure.header).toEqual({
      fileType: 'BIC ',
      fileVersion: 'V3.2',
      structOffset: 56,
      structCount: 4,
      fieldOffset: 104,
      fieldCount: 8,
      labelOffset: 200,
      labelCount: 7,
      fieldDataOffset: 312,
      fieldDataCount: 37,
      fieldIndicesOffset: 349,
      fieldIndicesCount: 24,
      listIndicesOffset: 373,
      listIndicesCount: 12,
    });
    expect(structure.structs[1]).toEqual({ typeId: 1, dataOrOffset: 5, fieldCount: 1 });
    expect(structure.fields[2]).toEqual({ fieldType: FieldType.ExoLocString, labelIndex: 2, dataOrOffset: 11 });
    expect(structure.labels).toEqual(['Str', 'Name', 'FirstName', 'Gold', 'Feats', 'Feat', 'Empty']);
    expect(structure.fieldData.length).toBe(37);
    expect(structure.fieldIndices).toEqual([0, 1, 2, 3, 4, 7]);
    expect(structure.listIndices).toEqual([2, 1, 2]);
  });

  it('rejects data shorter than the header', () => {
    expect(() => GffBinary.parse(Buffer.alloc(55))).toThrow('Data too small to be GFF: 55 bytes, header needs 56');
  });

  it('rejects truncated sections', () => {
    const bytes = playerBytes();
    expect(() => GffBinary.parse(bytes.subarray(0, bytes.length - 1))).toThrow(GffParseError);
  });

  it('rejects unknown field types', () => {
    const bytes = playerBytes();
    bytes.writeUInt32LE(255, 104);
    expect(() => GffBinary.parse(bytes)).toThrow('Invalid field type 255 for field 0');
  });

  it('rejects a file type tag that is not UTF-8', () => {
    const bytes = playerBytes();
    bytes[0] = 0xff;
    expect(() => GffBinary.parse(bytes)).toThrow(GffParseError);
  });

  it('warns about trailing bytes', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const structure = GffBinary.parse(Buffer.concat([playerBytes(), Buffer.alloc(3)]));

    expect(warn).toHaveBeenCalledWith('GFF data has 3 trailing bytes after the last section');
    expect(GffBinary.serialize(structure)).toEqual(playerBytes());
  });
});

describe('GffBinary.serialize', () => {
  it('reproduces the parsed bytes', () => {
    const bytes = playerBytes();
    expect(GffBinary.serialize(GffBinary.parse(bytes))).toEqual(bytes);
  });

  it('refuses a header that disagrees with the records', () => {
    const structure = GffBinary.parse(playerBytes());
    const tampered = { ...structure, header: { ...structure.header, fieldCount: 9 } };
    expect(() => GffBinary.serialize(tampered)).toThrow(GffWriteError);
    expect(() => GffBinary.serialize(tampered)).toThrow('Header field count 9 does not match the stored 8');
  });
});

describe('GffBinary.getField', () => {
  const structure = GffBinary.parse(playerBytes());

  it('finds nothing in an empty struct', () => {
    expect(GffBinary.getField(structure, structure.structs[3], 0)).toBeUndefined();
  });

  it('reads a single-field struct directly', () => {
    expect(GffBinary.getField(structure, structure.structs[1], 0)).toEqual({
      fieldType: FieldType.Word,
      labelIndex: 5,
      dataOrOffset: 7,
    });
    expect(GffBinary.getField(structure, structure.structs[1], 1)).toBeUndefined();
  });

  it('goes through the field indices for larger structs', () => {
    expect(GffBinary.getField(structure, structure.structs[0], 5)).toEqual({
      fieldType: FieldType.Struct,
      labelIndex: 6,
      dataOrOffset: 3,
    });
    expect(GffBinary.getField(structure, structure.structs[0], 6)).toBeUndefined();
    expect(GffBinary.getField(structure, structure.structs[0], -1)).toBeUndefined();
  });

  it('rejects a misaligned field indices offset', () => {
    const struct = { typeId: 0, dataOrOffset: 2, fieldCount: 2 };
    expect(() => GffBinary.getField(structure, struct, 0)).toThrow(GffAlignmentError);
    expect(() => GffBinary.getField(structure, struct, 0)).toThrow(
      'Offset 2 into field indices is not aligned on a 4-byte boundary'
    );
  });

  it('rejects dangling field references', () => {
    const struct = { typeId: 0, dataOrOffset: 99, fieldCount: 1 };
    expect(() => GffBinary.getField(structure, struct, 0)).toThrow('Field index 99 is out of range (8 fields)');
  });

  it('rejects field indices entries past the array', () => {
    const struct = { typeId: 0, dataOrOffset: 20, fieldCount: 3 };
    expect(() => GffBinary.getField(structure, struct, 1)).toThrow('Field indices entry 6 is out of range (6 entries)');
  });
});

describe('GffBinary.decodeFieldData', () => {
  it('keeps simple values inline', () => {
    expect(GffBinary.decodeFieldData({ fieldType: FieldType.Int, labelIndex: 0, dataOrOffset: 0xfffffffe })).toEqual({
      kind: 'inline',
      raw: 0xfffffffe,
    });
  });

  it('points complex values into the heap', () => {
    expect(GffBinary.decodeFieldData({ fieldType: FieldType.Double, labelIndex: 0, dataOrOffset: 16 })).toEqual({
      kind: 'heap',
      offset: 16,
    });
  });

  it('turns list offsets into entry indices', () => {
    expect(GffBinary.decodeFieldData({ fieldType: FieldType.List, labelIndex: 0, dataOrOffset: 8 })).toEqual({
      kind: 'list',
      entryIndex: 2,
    });
  });

  it('rejects misaligned list offsets', () => {
    expect(() => GffBinary.decodeFieldData({ fieldType: FieldType.List, labelIndex: 0, dataOrOffset: 6 })).toThrow(
      'Offset 6 into list indices is not aligned on a 4-byte boundary'
    );
  });
});

describe('hand-assembled data', () => {
  it('parses a file with only a root struct', () => {
    const structure = GffBinary.parse(assembleGff({ structs: [[0xffffffff, 0xffffffff, 0]], fields: [], labels: [] }));
    expect(structure.header.fileType).toBe('GFF ');
    expect(structure.structs).toEqual([{ typeId: 0xffffffff, dataOrOffset: 0xffffffff, fieldCount: 0 }]);
    expect(structure.fieldData.length).toBe(0);
  });
});
