import { describe, expect, it } from 'vitest';
import { GffWriteError } from '../src/errors.js';
import { GffBinary } from '../src/gff-binary.js';
import { buildStructure, GffStructureBuilder, layoutHeader } from '../src/gff-builder.js';
import { GffStruct } from '../src/gff-struct.js';
import { FieldType } from '../src/types/field-type.js';
import { Gender, Language } from '../src/types/locale.js';
import { playerBytes } from './helpers/gff-bytes.js';

function playerTree(): GffStruct {
  return GffStruct.from(0xffffffff, [
    ['Str', { type: 'Byte', value: 16 }],
    ['Name', { type: 'ExoString', value: 'Aribeth' }],
    ['FirstName', {
      type: 'ExoLocString',
      value: {
        stringRef: 0xffffffff,
        substrings: [{ language: Language.English, gender: Gender.Masculine, text: 'Cassie' }],
      },
    }],
    ['Gold', { type: 'DWord', value: 500 }],
    ['Feats', {
      type: 'List',
      value: [
        GffStruct.from(1, [['Feat', { type: 'Word', value: 7 }]]),
        GffStruct.from(1, [['Feat', { type: 'Word', value: 42 }]]),
      ],
    }],
    ['Empty', { type: 'Struct', value: new GffStruct(3, [], { kind: 'file', dataOrOffset: 5 }) }],
  ]);
}

describe('label interning', () => {
  it('assigns indices in first-seen order', () => {
    const builder = new GffStructureBuilder();
    const indices = ['hello', 'hello', 'hello', 'goodbye'].map((label) => builder.registerLabel(label));

    expect(indices).toEqual([0, 0, 0, 1]);
    expect(builder.labels).toEqual(['hello', 'goodbye']);
  });

  it('refuses labels wider than the slot', () => {
    const builder = new GffStructureBuilder();
    expect(() => builder.registerLabel('ABCDEFGHIJKLMNOPQ')).toThrow('Label "ABCDEFGHIJKLMNOPQ" is longer than 16 bytes');
  });
});

describe('GffStructureBuilder.storeField', () => {
  it('stores small values inline', () => {
    const builder = new GffStructureBuilder();
    expect(builder.storeField('hello', { type: 'Int', value: 4 })).toBe(0);

    const structure = builder.finish('GFF ', 'V3.2');
    expect(structure.fields).toEqual([{ fieldType: FieldType.Int, labelIndex: 0, dataOrOffset: 4 }]);
    expect(structure.fieldData.length).toBe(0);
  });

  it('stores 64-bit values in the heap', () => {
    const builder = new GffStructureBuilder();
    builder.storeField('hello', { type: 'Int64', value: 8n });

    const structure = builder.finish('GFF ', 'V3.2');
    expect(structure.fields).toEqual([{ fieldType: FieldType.Int64, labelIndex: 0, dataOrOffset: 0 }]);
    expect(structure.fieldData).toEqual(Buffer.from([8, 0, 0, 0, 0, 0, 0, 0]));
  });

  it('sign-extends negative values and stores float bits', () => {
    const builder = new GffStructureBuilder();
    builder.storeField('a', { type: 'Short', value: -1 });
    builder.storeField('b', { type: 'Int', value: -2 });
    builder.storeField('c', { type: 'Float', value: 1 });
    builder.storeField('d', { type: 'Byte', value: 16 });

    const { fields } = builder.finish('GFF ', 'V3.2');
    expect(fields.map((field) => field.dataOrOffset)).toEqual([0xffffffff, 0xfffffffe, 0x3f800000, 16]);
  });

  it('appends heap payloads one after another', () => {
    const builder = new GffStructureBuilder();
    builder.storeField('Text', { type: 'ExoString', value: 'ab' });
    builder.storeField('Big', { type: 'DWord64', value: 1n });

    const structure = builder.finish('GFF ', 'V3.2');
    expect(structure.fields.map((field) => field.dataOrOffset)).toEqual([0, 6]);
    expect(structure.fieldData).toEqual(Buffer.from([2, 0, 0, 0, 0x61, 0x62, 1, 0, 0, 0, 0, 0, 0, 0]));
  });

  it('rejects values outside their kind', () => {
    const builder = new GffStructureBuilder();
    expect(() => builder.storeField('Str', { type: 'Byte', value: 256 })).toThrow('Field "Str": Byte value 256 is outside 0..255');
    expect(() => builder.storeField('Hp', { type: 'Short', value: 40000 })).toThrow(GffWriteError);
    expect(() => builder.storeField('Xp', { type: 'DWord64', value: -1n })).toThrow(GffWriteError);
    expect(() => builder.storeField('Res', { type: 'ResRef', value: 'abcdefghijklmnopq' })).toThrow(GffWriteError);
  });
});

describe('buildStructure', () => {
  it('lays out a tree the way the game does', () => {
    const structure = buildStructure({ fileType: 'BIC ', fileVersion: 'V3.2', root: playerTree() });

    expect(structure.structs).toEqual([
      { typeId: 0xffffffff, dataOrOffset: 0, fieldCount: 6 },
      { typeId: 1, dataOrOffset: 5, fieldCount: 1 },
      { typeId: 1, dataOrOffset: 6, fieldCount: 1 },
      { typeId: 3, dataOrOffset: 5, fieldCount: 0 },
    ]);
    expect(structure.fieldIndices).toEqual([0, 1, 2, 3, 4, 7]);
    expect(structure.listIndices).toEqual([2, 1, 2]);
    expect(GffBinary.serialize(structure)).toEqual(playerBytes());
  });

  it('marks synthesized empty structs', () => {
    const root = GffStruct.from(0xffffffff, [['Child', { type: 'Struct', value: new GffStruct(3) }]]);
    const structure = buildStructure({ fileType: 'GFF ', fileVersion: 'V3.2', root });

    expect(structure.structs).toEqual([
      { typeId: 0xffffffff, dataOrOffset: 0, fieldCount: 1 },
      { typeId: 3, dataOrOffset: 0xffffffff, fieldCount: 0 },
    ]);
    expect(structure.fields).toEqual([{ fieldType: FieldType.Struct, labelIndex: 0, dataOrOffset: 1 }]);
  });

  it('stores an empty list as a zero count', () => {
    const root = GffStruct.from(0xffffffff, [['Items', { type: 'List', value: [] }]]);
    const structure = buildStructure({ fileType: 'GFF ', fileVersion: 'V3.2', root });

    expect(structure.listIndices).toEqual([0]);
    expect(structure.header.listIndicesCount).toBe(4);
  });

  it('refuses a struct that contains itself', () => {
    const root = new GffStruct(1);
    root.add('Self', { type: 'Struct', value: root });
    expect(() => buildStructure({ fileType: 'GFF ', fileVersion: 'V3.2', root })).toThrow('Struct 1 contains itself');
  });

  it('allows the same struct twice side by side', () => {
    const shared = GffStruct.from(2, [['X', { type: 'Byte', value: 1 }]]);
    const root = GffStruct.from(0xffffffff, [['Items', { type: 'List', value: [shared, shared] }]]);
    const structure = buildStructure({ fileType: 'GFF ', fileVersion: 'V3.2', root });

    expect(structure.listIndices).toEqual([2, 1, 2]);
    expect(structure.structs.length).toBe(3);
  });
});

describe('layoutHeader', () => {
  it('places the sections back to back', () => {
    expect(layoutHeader('BIC ', 'V3.2', {
      structCount: 4,
      fieldCount: 8,
      labelCount: 7,
      fieldDataCount: 37,
      fieldIndicesCount: 24,
      listIndicesCount: 12,
    })).toEqual({
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
  });
});
