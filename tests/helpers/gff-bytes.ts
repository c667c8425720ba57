/**
 * Hand assembly of GFF bytes for tests, independent of the library's writer.
 */

export type RawStruct = readonly [typeId: number, dataOrOffset: number, fieldCount: number];
export type RawField = readonly [fieldType: number, labelIndex: number, dataOrOffset: number];

export interface RawGff {
  readonly fileType?: string;
  readonly fileVersion?: string;
  readonly structs: readonly RawStruct[];
  readonly fields: readonly RawField[];
  readonly labels: readonly string[];
  readonly fieldData?: readonly number[];
  readonly fieldIndices?: readonly number[];
  readonly listIndices?: readonly number[];
}

export function u32(value: number): number[] {
  const bytes = Buffer.alloc(4);
  bytes.writeUInt32LE(value >>> 0, 0);
  return [...bytes];
}

export function ascii(text: string): number[] {
  return [...Buffer.from(text, 'latin1')];
}

/** Lays the sections out back to back after the 56-byte header. */
export function assembleGff(raw: RawGff): Buffer {
  const structBytes = raw.structs.flatMap(([typeId, data, count]) => [...u32(typeId), ...u32(data), ...u32(count)]);
  const fieldBytes = raw.fields.flatMap(([type, label, data]) => [...u32(type), ...u32(label), ...u32(data)]);
  const labelBytes = raw.labels.flatMap((label) => {
    const slot = Buffer.alloc(16);
    slot.write(label, 'latin1');
    return [...slot];
  });
  const fieldData = [...(raw.fieldData ?? [])];
  const fieldIndexBytes = (raw.fieldIndices ?? []).flatMap(u32);
  const listIndexBytes = (raw.listIndices ?? []).flatMap(u32);

  const structOffset = 56;
  const fieldOffset = structOffset + structBytes.length;
  const labelOffset = fieldOffset + fieldBytes.length;
  const fieldDataOffset = labelOffset + labelBytes.length;
  const fieldIndicesOffset = fieldDataOffset + fieldData.length;
  const listIndicesOffset = fieldIndicesOffset + fieldIndexBytes.length;

  const header = [
    ...ascii(raw.fileType ?? 'GFF '),
    ...ascii(raw.fileVersion ?? 'V3.2'),
    ...u32(structOffset), ...u32(raw.structs.length),
    ...u32(fieldOffset), ...u32(raw.fields.length),
    ...u32(labelOffset), ...u32(raw.labels.length),
    ...u32(fieldDataOffset), ...u32(fieldData.length),
    ...u32(fieldIndicesOffset), ...u32(fieldIndexBytes.length),
    ...u32(listIndicesOffset), ...u32(listIndexBytes.length),
  ];

  return Buffer.from([...header, ...structBytes, ...fieldBytes, ...labelBytes, ...fieldData, ...fieldIndexBytes, ...listIndexBytes]);
}

/**
 * A small character record, laid out the way the game writes it:
 *
 * root (0xFFFFFFFF)
 *   Str: Byte 16
 *   Name: ExoString "Aribeth"
 *   FirstName: ExoLocString (no string ref, English "Cassie")
 *   Gold: DWord 500
 *   Feats: List [ {Feat: Word 7}, {Feat: Word 42} ] (struct id 1)
 *   Empty: Struct id 3 with no fields (stored dataOrOffset 5)
 */
export const PLAYER_RAW: RawGff = {
  fileType: 'BIC ',
  fileVersion: 'V3.2',
  structs: [
    [0xffffffff, 0, 6],
    [1, 5, 1],
    [1, 6, 1],
    [3, 5, 0],
  ],
  fields: [
    [0, 0, 16],
    [10, 1, 0],
    [12, 2, 11],
    [4, 3, 500],
    [15, 4, 0],
    [2, 5, 7],
    [2, 5, 42],
    [14, 6, 3],
  ],
  labels: ['Str', 'Name', 'FirstName', 'Gold', 'Feats', 'Feat', 'Empty'],
  fieldData: [
    ...u32(7), ...ascii('Aribeth'),
    ...u32(22), ...u32(0xffffffff), ...u32(1), ...u32(0), ...u32(6), ...ascii('Cassie'),
  ],
  fieldIndices: [0, 1, 2, 3, 4, 7],
  listIndices: [2, 1, 2],
};

export function playerBytes(): Buffer {
  return assembleGff(PLAYER_RAW);
}
