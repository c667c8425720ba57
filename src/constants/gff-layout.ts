/**
 * Fixed sizes and sentinels of the GFF binary layout.
 */

/** Header: two 4-char tags followed by twelve u32 offset/count values. */
export const HEADER_SIZE = 56;

export const STRUCT_SIZE = 12;

export const FIELD_SIZE = 12;

export const LABEL_SIZE = 16;

/** Width of one entry in the field-indices and list-indices arrays. */
export const INDEX_SIZE = 4;

export const TAG_SIZE = 4;

export const RESREF_MAX_LENGTH = 16;

/** String reference meaning "no string-table entry". */
export const NO_STRING_REF = 0xffffffff;

/** `dataOrOffset` written for empty structs that were not read from a file. */
export const SYNTHESIZED_STRUCT_OFFSET = 0xffffffff;
