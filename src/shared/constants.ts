/** Registry status column codes. Anything else decodes as UNKNOWN. */
export const STATUS_CODES = {
  ACTIVE: 'A',
  INACTIVE: 'I',
} as const;

/** Name-type flag carried by officers and the registered agent. */
export const NAME_TYPES = {
  PERSON: 'P',
  CORPORATION: 'C',
} as const;

/**
 * Corporate suffix tokens stripped during name normalization. Tokens are
 * matched against the end of an upper-cased name; the normalizer tries longer
 * tokens first so ", INC." wins over " INC".
 */
export const DEFAULT_NAME_SUFFIXES: readonly string[] = [
  ', INCORPORATED',
  ' INCORPORATED',
  ', INC.',
  ', INC',
  ' INC.',
  ' INC',
  ', L.L.C.',
  ' L.L.C.',
  ', LLC',
  ' LLC',
  ' CORPORATION',
  ', CORP.',
  ' CORP.',
  ' CORP',
  ', LTD.',
  ' LTD.',
  ' LTD',
  ', P.A.',
  ' P.A.',
];

export const DEFAULT_RECORD_WIDTH = 1440;
export const DEFAULT_MAX_OFFICERS = 6;
export const DEFAULT_CHUNK_SIZE = 100;
export const LINE_SEPARATOR = '\n';

export const NAME_INDEX_FILE = 'name-index.json';
export const STATUS_FILE = 'status.json';
