/**
 * Status codes registered by the Token Status List draft.
 * 0x04..0x0A are reserved for future registration; 0x03 and 0x0B..0x0F
 * are application specific.
 */
export const StatusType = {
  VALID: 0x00,
  INVALID: 0x01,
  SUSPENDED: 0x02,
  APPLICATION_SPECIFIC_3: 0x03,
  APPLICATION_SPECIFIC_11: 0x0b,
  APPLICATION_SPECIFIC_12: 0x0c,
  APPLICATION_SPECIFIC_13: 0x0d,
  APPLICATION_SPECIFIC_14: 0x0e,
  APPLICATION_SPECIFIC_15: 0x0f,
} as const;

export type StatusTypeName = keyof typeof StatusType;
export type StatusType = (typeof StatusType)[StatusTypeName];

const STATUS_TYPE_NAMES: readonly StatusTypeName[] = [
  'VALID',
  'INVALID',
  'SUSPENDED',
  'APPLICATION_SPECIFIC_3',
  'APPLICATION_SPECIFIC_11',
  'APPLICATION_SPECIFIC_12',
  'APPLICATION_SPECIFIC_13',
  'APPLICATION_SPECIFIC_14',
  'APPLICATION_SPECIFIC_15',
];

const NAMES_BY_CODE = new Map<number, StatusTypeName>(
  STATUS_TYPE_NAMES.map((name): [number, StatusTypeName] => [StatusType[name], name]),
);

/** Type guard: checks if a code is one of the named status types. */
export function isStatusType(code: number): code is StatusType {
  return NAMES_BY_CODE.has(code);
}

/** Map a raw code to its named status type, or undefined for unnamed codes. */
export function statusTypeFromCode(code: number): StatusType | undefined {
  return isStatusType(code) ? code : undefined;
}

/** Symbolic name of a code, e.g. 'SUSPENDED'. */
export function statusTypeName(code: number): StatusTypeName | undefined {
  return NAMES_BY_CODE.get(code);
}

/** True for 0x04..0x0A, the range held back for future registration. */
export function isReservedStatusCode(code: number): boolean {
  return code >= 0x04 && code <= 0x0a;
}
