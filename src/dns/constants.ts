/**
 * DNS protocol constants (RFC 1035, RFC 2782, RFC 6895).
 */

/** Resource record types the resolver names explicitly */
export const RecordType = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  PTR: 12,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  SRV: 33,
  NAPTR: 35,
} as const;

export type RecordTypeName = keyof typeof RecordType;

/** Resource record classes */
export const RecordClass = {
  IN: 1,
  CH: 3,
  HS: 4,
  ANY: 255,
} as const;

export type RecordClassName = keyof typeof RecordClass;

/** Response codes carried in the header RCODE field */
export const Rcode = {
  NOERROR: 0,
  FORMERR: 1,
  SERVFAIL: 2,
  NXDOMAIN: 3,
  NOTIMP: 4,
  REFUSED: 5,
} as const;

export type RcodeName = keyof typeof Rcode;

/** Highest value of a 16-bit unsigned field */
export const UINT16_MAX = 0xffff;

/** Size of the fixed DNS message header */
export const HEADER_SIZE = 12;

/**
 * Look up the mnemonic for a numeric record type, falling back to the
 * RFC 3597 `TYPEnnn` form.
 */
export function recordTypeName(type: number): string {
  const entry = Object.entries(RecordType).find(([, value]) => value === type);
  return entry ? entry[0] : `TYPE${type}`;
}

/** Mnemonic for a numeric response code, or `RCODEnn` when unknown */
export function rcodeName(rcode: number): string {
  const entry = Object.entries(Rcode).find(([, value]) => value === rcode);
  return entry ? entry[0] : `RCODE${rcode}`;
}

function isRecordTypeName(value: string): value is RecordTypeName {
  return Object.hasOwn(RecordType, value);
}

/**
 * Parse a record type from a mnemonic (`srv`, `SRV`) or a number.
 * @returns The numeric type, or null when it cannot be parsed
 */
export function parseRecordType(value: string): number | null {
  const upper = value.trim().toUpperCase();
  if (isRecordTypeName(upper)) {
    return RecordType[upper];
  }
  const numeric = /^(?:TYPE)?(\d+)$/.exec(upper);
  if (numeric) {
    const type = Number(numeric[1]);
    return type <= UINT16_MAX ? type : null;
  }
  return null;
}
