/**
 * SRV RDATA validation and encoding (RFC 2782).
 * Wire layout: priority:u16, weight:u16, port:u16, target:domain-name
 */
import { UINT16_MAX } from '../dns/constants.js';
import { decodeName, encodeName, type MessageContext, type NameDecodeFailure } from '../dns/name.js';

/** A validated SRV record. Instances are frozen. */
export interface SrvRecord {
  readonly priority: number;
  readonly weight: number;
  readonly port: number;
  /** Target host; the empty string is the root ("service not available") */
  readonly target: string;
}

/** Bytes taken by priority, weight and port */
export const SRV_FIXED_LENGTH = 6;

export type SrvRejectReason = 'truncated-fixed-fields' | NameDecodeFailure;

export type SrvParseResult =
  | { ok: true; record: SrvRecord }
  | { ok: false; reason: SrvRejectReason };

/**
 * Validate one SRV RDATA payload.
 *
 * All four fields are mandatory: a payload that stops after any of them is
 * rejected rather than defaulted. Bytes after the target are ignored. Pure;
 * the same bytes always give an equal record.
 *
 * @param rdata - The record's RDATA
 * @param context - Enclosing message, needed only when the target is compressed
 */
export function parseSrvRecord(rdata: Uint8Array, context?: MessageContext): SrvParseResult {
  if (rdata.length < SRV_FIXED_LENGTH) {
    return { ok: false, reason: 'truncated-fixed-fields' };
  }

  const target = decodeName(rdata, SRV_FIXED_LENGTH, context);
  if (!target.ok) {
    return { ok: false, reason: target.reason };
  }

  return {
    ok: true,
    record: createSrvRecord({
      priority: readUint16(rdata, 0),
      weight: readUint16(rdata, 2),
      port: readUint16(rdata, 4),
      target: target.name,
    }),
  };
}

/**
 * Build a frozen SrvRecord from plain fields.
 * @throws RangeError when a numeric field is not an unsigned 16-bit integer
 */
export function createSrvRecord(fields: SrvRecord): SrvRecord {
  for (const key of ['priority', 'weight', 'port'] as const) {
    const value = fields[key];
    if (!Number.isInteger(value) || value < 0 || value > UINT16_MAX) {
      throw new RangeError(`SRV ${key} must be an integer in 0..${UINT16_MAX}, got ${value}`);
    }
  }
  return Object.freeze({
    priority: fields.priority,
    weight: fields.weight,
    port: fields.port,
    target: fields.target,
  });
}

export type SrvField = keyof SrvRecord;

export interface EncodeSrvOptions {
  /** Fields left out of the payload, producing deliberately broken RDATA */
  omit?: readonly SrvField[];
}

/** Encode an SRV record as uncompressed RDATA */
export function encodeSrvRecord(record: SrvRecord, options: EncodeSrvOptions = {}): Buffer {
  const omit = new Set(options.omit ?? []);
  const parts: Buffer[] = [];

  for (const key of ['priority', 'weight', 'port'] as const) {
    if (!omit.has(key)) {
      const field = Buffer.alloc(2);
      field.writeUInt16BE(record[key], 0);
      parts.push(field);
    }
  }
  if (!omit.has('target')) {
    parts.push(encodeName(record.target));
  }

  return Buffer.concat(parts);
}

/** Render a record in zone-file order: `priority weight port target.` */
export function formatSrvRecord(record: SrvRecord): string {
  return `${record.priority} ${record.weight} ${record.port} ${record.target}.`;
}

function readUint16(data: Uint8Array, offset: number): number {
  return (data[offset] << 8) | data[offset + 1];
}
