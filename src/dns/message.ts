/**
 * Builds DNS response messages from answer records.
 * Used by resolver backends that hold records rather than wire bytes, so every
 * result can still expose a complete answer message.
 */
import { HEADER_SIZE, RecordClass, Rcode } from './constants.js';
import { encodeName } from './name.js';

export interface AnswerInput {
  rrType: number;
  rrClass?: number;
  ttl: number;
  data: Uint8Array;
}

/** An answer as placed in the built message */
export interface EncodedAnswer {
  rrType: number;
  rrClass: number;
  ttl: number;
  data: Buffer;
  /** Offset of the RDATA inside the message */
  offset: number;
}

export interface BuildMessageOptions {
  id?: number;
  rcode?: number;
  authoritative?: boolean;
  /** The AD bit (RFC 4035) */
  authenticated?: boolean;
}

export interface BuiltMessage {
  message: Buffer;
  answers: EncodedAnswer[];
}

/** Offset of the question name, the usual target of `0xc00c` pointers */
export const QUESTION_NAME_OFFSET = HEADER_SIZE;

const FLAG_QR = 0x8000;
const FLAG_AA = 0x0400;
const FLAG_RD = 0x0100;
const FLAG_RA = 0x0080;
const FLAG_AD = 0x0020;

/**
 * Build a response to a single question. Every answer owner name is a
 * pointer to the question name.
 */
export function buildResponse(
  name: string,
  rrType: number,
  rrClass: number,
  answers: AnswerInput[],
  options: BuildMessageOptions = {}
): BuiltMessage {
  const header = Buffer.alloc(HEADER_SIZE);
  let flags = FLAG_QR | FLAG_RD | FLAG_RA | ((options.rcode ?? Rcode.NOERROR) & 0x0f);
  if (options.authoritative) flags |= FLAG_AA;
  if (options.authenticated) flags |= FLAG_AD;

  header.writeUInt16BE(options.id ?? 0, 0);
  header.writeUInt16BE(flags, 2);
  header.writeUInt16BE(1, 4); // QDCOUNT
  header.writeUInt16BE(answers.length, 6); // ANCOUNT

  const question = Buffer.concat([encodeName(name), uint16(rrType), uint16(rrClass)]);

  const parts: Buffer[] = [header, question];
  const encoded: EncodedAnswer[] = [];
  let offset = header.length + question.length;

  for (const answer of answers) {
    const data = Buffer.from(answer.data);
    const fixed = Buffer.alloc(12);
    fixed.writeUInt16BE(0xc000 | QUESTION_NAME_OFFSET, 0);
    fixed.writeUInt16BE(answer.rrType, 2);
    fixed.writeUInt16BE(answer.rrClass ?? RecordClass.IN, 4);
    fixed.writeUInt32BE(answer.ttl >>> 0, 6);
    fixed.writeUInt16BE(data.length, 10);

    parts.push(fixed, data);
    offset += fixed.length;
    encoded.push({
      rrType: answer.rrType,
      rrClass: answer.rrClass ?? RecordClass.IN,
      ttl: answer.ttl,
      data,
      offset,
    });
    offset += data.length;
  }

  return { message: Buffer.concat(parts), answers: encoded };
}

function uint16(value: number): Buffer {
  const buffer = Buffer.alloc(2);
  buffer.writeUInt16BE(value, 0);
  return buffer;
}
