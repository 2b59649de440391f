/**
 * Domain-name wire format (RFC 1035 Section 3.1 and 4.1.4).
 * Names are sequences of length-prefixed labels ending in a zero-length label,
 * or ending in a two-byte pointer back into the enclosing message.
 */

/** Largest label length (the top two bits of the length byte are flags) */
export const MAX_LABEL_LENGTH = 63;

/** Largest encoded name length, terminator included */
export const MAX_NAME_LENGTH = 255;

const POINTER_FLAGS = 0xc0;

/** Where a piece of RDATA sits inside the message it was read from */
export interface MessageContext {
  message: Uint8Array;
  /** Offset of the first RDATA byte inside `message` */
  offset: number;
}

export type NameDecodeFailure = 'truncated-name' | 'malformed-name';

export type NameDecodeResult =
  | { ok: true; name: string; next: number }
  | { ok: false; reason: NameDecodeFailure };

/**
 * Decode a domain name starting at `offset` in `data`.
 *
 * A compression pointer can only be followed when `context` places `data`
 * inside a full message. Pointers must point strictly backwards and the walk
 * stops at MAX_NAME_LENGTH, so a looping name ends as malformed. Without
 * context a pointer is malformed.
 *
 * Label bytes are read as latin1; a `.` or `\` inside a label comes out
 * escaped as `\.` or `\\`.
 *
 * @returns The dotted name (root is the empty string) and the offset in `data`
 *   just past the encoded name
 */
export function decodeName(data: Uint8Array, offset: number, context?: MessageContext): NameDecodeResult {
  const labels: string[] = [];
  let buffer = data;
  let position = offset;
  // Absolute message offset of buffer[0], once we know it
  let base = context ? context.offset : null;
  let next: number | null = null;
  let encodedLength = 0;

  for (;;) {
    if (position >= buffer.length) {
      return { ok: false, reason: 'truncated-name' };
    }

    const length = buffer[position];

    if (length === 0) {
      encodedLength += 1;
      if (encodedLength > MAX_NAME_LENGTH) {
        return { ok: false, reason: 'malformed-name' };
      }
      return { ok: true, name: labels.join('.'), next: next ?? position + 1 };
    }

    if ((length & POINTER_FLAGS) === POINTER_FLAGS) {
      if (position + 1 >= buffer.length) {
        return { ok: false, reason: 'truncated-name' };
      }
      if (!context || base === null) {
        return { ok: false, reason: 'malformed-name' };
      }
      const target = ((length & ~POINTER_FLAGS) << 8) | buffer[position + 1];
      if (target >= base + position) {
        return { ok: false, reason: 'malformed-name' };
      }
      if (next === null) {
        next = position + 2;
      }
      buffer = context.message;
      base = 0;
      position = target;
      continue;
    }

    if (length > MAX_LABEL_LENGTH) {
      return { ok: false, reason: 'malformed-name' };
    }
    if (position + 1 + length > buffer.length) {
      return { ok: false, reason: 'truncated-name' };
    }

    encodedLength += 1 + length;
    if (encodedLength > MAX_NAME_LENGTH) {
      return { ok: false, reason: 'malformed-name' };
    }

    labels.push(escapeLabel(Buffer.from(buffer.subarray(position + 1, position + 1 + length)).toString('latin1')));
    position += 1 + length;
  }
}

function escapeLabel(label: string): string {
  return label.replace(/[.\\]/g, (char) => `\\${char}`);
}

/** Split a presentation-format name on unescaped dots, unescaping `\.` and `\\` */
function splitLabels(name: string): string[] {
  if (name === '' || name === '.') return [];

  const labels: string[] = [];
  let current = '';
  let escaped = false;
  for (const char of name) {
    if (escaped) {
      current += char;
      escaped = false;
    } else if (char === '\\') {
      escaped = true;
    } else if (char === '.') {
      labels.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  if (escaped) {
    throw new RangeError(`Dangling escape at the end of "${name}"`);
  }
  // A final unescaped dot only marks the name as absolute
  if (current !== '' || labels.length === 0) {
    labels.push(current);
  }
  return labels;
}

/**
 * Encode a dotted name as uncompressed labels. A trailing dot is optional;
 * the empty string and `.` both encode the root. `\.` and `\\` stand for a
 * literal dot or backslash inside a label.
 * @throws RangeError when a label is empty or too long, the whole name is too
 *   long, or the name ends in a lone backslash
 */
export function encodeName(name: string): Buffer {
  const labels = splitLabels(name);
  const parts: Buffer[] = [];

  for (const label of labels) {
    const bytes = Buffer.from(label, 'latin1');
    if (bytes.length === 0 || bytes.length > MAX_LABEL_LENGTH) {
      throw new RangeError(`Invalid DNS label length ${bytes.length} in "${name}"`);
    }
    parts.push(Buffer.from([bytes.length]), bytes);
  }
  parts.push(Buffer.from([0]));

  const encoded = Buffer.concat(parts);
  if (encoded.length > MAX_NAME_LENGTH) {
    throw new RangeError(`DNS name too long: ${encoded.length} bytes (max ${MAX_NAME_LENGTH})`);
  }
  return encoded;
}
