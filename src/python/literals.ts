import type { NumberValue } from './tokens.js';
import { lookupCharacterName } from './unicode-names.js';

/** Raised by the decoders; `index` is relative to the decoded body. */
export class LiteralEscapeError extends Error {
  constructor(message: string, public index: number) {
    super(message);
    this.name = 'LiteralEscapeError';
  }
}

export function parseNumberLiteral(text: string): NumberValue {
  const clean = text.replace(/_/g, '');
  const last = clean[clean.length - 1];
  if (last === 'j' || last === 'J') {
    return { kind: 'complex', value: { real: 0, imag: Number(clean.slice(0, -1)) } };
  }
  if (/^0[xXoObB]/.test(clean)) {
    return { kind: 'int', value: BigInt(clean) };
  }
  if (/[.eE]/.test(clean)) {
    return { kind: 'float', value: Number(clean) };
  }
  return { kind: 'int', value: BigInt(clean) };
}

const simpleEscapes: Record<string, number> = {
  '\\': 0x5c,
  "'": 0x27,
  '"': 0x22,
  a: 0x07,
  b: 0x08,
  f: 0x0c,
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  v: 0x0b,
};

const isOctal = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '7';

function readHex(body: string, start: number, count: number, escape: string): number {
  const digits = body.slice(start, start + count);
  if (digits.length !== count || !/^[0-9a-fA-F]+$/.test(digits)) {
    throw new LiteralEscapeError(`truncated \\${escape} escape`, start - 2);
  }
  return Number.parseInt(digits, 16);
}

/** Decode the body of a non-raw `str` literal (quotes and prefix removed). */
export function decodeStr(body: string): string {
  if (!body.includes('\\')) return body;
  let out = '';
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch !== '\\') {
      out += ch;
      i += 1;
      continue;
    }
    const next = body[i + 1];
    if (next === undefined) {
      out += ch;
      break;
    }
    if (next === '\n') {
      i += 2;
      continue;
    }
    if (next === '\r') {
      i += body[i + 2] === '\n' ? 3 : 2;
      continue;
    }
    if (next in simpleEscapes) {
      out += String.fromCharCode(simpleEscapes[next]);
      i += 2;
      continue;
    }
    if (isOctal(next)) {
      let digits = next;
      let j = i + 2;
      while (digits.length < 3 && isOctal(body[j])) {
        digits += body[j];
        j += 1;
      }
      out += String.fromCodePoint(Number.parseInt(digits, 8));
      i = j;
      continue;
    }
    if (next === 'x') {
      out += String.fromCodePoint(readHex(body, i + 2, 2, 'xXX'));
      i += 4;
      continue;
    }
    if (next === 'u') {
      out += String.fromCodePoint(readHex(body, i + 2, 4, 'uXXXX'));
      i += 6;
      continue;
    }
    if (next === 'U') {
      const code = readHex(body, i + 2, 8, 'UXXXXXXXX');
      if (code > 0x10ffff) {
        throw new LiteralEscapeError('illegal Unicode character', i);
      }
      out += String.fromCodePoint(code);
      i += 10;
      continue;
    }
    if (next === 'N' && body[i + 2] === '{') {
      const close = body.indexOf('}', i + 3);
      if (close === -1 || close === i + 3) {
        throw new LiteralEscapeError('malformed \\N character escape', i);
      }
      const code = lookupCharacterName(body.slice(i + 3, close));
      if (code === undefined) {
        throw new LiteralEscapeError('unknown Unicode character name', i);
      }
      out += String.fromCodePoint(code);
      i = close + 1;
      continue;
    }
    out += ch + next;
    i += 2;
  }
  return out;
}

/** Decode the body of a `bytes` literal. Non-ASCII source characters are rejected. */
export function decodeBytes(body: string, raw: boolean): Uint8Array {
  const bytes: number[] = [];
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    const code = ch.charCodeAt(0);
    if (code > 0x7f) {
      throw new LiteralEscapeError('bytes can only contain ASCII literal characters', i);
    }
    if (raw || ch !== '\\') {
      bytes.push(code);
      i += 1;
      continue;
    }
    const next = body[i + 1];
    if (next === undefined) {
      bytes.push(code);
      break;
    }
    if (next === '\n') {
      i += 2;
      continue;
    }
    if (next === '\r') {
      i += body[i + 2] === '\n' ? 3 : 2;
      continue;
    }
    if (next in simpleEscapes) {
      bytes.push(simpleEscapes[next]);
      i += 2;
      continue;
    }
    if (isOctal(next)) {
      let digits = next;
      let j = i + 2;
      while (digits.length < 3 && isOctal(body[j])) {
        digits += body[j];
        j += 1;
      }
      bytes.push(Number.parseInt(digits, 8) & 0xff);
      i = j;
      continue;
    }
    if (next === 'x') {
      bytes.push(readHex(body, i + 2, 2, 'xXX'));
      i += 4;
      continue;
    }
    if (next.charCodeAt(0) > 0x7f) {
      throw new LiteralEscapeError('bytes can only contain ASCII literal characters', i + 1);
    }
    bytes.push(code, next.charCodeAt(0));
    i += 2;
  }
  return Uint8Array.from(bytes);
}
