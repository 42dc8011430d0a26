import { utf8Decoder } from '../../application/canonical-codec.js';
import { JsonSyntaxError } from '../../application/errors.js';

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const SPACE = 0x20;
const QUOTE = 0x22;
const PLUS = 0x2b;
const COMMA = 0x2c;
const MINUS = 0x2d;
const DOT = 0x2e;
const SLASH = 0x2f;
const ZERO = 0x30;
const ONE = 0x31;
const NINE = 0x39;
const COLON = 0x3a;
const UPPER_E = 0x45;
const LBRACKET = 0x5b;
const BACKSLASH = 0x5c;
const RBRACKET = 0x5d;
const LOWER_B = 0x62;
const LOWER_E = 0x65;
const LOWER_F = 0x66;
const LOWER_N = 0x6e;
const LOWER_R = 0x72;
const LOWER_T = 0x74;
const LOWER_U = 0x75;
const LBRACE = 0x7b;
const RBRACE = 0x7d;

type JsonMembers = { [key: string]: unknown };

type Frame =
  | { readonly kind: 'array'; readonly items: unknown[] }
  | { readonly kind: 'object'; readonly members: JsonMembers; key: string };

/** A `\uXXXX` escape of an unpaired surrogate, spliced in after UTF-8 decoding. */
interface LoneSurrogate {
  readonly at: number;
  readonly unit: number;
}

export type ScanResult =
  | { readonly ok: true; readonly value: unknown }
  | { readonly ok: false; readonly error: JsonSyntaxError };

/**
 * Parses JSON from `bytes`, rewriting string escapes inside the buffer.
 *
 * Produces the same tree `JSON.parse` would for the same text: repeated
 * keys keep their first position and last value, `__proto__` becomes an
 * ordinary own property. Nesting depth is bounded by memory only.
 */
export function scanInPlace(bytes: Uint8Array): ScanResult {
  try {
    return { ok: true, value: new InPlaceScanner(bytes).parse() };
  } catch (err: unknown) {
    if (err instanceof JsonSyntaxError) return { ok: false, error: err };
    throw err;
  }
}

function isDigit(byte: number): boolean {
  return byte >= ZERO && byte <= NINE;
}

function setMember(members: JsonMembers, key: string, value: unknown): void {
  if (key === '__proto__') {
    Object.defineProperty(members, key, { value, writable: true, enumerable: true, configurable: true });
  } else {
    members[key] = value;
  }
}

/** Writes `codePoint` as UTF-8 at `at`; returns the index after it. */
function writeUtf8(bytes: Uint8Array, at: number, codePoint: number): number {
  if (codePoint < 0x80) {
    bytes[at] = codePoint;
    return at + 1;
  }
  if (codePoint < 0x800) {
    bytes[at] = 0xc0 | (codePoint >> 6);
    bytes[at + 1] = 0x80 | (codePoint & 0x3f);
    return at + 2;
  }
  if (codePoint < 0x10000) {
    bytes[at] = 0xe0 | (codePoint >> 12);
    bytes[at + 1] = 0x80 | ((codePoint >> 6) & 0x3f);
    bytes[at + 2] = 0x80 | (codePoint & 0x3f);
    return at + 3;
  }
  bytes[at] = 0xf0 | (codePoint >> 18);
  bytes[at + 1] = 0x80 | ((codePoint >> 12) & 0x3f);
  bytes[at + 2] = 0x80 | ((codePoint >> 6) & 0x3f);
  bytes[at + 3] = 0x80 | (codePoint & 0x3f);
  return at + 4;
}

class InPlaceScanner {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  parse(): unknown {
    const stack: Frame[] = [];
    this.skipWhitespace();

    for (;;) {
      let value: unknown;
      const byte = this.peek();

      if (byte === LBRACE) {
        this.pos++;
        this.skipWhitespace();
        if (this.peek() !== RBRACE) {
          stack.push({ kind: 'object', members: {}, key: this.readKey() });
          continue;
        }
        this.pos++;
        value = {};
      } else if (byte === LBRACKET) {
        this.pos++;
        this.skipWhitespace();
        if (this.peek() !== RBRACKET) {
          stack.push({ kind: 'array', items: [] });
          continue;
        }
        this.pos++;
        value = [];
      } else {
        value = this.readScalar();
      }

      // Attach the finished value to its parent, closing containers that end here.
      for (;;) {
        this.skipWhitespace();
        const frame = stack[stack.length - 1];
        if (frame === undefined) {
          if (this.pos !== this.bytes.length) throw this.unexpected();
          return value;
        }

        const next = this.peek();
        if (frame.kind === 'array') {
          frame.items.push(value);
          if (next === COMMA) {
            this.pos++;
            this.skipWhitespace();
            break;
          }
          if (next !== RBRACKET) throw this.unexpected();
          value = frame.items;
        } else {
          setMember(frame.members, frame.key, value);
          if (next === COMMA) {
            this.pos++;
            this.skipWhitespace();
            frame.key = this.readKey();
            break;
          }
          if (next !== RBRACE) throw this.unexpected();
          value = frame.members;
        }
        this.pos++;
        stack.pop();
      }
    }
  }

  private peek(): number {
    return this.bytes[this.pos] ?? -1;
  }

  private skipWhitespace(): void {
    let byte = this.peek();
    while (byte === SPACE || byte === LF || byte === CR || byte === TAB) {
      this.pos++;
      byte = this.peek();
    }
  }

  private unexpected(): JsonSyntaxError {
    const byte = this.peek();
    if (byte === -1) return new JsonSyntaxError('Unexpected end of JSON input', this.pos);
    return new JsonSyntaxError(`Unexpected byte 0x${byte.toString(16).padStart(2, '0')}`, this.pos);
  }

  private readKey(): string {
    if (this.peek() !== QUOTE) throw this.unexpected();
    const key = this.readString();
    this.skipWhitespace();
    if (this.peek() !== COLON) throw this.unexpected();
    this.pos++;
    this.skipWhitespace();
    return key;
  }

  private readScalar(): unknown {
    const byte = this.peek();
    if (byte === QUOTE) return this.readString();
    if (byte === LOWER_T) return this.readLiteral('true', true);
    if (byte === LOWER_F) return this.readLiteral('false', false);
    if (byte === LOWER_N) return this.readLiteral('null', null);
    if (byte === MINUS || isDigit(byte)) return this.readNumber();
    throw this.unexpected();
  }

  private readLiteral<V>(word: string, value: V): V {
    for (let i = 0; i < word.length; i++) {
      if (this.peek() !== word.charCodeAt(i)) throw this.unexpected();
      this.pos++;
    }
    return value;
  }

  private readNumber(): number {
    const start = this.pos;
    if (this.peek() === MINUS) this.pos++;

    const first = this.peek();
    if (first === ZERO) {
      this.pos++;
    } else if (first >= ONE && first <= NINE) {
      this.skipDigits();
    } else {
      throw this.unexpected();
    }

    if (this.peek() === DOT) {
      this.pos++;
      if (!isDigit(this.peek())) throw this.unexpected();
      this.skipDigits();
    }

    const exponent = this.peek();
    if (exponent === LOWER_E || exponent === UPPER_E) {
      this.pos++;
      const sign = this.peek();
      if (sign === PLUS || sign === MINUS) this.pos++;
      if (!isDigit(this.peek())) throw this.unexpected();
      this.skipDigits();
    }

    return Number(this.decodeUtf8(start, this.pos));
  }

  private skipDigits(): void {
    while (isDigit(this.peek())) this.pos++;
  }

  /**
   * Reads the string starting at the opening quote. Escapes are rewritten
   * to UTF-8 over the escaped text, so the unescaped string ends at or
   * before the closing quote.
   */
  private readString(): string {
    const { bytes } = this;
    const start = this.pos + 1;
    let read = start;
    let write = start;
    let lone: LoneSurrogate[] | undefined;

    for (;;) {
      const byte = bytes[read];
      if (byte === undefined) throw new JsonSyntaxError('Unterminated string', this.pos);
      if (byte === QUOTE) break;
      if (byte < SPACE) throw new JsonSyntaxError('Control character in string', read);

      if (byte !== BACKSLASH) {
        bytes[write++] = byte;
        read++;
        continue;
      }

      const escape = bytes[read + 1];
      switch (escape) {
        case QUOTE:
          bytes[write++] = QUOTE;
          read += 2;
          break;
        case BACKSLASH:
          bytes[write++] = BACKSLASH;
          read += 2;
          break;
        case SLASH:
          bytes[write++] = SLASH;
          read += 2;
          break;
        case LOWER_B:
          bytes[write++] = 0x08;
          read += 2;
          break;
        case LOWER_F:
          bytes[write++] = 0x0c;
          read += 2;
          break;
        case LOWER_N:
          bytes[write++] = LF;
          read += 2;
          break;
        case LOWER_R:
          bytes[write++] = CR;
          read += 2;
          break;
        case LOWER_T:
          bytes[write++] = TAB;
          read += 2;
          break;
        case LOWER_U: {
          const unit = this.readHex4(read + 2);
          read += 6;
          if (unit >= 0xd800 && unit <= 0xdbff && bytes[read] === BACKSLASH && bytes[read + 1] === LOWER_U) {
            const low = this.readHex4(read + 2);
            if (low >= 0xdc00 && low <= 0xdfff) {
              write = writeUtf8(bytes, write, 0x10000 + ((unit - 0xd800) << 10) + (low - 0xdc00));
              read += 6;
              break;
            }
          }
          if (unit >= 0xd800 && unit <= 0xdfff) {
            (lone ??= []).push({ at: write, unit });
          } else {
            write = writeUtf8(bytes, write, unit);
          }
          break;
        }
        default:
          throw new JsonSyntaxError('Invalid escape sequence', read);
      }
    }

    this.pos = read + 1;
    if (lone === undefined) return this.decodeUtf8(start, write);

    let text = '';
    let from = start;
    for (const surrogate of lone) {
      text += this.decodeUtf8(from, surrogate.at) + String.fromCharCode(surrogate.unit);
      from = surrogate.at;
    }
    return text + this.decodeUtf8(from, write);
  }

  private readHex4(at: number): number {
    let unit = 0;
    for (let i = 0; i < 4; i++) {
      const byte = this.bytes[at + i] ?? -1;
      let digit: number;
      if (isDigit(byte)) digit = byte - ZERO;
      else if (byte >= 0x61 && byte <= 0x66) digit = byte - 0x61 + 10;
      else if (byte >= 0x41 && byte <= 0x46) digit = byte - 0x41 + 10;
      else throw new JsonSyntaxError('Invalid unicode escape', at - 2);
      unit = (unit << 4) | digit;
    }
    return unit;
  }

  private decodeUtf8(start: number, end: number): string {
    if (start === end) return '';
    try {
      return utf8Decoder.decode(this.bytes.subarray(start, end));
    } catch (err: unknown) {
      if (err instanceof TypeError) throw new JsonSyntaxError('Invalid UTF-8 in string', start);
      throw err;
    }
  }
}
