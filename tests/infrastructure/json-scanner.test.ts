import { describe, it, expect } from 'vitest';
import { scanInPlace } from '../../src/infrastructure/in-place/json-scanner.js';
import { isJsonObject } from '../../src/domain/schema/json-value.js';

const encoder = new TextEncoder();

function scan(text: string): unknown {
  const result = scanInPlace(encoder.encode(text));
  if (!result.ok) throw new Error(`Expected ${text} to parse: ${result.error.message}`);
  return result.value;
}

function scanObject(text: string): { [key: string]: unknown } {
  const value = scan(text);
  if (!isJsonObject(value)) throw new Error(`Expected ${text} to be an object`);
  return value;
}

describe('scanInPlace', () => {
  it('matches JSON.parse for scalars and containers', () => {
    const text = ' { "a" : [ 1 , true , false , null , { } , [ ] ] , "b" : { "c" : "d" } } ';
    expect(scan(text)).toEqual(JSON.parse(text));
  });

  it('matches JSON.parse for numbers', () => {
    const text = '[0,-0,1.5,-2e3,1E+2,2.5e-3,12345678901234567890,0.1,1e400]';
    expect(scan(text)).toEqual(JSON.parse(text));
  });

  it('matches JSON.parse for escapes and unicode', () => {
    const text = String.raw`["plain","esc\"aped","back\\slash","\/","\b\f\n\r\t","é€","😀","raw é € 😀",""]`;
    expect(scan(text)).toEqual(JSON.parse(text));
    expect(scan(text)).toEqual(['plain', 'esc"aped', 'back\\slash', '/', '\b\f\n\r\t', 'é€', '😀', 'raw é € 😀', '']);
  });

  it('keeps unpaired surrogate escapes like JSON.parse', () => {
    const text = String.raw`["\ud800x","\udc00\ud800","\ud800A","a\udfffb"]`;
    expect(scan(text)).toEqual(JSON.parse(text));
    expect(scan(text)).toEqual(['\ud800x', '\udc00\ud800', '\ud800A', 'a\udfffb']);
  });

  it('keeps the first position and last value of repeated keys', () => {
    const text = '{"a":1,"b":2,"a":3}';
    const value = scanObject(text);
    expect(Object.entries(value)).toEqual([['a', 3], ['b', 2]]);
    expect(Object.entries(value)).toEqual(Object.entries(JSON.parse(text)));
  });

  it('stores __proto__ as an own property', () => {
    const value = scanObject('{"__proto__":{"polluted":true},"a":1}');
    expect(Object.keys(value)).toEqual(['__proto__', 'a']);
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
    expect(Reflect.get({}, 'polluted')).toBeUndefined();
  });

  it('handles nesting deeper than the call stack allows', () => {
    const depth = 200_000;
    const result = scanInPlace(encoder.encode('['.repeat(depth) + ']'.repeat(depth)));
    expect(result.ok).toBe(true);
  });

  const malformed = [
    '',
    ' ',
    '{',
    '}',
    '[1,]',
    '[1,2',
    '{"a":1,}',
    '{"a":}',
    '{"a" 1}',
    '{"a":1 "b":2}',
    '{a:1}',
    "{'a':1}",
    '01',
    '1.',
    '.5',
    '-',
    '1e',
    '+1',
    'tru',
    'nul',
    'NaN',
    '"abc',
    String.raw`"\x"`,
    String.raw`"\u12G4"`,
    '"a\u0001b"',
    '"a\nb"',
    '[1] x',
    '\uFEFF{}',
  ];

  for (const text of malformed) {
    it(`rejects ${JSON.stringify(text)} like JSON.parse`, () => {
      expect(() => JSON.parse(text)).toThrow(SyntaxError);
      const result = scanInPlace(encoder.encode(text));
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.kind).toBe('syntax');
    });
  }

  it('reports the byte offset of the problem', () => {
    const result = scanInPlace(encoder.encode('{"a":1,}'));
    expect(result).toMatchObject({ ok: false, error: { offset: 7, message: 'Unexpected byte 0x7d at byte 7' } });
  });

  it('rejects invalid UTF-8 inside strings', () => {
    const result = scanInPlace(new Uint8Array([0x22, 0xc3, 0x28, 0x22]));
    expect(result).toMatchObject({ ok: false, error: { kind: 'syntax', offset: 1 } });
  });
});
