import { describe, it, expect, vi } from 'vitest';
import type { Logger } from 'pino';
import { decode, encode, toJsonEnglish } from '../../src/application/canonical-codec.js';
import { BufferOwnershipError } from '../../src/application/errors.js';
import type { DecodeResult } from '../../src/application/errors.js';
import {
  decodeInPlace,
  decodeOwnedBytes,
  decodeText,
} from '../../src/infrastructure/in-place/accelerated-decoder.js';
import { OwnedBuffer } from '../../src/infrastructure/in-place/owned-buffer.js';
import type { Meter } from '../../src/domain/catalog/records/meter.js';
import { meterType } from '../../src/domain/catalog/records/meter.js';
import { expectFailure, expectSuccess, fakeLogger, recordCases } from '../helpers.js';

describe('in-place decoding', () => {
  describe('agreement with the canonical decoder', () => {
    for (const { type, samples } of recordCases()) {
      it(`produces the same ${type.name} records for encoded input`, () => {
        for (const [, make] of samples) {
          for (const convention of ['german', 'english'] as const) {
            const record = make();
            const bytes = encode(type, record, { convention });
            const canonical = expectSuccess(decode(type, bytes));
            expect(expectSuccess(decodeInPlace(type, OwnedBuffer.copyOf(bytes)))).toEqual(canonical);
            expect(canonical).toEqual(record);
          }
        }
      });
    }

    const inputs = [
      '{"zaehlernummer":"A","meterNumber":"B","zaehlernummer":"C"}',
      '{"meterNumber":"Z\\u00e4hler \\"1\\"","hersteller":"\\ud83d\\ude00 \\u0041G"}',
      '{"foo":{"bar":[1,{"baz":null}]},"sparte":"STROM","__proto__":{"x":1}}',
      '{"zaehlernummer":null,"zaehlwerke":[],"_typ":"Zaehler"}',
      '{"einbaudatum":"2022-03-01T01:00:00+01:00","herstellungsjahr":1.0e3}',
      '{"sparte":"KOHLE"}',
      '{"zaehlwerke":[{"einheit":"KWH"},{"einheit":"FOO"}]}',
      '{"zaehlernummer":42}',
      '{"herstellungsjahr":1e400}',
      '{"zusatzAttribute":[{"value":1}]}',
      '[]',
      'null',
      '"text"',
      '{"zaehlernummer":"A"',
      '{"zaehlernummer":"A",}',
      '{"zaehlernummer":"\\q"}',
      '\uFEFF{}',
      '',
      '{"zaehlernummer":"a\ud800b","hersteller":"\udc00"}',
      '{"zaehlernummer":"a\\ud800b"}',
    ];

    for (const text of inputs) {
      it(`agrees on ${JSON.stringify(text)}`, () => {
        const canonical = decode(meterType, text);
        const inPlace = decodeText(meterType, text);
        expect(inPlace.ok).toBe(canonical.ok);
        if (canonical.ok && inPlace.ok) {
          expect(inPlace.value).toEqual(canonical.value);
        } else if (!canonical.ok && !inPlace.ok) {
          expect(inPlace.error.kind).toBe(canonical.error.kind);
          expect('path' in inPlace.error ? inPlace.error.path : undefined).toEqual(
            'path' in canonical.error ? canonical.error.path : undefined,
          );
        }
      });
    }

    it('replaces raw lone surrogates in text on both paths', () => {
      const text = '{"zaehlernummer":"a\ud800b","hersteller":"\udc00\ud83d\ude00"}';
      const expected: Meter = { meta: {}, meterNumber: 'a\uFFFDb', manufacturer: '\uFFFD\ud83d\ude00' };
      expect(expectSuccess(decode(meterType, text))).toEqual(expected);
      expect(expectSuccess(decodeText(meterType, text))).toEqual(expected);
    });

    it('agrees on a deeply nested additional attribute value', () => {
      const depth = 20_000;
      const text = `{"zusatzAttribute":[{"name":"n","value":${'['.repeat(depth)}"x"${']'.repeat(depth)}}]}`;
      const canonical = expectSuccess(decode(meterType, text)).meta.additionalAttributes?.[0];
      const inPlace = expectSuccess(decodeText(meterType, text)).meta.additionalAttributes?.[0];
      expect(canonical?.name).toBe('n');
      expect(inPlace?.name).toBe('n');
      for (const value of [canonical?.value, inPlace?.value]) {
        let node: unknown = value;
        let levels = 0;
        while (Array.isArray(node)) {
          node = node[0];
          levels++;
        }
        expect(levels).toBe(depth);
        expect(node).toBe('x');
      }
    });

    it('agrees on invalid UTF-8 bytes', () => {
      const bytes = new Uint8Array([0x7b, 0x22, 0x61, 0x22, 0x3a, 0x22, 0xe2, 0x28, 0xa1, 0x22, 0x7d]);
      expect(expectFailure(decode(meterType, bytes)).kind).toBe('syntax');
      expect(expectFailure(decodeInPlace(meterType, OwnedBuffer.copyOf(bytes))).kind).toBe('syntax');
    });
  });

  describe('decodeText', () => {
    it('decodes English text without touching the caller', () => {
      const text = toJsonEnglish(meterType, { meta: {}, meterNumber: 'line\nbreak' });
      expect(expectSuccess(decodeText(meterType, text))).toEqual({ meta: {}, meterNumber: 'line\nbreak' });
      expect(text).toBe('{"meterNumber":"line\\nbreak"}');
    });
  });

  describe('decodeOwnedBytes', () => {
    it('decodes bytes it takes over', () => {
      const bytes = new TextEncoder().encode('{"zaehlernummer":"A\\tB"}');
      expect(expectSuccess(decodeOwnedBytes(meterType, bytes))).toEqual({ meta: {}, meterNumber: 'A\tB' });
    });

    it('rejects bytes adopted before', () => {
      const log = fakeLogger();
      const bytes = new TextEncoder().encode('{}');
      expectSuccess(decodeOwnedBytes(meterType, bytes));
      const error = expectFailure(decodeOwnedBytes(meterType, bytes, log));
      expect(error).toBeInstanceOf(BufferOwnershipError);
      expect(error).toMatchObject({ kind: 'buffer_ownership', reason: 'already_adopted' });
      expect(log.debug).toHaveBeenCalledWith(
        { type: 'Meter', reason: 'already_adopted' },
        'Rejected buffer without exclusive ownership',
      );
    });

    it('rejects shared memory', () => {
      const bytes = new Uint8Array(new SharedArrayBuffer(2));
      bytes.set([0x7b, 0x7d]);
      expect(expectFailure(decodeOwnedBytes(meterType, bytes))).toMatchObject({ reason: 'shared_memory' });
    });
  });

  describe('decodeInPlace', () => {
    it('leaves the source of a copy untouched', () => {
      const source = new TextEncoder().encode('{"zaehlernummer":"\\u0041\\n"}');
      const before = Array.from(source);
      expect(expectSuccess(decodeInPlace(meterType, OwnedBuffer.copyOf(source))).meterNumber).toBe('A\n');
      expect(Array.from(source)).toEqual(before);
    });

    it('consumes the buffer whatever the outcome', () => {
      const good = OwnedBuffer.copyOf('{}');
      const bad = OwnedBuffer.copyOf('{');
      expect(good.status).toBe('ready');
      expectSuccess(decodeInPlace(meterType, good));
      expectFailure(decodeInPlace(meterType, bad));
      expect(good.status).toBe('consumed');
      expect(bad.status).toBe('consumed');
    });

    it('rejects a consumed buffer', () => {
      const buffer = OwnedBuffer.copyOf('{"zaehlernummer":"A"}');
      expectSuccess(decodeInPlace(meterType, buffer));
      expect(expectFailure(decodeInPlace(meterType, buffer))).toMatchObject({
        kind: 'buffer_ownership',
        reason: 'consumed',
      });
    });

    it('rejects a buffer that is still leased', () => {
      const buffer = OwnedBuffer.copyOf('{"unknown":1,"zaehlernummer":"A"}');
      let nested: DecodeResult<Meter> | undefined;
      const log = {
        trace: vi.fn(() => {
          nested = decodeInPlace(meterType, buffer);
        }),
        debug: vi.fn(),
      } as unknown as Logger;

      expect(expectSuccess(decodeInPlace(meterType, buffer, log))).toEqual({ meta: {}, meterNumber: 'A' });
      expect(nested).toMatchObject({ ok: false, error: { kind: 'buffer_ownership', reason: 'leased' } });
    });
  });
});

describe('OwnedBuffer', () => {
  it('copies text as UTF-8', () => {
    expect(OwnedBuffer.copyOf('ä').byteLength).toBe(2);
  });

  it('throws when adopting shared or already adopted memory', () => {
    const bytes = new Uint8Array(4);
    OwnedBuffer.adopt(bytes);
    expect(() => OwnedBuffer.adopt(bytes)).toThrow(BufferOwnershipError);
    expect(() => OwnedBuffer.adopt(new Uint8Array(new SharedArrayBuffer(1)))).toThrow(
      'Buffer cannot be decoded in place: shared memory',
    );
  });

  it('leases once', () => {
    const buffer = OwnedBuffer.copyOf('{}');
    expect(buffer.lease()).toBeInstanceOf(Uint8Array);
    expect(buffer.status).toBe('leased');
    expect(buffer.lease()).toMatchObject({ reason: 'leased' });
    buffer.consume();
    expect(buffer.lease()).toMatchObject({ reason: 'consumed' });
  });
});
