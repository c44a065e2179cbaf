import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { compileSchema, CompiledSchema, DEFAULT_MAX_DEPTH } from './compiler';
import { DefinitionKind } from './schema';
import {
  DecodeError,
  EncodeError,
  InvalidEnumValueError,
  MalformedSyntaxError,
  MissingRequiredFieldError,
  SemanticError,
  TruncatedError,
  UnknownFieldError,
  UnknownTypeError,
} from './errors';
import { MinInt64, MaxInt64 } from './types';

const compiled = compileSchema(`
  enum T { A = 0; B = 1; }
  struct Color { byte r; byte g; byte b; }
  message M { uint id = 1; T t = 2; Color c = 3; }
`);

describe('CompiledSchema', () => {
  describe('encode and decode', () => {
    it('encodes a message with an enum and a struct', () => {
      const bytes = compiled.encode('M', { id: 5, t: 'B', c: { r: 10, g: 20, b: 30 } });
      expect(bytes).toEqual(new Uint8Array([0x01, 0x05, 0x02, 0x01, 0x03, 10, 20, 30, 0x00]));
    });

    it('decodes it back', () => {
      const record = compiled.decode(
        'M',
        new Uint8Array([0x01, 0x05, 0x02, 0x01, 0x03, 10, 20, 30, 0x00])
      );
      expect(record).toEqual({ id: 5, t: 'B', c: { r: 10, g: 20, b: 30 } });
    });

    it('skips absent and null message fields', () => {
      expect(compiled.encode('M', { id: 1 })).toEqual(new Uint8Array([1, 1, 0]));
      expect(compiled.encode('M', { id: 1, t: null })).toEqual(new Uint8Array([1, 1, 0]));
      expect(compiled.decode('M', new Uint8Array([0]))).toEqual({});
    });

    it('decodes message fields in wire order', () => {
      const record = compiled.decode('M', new Uint8Array([2, 0, 1, 9, 0]));
      expect(Object.keys(record)).toEqual(['t', 'id']);
      expect(record).toEqual({ t: 'A', id: 9 });
    });

    it('encodes a struct as the top-level type', () => {
      expect(compiled.encode('Color', { r: 1, g: 2, b: 3 })).toEqual(new Uint8Array([1, 2, 3]));
      expect(compiled.decode('Color', new Uint8Array([1, 2, 3]))).toEqual({ r: 1, g: 2, b: 3 });
    });

    it('encodes every native type', () => {
      const schema = compileSchema(`
        struct All {
          bool flag; byte small; int signed; uint unsigned;
          float real; string text; int64 big; uint64 ubig;
        }
      `);
      const bytes = schema.encode('All', {
        flag: true,
        small: 200,
        signed: -1,
        unsigned: 300,
        real: 1.5,
        text: 'hi',
        big: -1n,
        ubig: 300n,
      });
      expect(bytes).toEqual(
        new Uint8Array([1, 200, 1, 0xac, 0x02, 0x7f, 0, 0, 0x80, 104, 105, 0, 1, 0xac, 0x02])
      );
      expect(schema.decode('All', bytes)).toEqual({
        flag: true,
        small: 200,
        signed: -1,
        unsigned: 300,
        real: 1.5,
        text: 'hi',
        big: -1n,
        ubig: 300n,
      });
    });

    it('accepts safe-integer numbers for 64-bit fields', () => {
      const schema = compileSchema('message L { int64 big = 1; }');
      expect(schema.encode('L', { big: -1 })).toEqual(schema.encode('L', { big: -1n }));
      expect(schema.decode('L', new Uint8Array([1, 1, 0]))).toEqual({ big: -1n });
    });
  });

  describe('arrays', () => {
    const arrays = compileSchema(`
      struct P { int x; int y; }
      message A { int[] xs = 1; string[] names = 2; byte[] data = 3; P[] points = 4; }
    `);

    it('writes a count before the elements', () => {
      expect(arrays.encode('A', { xs: [-1, 1], names: ['a'] })).toEqual(
        new Uint8Array([1, 2, 1, 2, 2, 1, 0x61, 0, 0])
      );
    });

    it('encodes byte arrays from Uint8Array', () => {
      const bytes = arrays.encode('A', { data: new Uint8Array([1, 2, 3]) });
      expect(bytes).toEqual(new Uint8Array([3, 3, 1, 2, 3, 0]));
      const record = arrays.decode('A', bytes);
      expect(record.data).toBeInstanceOf(Uint8Array);
      expect(record.data).toEqual(new Uint8Array([1, 2, 3]));
    });

    it('roundtrips struct arrays and empty arrays', () => {
      const record = { xs: [], points: [{ x: 1, y: -2 }, { x: 3, y: 4 }] };
      expect(arrays.decode('A', arrays.encode('A', record))).toEqual(record);
    });

    it('rejects a plain array for byte[]', () => {
      expect(() => arrays.encode('A', { data: [1, 2] })).toThrow(
        'Expected Uint8Array for field "A.data" but got array'
      );
    });

    it('rejects a scalar for an array field', () => {
      expect(() => arrays.encode('A', { xs: 5 })).toThrow(
        'Expected array for field "A.xs" but got number'
      );
    });

    it('reports the element index of a bad element', () => {
      expect(() => arrays.encode('A', { names: ['ok', 7] })).toThrow(
        'Expected string for field "A.names[1]" but got number'
      );
    });
  });

  describe('deprecated fields', () => {
    const schema = compileSchema('message M { uint a = 1; uint old = 2 [deprecated]; }');

    it('still encodes them', () => {
      expect(schema.encode('M', { a: 1, old: 7 })).toEqual(new Uint8Array([1, 1, 2, 7, 0]));
    });

    it('reads past them but leaves them out of the record', () => {
      expect(schema.decode('M', new Uint8Array([1, 1, 2, 7, 0]))).toEqual({ a: 1 });
    });
  });

  describe('nesting', () => {
    const schema = compileSchema(`
      struct P { float x; float y; }
      message Node { string name = 1; Node child = 2; P[] points = 3; Node[] kids = 4; }
    `);

    it('roundtrips nested messages', () => {
      const record = {
        name: 'root',
        child: { name: 'inner', child: { name: 'leaf' } },
        points: [{ x: 0.5, y: 2 }],
        kids: [{ name: 'a' }, {}],
      };
      expect(schema.decode('Node', schema.encode('Node', record))).toEqual(record);
    });

    describe('depth limit', () => {
      const chain = compileSchema('message Node { Node child = 1; }', { maxDepth: 3 });

      it('decodes records up to the limit', () => {
        expect(chain.decode('Node', new Uint8Array([1, 1, 0, 0, 0]))).toEqual({
          child: { child: {} },
        });
      });

      it('names the offset of the record past the limit', () => {
        expect(() => chain.decode('Node', new Uint8Array([1, 1, 1, 0, 0, 0, 0]))).toThrow(
          new DecodeError('Exceeded maximum nesting depth of 3 at offset 3')
        );
      });

      it('stops deep input with a DecodeError under the default limit', () => {
        const depth = 20000;
        const data = new Uint8Array(depth * 2);
        data.fill(1, 0, depth);
        const defaults = compileSchema('message Node { Node child = 1; }');

        expect(() => defaults.decode('Node', data)).toThrow(
          new DecodeError(
            `Exceeded maximum nesting depth of ${DEFAULT_MAX_DEPTH} at offset ${DEFAULT_MAX_DEPTH}`
          )
        );
      });

      it('refuses to encode records past the limit', () => {
        expect(chain.encode('Node', { child: { child: {} } })).toEqual(
          new Uint8Array([1, 1, 0, 0, 0])
        );
        expect(() => chain.encode('Node', { child: { child: { child: {} } } })).toThrow(
          new EncodeError('Exceeded maximum nesting depth of 3 encoding "Node"')
        );
      });
    });
  });

  describe('field names shared with Object.prototype', () => {
    it('skips message fields the record does not own', () => {
      const schema = compileSchema('message M { string constructor = 1; uint id = 2; }');
      expect(schema.encode('M', { id: 1 })).toEqual(new Uint8Array([2, 1, 0]));
    });

    it('requires struct fields the record does not own', () => {
      const schema = compileSchema('struct S { string toString; }');
      expect(() => schema.encode('S', {})).toThrow(MissingRequiredFieldError);
    });

    it('decodes a __proto__ field as an own property', () => {
      const schema = compileSchema('struct P { byte v; } message M { P __proto__ = 1; }');
      const record = schema.decode('M', new Uint8Array([1, 7, 0]));

      expect(Object.keys(record)).toEqual(['__proto__']);
      expect(Object.getOwnPropertyDescriptor(record, '__proto__')?.value).toEqual({ v: 7 });
      expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
      expect(schema.encode('M', record)).toEqual(new Uint8Array([1, 7, 0]));
    });

    it('encodes an own constructor field', () => {
      const schema = compileSchema('message M { string constructor = 1; }');
      const record = schema.decode('M', new Uint8Array([1, 0x61, 0, 0]));

      expect(Object.getOwnPropertyDescriptor(record, 'constructor')?.value).toBe('a');
      expect(schema.encode('M', record)).toEqual(new Uint8Array([1, 0x61, 0, 0]));
    });
  });

  describe('errors', () => {
    it('throws MissingRequiredFieldError for an absent struct field', () => {
      expect(() => compiled.encode('Color', { r: 1, b: 3 })).toThrow(MissingRequiredFieldError);
      expect(() => compiled.encode('Color', { r: 1, b: 3 })).toThrow(
        'Missing required field "g" of struct "Color"'
      );
    });

    it('throws InvalidEnumValueError for an unknown member name', () => {
      expect(() => compiled.encode('M', { t: 'C' })).toThrow(InvalidEnumValueError);
      expect(() => compiled.encode('M', { t: 'C' })).toThrow('Invalid value "C" for enum "T"');
    });

    it('throws InvalidEnumValueError for an unknown member value', () => {
      expect(() => compiled.decode('M', new Uint8Array([2, 9, 0]))).toThrow(
        'Invalid value 9 for enum "T"'
      );
    });

    it('throws UnknownFieldError for an undeclared id', () => {
      try {
        compiled.decode('M', new Uint8Array([1, 1, 7, 0]));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownFieldError);
        if (error instanceof UnknownFieldError) {
          expect(error.typeName).toBe('M');
          expect(error.fieldId).toBe(7);
          expect(error.offset).toBe(2);
        }
      }
    });

    it('throws TruncatedError when a message has no terminator', () => {
      expect(() => compiled.decode('M', new Uint8Array([1, 5]))).toThrow(TruncatedError);
    });

    it('throws UnknownTypeError for an undefined type', () => {
      expect(() => compiled.encode('Nope', {})).toThrow(UnknownTypeError);
      expect(() => compiled.decode('Nope', new Uint8Array([0]))).toThrow('Unknown type Nope');
    });

    it('refuses an enum as the top-level type', () => {
      expect(() => compiled.encode('T', {})).toThrow(EncodeError);
      expect(() => compiled.decode('T', new Uint8Array([0]))).toThrow(DecodeError);
      expect(() => compiled.decode('T', new Uint8Array([0]))).toThrow(
        'Cannot decode enum "T" as a top-level type'
      );
    });

    it('reports the field path of a mismatched value', () => {
      expect(() => compiled.encode('M', { id: 'x' })).toThrow(
        'Expected number for field "M.id" but got string'
      );
      expect(() => compiled.encode('M', { c: 'red' })).toThrow(
        'Expected Color record for field "M.c" but got string'
      );
    });

    it('rejects numbers outside the safe range for 64-bit fields', () => {
      const schema = compileSchema('message L { int64 big = 1; }');
      expect(() => schema.encode('L', { big: 2 ** 60 })).toThrow(
        'Expected bigint for field "L.big" but got number'
      );
    });

    it('rejects schema text that does not parse', () => {
      expect(() => compileSchema('message {')).toThrow(MalformedSyntaxError);
    });

    it('rejects recursive structs in a schema object', () => {
      expect(
        () =>
          new CompiledSchema({
            definitions: [
              {
                name: 'A',
                kind: DefinitionKind.Struct,
                fields: [{ name: 'a', type: 'A', isArray: false, isDeprecated: false, id: 1 }],
              },
            ],
          })
      ).toThrow(new SemanticError('Recursive nesting of "A" is not allowed', 0, 0));
    });
  });

  describe('lookups', () => {
    it('exposes definitions and enum tables', () => {
      expect(compiled.has('M')).toBe(true);
      expect(compiled.has('Nope')).toBe(false);
      expect(compiled.definition('Color')?.kind).toBe(DefinitionKind.Struct);
      expect(compiled.enumValues('T')?.get('B')).toBe(1);
      expect(compiled.enumNames('T')?.get(0)).toBe('A');
      expect(compiled.enumValues('M')).toBeUndefined();
    });
  });

  describe('properties', () => {
    const schema = compileSchema(`
      message R { uint u = 1; int i = 2; string s = 3; bool b = 4; int64 l = 5; float f = 6; }
    `);

    it('roundtrips arbitrary records', () => {
      fc.assert(
        fc.property(
          fc.record({
            u: fc.integer({ min: 0, max: 0xffffffff }),
            i: fc.integer({ min: -2147483648, max: 2147483647 }),
            s: fc.string().filter((s) => !s.includes('\0')),
            b: fc.boolean(),
            l: fc.bigInt({ min: MinInt64, max: MaxInt64 }),
            f: fc.float({ min: 1, max: 1000, noNaN: true }),
          }),
          (record) => {
            expect(schema.decode('R', schema.encode('R', record))).toEqual(record);
          }
        ),
        { numRuns: 100 }
      );
    });

    it('produces byte-identical output for equal records', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 0xffffffff }), fc.string(), (u, s) => {
          fc.pre(!s.includes('\0'));
          const first = schema.encode('R', { u, s });
          const second = schema.encode('R', { s, u });
          expect(first).toEqual(second);
        }),
        { numRuns: 100 }
      );
    });
  });
});
