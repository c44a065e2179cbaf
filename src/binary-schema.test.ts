import { describe, it, expect } from 'vitest';
import { encodeBinarySchema, decodeBinarySchema } from './binary-schema';
import { parseSchema } from './parser';
import { DefinitionKind, type Schema } from './schema';
import { DecodeError, TruncatedError, UnknownTypeError } from './errors';

describe('encodeBinarySchema', () => {
  it('encodes enums with placeholder type codes', () => {
    const bytes = encodeBinarySchema(parseSchema('enum T { A = 0; B = 1; }\nmessage M { T t = 1; }'));
    expect(bytes).toEqual(
      new Uint8Array([
        2,
        0x54, 0, 0, 2,
        0x41, 0, 0, 0, 0,
        0x42, 0, 0, 0, 1,
        0x4d, 0, 2, 1,
        0x74, 0, 0, 0, 1,
      ])
    );
  });

  it('encodes native types as the complement of their table index', () => {
    // int is index 2, ~2 = -3, zigzag(-3) = 5
    const bytes = encodeBinarySchema(parseSchema('struct S { int[] v; }'));
    expect(bytes).toEqual(new Uint8Array([1, 0x53, 0, 1, 1, 0x76, 0, 5, 1, 1]));
  });

  it('drops the package name and deprecation', () => {
    const schema = parseSchema('package p;\nmessage M { int a = 1 [deprecated]; }');
    expect(encodeBinarySchema(schema)).toEqual(
      encodeBinarySchema(parseSchema('message M { int a = 1; }'))
    );
  });

  it('throws UnknownTypeError for an unresolvable type', () => {
    const schema: Schema = {
      definitions: [
        {
          name: 'M',
          kind: DefinitionKind.Message,
          fields: [{ name: 'x', type: 'Nope', isArray: false, isDeprecated: false, id: 1 }],
        },
      ],
    };
    expect(() => encodeBinarySchema(schema)).toThrow(UnknownTypeError);
    expect(() => encodeBinarySchema(schema)).toThrow('Unknown type Nope: referenced by field "M.x"');
  });
});

describe('decodeBinarySchema', () => {
  it('decodes what encodeBinarySchema writes', () => {
    const schema = parseSchema(`
      enum T { A = 0; B = 1; }
      struct Color { byte r; byte g; byte b; }
      message M { uint id = 1; T t = 2; Color[] c = 3; int64 big = 4; uint64 u = 5; float f = 6; bool ok = 7; string s = 8; }
    `);
    expect(decodeBinarySchema(encodeBinarySchema(schema))).toEqual(schema);
  });

  it('returns fields without deprecation or package', () => {
    const decoded = decodeBinarySchema(
      encodeBinarySchema(parseSchema('package p;\nmessage M { int a = 1 [deprecated]; }'))
    );
    expect(decoded).toEqual({
      definitions: [
        {
          name: 'M',
          kind: DefinitionKind.Message,
          fields: [{ name: 'a', type: 'int', isArray: false, isDeprecated: false, id: 1 }],
        },
      ],
    });
  });

  it('resolves references to later definitions', () => {
    const decoded = decodeBinarySchema(
      encodeBinarySchema(parseSchema('message M { S s = 1; }\nstruct S { int x; }'))
    );
    expect(decoded.definitions[0].fields[0].type).toBe('S');
  });

  it('decodes an empty schema', () => {
    expect(decodeBinarySchema(new Uint8Array([0]))).toEqual({ definitions: [] });
  });

  it('rejects an unknown definition kind', () => {
    expect(() => decodeBinarySchema(new Uint8Array([1, 0x58, 0, 7, 0]))).toThrow(DecodeError);
    expect(() => decodeBinarySchema(new Uint8Array([1, 0x58, 0, 7, 0]))).toThrow(
      'Invalid kind for definition "X" at offset 3'
    );
  });

  it('rejects a native type code outside the table', () => {
    // zigzag(~8) = zigzag(-9) = 17
    const bytes = new Uint8Array([1, 0x53, 0, 1, 1, 0x76, 0, 17, 0, 1]);
    expect(() => decodeBinarySchema(bytes)).toThrow(UnknownTypeError);
  });

  it('rejects a definition index out of range', () => {
    // zigzag(5) = 10
    const bytes = new Uint8Array([1, 0x53, 0, 1, 1, 0x76, 0, 10, 0, 1]);
    expect(() => decodeBinarySchema(bytes)).toThrow(
      'Unknown type 5: definition index out of range for field "S.v"'
    );
  });

  it('throws TruncatedError on incomplete input', () => {
    expect(() => decodeBinarySchema(new Uint8Array([1, 0x53]))).toThrow(TruncatedError);
    expect(() => decodeBinarySchema(new Uint8Array([]))).toThrow(TruncatedError);
  });
});
