import { describe, it, expect } from 'vitest';
import { prettyPrint } from './printer';
import { parseSchema } from './parser';

const SOURCE = `
package demo;
enum T { A = 0; B = 1; }
struct C { byte r; float[] g; }
message M { uint id = 1; T t = 2 [deprecated]; C c = 3; }
`;

describe('prettyPrint', () => {
  it('prints one field per line', () => {
    expect(prettyPrint(parseSchema(SOURCE))).toBe(
      [
        'package demo;',
        '',
        'enum T {',
        '  A = 0;',
        '  B = 1;',
        '}',
        '',
        'struct C {',
        '  byte r;',
        '  float[] g;',
        '}',
        '',
        'message M {',
        '  uint id = 1;',
        '  T t = 2 [deprecated];',
        '  C c = 3;',
        '}',
        '',
      ].join('\n')
    );
  });

  it('omits the package line when there is none', () => {
    expect(prettyPrint(parseSchema('struct A { int x; }'))).toBe('struct A {\n  int x;\n}\n');
  });

  it('prints an empty schema as an empty string', () => {
    expect(prettyPrint({ definitions: [] })).toBe('');
  });

  it('prints text that parses back to the same schema', () => {
    const sources = [
      SOURCE,
      'enum E { A; B = 10; C; }',
      'struct P { int x; int y; }\nmessage Path { P[] points = 2; string name = 1; Path child = 3; }',
      'message Big { int64 a = 1; uint64 b = 2; bool c = 3; byte[] d = 4; string[] e = 5; }',
    ];
    for (const source of sources) {
      const schema = parseSchema(source);
      expect(parseSchema(prettyPrint(schema))).toEqual(schema);
    }
  });
});
