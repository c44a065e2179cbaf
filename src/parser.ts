import { MalformedSyntaxError, SemanticError } from "./errors";
import { DefinitionKind, type Definition, type Field, type Schema } from "./schema";
import { quote, tokenize, type Token } from "./tokenizer";
import { verifySchema, type SchemaLocations, type SourceLocation } from "./verifier";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INTEGER = /^-?\d+$/;

interface ParseResult {
  schema: Schema;
  locations: SchemaLocations;
}

/**
 * Recursive-descent parser over a token list. Produces the schema and, in
 * parallel, the source location of every definition and field.
 */
class SchemaParser {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  private get current(): Token {
    return this.tokens[this.index];
  }

  private eat(text: string): boolean {
    if (this.current.kind !== "eof" && this.current.text === text) {
      this.index++;
      return true;
    }
    return false;
  }

  private expect(text: string): void {
    if (!this.eat(text)) {
      this.fail(`Expected ${quote(text)}`);
    }
  }

  private expectIdentifier(): Token {
    const token = this.current;
    if (token.kind !== "identifier" || !IDENTIFIER.test(token.text)) {
      this.fail("Expected identifier");
    }
    this.index++;
    return token;
  }

  private expectInteger(): number {
    const token = this.current;
    if (token.kind !== "integer" || !INTEGER.test(token.text)) {
      this.fail("Expected integer");
    }
    const value = Number(token.text);
    if (String(value) !== token.text) {
      throw new MalformedSyntaxError(`Invalid integer ${quote(token.text)}`, token.line, token.column);
    }
    this.index++;
    return value;
  }

  private fail(expected: string): never {
    const token = this.current;
    throw new MalformedSyntaxError(
      `${expected} but found ${quote(token.text)}`,
      token.line,
      token.column
    );
  }

  parse(): ParseResult {
    const definitions: Definition[] = [];
    const definitionLocations: SourceLocation[] = [];
    const fieldLocations: SourceLocation[][] = [];
    let packageName: string | undefined;

    if (this.eat("package")) {
      packageName = this.expectIdentifier().text;
      this.expect(";");
    }

    while (this.current.kind !== "eof") {
      let kind: DefinitionKind;
      if (this.eat("enum")) {
        kind = DefinitionKind.Enum;
      } else if (this.eat("struct")) {
        kind = DefinitionKind.Struct;
      } else if (this.eat("message")) {
        kind = DefinitionKind.Message;
      } else {
        const token = this.current;
        throw new MalformedSyntaxError(`Unexpected token ${quote(token.text)}`, token.line, token.column);
      }

      const name = this.expectIdentifier();
      this.expect("{");

      const fields: Field[] = [];
      const locations: SourceLocation[] = [];
      while (!this.eat("}")) {
        const { field, location } = this.parseField(kind, fields);
        fields.push(field);
        locations.push(location);
      }

      definitions.push({ name: name.text, kind, fields });
      definitionLocations.push({ line: name.line, column: name.column });
      fieldLocations.push(locations);
    }

    const schema: Schema =
      packageName === undefined ? { definitions } : { package: packageName, definitions };
    return {
      schema,
      locations: { definitions: definitionLocations, fields: fieldLocations },
    };
  }

  private parseField(
    kind: DefinitionKind,
    previous: readonly Field[]
  ): { field: Field; location: SourceLocation } {
    let type: string | undefined;
    let isArray = false;

    // Enum members have no type
    if (kind !== DefinitionKind.Enum) {
      type = this.expectIdentifier().text;
      isArray = this.eat("[]");
    }

    const name = this.expectIdentifier();

    let id: number;
    if (kind === DefinitionKind.Struct) {
      id = previous.length + 1;
    } else if (kind === DefinitionKind.Message || this.current.text === "=") {
      this.expect("=");
      id = this.expectInteger();
    } else {
      id = previous.length > 0 ? previous[previous.length - 1].id + 1 : 0;
    }

    const deprecated = this.current;
    const isDeprecated = this.eat("[deprecated]");
    if (isDeprecated && kind !== DefinitionKind.Message) {
      throw new SemanticError("Cannot deprecate this field", deprecated.line, deprecated.column);
    }

    this.expect(";");

    const field: Field =
      type === undefined
        ? { name: name.text, isArray, isDeprecated, id }
        : { name: name.text, type, isArray, isDeprecated, id };
    return { field, location: { line: name.line, column: name.column } };
  }
}

/**
 * Parses and verifies schema text.
 *
 * @example
 * ```typescript
 * const schema = parseSchema(`
 *   enum Type { FLAT = 0; ROUND = 1; }
 *   struct Color { byte red; byte green; byte blue; byte alpha; }
 *   message Example { uint clientID = 1; Type type = 2; Color[] colors = 3; }
 * `);
 * ```
 *
 * @throws MalformedSyntaxError when the text does not follow the grammar
 * @throws SemanticError when the schema breaks a naming, typing, id or nesting rule
 */
export function parseSchema(text: string): Schema {
  const { schema, locations } = new SchemaParser(tokenize(text)).parse();
  verifySchema(schema, locations);
  return schema;
}
