import { SemanticError } from "./errors";
import { DefinitionKind, NATIVE_TYPES, RESERVED_NAMES, type Definition, type Schema } from "./schema";
import { quote } from "./tokenizer";

/**
 * A 1-based source position. Line 0 means "unknown".
 */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
}

/**
 * Source positions for a schema, indexed in parallel with its definitions
 * and their fields.
 */
export interface SchemaLocations {
  readonly definitions: readonly SourceLocation[];
  readonly fields: readonly (readonly SourceLocation[])[];
}

const UNKNOWN_LOCATION: SourceLocation = { line: 0, column: 0 };

const VISITING = 1;
const DONE = 2;

/**
 * Returns the index of the first struct found to contain itself through
 * non-array struct fields, or -1.
 *
 * Uses an explicit stack with a three-colour state per definition
 * (unvisited, visiting, done), so schema depth never grows the call stack.
 */
export function findRecursiveStruct(definitions: readonly Definition[]): number {
  const indexByName = new Map<string, number>();
  definitions.forEach((definition, i) => indexByName.set(definition.name, i));

  const state = new Uint8Array(definitions.length);
  const stack: { definition: number; next: number }[] = [];

  for (let root = 0; root < definitions.length; root++) {
    if (definitions[root].kind !== DefinitionKind.Struct || state[root] !== 0) {
      continue;
    }

    state[root] = VISITING;
    stack.push({ definition: root, next: 0 });

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const fields = definitions[frame.definition].fields;

      if (frame.next >= fields.length) {
        state[frame.definition] = DONE;
        stack.pop();
        continue;
      }

      const field = fields[frame.next++];
      if (field.isArray || field.type === undefined) {
        continue;
      }

      const target = indexByName.get(field.type);
      if (target === undefined || definitions[target].kind !== DefinitionKind.Struct) {
        continue;
      }
      if (state[target] === VISITING) {
        return target;
      }
      if (state[target] !== DONE) {
        state[target] = VISITING;
        stack.push({ definition: target, next: 0 });
      }
    }
  }

  return -1;
}

/**
 * Throws if any struct contains itself through non-array fields.
 */
export function assertNoRecursiveStructs(
  definitions: readonly Definition[],
  locations?: SchemaLocations
): void {
  const recursive = findRecursiveStruct(definitions);
  if (recursive !== -1) {
    const location = locations?.definitions[recursive] ?? UNKNOWN_LOCATION;
    throw new SemanticError(
      `Recursive nesting of ${quote(definitions[recursive].name)} is not allowed`,
      location.line,
      location.column
    );
  }
}

/**
 * Checks the semantic rules of a parsed schema: unique and unreserved
 * definition names, resolvable field types, unique field names, valid field
 * ids and no self-containing structs.
 *
 * @throws SemanticError on the first violation found
 */
export function verifySchema(schema: Schema, locations?: SchemaLocations): void {
  const definitions = schema.definitions;
  const definedTypes = new Set<string>(NATIVE_TYPES);

  const definitionAt = (i: number): SourceLocation =>
    locations?.definitions[i] ?? UNKNOWN_LOCATION;
  const fieldAt = (i: number, j: number): SourceLocation =>
    locations?.fields[i]?.[j] ?? UNKNOWN_LOCATION;

  definitions.forEach((definition, i) => {
    const { line, column } = definitionAt(i);
    if (definedTypes.has(definition.name)) {
      throw new SemanticError(`The type ${quote(definition.name)} is defined twice`, line, column);
    }
    if (RESERVED_NAMES.includes(definition.name)) {
      throw new SemanticError(`The type name ${quote(definition.name)} is reserved`, line, column);
    }
    definedTypes.add(definition.name);
  });

  definitions.forEach((definition, i) => {
    const fields = definition.fields;
    const names = new Set<string>();

    fields.forEach((field, j) => {
      const { line, column } = fieldAt(i, j);
      if (names.has(field.name)) {
        throw new SemanticError(`The field name ${quote(field.name)} is used twice`, line, column);
      }
      names.add(field.name);
    });

    if (definition.kind === DefinitionKind.Enum) {
      return;
    }

    fields.forEach((field, j) => {
      if (field.type === undefined || !definedTypes.has(field.type)) {
        const { line, column } = fieldAt(i, j);
        throw new SemanticError(
          `The type ${quote(field.type ?? "")} is not defined for field ${quote(field.name)}`,
          line,
          column
        );
      }
    });

    const ids = new Set<number>();
    fields.forEach((field, j) => {
      const { line, column } = fieldAt(i, j);
      if (ids.has(field.id)) {
        throw new SemanticError(`The id for field ${quote(field.name)} is used twice`, line, column);
      }
      if (field.id <= 0) {
        throw new SemanticError(`The id for field ${quote(field.name)} must be positive`, line, column);
      }
      if (field.id > fields.length) {
        throw new SemanticError(
          `The id for field ${quote(field.name)} cannot be larger than ${fields.length}`,
          line,
          column
        );
      }
      ids.add(field.id);
    });
  });

  assertNoRecursiveStructs(definitions, locations);
}
